import { describe, it, expect } from 'vitest'
import { getTableConfig } from 'drizzle-orm/pg-core'
import { MIGRATION_STATEMENTS } from '../../../src/db/migrate.js'
import { prReviewers, prs, teams, users } from '../../../src/db/schema.js'

interface DdlColumn {
  name: string
  definition: string
}

function createTable(name: string): string {
  const statement = MIGRATION_STATEMENTS.find(s => s.startsWith(`CREATE TABLE IF NOT EXISTS ${name} (`))
  if (!statement) {
    throw new Error(`no CREATE TABLE for ${name}`)
  }
  return statement
}

function ddlColumns(statement: string): DdlColumn[] {
  const body = statement.slice(statement.indexOf('(') + 1, statement.lastIndexOf(')'))
  return body
    .split('\n')
    .map(line => line.trim().replace(/,$/, ''))
    .filter(line => line !== '' && !line.startsWith('PRIMARY KEY'))
    .map(line => ({ name: line.split(' ')[0] ?? '', definition: line }))
}

function ddlIndexes(table: string): string[] {
  return MIGRATION_STATEMENTS.flatMap(statement => {
    const match = /^CREATE INDEX IF NOT EXISTS (\w+) ON (\w+)\(/.exec(statement)
    return match && match[2] === table && match[1] ? [match[1]] : []
  })
}

describe('runMigrations DDL', () => {
  for (const table of [teams, users, prs, prReviewers]) {
    const config = getTableConfig(table)

    it(`debe coincidir con el schema de drizzle para ${config.name}`, () => {
      const columns = ddlColumns(createTable(config.name))

      expect(columns.map(c => c.name).sort()).toEqual(config.columns.map(c => c.name).sort())

      for (const column of config.columns) {
        const definition = columns.find(c => c.name === column.name)?.definition ?? ''
        if (column.primary) {
          expect(definition).toContain('PRIMARY KEY')
        } else {
          expect(definition.includes('NOT NULL')).toBe(column.notNull)
        }
      }

      expect(ddlIndexes(config.name).sort()).toEqual(config.indexes.map(index => index.config.name).sort())
    })
  }

  it('debe declarar la PK compuesta de pr_reviewers', () => {
    const [pk] = getTableConfig(prReviewers).primaryKeys
    const columns = pk?.columns.map(c => c.name).join(', ')

    expect(createTable('pr_reviewers')).toContain(`PRIMARY KEY (${columns})`)
  })
})
