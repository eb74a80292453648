import { pgTable, serial, text, integer, boolean, timestamp, primaryKey, index } from 'drizzle-orm/pg-core'
import type { PRStatus } from '../models.js'

/**
 * Teams
 * El nombre es único
 */
export const teams = pgTable('teams', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
})

/**
 * Users
 * team_id null = usuario sin equipo (nunca recibe revisores al crear un PR)
 */
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  teamId: integer('team_id').references(() => teams.id, { onDelete: 'set null' }),
  name: text('name').notNull(),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  teamIdx: index('idx_users_team_id').on(table.teamId),
}))

/**
 * Pull Requests
 */
export const prs = pgTable('prs', {
  id: serial('id').primaryKey(),
  title: text('title').notNull(),
  authorId: integer('author_id').notNull().references(() => users.id, { onDelete: 'restrict' }),
  status: text('status').$type<PRStatus>().notNull().default('OPEN'), // 'OPEN' | 'MERGED'
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  authorIdx: index('idx_prs_author_id').on(table.authorId),
}))

/**
 * PR Reviewers
 * La PK compuesta garantiza que nadie quede asignado dos veces al mismo PR
 */
export const prReviewers = pgTable('pr_reviewers', {
  prId: integer('pr_id').notNull().references(() => prs.id, { onDelete: 'cascade' }),
  userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'restrict' }),
  assignedAt: timestamp('assigned_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.prId, table.userId] }),
  userIdx: index('idx_pr_reviewers_user_id').on(table.userId),
}))
