import { and, asc, count, eq, inArray, TransactionRollbackError } from 'drizzle-orm'
import { getDatabase } from '../db/client.js'
import { prReviewers, prs, teams, users } from '../db/schema.js'
import { StorageError } from '../errors.js'
import type { PRStatus, PullRequest, PullRequestWithReviewers, Team, User } from '../models.js'
import type { NewPullRequest, NewUser, ReplaceOutcome, ReviewStore } from './repository.js'

/**
 * Implementación de ReviewStore sobre PostgreSQL (drizzle + postgres-js).
 * Todo error del driver sale envuelto en StorageError con el nombre de la operación.
 */
export class PostgresReviewStore implements ReviewStore {
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw new StorageError(operation, error)
    }
  }

  private insertedRow<T>(operation: string, rows: T[]): T {
    const [row] = rows
    if (!row) {
      throw new StorageError(operation, new Error('insert returned no rows'))
    }
    return row
  }

  async createTeam(name: string): Promise<Team> {
    const rows = await this.run('create team', async () =>
      getDatabase().insert(teams).values({ name }).returning()
    )
    return this.insertedRow('create team', rows)
  }

  async getTeamById(id: number): Promise<Team | null> {
    const rows = await this.run('get team', async () =>
      getDatabase().select().from(teams).where(eq(teams.id, id)).limit(1)
    )
    return rows[0] ?? null
  }

  async findTeamByName(name: string): Promise<Team | null> {
    const rows = await this.run('find team by name', async () =>
      getDatabase().select().from(teams).where(eq(teams.name, name)).limit(1)
    )
    return rows[0] ?? null
  }

  async createUser(user: NewUser): Promise<User> {
    const rows = await this.run('create user', async () =>
      getDatabase()
        .insert(users)
        .values({ teamId: user.teamId, name: user.name, isActive: user.isActive })
        .returning()
    )
    return this.insertedRow('create user', rows)
  }

  async getUserById(id: number): Promise<User | null> {
    const rows = await this.run('get user', async () =>
      getDatabase().select().from(users).where(eq(users.id, id)).limit(1)
    )
    return rows[0] ?? null
  }

  async listActiveUsersInTeam(teamId: number): Promise<User[]> {
    return this.run('list active users', async () =>
      getDatabase()
        .select()
        .from(users)
        .where(and(eq(users.teamId, teamId), eq(users.isActive, true)))
        .orderBy(asc(users.id))
    )
  }

  async deactivateUsersInTeam(teamId: number, userIds: readonly number[]): Promise<User[]> {
    if (userIds.length === 0) {
      return []
    }

    return this.run('deactivate users', async () =>
      getDatabase()
        .update(users)
        .set({ isActive: false })
        .where(and(eq(users.teamId, teamId), inArray(users.id, [...userIds])))
        .returning()
    )
  }

  async createPR(pr: NewPullRequest): Promise<PullRequest> {
    const rows = await this.run('create PR', async () =>
      getDatabase()
        .insert(prs)
        .values({ title: pr.title, authorId: pr.authorId, status: pr.status })
        .returning()
    )
    return this.insertedRow('create PR', rows)
  }

  async getPRById(id: number): Promise<PullRequest | null> {
    const rows = await this.run('get PR', async () =>
      getDatabase().select().from(prs).where(eq(prs.id, id)).limit(1)
    )
    return rows[0] ?? null
  }

  async setPRStatus(id: number, status: PRStatus): Promise<PullRequest | null> {
    const rows = await this.run('set PR status', async () =>
      getDatabase().update(prs).set({ status }).where(eq(prs.id, id)).returning()
    )
    return rows[0] ?? null
  }

  async assignReviewers(prId: number, userIds: readonly number[]): Promise<void> {
    if (userIds.length === 0) {
      return
    }

    await this.run('assign reviewers', async () =>
      getDatabase()
        .insert(prReviewers)
        .values(userIds.map(userId => ({ prId, userId })))
        .onConflictDoNothing()
    )
  }

  async getReviewersByPR(prId: number): Promise<User[]> {
    const rows = await this.run('get reviewers by PR', async () =>
      getDatabase()
        .select({ user: users })
        .from(prReviewers)
        .innerJoin(users, eq(prReviewers.userId, users.id))
        .where(eq(prReviewers.prId, prId))
        .orderBy(asc(users.id))
    )
    return rows.map(row => row.user)
  }

  async replaceReviewer(prId: number, oldUserId: number, newUserId: number): Promise<ReplaceOutcome> {
    // El lock sobre la fila del PR serializa reasignaciones y merge del mismo PR
    return this.run('replace reviewer', async () => {
      try {
        return await getDatabase().transaction(async (tx): Promise<ReplaceOutcome> => {
          const [pr] = await tx
            .select({ status: prs.status })
            .from(prs)
            .where(eq(prs.id, prId))
            .for('update')

          if (!pr) {
            return 'pr-missing'
          }
          if (pr.status !== 'OPEN') {
            return 'merged'
          }

          const removed = await tx
            .delete(prReviewers)
            .where(and(eq(prReviewers.prId, prId), eq(prReviewers.userId, oldUserId)))
            .returning({ userId: prReviewers.userId })

          if (removed.length === 0) {
            return 'not-assigned'
          }

          const added = await tx
            .insert(prReviewers)
            .values({ prId, userId: newUserId })
            .onConflictDoNothing()
            .returning({ userId: prReviewers.userId })

          if (added.length === 0) {
            // Deshace el delete: el PR no puede quedar con un revisor de menos
            tx.rollback()
          }

          return 'replaced'
        })
      } catch (error) {
        if (error instanceof TransactionRollbackError) {
          return 'taken'
        }
        throw error
      }
    })
  }

  async listPRsAssignedToUser(userId: number): Promise<PullRequestWithReviewers[]> {
    const rows = await this.run('list PRs assigned to user', async () =>
      getDatabase()
        .select({ pr: prs })
        .from(prReviewers)
        .innerJoin(prs, eq(prReviewers.prId, prs.id))
        .where(eq(prReviewers.userId, userId))
        .orderBy(asc(prs.id))
    )

    const result: PullRequestWithReviewers[] = []
    for (const { pr } of rows) {
      const reviewers = await this.getReviewersByPR(pr.id)
      result.push({ ...pr, reviewers })
    }
    return result
  }

  async countAssignments(): Promise<number> {
    const rows = await this.run('count assignments', async () =>
      getDatabase().select({ value: count() }).from(prReviewers)
    )
    return rows[0]?.value ?? 0
  }
}
