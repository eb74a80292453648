import { StorageError } from '../errors.js'
import type { PRStatus, PullRequest, PullRequestWithReviewers, Team, User } from '../models.js'
import type { NewPullRequest, NewUser, ReplaceOutcome, ReviewStore } from './repository.js'

/**
 * ReviewStore en memoria.
 * Se usa en modo stateless (sin DATABASE_URL) y como store de los tests.
 * Replica las garantías de Postgres: ids autoincrementales, nombre de team único,
 * par (pr, reviewer) único y reemplazo atómico.
 */
export class InMemoryReviewStore implements ReviewStore {
  private teams = new Map<number, Team>()
  private users = new Map<number, User>()
  private prs = new Map<number, PullRequest>()
  // prId -> userIds
  private assignments = new Map<number, Set<number>>()

  private sequences = { team: 0, user: 0, pr: 0 }

  async createTeam(name: string): Promise<Team> {
    for (const team of this.teams.values()) {
      if (team.name === name) {
        throw new StorageError('create team', new Error(`duplicate team name "${name}"`))
      }
    }

    const team: Team = { id: ++this.sequences.team, name, createdAt: new Date() }
    this.teams.set(team.id, team)
    return { ...team }
  }

  async getTeamById(id: number): Promise<Team | null> {
    const team = this.teams.get(id)
    return team ? { ...team } : null
  }

  async findTeamByName(name: string): Promise<Team | null> {
    for (const team of this.teams.values()) {
      if (team.name === name) {
        return { ...team }
      }
    }
    return null
  }

  async createUser(input: NewUser): Promise<User> {
    if (input.teamId !== null && !this.teams.has(input.teamId)) {
      throw new StorageError('create user', new Error(`team ${input.teamId} does not exist`))
    }

    const user: User = {
      id: ++this.sequences.user,
      teamId: input.teamId,
      name: input.name,
      isActive: input.isActive,
      createdAt: new Date(),
    }
    this.users.set(user.id, user)
    return { ...user }
  }

  async getUserById(id: number): Promise<User | null> {
    const user = this.users.get(id)
    return user ? { ...user } : null
  }

  async listActiveUsersInTeam(teamId: number): Promise<User[]> {
    return [...this.users.values()]
      .filter(user => user.teamId === teamId && user.isActive)
      .sort((a, b) => a.id - b.id)
      .map(user => ({ ...user }))
  }

  async deactivateUsersInTeam(teamId: number, userIds: readonly number[]): Promise<User[]> {
    const deactivated: User[] = []
    for (const id of userIds) {
      const user = this.users.get(id)
      if (user && user.teamId === teamId) {
        user.isActive = false
        deactivated.push({ ...user })
      }
    }
    return deactivated
  }

  async createPR(input: NewPullRequest): Promise<PullRequest> {
    if (!this.users.has(input.authorId)) {
      throw new StorageError('create PR', new Error(`author ${input.authorId} does not exist`))
    }

    const pr: PullRequest = {
      id: ++this.sequences.pr,
      title: input.title,
      authorId: input.authorId,
      status: input.status,
      createdAt: new Date(),
    }
    this.prs.set(pr.id, pr)
    return { ...pr }
  }

  async getPRById(id: number): Promise<PullRequest | null> {
    const pr = this.prs.get(id)
    return pr ? { ...pr } : null
  }

  async setPRStatus(id: number, status: PRStatus): Promise<PullRequest | null> {
    const pr = this.prs.get(id)
    if (!pr) {
      return null
    }
    pr.status = status
    return { ...pr }
  }

  async assignReviewers(prId: number, userIds: readonly number[]): Promise<void> {
    this.ensureAssignable(prId, userIds, 'assign reviewers')

    const reviewers = this.reviewerSet(prId)
    for (const userId of userIds) {
      reviewers.add(userId)
    }
  }

  async getReviewersByPR(prId: number): Promise<User[]> {
    const reviewers: User[] = []
    for (const userId of this.assignments.get(prId) ?? []) {
      const user = this.users.get(userId)
      if (user) {
        reviewers.push({ ...user })
      }
    }
    return reviewers.sort((a, b) => a.id - b.id)
  }

  async replaceReviewer(prId: number, oldUserId: number, newUserId: number): Promise<ReplaceOutcome> {
    // Chequeos y mutación sin awaits de por medio: nada se intercala
    const pr = this.prs.get(prId)
    if (!pr) {
      return 'pr-missing'
    }
    this.ensureAssignable(prId, [newUserId], 'replace reviewer')

    if (pr.status !== 'OPEN') {
      return 'merged'
    }

    const reviewers = this.reviewerSet(prId)
    if (!reviewers.has(oldUserId)) {
      return 'not-assigned'
    }
    if (reviewers.has(newUserId)) {
      return 'taken'
    }

    reviewers.delete(oldUserId)
    reviewers.add(newUserId)
    return 'replaced'
  }

  async listPRsAssignedToUser(userId: number): Promise<PullRequestWithReviewers[]> {
    const result: PullRequestWithReviewers[] = []
    const prIds = [...this.assignments.entries()]
      .filter(([, reviewers]) => reviewers.has(userId))
      .map(([prId]) => prId)
      .sort((a, b) => a - b)

    for (const prId of prIds) {
      const pr = this.prs.get(prId)
      if (pr) {
        result.push({ ...pr, reviewers: await this.getReviewersByPR(prId) })
      }
    }
    return result
  }

  async countAssignments(): Promise<number> {
    let total = 0
    for (const reviewers of this.assignments.values()) {
      total += reviewers.size
    }
    return total
  }

  private reviewerSet(prId: number): Set<number> {
    let reviewers = this.assignments.get(prId)
    if (!reviewers) {
      reviewers = new Set()
      this.assignments.set(prId, reviewers)
    }
    return reviewers
  }

  // Equivalente a las foreign keys de pr_reviewers
  private ensureAssignable(prId: number, userIds: readonly number[], operation: string): void {
    if (!this.prs.has(prId)) {
      throw new StorageError(operation, new Error(`PR ${prId} does not exist`))
    }
    const missing = userIds.find(id => !this.users.has(id))
    if (missing !== undefined) {
      throw new StorageError(operation, new Error(`user ${missing} does not exist`))
    }
  }
}
