import { badRequest, notFound, ReviewError } from '../errors.js'
import { REVIEWERS_PER_PR, type PullRequestWithReviewers, type Team, type User } from '../models.js'
import type { ReviewStore } from '../storage/repository.js'
import { logger } from '../utils/logger.js'
import { filterCandidates } from './eligibility.js'
import { canReassign, planMerge } from './lifecycle.js'
import { pickOne, sample, type RandomSource } from './random.js'

/**
 * Orquesta la asignación de revisores sobre un ReviewStore.
 *
 * Reglas:
 * - Al crear un PR se eligen hasta REVIEWERS_PER_PR compañeros activos del autor, nunca el autor
 * - La reasignación cambia exactamente un revisor por otro, en una sola operación atómica
 * - Un PR MERGED no admite cambios de revisores
 *
 * Después de cada escritura se releen los revisores del storage; la respuesta
 * refleja lo persistido, no la selección en memoria.
 *
 * Los errores del storage no se capturan: llegan al caller tal cual.
 */
export class ReviewAssignmentEngine {
  constructor(
    private readonly store: ReviewStore,
    private readonly random: RandomSource
  ) {}

  async createTeam(name: string): Promise<Team> {
    logger.info({ name }, 'Creating team')

    if (name.trim() === '') {
      throw badRequest('team name empty')
    }

    const existing = await this.store.findTeamByName(name)
    if (existing) {
      logger.warn({ name, teamId: existing.id }, 'Team name already taken')
      throw badRequest('team name already taken', { teamId: existing.id })
    }

    const team = await this.store.createTeam(name)
    logger.info({ teamId: team.id, name: team.name }, 'Team created')
    return team
  }

  async createUser(teamId: number | null, name: string, isActive: boolean): Promise<User> {
    logger.info({ name, teamId, isActive }, 'Creating user')

    if (name.trim() === '') {
      throw badRequest('user name empty')
    }

    if (teamId !== null) {
      const team = await this.store.getTeamById(teamId)
      if (!team) {
        logger.warn({ teamId }, 'Team not found for user creation')
        throw notFound('team', teamId)
      }
    }

    const user = await this.store.createUser({ teamId, name, isActive })
    logger.info({ userId: user.id, name: user.name, teamId }, 'User created')
    return user
  }

  async deactivateUsers(teamId: number, userIds: readonly number[]): Promise<User[]> {
    logger.info({ teamId, userIds }, 'Deactivating users')

    if (userIds.length === 0) {
      throw badRequest('user_ids must not be empty', { teamId })
    }

    const team = await this.store.getTeamById(teamId)
    if (!team) {
      throw notFound('team', teamId)
    }

    const deactivated = await this.store.deactivateUsersInTeam(teamId, userIds)
    logger.info({
      teamId,
      requested: userIds.length,
      deactivated: deactivated.map(u => u.id),
    }, 'Users deactivated')
    return deactivated
  }

  async createPR(title: string, authorId: number): Promise<PullRequestWithReviewers> {
    logger.info({ title, authorId }, 'Creating PR')

    const author = await this.store.getUserById(authorId)
    if (!author) {
      logger.warn({ authorId }, 'Author not found')
      throw notFound('author', authorId)
    }

    if (!author.isActive) {
      logger.warn({ authorId }, 'Author is not active')
      throw new ReviewError('AUTHOR_INACTIVE', 'author is not active', { userId: authorId })
    }

    const pr = await this.store.createPR({ title, authorId, status: 'OPEN' })

    // Autor sin equipo: no se buscan candidatos
    if (author.teamId === null) {
      logger.info({ prId: pr.id }, 'PR created without reviewers (author has no team)')
      return { ...pr, reviewers: [] }
    }

    const roster = await this.store.listActiveUsersInTeam(author.teamId)
    const candidates = filterCandidates(roster, { authorId })
    const chosen = sample(candidates, REVIEWERS_PER_PR, this.random)

    if (chosen.length > 0) {
      await this.store.assignReviewers(pr.id, chosen.map(u => u.id))
    }

    const reviewers = await this.store.getReviewersByPR(pr.id)

    logger.info({
      prId: pr.id,
      teamId: author.teamId,
      candidates: candidates.length,
      reviewerIds: reviewers.map(u => u.id),
    }, 'PR created')

    return { ...pr, reviewers }
  }

  async reassignReviewer(prId: number, oldUserId: number): Promise<PullRequestWithReviewers> {
    logger.info({ prId, oldUserId }, 'Reassigning reviewer')

    const pr = await this.store.getPRById(prId)
    if (!pr) {
      logger.warn({ prId }, 'PR not found for reassignment')
      throw notFound('pr', prId)
    }

    if (!canReassign(pr.status)) {
      logger.warn({ prId, status: pr.status }, 'Attempt to reassign reviewer on merged PR')
      throw new ReviewError('PR_MERGED', 'cannot reassign merged pr', { prId })
    }

    const oldReviewer = await this.store.getUserById(oldUserId)
    if (!oldReviewer) {
      logger.warn({ userId: oldUserId }, 'Old reviewer not found')
      throw notFound('user', oldUserId)
    }

    if (oldReviewer.teamId === null) {
      logger.warn({ userId: oldUserId }, 'Reviewer has no team')
      throw badRequest('reviewer has no team', { prId, userId: oldUserId })
    }

    const currentReviewers = await this.store.getReviewersByPR(prId)
    if (!currentReviewers.some(u => u.id === oldUserId)) {
      logger.warn({ prId, userId: oldUserId }, 'Old reviewer not assigned to PR')
      throw new ReviewError('NOT_ASSIGNED', 'reviewer is not assigned to this PR', { prId, userId: oldUserId })
    }

    const roster = await this.store.listActiveUsersInTeam(oldReviewer.teamId)
    const candidates = filterCandidates(roster, {
      authorId: pr.authorId,
      assignedIds: currentReviewers.map(u => u.id),
      replacingId: oldUserId,
    })

    const replacement = pickOne(candidates, this.random)
    if (!replacement) {
      logger.warn({ prId, oldUserId, teamId: oldReviewer.teamId }, 'No available candidates for reassignment')
      throw new ReviewError('NO_CANDIDATE', 'no active candidates to reassign', {
        prId,
        userId: oldUserId,
        teamId: oldReviewer.teamId,
      })
    }

    // El store revalida al escribir: otra request pudo cambiar el PR desde las lecturas de arriba
    const outcome = await this.store.replaceReviewer(prId, oldUserId, replacement.id)
    switch (outcome) {
      case 'replaced':
        break

      case 'pr-missing':
        throw notFound('pr', prId)

      case 'merged':
        logger.warn({ prId }, 'PR merged during reassignment')
        throw new ReviewError('PR_MERGED', 'cannot reassign merged pr', { prId })

      case 'not-assigned':
        logger.warn({ prId, userId: oldUserId }, 'Old reviewer unassigned during reassignment')
        throw new ReviewError('NOT_ASSIGNED', 'reviewer is not assigned to this PR', { prId, userId: oldUserId })

      case 'taken':
        logger.warn({ prId, oldUserId, newUserId: replacement.id }, 'Replacement assigned during reassignment')
        throw new ReviewError('NO_CANDIDATE', 'replacement reviewer was assigned concurrently', {
          prId,
          userId: oldUserId,
          teamId: oldReviewer.teamId,
        })
    }

    const reviewers = await this.store.getReviewersByPR(prId)

    logger.info({
      prId,
      oldUserId,
      newUserId: replacement.id,
      newUserName: replacement.name,
    }, 'Reviewer reassigned')

    return { ...pr, reviewers }
  }

  async mergePR(prId: number): Promise<PullRequestWithReviewers> {
    logger.info({ prId }, 'Merging PR')

    const pr = await this.store.getPRById(prId)
    if (!pr) {
      logger.warn({ prId }, 'PR not found for merge')
      throw notFound('pr', prId)
    }

    const plan = planMerge(pr.status)

    switch (plan.action) {
      case 'already-merged': {
        // Idempotente: sin escrituras
        logger.info({ prId }, 'PR already merged')
        const reviewers = await this.store.getReviewersByPR(prId)
        return { ...pr, reviewers }
      }

      case 'invalid':
        logger.error({ prId, status: plan.status }, 'PR has unexpected status')
        throw badRequest('can only merge OPEN pull requests', { prId })

      case 'transition': {
        const merged = await this.store.setPRStatus(prId, plan.to)
        if (!merged) {
          // El PR desapareció entre la lectura y la escritura
          throw notFound('pr', prId)
        }

        const reviewers = await this.store.getReviewersByPR(prId)
        logger.info({ prId, reviewers: reviewers.length }, 'PR merged')
        return { ...merged, reviewers }
      }
    }
  }

  async listPRsAssignedToUser(userId: number): Promise<PullRequestWithReviewers[]> {
    logger.debug({ userId }, 'Listing PRs assigned to user')

    const user = await this.store.getUserById(userId)
    if (!user) {
      logger.warn({ userId }, 'User not found for PRs query')
      throw notFound('user', userId)
    }

    const prs = await this.store.listPRsAssignedToUser(userId)
    logger.debug({ userId, prs: prs.length }, 'Retrieved PRs for user')
    return prs
  }

  async statsAssignments(): Promise<number> {
    return this.store.countAssignments()
  }
}
