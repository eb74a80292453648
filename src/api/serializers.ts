import type { PullRequestWithReviewers, Team, User } from '../models.js'

// Formato JSON expuesto por la API (snake_case)

export function serializeTeam(team: Team) {
  return {
    id: team.id,
    name: team.name,
    created_at: team.createdAt.toISOString(),
  }
}

export function serializeUser(user: User) {
  return {
    id: user.id,
    team_id: user.teamId,
    name: user.name,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
  }
}

export function serializePullRequest(pr: PullRequestWithReviewers) {
  return {
    id: pr.id,
    title: pr.title,
    author_id: pr.authorId,
    status: pr.status,
    created_at: pr.createdAt.toISOString(),
    reviewers: pr.reviewers.map(serializeUser),
  }
}
