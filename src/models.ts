export interface Team {
  id: number
  name: string
  createdAt: Date
}

export interface User {
  id: number
  teamId: number | null // null = usuario sin equipo
  name: string
  isActive: boolean
  createdAt: Date
}

export const PR_STATUSES = ['OPEN', 'MERGED'] as const

export type PRStatus = (typeof PR_STATUSES)[number]

export interface PullRequest {
  id: number
  title: string
  authorId: number
  status: PRStatus
  createdAt: Date
}

export interface PullRequestWithReviewers extends PullRequest {
  reviewers: User[]
}

/**
 * Cantidad objetivo de revisores por PR.
 * Si el equipo tiene menos candidatos elegibles, se asignan los que haya.
 */
export const REVIEWERS_PER_PR = 2
