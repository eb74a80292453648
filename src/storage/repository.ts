import type { PRStatus, PullRequest, PullRequestWithReviewers, Team, User } from '../models.js'

export interface NewUser {
  teamId: number | null
  name: string
  isActive: boolean
}

export interface NewPullRequest {
  title: string
  authorId: number
  status: PRStatus
}

/**
 * Resultado de replaceReviewer. Solo 'replaced' implica escritura; el resto
 * deja los revisores del PR sin cambios.
 */
export type ReplaceOutcome =
  | 'replaced'
  | 'pr-missing' // el PR ya no existe
  | 'merged' // el PR dejó de estar OPEN
  | 'not-assigned' // el revisor saliente ya no está asignado
  | 'taken' // el revisor entrante ya está asignado

/**
 * Contrato de persistencia que consume el engine.
 *
 * Cada operación es atómica por sí sola. Los lookups devuelven null si la entidad
 * no existe; cualquier otra falla se lanza como StorageError.
 */
export interface ReviewStore {
  createTeam(name: string): Promise<Team>
  getTeamById(id: number): Promise<Team | null>
  findTeamByName(name: string): Promise<Team | null>

  createUser(user: NewUser): Promise<User>
  getUserById(id: number): Promise<User | null>
  /** Usuarios activos del equipo, ordenados por id */
  listActiveUsersInTeam(teamId: number): Promise<User[]>
  /** Desactiva solo los ids que pertenecen al equipo; devuelve los usuarios afectados */
  deactivateUsersInTeam(teamId: number, userIds: readonly number[]): Promise<User[]>

  createPR(pr: NewPullRequest): Promise<PullRequest>
  getPRById(id: number): Promise<PullRequest | null>
  /** Devuelve el PR actualizado, o null si no existe */
  setPRStatus(id: number, status: PRStatus): Promise<PullRequest | null>

  /** Idempotente: un par (pr, reviewer) duplicado no es error */
  assignReviewers(prId: number, userIds: readonly number[]): Promise<void>
  /** Revisores del PR, ordenados por id de usuario */
  getReviewersByPR(prId: number): Promise<User[]>
  /**
   * Borra (pr, old) e inserta (pr, new) como una sola unidad, solo si el PR sigue
   * OPEN, old sigue asignado y new no lo está. Revalida todo al escribir: lo que
   * el caller leyó antes puede estar desactualizado.
   */
  replaceReviewer(prId: number, oldUserId: number, newUserId: number): Promise<ReplaceOutcome>

  listPRsAssignedToUser(userId: number): Promise<PullRequestWithReviewers[]>
  countAssignments(): Promise<number>
}
