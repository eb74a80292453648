import type { User } from '../models.js'

export interface EligibilityExclusions {
  authorId: number
  /** Revisores ya asignados al PR (solo en reasignación) */
  assignedIds?: readonly number[]
  /** Revisor que se está reemplazando; nunca puede salir como su propio reemplazo */
  replacingId?: number
}

/**
 * Filtra el roster de un equipo y deja solo candidatos válidos para revisar.
 *
 * - Excluye al autor del PR
 * - Excluye revisores ya asignados y el revisor reemplazado
 * - Excluye usuarios inactivos (el roster ya debería venir filtrado)
 *
 * Mantiene el orden del roster, así la selección posterior es reproducible
 * con una semilla fija.
 */
export function filterCandidates(roster: readonly User[], exclusions: EligibilityExclusions): User[] {
  const excluded = new Set<number>(exclusions.assignedIds ?? [])
  excluded.add(exclusions.authorId)
  if (exclusions.replacingId !== undefined) {
    excluded.add(exclusions.replacingId)
  }

  return roster.filter(user => user.isActive && !excluded.has(user.id))
}
