import type { PRStatus } from '../models.js'

/**
 * Máquina de estados del PR: OPEN -> MERGED. MERGED es terminal.
 *
 * Los guards reciben `string` y no `PRStatus` porque el valor viene del storage:
 * un status desconocido tiene que terminar en error, no en una transición.
 */

export type MergePlan =
  | { action: 'transition'; to: PRStatus }
  | { action: 'already-merged' }
  | { action: 'invalid'; status: string }

export function canReassign(status: string): boolean {
  return status === 'OPEN'
}

export function planMerge(status: string): MergePlan {
  switch (status) {
    case 'OPEN':
      return { action: 'transition', to: 'MERGED' }
    case 'MERGED':
      return { action: 'already-merged' }
    default:
      return { action: 'invalid', status }
  }
}
