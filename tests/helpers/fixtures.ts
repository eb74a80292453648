import type { RandomSource } from '../../src/assignment/random.js'
import type { Team, User } from '../../src/models.js'
import type { ReviewStore } from '../../src/storage/repository.js'

/** Siempre elige la primera posición disponible */
export const alwaysFirst: RandomSource = { nextInt: () => 0 }

/** Siempre elige la última posición disponible */
export const alwaysLast: RandomSource = { nextInt: (maxExclusive) => maxExclusive - 1 }

export interface MemberSeed {
  name: string
  isActive?: boolean
}

export async function seedTeam(
  store: ReviewStore,
  name: string,
  members: MemberSeed[]
): Promise<{ team: Team; users: User[] }> {
  const team = await store.createTeam(name)
  const users: User[] = []
  for (const member of members) {
    users.push(await store.createUser({
      teamId: team.id,
      name: member.name,
      isActive: member.isActive ?? true,
    }))
  }
  return { team, users }
}

export function ids(users: Array<{ id: number }>): number[] {
  return users.map(u => u.id)
}
