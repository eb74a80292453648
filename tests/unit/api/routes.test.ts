import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { createServer } from '../../../src/server.js'
import type { GlobalConfig } from '../../../src/config/global.js'
import { StorageError } from '../../../src/errors.js'
import { InMemoryReviewStore } from '../../../src/storage/memory.js'
import { alwaysFirst } from '../../helpers/fixtures.js'

const config: GlobalConfig = {
  server: { port: 0, host: '127.0.0.1' },
  logging: { level: 'silent' },
  database: { enabled: false, pool_max: 10 },
  assignment: {},
}

describe('HTTP routes', () => {
  let server: FastifyInstance
  let store: InMemoryReviewStore

  beforeEach(async () => {
    store = new InMemoryReviewStore()
    server = await createServer({ config, store, random: alwaysFirst })
  })

  afterEach(async () => {
    await server.close()
  })

  async function post(url: string, payload?: object) {
    return server.inject({ method: 'POST', url, payload })
  }

  // Backend: A(1), B(2), C(3), D(4)
  async function seedBackend() {
    await post('/teams', { name: 'Backend' })
    for (const name of ['A', 'B', 'C', 'D']) {
      await post('/teams/1/users', { name })
    }
  }

  function reviewerIds(body: { reviewers: Array<{ id: number }> }): number[] {
    return body.reviewers.map(r => r.id)
  }

  it('GET /health debe reportar la DB deshabilitada', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ status: 'ok', database: 'disabled' })
  })

  it('POST /teams debe crear un team', async () => {
    const response = await post('/teams', { name: 'Backend' })

    expect(response.statusCode).toBe(201)
    expect(response.json()).toMatchObject({ id: 1, name: 'Backend' })
  })

  it('POST /teams/:team_id/users debe crear usuarios activos por defecto', async () => {
    await post('/teams', { name: 'Backend' })

    const response = await post('/teams/1/users', { name: 'alice' })

    expect(response.statusCode).toBe(201)
    expect(response.json()).toMatchObject({ id: 1, team_id: 1, name: 'alice', is_active: true })
  })

  it('POST /teams/:team_id/users debe devolver 404 si el team no existe', async () => {
    const response = await post('/teams/3/users', { name: 'alice' })

    expect(response.statusCode).toBe(404)
    expect(response.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'team not found' } })
  })

  it('POST /users debe crear un usuario sin team', async () => {
    const response = await post('/users', { name: 'loner' })

    expect(response.statusCode).toBe(201)
    expect(response.json()).toMatchObject({ id: 1, team_id: null, is_active: true })
  })

  it('flujo completo: crear, reasignar, mergear', async () => {
    await seedBackend()

    const created = await post('/prs', { title: 'Add cache', author_id: 1 })
    expect(created.statusCode).toBe(201)
    expect(created.json()).toMatchObject({ id: 1, title: 'Add cache', author_id: 1, status: 'OPEN' })
    expect(reviewerIds(created.json())).toEqual([2, 3])

    const reassigned = await post('/prs/1/reassign', { old_user_id: 2 })
    expect(reassigned.statusCode).toBe(200)
    expect(reviewerIds(reassigned.json())).toEqual([3, 4])

    const merged = await post('/prs/1/merge')
    expect(merged.statusCode).toBe(200)
    expect(merged.json()).toMatchObject({ status: 'MERGED' })
    expect(reviewerIds(merged.json())).toEqual([3, 4])

    const blocked = await post('/prs/1/reassign', { old_user_id: 3 })
    expect(blocked.statusCode).toBe(409)
    expect(blocked.json()).toEqual({ error: { code: 'PR_MERGED', message: 'cannot reassign merged pr' } })

    const mergedAgain = await post('/prs/1/merge')
    expect(mergedAgain.statusCode).toBe(200)
    expect(mergedAgain.json()).toEqual(merged.json())
  })

  it('POST /prs debe crear un PR sin revisores si el autor no tiene team', async () => {
    await post('/users', { name: 'loner' })

    const response = await post('/prs', { title: 'Docs', author_id: 1 })

    expect(response.statusCode).toBe(201)
    expect(response.json()).toMatchObject({ reviewers: [] })
  })

  it('POST /prs debe devolver 409 si el autor está inactivo', async () => {
    await post('/teams', { name: 'Backend' })
    await post('/teams/1/users', { name: 'A', is_active: false })

    const response = await post('/prs', { title: 'Nope', author_id: 1 })

    expect(response.statusCode).toBe(409)
    expect(response.json()).toEqual({ error: { code: 'AUTHOR_INACTIVE', message: 'author is not active' } })
  })

  it('POST /prs debe devolver 404 si el autor no existe', async () => {
    const response = await post('/prs', { title: 'Ghost', author_id: 9 })

    expect(response.statusCode).toBe(404)
    expect(response.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'author not found' } })
  })

  it('POST /prs debe validar el body', async () => {
    const response = await post('/prs', { title: '', author_id: 1 })

    expect(response.statusCode).toBe(400)
    expect(response.json()).toEqual({ error: { code: 'BAD_REQUEST', message: 'title: is required' } })
  })

  it('debe rechazar ids fuera del rango de las columnas INT', async () => {
    const byBody = await post('/prs', { title: 'Add cache', author_id: 2147483648 })
    const byParam = await server.inject({ method: 'GET', url: '/users/2147483648/prs' })
    const atLimit = await server.inject({ method: 'GET', url: '/users/2147483647/prs' })

    expect(byBody.statusCode).toBe(400)
    expect(byBody.json()).toEqual({
      error: { code: 'BAD_REQUEST', message: 'author_id: Number must be less than or equal to 2147483647' },
    })
    expect(byParam.statusCode).toBe(400)
    expect(byParam.json()).toMatchObject({ error: { code: 'BAD_REQUEST' } })
    expect(atLimit.statusCode).toBe(404)
  })

  it('debe devolver 400 ante JSON inválido', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/prs',
      headers: { 'content-type': 'application/json' },
      payload: '{not json',
    })

    expect(response.statusCode).toBe(400)
    expect(response.json()).toMatchObject({ error: { code: 'BAD_REQUEST' } })
  })

  it('POST /prs/:pr_id/merge debe validar el id', async () => {
    const response = await post('/prs/abc/merge')

    expect(response.statusCode).toBe(400)
    expect(response.json()).toMatchObject({ error: { code: 'BAD_REQUEST' } })
  })

  it('POST /prs/:pr_id/merge debe devolver 404 si el PR no existe', async () => {
    const response = await post('/prs/99/merge')

    expect(response.statusCode).toBe(404)
    expect(response.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'pr not found' } })
  })

  it('POST /prs/:pr_id/reassign debe devolver 409 NOT_ASSIGNED y NO_CANDIDATE', async () => {
    await post('/teams', { name: 'Backend' })
    for (const name of ['A', 'B', 'C']) {
      await post('/teams/1/users', { name })
    }
    await post('/prs', { title: 'Add cache', author_id: 1 })

    const notAssigned = await post('/prs/1/reassign', { old_user_id: 1 })
    expect(notAssigned.statusCode).toBe(409)
    expect(notAssigned.json()).toMatchObject({ error: { code: 'NOT_ASSIGNED' } })

    const noCandidate = await post('/prs/1/reassign', { old_user_id: 2 })
    expect(noCandidate.statusCode).toBe(409)
    expect(noCandidate.json()).toEqual({ error: { code: 'NO_CANDIDATE', message: 'no active candidates to reassign' } })
  })

  it('POST /teams/:team_id/users/deactivate debe desactivar usuarios', async () => {
    await seedBackend()

    const response = await post('/teams/1/users/deactivate', { user_ids: [2, 3] })

    expect(response.statusCode).toBe(200)
    expect(response.json().deactivated.map((u: { id: number; is_active: boolean }) => [u.id, u.is_active])).toEqual([
      [2, false],
      [3, false],
    ])
  })

  it('GET /users/:user_id/prs y GET /stats', async () => {
    await seedBackend()
    await post('/prs', { title: 'First', author_id: 1 })
    await post('/prs', { title: 'Second', author_id: 4 })

    const prs = await server.inject({ method: 'GET', url: '/users/3/prs' })
    expect(prs.statusCode).toBe(200)
    expect(prs.json().map((pr: { title: string }) => pr.title)).toEqual(['First'])

    const stats = await server.inject({ method: 'GET', url: '/stats' })
    expect(stats.json()).toEqual({ total_assignments: 4 })
  })

  it('debe responder 500 sin filtrar el error del storage', async () => {
    vi.spyOn(store, 'countAssignments').mockRejectedValueOnce(
      new StorageError('count assignments', new Error('password authentication failed'))
    )

    const response = await server.inject({ method: 'GET', url: '/stats' })

    expect(response.statusCode).toBe(500)
    expect(response.json()).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'internal server error' } })
  })
})
