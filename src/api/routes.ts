import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { ReviewAssignmentEngine } from '../assignment/engine.js'
import { sendError } from './errors.js'
import { serializePullRequest, serializeTeam, serializeUser } from './serializers.js'

// Columnas INT de Postgres
const MAX_ID = 2147483647

const id = z.coerce.number().int().positive().max(MAX_ID)
const bodyId = z.number().int().positive().max(MAX_ID)
const nonEmpty = z.string().trim().min(1, 'is required')

const TeamParams = z.object({ team_id: id })
const PrParams = z.object({ pr_id: id })
const UserParams = z.object({ user_id: id })

const CreateTeamBody = z.object({ name: nonEmpty })
const CreateTeamUserBody = z.object({
  name: nonEmpty,
  is_active: z.boolean().default(true),
})
const CreateUserBody = z.object({
  name: nonEmpty,
  team_id: bodyId.nullable().default(null),
  is_active: z.boolean().default(true),
})
const DeactivateUsersBody = z.object({
  user_ids: z.array(bodyId).min(1),
})
const CreatePRBody = z.object({
  title: nonEmpty,
  author_id: bodyId,
})
const ReassignBody = z.object({
  old_user_id: bodyId,
})

/**
 * Rutas HTTP del servicio. Solo validan forma y delegan en el engine.
 */
export function registerRoutes(server: FastifyInstance, engine: ReviewAssignmentEngine) {
  server.post('/teams', async (request, reply) => {
    try {
      const body = CreateTeamBody.parse(request.body)
      const team = await engine.createTeam(body.name)
      return reply.code(201).send(serializeTeam(team))
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  server.post('/teams/:team_id/users', async (request, reply) => {
    try {
      const { team_id } = TeamParams.parse(request.params)
      const body = CreateTeamUserBody.parse(request.body)
      const user = await engine.createUser(team_id, body.name, body.is_active)
      return reply.code(201).send(serializeUser(user))
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  server.post('/teams/:team_id/users/deactivate', async (request, reply) => {
    try {
      const { team_id } = TeamParams.parse(request.params)
      const body = DeactivateUsersBody.parse(request.body)
      const users = await engine.deactivateUsers(team_id, body.user_ids)
      return reply.code(200).send({ deactivated: users.map(serializeUser) })
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  // Usuarios sin equipo: se crean por acá con team_id null u omitido
  server.post('/users', async (request, reply) => {
    try {
      const body = CreateUserBody.parse(request.body)
      const user = await engine.createUser(body.team_id, body.name, body.is_active)
      return reply.code(201).send(serializeUser(user))
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  server.post('/prs', async (request, reply) => {
    try {
      const body = CreatePRBody.parse(request.body)
      const pr = await engine.createPR(body.title, body.author_id)
      return reply.code(201).send(serializePullRequest(pr))
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  server.post('/prs/:pr_id/reassign', async (request, reply) => {
    try {
      const { pr_id } = PrParams.parse(request.params)
      const body = ReassignBody.parse(request.body)
      const pr = await engine.reassignReviewer(pr_id, body.old_user_id)
      return reply.code(200).send(serializePullRequest(pr))
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  server.post('/prs/:pr_id/merge', async (request, reply) => {
    try {
      const { pr_id } = PrParams.parse(request.params)
      const pr = await engine.mergePR(pr_id)
      return reply.code(200).send(serializePullRequest(pr))
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  server.get('/users/:user_id/prs', async (request, reply) => {
    try {
      const { user_id } = UserParams.parse(request.params)
      const prs = await engine.listPRsAssignedToUser(user_id)
      return reply.code(200).send(prs.map(serializePullRequest))
    } catch (error) {
      return sendError(reply, error, request)
    }
  })

  server.get('/stats', async (request, reply) => {
    try {
      const total = await engine.statsAssignments()
      return reply.code(200).send({ total_assignments: total })
    } catch (error) {
      return sendError(reply, error, request)
    }
  })
}
