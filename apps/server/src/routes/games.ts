import type { FastifyPluginAsync } from 'fastify'
import type { Seat } from '../engine/types.js'
import type { GameService } from '../services/gameService.js'
import { errorBody, statusForReason } from '../errors.js'

export interface GameRoutesOptions {
  gameService: GameService
}

interface GameParams {
  gameId: string
}

interface CreateGameQuery {
  player1Name?: string
  player2Name?: string
  humanPlayers: 0 | 1 | 2
}

interface MoveQuery {
  playerId: Seat
  column: number
}

const gameParamsSchema = {
  type: 'object',
  required: ['gameId'],
  properties: {
    gameId: { type: 'string', minLength: 1 },
  },
} as const

const createGameSchema = {
  querystring: {
    type: 'object',
    properties: {
      player1Name: { type: 'string', maxLength: 64 },
      player2Name: { type: 'string', maxLength: 64 },
      humanPlayers: { type: 'integer', enum: [0, 1, 2], default: 2 },
    },
  },
} as const

const moveSchema = {
  params: gameParamsSchema,
  querystring: {
    type: 'object',
    required: ['playerId', 'column'],
    properties: {
      playerId: { type: 'string', enum: ['P1', 'P2'] },
      column: { type: 'integer' },
    },
  },
} as const

export const gameRoutes: FastifyPluginAsync<GameRoutesOptions> = async (fastify, { gameService }) => {
  // Game management
  fastify.get('/games', async () => {
    return gameService.listGames().map(game => gameService.toView(game))
  })

  fastify.post<{ Querystring: CreateGameQuery }>('/games', { schema: createGameSchema }, async (request, reply) => {
    const { player1Name, player2Name, humanPlayers } = request.query
    const result = gameService.createGame({ player1Name, player2Name, humanPlayers })
    if (!result.success) {
      reply.code(statusForReason(result.reason))
      return errorBody(result.reason)
    }

    reply.code(201)
    return gameService.toView(result.game)
  })

  fastify.get<{ Params: GameParams }>('/games/:gameId', { schema: { params: gameParamsSchema } }, async (request, reply) => {
    const game = gameService.getGame(request.params.gameId)
    if (!game) {
      reply.code(404)
      return errorBody('game_not_found')
    }
    return gameService.toView(game)
  })

  fastify.post<{ Params: GameParams }>('/games/:gameId/restart', { schema: { params: gameParamsSchema } }, async (request, reply) => {
    const result = await gameService.restartGame(request.params.gameId)
    if (!result.success) {
      reply.code(statusForReason(result.reason))
      return errorBody(result.reason)
    }
    return gameService.toView(result.game)
  })

  fastify.post<{ Params: GameParams }>('/games/:gameId/quit', { schema: { params: gameParamsSchema } }, async (request, reply) => {
    const { gameId } = request.params
    const removed = await gameService.quitGame(gameId)
    if (!removed) {
      reply.code(404)
      return errorBody('game_not_found')
    }
    return { message: 'Game has been quit.', gameId }
  })

  // Gameplay
  fastify.post<{ Params: GameParams; Querystring: MoveQuery }>('/games/:gameId/moves', { schema: moveSchema }, async (request, reply) => {
    const result = await gameService.makeMove({
      gameId: request.params.gameId,
      seat: request.query.playerId,
      column: request.query.column,
    })
    if (!result.success) {
      reply.code(statusForReason(result.reason))
      return errorBody(result.reason)
    }
    return gameService.toView(result.game)
  })

  fastify.post<{ Params: GameParams }>('/games/:gameId/next_move', { schema: { params: gameParamsSchema } }, async (request, reply) => {
    const result = gameService.suggestMove(request.params.gameId)
    if (!result.success) {
      reply.code(statusForReason(result.reason))
      return errorBody(result.reason)
    }
    return { message: 'Next move calculated.', nextMove: result.column }
  })

  fastify.post<{ Params: GameParams }>('/games/:gameId/computer_move', { schema: { params: gameParamsSchema } }, async (request, reply) => {
    const result = await gameService.playComputerMove(request.params.gameId)
    if (!result.success) {
      reply.code(statusForReason(result.reason))
      return errorBody(result.reason)
    }
    return gameService.toView(result.game)
  })
}
