import Fastify, { type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { Server } from 'socket.io'
import type { ServerConfig } from './config.js'
import { GameService } from './services/gameService.js'
import { GameBroadcaster, NAMESPACE } from './realtime/gameBroadcaster.js'
import { gameRoutes } from './routes/games.js'
import { healthRoutes, debugRoutes } from './routes/health.js'
import type { ClientToServerEvents, ServerToClientEvents } from './types/game.js'

export interface BuildServerOptions {
  config: ServerConfig
  logger?: boolean
  gameService?: GameService
}

export interface GameServer {
  fastify: FastifyInstance
  io: Server<ClientToServerEvents, ServerToClientEvents>
  gameService: GameService
}

export async function buildServer(options: BuildServerOptions): Promise<GameServer> {
  const { config } = options

  const gameService = options.gameService ?? new GameService({
    engine: config.engine,
    maxGames: config.maxGames,
    idleTtlMs: config.gameIdleTtlMs,
    sweepIntervalMs: config.sweepIntervalMs,
  })

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  })

  await fastify.register(cors, {
    origin: config.corsOrigin,
    methods: ['GET', 'POST'],
    credentials: true,
  })

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      reply.code(400).send({ error: 'validation_error', message: error.message })
      return
    }

    const statusCode = error.statusCode ?? 500
    if (statusCode < 500) {
      reply.code(statusCode).send({ error: error.code ?? 'bad_request', message: error.message })
      return
    }

    request.log.error({ err: error }, 'request failed')
    reply.code(500).send({ error: 'internal_error', message: 'Internal server error' })
  })

  await fastify.register(healthRoutes, { gameService })
  await fastify.register(gameRoutes, { gameService })
  if (config.nodeEnv !== 'production') {
    await fastify.register(debugRoutes, { gameService })
  }

  const io = new Server<ClientToServerEvents, ServerToClientEvents>(fastify.server, {
    cors: {
      origin: config.corsOrigin,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  })

  const gameNamespace = io.of(NAMESPACE)
  const broadcaster = new GameBroadcaster(gameNamespace, gameService)
  broadcaster.attach()

  // Open sockets would keep the HTTP server from closing
  fastify.addHook('preClose', async () => {
    gameNamespace.local.disconnectSockets(true)
    io.local.disconnectSockets(true)
  })

  fastify.addHook('onClose', async () => {
    broadcaster.detach()
    gameService.destroy()
    await io.close()
  })

  return { fastify, io, gameService }
}
