import type { FastifyPluginAsync } from 'fastify'
import type { GameService } from '../services/gameService.js'

export interface HealthRoutesOptions {
  gameService: GameService
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { gameService }) => {
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      games: gameService.getGameCount(),
    }
  })
}

// Dev only, registered outside production
export const debugRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { gameService }) => {
  fastify.get('/debug/games', async () => {
    return {
      total: gameService.getGameCount(),
      active: gameService.getActiveGameCount(),
      finished: gameService.getFinishedGameCount(),
      settings: gameService.settings,
      games: gameService.listGames().map(game => ({
        gameId: game.id,
        status: game.state.status,
        version: game.state.version,
        moves: game.moves.length,
        updatedAt: game.updatedAt.toISOString(),
      })),
    }
  })
}
