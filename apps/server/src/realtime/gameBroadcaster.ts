import type { Namespace, Socket } from 'socket.io'
import type { GameService } from '../services/gameService.js'
import type { ClientToServerEvents, ServerToClientEvents } from '../types/game.js'

// Single namespace constant
export const NAMESPACE = '/game'

type GameNamespace = Namespace<ClientToServerEvents, ServerToClientEvents>
type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents>

export function roomForGame(gameId: string): string {
  return `game:${gameId}`
}

function logEvent(evt: string, fields: Record<string, unknown>): void {
  console.log(JSON.stringify({
    evt,
    ...fields,
    timestamp: new Date().toISOString(),
  }))
}

/**
 * Pushes game state to sockets watching a game. Subscribers join one room
 * per game id, every update from the game service is emitted to that room.
 */
export class GameBroadcaster {
  private unsubscribe: (() => void) | null = null

  constructor(
    private readonly namespace: GameNamespace,
    private readonly gameService: GameService,
  ) {}

  attach(): void {
    if (this.unsubscribe) {
      return
    }

    this.namespace.on('connection', (socket: GameSocket) => this.handleConnection(socket))

    this.unsubscribe = this.gameService.subscribe({
      gameUpdated: game => {
        this.namespace.to(roomForGame(game.id)).emit('gameState', this.gameService.toView(game))
      },
      gameClosed: (gameId, reason) => {
        const room = roomForGame(gameId)
        this.namespace.to(room).emit('gameClosed', { gameId })
        this.namespace.socketsLeave(room)
        logEvent('watch.closed', { gameId, reason })
      },
    })
  }

  detach(): void {
    this.unsubscribe?.()
    this.unsubscribe = null
    this.namespace.removeAllListeners('connection')
  }

  private handleConnection(socket: GameSocket): void {
    socket.on('watchGame', (gameId: string) => {
      const game = this.gameService.getGame(gameId)
      if (!game) {
        socket.emit('gameError', { gameId, error: 'game_not_found', message: 'Game not found' })
        return
      }

      void socket.join(roomForGame(gameId))
      logEvent('watch.start', { socketId: socket.id, gameId })
      socket.emit('gameState', this.gameService.toView(game))
    })

    socket.on('unwatchGame', (gameId: string) => {
      void socket.leave(roomForGame(gameId))
      logEvent('watch.stop', { socketId: socket.id, gameId })
    })
  }
}
