import { Mutex } from 'async-mutex'
import { v4 as uuidv4 } from 'uuid'
import { Connect4Engine } from '../engine/connect4Engine.js'
import { chooseColumn } from '../engine/computerPlayer.js'
import type { EngineSettings, MoveRejection, Position, Seat } from '../engine/types.js'
import type { GameRecord, GameView, PlayerProfile, PlayerType } from '../types/game.js'

export interface GameServiceOptions {
  engine?: Partial<EngineSettings>
  maxGames?: number
  idleTtlMs?: number
  sweepIntervalMs?: number
}

export interface CreateGameRequest {
  player1Name?: string
  player2Name?: string
  humanPlayers: 0 | 1 | 2
}

export interface MoveRequest {
  gameId: string
  seat: Seat
  column: number
}

export type CreateGameResult =
  | { success: true; game: GameRecord }
  | { success: false; reason: 'game_limit_reached' }

export type MoveResult =
  | { success: true; game: GameRecord; position: Position }
  | { success: false; reason: MoveRejection | 'game_not_found' | 'not_computer_turn' | 'no_valid_moves' }

export type SuggestionResult =
  | { success: true; column: number }
  | { success: false; reason: 'game_not_found' | 'no_valid_moves' }

export type RestartResult =
  | { success: true; game: GameRecord }
  | { success: false; reason: 'game_not_found' }

export type GameCloseReason = 'quit' | 'expired'

export interface GameListener {
  gameUpdated?: (game: GameRecord) => void
  gameClosed?: (gameId: string, reason: GameCloseReason) => void
}

const PLAYER_COLORS: Record<Seat, PlayerProfile['color']> = {
  P1: 'red',
  P2: 'yellow',
}

function createPlayer(seat: Seat, name: string | undefined, type: PlayerType): PlayerProfile {
  const index = seat === 'P1' ? 1 : 2
  const fallback = type === 'human' ? `Player ${index}` : `Computer ${index}`
  const trimmed = name?.trim()
  return {
    seat,
    name: trimmed ? trimmed : fallback,
    color: PLAYER_COLORS[seat],
    type,
  }
}

export class GameService {
  private games = new Map<string, GameRecord>()
  private gameMutexes = new Map<string, Mutex>()
  private listeners = new Set<GameListener>()
  private sweepTimer: NodeJS.Timeout | null = null
  private readonly engine: Connect4Engine
  private readonly maxGames: number
  private readonly idleTtlMs: number
  private readonly sweepIntervalMs: number

  constructor(options: GameServiceOptions = {}) {
    this.engine = new Connect4Engine(options.engine)
    this.maxGames = options.maxGames ?? 1000
    this.idleTtlMs = options.idleTtlMs ?? 60 * 60 * 1000
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60 * 1000
  }

  get settings(): EngineSettings {
    return this.engine.settings
  }

  subscribe(listener: GameListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  createGame(request: CreateGameRequest): CreateGameResult {
    if (this.games.size >= this.maxGames) {
      this.logEvent('game.reject', { reason: 'game_limit_reached', games: this.games.size })
      return { success: false, reason: 'game_limit_reached' }
    }

    const now = new Date()
    const game: GameRecord = {
      id: uuidv4(),
      players: {
        P1: createPlayer('P1', request.player1Name, request.humanPlayers > 0 ? 'human' : 'computer'),
        P2: createPlayer('P2', request.player2Name, request.humanPlayers > 1 ? 'human' : 'computer'),
      },
      state: this.engine.newGame(),
      moves: [],
      createdAt: now,
      updatedAt: now,
    }

    this.games.set(game.id, game)
    this.gameMutexes.set(game.id, new Mutex())

    this.logEvent('game.create', {
      gameId: game.id,
      p1: game.players.P1.type,
      p2: game.players.P2.type,
      rows: this.engine.settings.rows,
      columns: this.engine.settings.columns,
    })
    return { success: true, game }
  }

  getGame(gameId: string): GameRecord | undefined {
    return this.games.get(gameId)
  }

  listGames(): GameRecord[] {
    return Array.from(this.games.values())
  }

  async makeMove(request: MoveRequest): Promise<MoveResult> {
    const { gameId, seat, column } = request
    const mutex = this.gameMutexes.get(gameId)
    if (!mutex) {
      this.logEvent('move.reject', { gameId, seat, column, reason: 'game_not_found' })
      return { success: false, reason: 'game_not_found' }
    }

    return await mutex.runExclusive(() => this.applyMoveLocked(gameId, seat, column))
  }

  async playComputerMove(gameId: string): Promise<MoveResult> {
    const mutex = this.gameMutexes.get(gameId)
    if (!mutex) {
      return { success: false, reason: 'game_not_found' }
    }

    return await mutex.runExclusive((): MoveResult => {
      const game = this.games.get(gameId)
      if (!game) {
        return { success: false, reason: 'game_not_found' }
      }
      if (game.state.status !== 'in-progress') {
        return { success: false, reason: 'match_finished' }
      }

      const seat = game.state.currentTurn
      if (game.players[seat].type !== 'computer') {
        this.logEvent('move.reject', { gameId, seat, reason: 'not_computer_turn' })
        return { success: false, reason: 'not_computer_turn' }
      }

      const column = chooseColumn(game.state, this.engine.settings)
      if (column === null) {
        return { success: false, reason: 'no_valid_moves' }
      }
      return this.applyMoveLocked(gameId, seat, column)
    })
  }

  suggestMove(gameId: string): SuggestionResult {
    const game = this.games.get(gameId)
    if (!game) {
      return { success: false, reason: 'game_not_found' }
    }

    const column = chooseColumn(game.state, this.engine.settings)
    if (column === null) {
      return { success: false, reason: 'no_valid_moves' }
    }
    return { success: true, column }
  }

  async restartGame(gameId: string): Promise<RestartResult> {
    const mutex = this.gameMutexes.get(gameId)
    if (!mutex) {
      return { success: false, reason: 'game_not_found' }
    }

    return await mutex.runExclusive((): RestartResult => {
      const game = this.games.get(gameId)
      if (!game) {
        return { success: false, reason: 'game_not_found' }
      }

      // Players stay, board, turn and move log reset
      game.state = this.engine.newGame()
      game.moves = []
      game.updatedAt = new Date()

      this.logEvent('game.restart', { gameId })
      this.notifyUpdated(game)
      return { success: true, game }
    })
  }

  async quitGame(gameId: string): Promise<boolean> {
    const mutex = this.gameMutexes.get(gameId)
    if (!mutex) {
      return false
    }

    return await mutex.runExclusive(() => this.removeGame(gameId, 'quit'))
  }

  sweepIdleGames(now: Date = new Date()): string[] {
    const cutoff = now.getTime() - this.idleTtlMs
    const expired = Array.from(this.games.values())
      .filter(game => game.updatedAt.getTime() < cutoff)
      .map(game => game.id)

    for (const gameId of expired) {
      // A locked game is being played right now, leave it for the next sweep
      if (this.gameMutexes.get(gameId)?.isLocked()) {
        continue
      }
      this.removeGame(gameId, 'expired')
    }
    return expired.filter(gameId => !this.games.has(gameId))
  }

  startSweeper(): void {
    if (this.sweepTimer) {
      return
    }
    this.sweepTimer = setInterval(() => {
      this.sweepIdleGames()
    }, this.sweepIntervalMs)
    this.sweepTimer.unref()
  }

  destroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
    this.games.clear()
    this.gameMutexes.clear()
    this.listeners.clear()
  }

  toView(game: GameRecord): GameView {
    const { state } = game
    return {
      id: game.id,
      board: state.board.map(row => [...row]),
      rows: this.engine.settings.rows,
      columns: this.engine.settings.columns,
      connect: this.engine.settings.connect,
      players: { P1: { ...game.players.P1 }, P2: { ...game.players.P2 } },
      currentTurn: state.currentTurn,
      status: state.status,
      winner: state.winner,
      winningLine: state.winningLine,
      lastMove: state.lastMove,
      moveCount: state.moveCount,
      version: state.version,
      createdAt: game.createdAt.toISOString(),
      updatedAt: game.updatedAt.toISOString(),
    }
  }

  // Stats
  getGameCount(): number {
    return this.games.size
  }

  getActiveGameCount(): number {
    return this.listGames().filter(game => game.state.status === 'in-progress').length
  }

  getFinishedGameCount(): number {
    return this.listGames().filter(game => game.state.status !== 'in-progress').length
  }

  // Caller must hold the game's mutex
  private applyMoveLocked(gameId: string, seat: Seat, column: number): MoveResult {
    const game = this.games.get(gameId)
    if (!game) {
      this.logEvent('move.reject', { gameId, seat, column, reason: 'game_not_found' })
      return { success: false, reason: 'game_not_found' }
    }

    const outcome = this.engine.applyMove(game.state, column, seat)
    if (!outcome.success) {
      this.logEvent('move.reject', { gameId, seat, column, reason: outcome.reason, version: game.state.version })
      return { success: false, reason: outcome.reason }
    }

    const now = new Date()
    game.state = outcome.state
    game.updatedAt = now
    game.moves.push({
      seat,
      column,
      row: outcome.position.row,
      version: outcome.state.version,
      timestamp: now,
    })

    this.logEvent('move.accept', {
      gameId,
      seat,
      column,
      row: outcome.position.row,
      version: outcome.state.version,
      nextTurn: outcome.state.status === 'in-progress' ? outcome.state.currentTurn : null,
    })

    if (outcome.state.status !== 'in-progress') {
      this.logEvent('result.decided', {
        gameId,
        status: outcome.state.status,
        winner: outcome.state.winner,
        line: outcome.state.winningLine,
        version: outcome.state.version,
      })
    }

    this.notifyUpdated(game)
    return { success: true, game, position: outcome.position }
  }

  private removeGame(gameId: string, reason: GameCloseReason): boolean {
    if (!this.games.delete(gameId)) {
      return false
    }
    this.gameMutexes.delete(gameId)

    this.logEvent(reason === 'quit' ? 'game.quit' : 'game.expire', { gameId })
    for (const listener of this.listeners) {
      listener.gameClosed?.(gameId, reason)
    }
    return true
  }

  private notifyUpdated(game: GameRecord): void {
    for (const listener of this.listeners) {
      listener.gameUpdated?.(game)
    }
  }

  private logEvent(evt: string, fields: Record<string, unknown>): void {
    console.log(JSON.stringify({
      evt,
      ...fields,
      timestamp: new Date().toISOString(),
    }))
  }
}
