import type { Board, EngineState, GameStatus, Position, Seat } from '../engine/types.js'

export type PlayerType = 'human' | 'computer'

export interface PlayerProfile {
  seat: Seat
  name: string
  color: 'red' | 'yellow'
  type: PlayerType
}

export interface MoveRecord {
  seat: Seat
  column: number
  row: number
  version: number
  timestamp: Date
}

export interface GameRecord {
  id: string
  players: Record<Seat, PlayerProfile>
  state: EngineState
  moves: MoveRecord[]
  createdAt: Date
  updatedAt: Date
}

// Serialized shape sent over HTTP and Socket.IO
export interface GameView {
  id: string
  board: Board
  rows: number
  columns: number
  connect: number
  players: Record<Seat, PlayerProfile>
  currentTurn: Seat
  status: GameStatus
  winner: Seat | null
  winningLine: Position[] | null
  lastMove: Position | null
  moveCount: number
  version: number
  createdAt: string
  updatedAt: string
}

// Socket event types
export interface ServerToClientEvents {
  gameState: (game: GameView) => void
  gameClosed: (data: { gameId: string }) => void
  gameError: (data: { gameId: string; error: string; message: string }) => void
}

export interface ClientToServerEvents {
  watchGame: (gameId: string) => void
  unwatchGame: (gameId: string) => void
}
