// Engine abstraction types - the game service stores EngineState as-is
export type Seat = 'P1' | 'P2'

export type Cell = Seat | null

// board[row][column], row 0 is the top row
export type Board = Cell[][]

export interface Position {
  row: number
  column: number
}

export type GameStatus = 'in-progress' | 'won' | 'draw'

export interface EngineSettings {
  rows: number
  columns: number
  connect: number // pieces in a row needed to win
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  rows: 6,
  columns: 7,
  connect: 4,
}

export interface EngineState {
  board: Board
  currentTurn: Seat
  status: GameStatus
  winner: Seat | null
  winningLine: Position[] | null
  lastMove: Position | null
  moveCount: number
  version: number
  finishedAt?: Date
}

export type MoveRejection = 'invalid_column' | 'column_full' | 'not_your_turn' | 'match_finished'

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: MoveRejection }

export interface DropApplication {
  board: Board
  position: Position
  version: number
  nextTurn: Seat
}

export type ResultCheck =
  | { status: 'in-progress' }
  | { status: 'won'; winner: Seat; winningLine: Position[] }
  | { status: 'draw' }

export type MoveOutcome =
  | { success: true; state: EngineState; position: Position }
  | { success: false; reason: MoveRejection }

// Main engine interface
export interface GameEngine {
  readonly settings: EngineSettings

  // Initialize a new game state
  newGame(): EngineState

  // Validate if a drop is legal
  validateDrop(state: EngineState, seat: Seat, column: number): ValidationResult

  // Apply a validated drop and return the mutation
  applyDrop(state: EngineState, seat: Seat, column: number): DropApplication

  // Check for win/draw after a drop
  checkResult(board: Board, lastMove: Position): ResultCheck

  // Validate, apply and evaluate in one step
  applyMove(state: EngineState, column: number, seat?: Seat): MoveOutcome
}
