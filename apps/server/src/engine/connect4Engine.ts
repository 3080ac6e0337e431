import { DEFAULT_ENGINE_SETTINGS } from './types.js'
import type {
  GameEngine,
  EngineSettings,
  EngineState,
  ValidationResult,
  DropApplication,
  ResultCheck,
  MoveOutcome,
  Board,
  Position,
  Seat,
} from './types.js'
import { createBoard, cloneBoard, getDropRow, findWinningLine, checkDraw, otherSeat } from './board.js'

export class Connect4Engine implements GameEngine {
  readonly settings: EngineSettings

  constructor(settings: Partial<EngineSettings> = {}) {
    this.settings = { ...DEFAULT_ENGINE_SETTINGS, ...settings }

    const { rows, columns, connect } = this.settings
    if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(columns) || columns < 1) {
      throw new RangeError(`Board must have at least one row and one column, got ${rows}x${columns}`)
    }
    if (!Number.isInteger(connect) || connect < 2) {
      throw new RangeError(`Connect length must be an integer >= 2, got ${connect}`)
    }
  }

  newGame(): EngineState {
    return {
      board: createBoard(this.settings.rows, this.settings.columns),
      currentTurn: 'P1', // P1 always starts
      status: 'in-progress',
      winner: null,
      winningLine: null,
      lastMove: null,
      moveCount: 0,
      version: 0,
      finishedAt: undefined,
    }
  }

  validateDrop(state: EngineState, seat: Seat, column: number): ValidationResult {
    if (state.status !== 'in-progress') {
      return { valid: false, reason: 'match_finished' }
    }

    if (state.currentTurn !== seat) {
      return { valid: false, reason: 'not_your_turn' }
    }

    if (!Number.isInteger(column) || column < 0 || column >= this.settings.columns) {
      return { valid: false, reason: 'invalid_column' }
    }

    if (getDropRow(state.board, column) === null) {
      return { valid: false, reason: 'column_full' }
    }

    return { valid: true }
  }

  applyDrop(state: EngineState, seat: Seat, column: number): DropApplication {
    const row = getDropRow(state.board, column)
    if (row === null) {
      throw new Error(`Cannot drop into column ${column}: validateDrop must pass first`)
    }

    const board = cloneBoard(state.board)
    board[row][column] = seat

    return {
      board,
      position: { row, column },
      version: state.version + 1,
      nextTurn: otherSeat(seat),
    }
  }

  checkResult(board: Board, lastMove: Position): ResultCheck {
    const line = findWinningLine(board, lastMove, this.settings.connect)
    const seat = board[lastMove.row][lastMove.column]
    if (line && seat !== null) {
      return { status: 'won', winner: seat, winningLine: line }
    }

    if (checkDraw(board, this.settings.connect)) {
      return { status: 'draw' }
    }

    return { status: 'in-progress' }
  }

  applyMove(state: EngineState, column: number, seat: Seat = state.currentTurn): MoveOutcome {
    const validation = this.validateDrop(state, seat, column)
    if (!validation.valid) {
      return { success: false, reason: validation.reason }
    }

    const application = this.applyDrop(state, seat, column)
    const result = this.checkResult(application.board, application.position)

    const next: EngineState = {
      board: application.board,
      currentTurn: result.status === 'in-progress' ? application.nextTurn : seat,
      status: result.status,
      winner: result.status === 'won' ? result.winner : null,
      winningLine: result.status === 'won' ? result.winningLine : null,
      lastMove: application.position,
      moveCount: state.moveCount + 1,
      version: application.version,
      finishedAt: result.status === 'in-progress' ? undefined : new Date(),
    }

    return { success: true, state: next, position: application.position }
  }
}
