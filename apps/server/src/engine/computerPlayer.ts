import type { EngineSettings, EngineState, Board, Seat } from './types.js'
import { cloneBoard, getDropRow, findWinningLine, otherSeat, validColumns } from './board.js'

// Columns ordered centre-first, lower index breaks ties
function orderedColumns(board: Board, columns: number): number[] {
  const center = (columns - 1) / 2
  return validColumns(board).sort((a, b) => Math.abs(a - center) - Math.abs(b - center) || a - b)
}

function dropWins(board: Board, column: number, seat: Seat, connect: number): boolean {
  const row = getDropRow(board, column)
  if (row === null) {
    return false
  }
  const next = cloneBoard(board)
  next[row][column] = seat
  return findWinningLine(next, { row, column }, connect) !== null
}

// True when dropping in `column` leaves the opponent an immediate win on top of it
function opensWinAbove(board: Board, column: number, seat: Seat, connect: number): boolean {
  const row = getDropRow(board, column)
  if (row === null || row === 0) {
    return false
  }
  const next = cloneBoard(board)
  next[row][column] = seat
  return dropWins(next, column, otherSeat(seat), connect)
}

/**
 * Picks a column for the seat to move: win now, else block the opponent,
 * else the most central column that does not hand over a win.
 */
export function chooseColumn(state: EngineState, settings: EngineSettings): number | null {
  if (state.status !== 'in-progress') {
    return null
  }

  const { board, currentTurn: me } = state
  const candidates = orderedColumns(board, settings.columns)
  if (candidates.length === 0) {
    return null
  }

  const winning = candidates.find(column => dropWins(board, column, me, settings.connect))
  if (winning !== undefined) {
    return winning
  }

  const blocking = candidates.find(column => dropWins(board, column, otherSeat(me), settings.connect))
  if (blocking !== undefined) {
    return blocking
  }

  const safe = candidates.find(column => !opensWinAbove(board, column, me, settings.connect))
  return safe ?? candidates[0]
}
