import type { Board, Cell, Position, Seat } from './types.js'

// Line directions scanned through a piece: row step, column step
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1], // horizontal
  [1, 0], // vertical
  [1, 1], // diagonal down-right
  [1, -1], // diagonal down-left
]

export function otherSeat(seat: Seat): Seat {
  return seat === 'P1' ? 'P2' : 'P1'
}

export function createBoard(rows: number, columns: number): Board {
  return Array.from({ length: rows }, () => Array<Cell>(columns).fill(null))
}

export function cloneBoard(board: Board): Board {
  return board.map(row => [...row])
}

export function columnCount(board: Board): number {
  return board.length > 0 ? board[0].length : 0
}

export function inBounds(board: Board, row: number, column: number): boolean {
  return row >= 0 && row < board.length && column >= 0 && column < columnCount(board)
}

/**
 * Lowest empty row of a column (highest row index), or null when the
 * column is full or does not exist.
 */
export function getDropRow(board: Board, column: number): number | null {
  if (!inBounds(board, 0, column)) {
    return null
  }
  for (let row = board.length - 1; row >= 0; row--) {
    if (board[row][column] === null) {
      return row
    }
  }
  return null
}

export function isColumnFull(board: Board, column: number): boolean {
  return board.length === 0 || board[0][column] !== null
}

export function isBoardFull(board: Board): boolean {
  return board.length === 0 || board[0].every(cell => cell !== null)
}

export function validColumns(board: Board): number[] {
  const columns: number[] = []
  for (let column = 0; column < columnCount(board); column++) {
    if (!isColumnFull(board, column)) {
      columns.push(column)
    }
  }
  return columns
}

/**
 * Finds a run of at least `connect` same-seat cells through `lastMove`.
 * The returned line is ordered from one end of the run to the other.
 */
export function findWinningLine(board: Board, lastMove: Position, connect = 4): Position[] | null {
  const { row, column } = lastMove
  if (!inBounds(board, row, column)) {
    return null
  }
  const seat = board[row][column]
  if (seat === null) {
    return null
  }

  for (const [dr, dc] of DIRECTIONS) {
    // Walk back to the start of the run, then collect forwards
    let startRow = row
    let startColumn = column
    while (inBounds(board, startRow - dr, startColumn - dc) && board[startRow - dr][startColumn - dc] === seat) {
      startRow -= dr
      startColumn -= dc
    }

    const line: Position[] = []
    let r = startRow
    let c = startColumn
    while (inBounds(board, r, c) && board[r][c] === seat) {
      line.push({ row: r, column: c })
      r += dr
      c += dc
    }

    if (line.length >= connect) {
      return line
    }
  }
  return null
}

export function checkWinner(board: Board, lastMove: Position, connect = 4): Seat | null {
  const line = findWinningLine(board, lastMove, connect)
  if (!line) {
    return null
  }
  return board[lastMove.row][lastMove.column]
}

function hasAnyWinner(board: Board, connect: number): boolean {
  for (let row = 0; row < board.length; row++) {
    for (let column = 0; column < board[row].length; column++) {
      if (board[row][column] !== null && findWinningLine(board, { row, column }, connect)) {
        return true
      }
    }
  }
  return false
}

export function checkDraw(board: Board, connect = 4): boolean {
  return isBoardFull(board) && !hasAnyWinner(board, connect)
}
