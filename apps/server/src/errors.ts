import type { MoveRejection } from './engine/types.js'

export type GameErrorReason =
  | MoveRejection
  | 'game_not_found'
  | 'game_limit_reached'
  | 'not_computer_turn'
  | 'no_valid_moves'

export interface ErrorBody {
  error: string
  message: string
}

const ERROR_STATUS: Record<GameErrorReason, number> = {
  invalid_column: 400,
  column_full: 400,
  not_your_turn: 400,
  match_finished: 400,
  not_computer_turn: 400,
  no_valid_moves: 400,
  game_not_found: 404,
  game_limit_reached: 503,
}

const ERROR_MESSAGES: Record<GameErrorReason, string> = {
  invalid_column: 'Column out of bounds.',
  column_full: 'Column is full.',
  not_your_turn: "It's not your turn.",
  match_finished: 'Game is already over.',
  not_computer_turn: 'The player to move is not a computer.',
  no_valid_moves: 'No valid moves available.',
  game_not_found: 'Game not found',
  game_limit_reached: 'Too many games in progress, try again later.',
}

export function statusForReason(reason: GameErrorReason): number {
  return ERROR_STATUS[reason]
}

export function errorBody(reason: GameErrorReason): ErrorBody {
  return { error: reason, message: ERROR_MESSAGES[reason] }
}
