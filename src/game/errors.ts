import type { Move } from './types'

export type IllegalMoveReason = 'out-of-range' | 'occupied' | 'board-full'

export class IllegalMoveError extends Error {
  readonly move: Move
  readonly reason: IllegalMoveReason

  constructor (move: Move, reason: IllegalMoveReason) {
    super(`Illegal move (${move.row}, ${move.col}): ${reason}`)
    this.name = 'IllegalMoveError'
    this.move = move
    this.reason = reason
  }
}

// Raised when a move is requested from a finished game. Callers are expected
// to check isTerminal first, so this signals a bug rather than bad input.
export class NoLegalMoveError extends Error {
  constructor (message = 'No legal move: the game is already over') {
    super(message)
    this.name = 'NoLegalMoveError'
  }
}

export class InvalidConfigError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'InvalidConfigError'
  }
}
