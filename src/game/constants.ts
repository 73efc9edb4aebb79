import type { Player } from './types'

// --- Board Constants ---
export const BOARD_SIZE = 3
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE

// Flat indices (row * 3 + col) of every row, column and diagonal
export const WIN_PATTERNS = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
]

export const FIRST_PLAYER: Player = 'O'

export const MARKS: Record<Player | 'empty', string> = {
  X: 'X',
  O: 'O',
  empty: ' ',
}

// --- Search Constants ---
export const DEFAULT_SEARCH_DEPTH = 8
export const MAX_SEARCH_DEPTH = CELL_COUNT
