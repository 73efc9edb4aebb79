import type { Board, Cell, GameState, Move, Outcome, Player, WinningLine } from './types'
import { BOARD_SIZE, CELL_COUNT, FIRST_PLAYER, MARKS, WIN_PATTERNS } from './constants'
import { IllegalMoveError, InvalidConfigError } from './errors'

export const opponent = (player: Player): Player => (player === 'X' ? 'O' : 'X')

export const fromIndex = (index: number): Move => ({
  row: Math.floor(index / BOARD_SIZE),
  col: index % BOARD_SIZE,
})

// Cell at a flat row-major index
export const cellAt = (board: Board, index: number): Cell =>
  board[Math.floor(index / BOARD_SIZE)][index % BOARD_SIZE]

export const emptyBoard = (): Cell[][] =>
  Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null))

/**
 * Builds a state. Without arguments this is the start position with
 * FIRST_PLAYER to move. Given a board, the move count is read off the cells
 * and the turn defaults to whoever is behind in marks.
 */
export const createState = (board?: Board, turn?: Player): GameState => {
  if (!board) {
    return { board: emptyBoard(), turn: turn ?? FIRST_PLAYER, moveCount: 0 }
  }

  if (board.length !== BOARD_SIZE || board.some(row => row.length !== BOARD_SIZE)) {
    throw new InvalidConfigError(`Board must be ${BOARD_SIZE}x${BOARD_SIZE}`)
  }

  let first = 0
  let second = 0
  for (const row of board) {
    for (const cell of row) {
      if (cell === FIRST_PLAYER) first++
      else if (cell !== null) second++
    }
  }

  return {
    board: board.map(row => [...row]),
    turn: turn ?? (first === second ? FIRST_PLAYER : opponent(FIRST_PLAYER)),
    moveCount: first + second,
  }
}

// Empty cells in row-major order. The search expands children in this order,
// so it also decides which of several equally scored moves wins.
export const legalMoves = (state: GameState): Move[] => {
  const moves: Move[] = []
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (state.board[row][col] === null) moves.push({ row, col })
    }
  }
  return moves
}

const inRange = (value: number): boolean =>
  Number.isInteger(value) && value >= 0 && value < BOARD_SIZE

export const isLegalMove = (state: GameState, move: Move): boolean =>
  inRange(move.row) &&
  inRange(move.col) &&
  state.moveCount < CELL_COUNT &&
  state.board[move.row][move.col] === null

export const apply = (state: GameState, move: Move): GameState => {
  if (!inRange(move.row) || !inRange(move.col)) {
    throw new IllegalMoveError(move, 'out-of-range')
  }
  if (state.moveCount >= CELL_COUNT) {
    throw new IllegalMoveError(move, 'board-full')
  }
  if (state.board[move.row][move.col] !== null) {
    throw new IllegalMoveError(move, 'occupied')
  }

  const board = state.board.map((row, r) =>
    r === move.row ? row.map((cell, c) => (c === move.col ? state.turn : cell)) : [...row]
  )

  return {
    board,
    turn: opponent(state.turn),
    moveCount: state.moveCount + 1,
  }
}

export const winningLines = (state: GameState): WinningLine[] => {
  const lines: WinningLine[] = []
  for (let i = 0; i < WIN_PATTERNS.length; i++) {
    const [a, b, c] = WIN_PATTERNS[i]
    const owner = cellAt(state.board, a)
    if (owner && owner === cellAt(state.board, b) && owner === cellAt(state.board, c)) {
      lines.push({ player: owner, pattern: i, cells: WIN_PATTERNS[i].map(fromIndex) })
    }
  }
  return lines
}

export const isTerminal = (state: GameState): Outcome => {
  for (const [a, b, c] of WIN_PATTERNS) {
    const owner = cellAt(state.board, a)
    if (owner && owner === cellAt(state.board, b) && owner === cellAt(state.board, c)) {
      return { over: true, winner: owner }
    }
  }
  if (state.moveCount === CELL_COUNT) return { over: true, winner: null }
  return { over: false, winner: null }
}

export const formatBoard = (state: GameState): string =>
  state.board
    .map(row => row.map(cell => MARKS[cell ?? 'empty']).join('|'))
    .join('\n-+-+-\n')

export const describeOutcome = (outcome: Outcome): string => {
  if (!outcome.over) return 'Tic-tac-toe!'
  return outcome.winner === null ? 'Draw!' : `${outcome.winner} wins!`
}
