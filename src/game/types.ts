// Game primitives
export type Player = 'X' | 'O'
export type Cell = Player | null
export type Winner = Player | null

// board[row][col]
export type Board = readonly (readonly Cell[])[]

export interface Move {
  row: number
  col: number
}

// One position of the game. Treated as a value: transitions return a new state.
export interface GameState {
  board: Board
  turn: Player
  moveCount: number
}

export interface Outcome {
  over: boolean
  winner: Winner
}

export interface WinningLine {
  player: Player
  pattern: number
  cells: Move[]
}

export type GamePhase =
  | { kind: 'awaitingInput' }
  | { kind: 'awaitingStrategy' }
  | { kind: 'gameOver'; winner: Winner }

export type StrategyKind = 'random' | 'minimax'
export type OpeningPolicy = 'random' | 'strategy'
