import type { Move } from '../types'

export interface SearchConfig {
  maxDepth: number
  // Score wins by how soon they happen instead of all alike (default true)
  preferFasterWins?: boolean
  pruning?: boolean
  debug?: boolean
}

export interface SearchResult {
  move: Move
  score: number
  depth: number
  nodes: number
  time: number
}

export const WIN_SCORE = 10
export const DRAW_SCORE = 0
