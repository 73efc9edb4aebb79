import type { GameState, Player } from '../types'
import { WIN_PATTERNS } from '../constants'
import { cellAt, opponent } from '../logic'

const SCORES = {
  NEAR_WIN: 10, // 2 in an open line
  NEAR_LOSS: -10,
  ADVANTAGE: 1, // 1 in an open line
  DISADVANTAGE: -1,
}

// Keeps every heuristic value strictly inside (-1, 1), below any decided result
const SCALE = WIN_PATTERNS.length * SCORES.NEAR_WIN + 1

// Static value of an undecided position from the perspective of 'player'.
// Only reached when the search runs out of depth before the game ends.
export function evaluate (state: GameState, player: Player): number {
  const other = opponent(player)
  let score = 0

  for (const pattern of WIN_PATTERNS) {
    let pCount = 0
    let oCount = 0

    for (const idx of pattern) {
      const owner = cellAt(state.board, idx)
      if (owner === player) pCount++
      else if (owner === other) oCount++
    }

    if (pCount > 0 && oCount > 0) continue
    if (pCount === 2) score += SCORES.NEAR_WIN
    else if (oCount === 2) score += SCORES.NEAR_LOSS
    else if (pCount === 1) score += SCORES.ADVANTAGE
    else if (oCount === 1) score += SCORES.DISADVANTAGE
  }

  return score / SCALE
}
