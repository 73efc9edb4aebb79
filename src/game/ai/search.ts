import type { GameState, Move, Player, Winner } from '../types'
import { apply, isTerminal, legalMoves } from '../logic'
import { validateSearchDepth } from '../config'
import { NoLegalMoveError } from '../errors'
import { evaluate } from './evaluator'
import type { SearchConfig, SearchResult } from './types'
import { DRAW_SCORE, WIN_SCORE } from './types'

interface SearchContext {
  forPlayer: Player
  preferFasterWins: boolean
  pruning: boolean
  nodes: number
}

const terminalScore = (winner: Winner, ply: number, ctx: SearchContext): number => {
  if (winner === null) return DRAW_SCORE
  const magnitude = ctx.preferFasterWins ? WIN_SCORE - ply : WIN_SCORE
  return winner === ctx.forPlayer ? magnitude : -magnitude
}

/**
 * Picks the move for 'forPlayer' at 'state' by minimax, looking at most
 * 'maxDepth' plies ahead. Children are expanded in legalMoves order and the
 * first best one is kept, so equal scores resolve to the earliest cell.
 */
export function search (state: GameState, forPlayer: Player, config: SearchConfig): SearchResult {
  const maxDepth = validateSearchDepth(config.maxDepth)
  const startTime = performance.now()

  if (isTerminal(state).over) throw new NoLegalMoveError()
  const moves = legalMoves(state)
  if (moves.length === 0) throw new NoLegalMoveError()

  const ctx: SearchContext = {
    forPlayer,
    preferFasterWins: config.preferFasterWins ?? true,
    pruning: config.pruning ?? false,
    nodes: 1,
  }

  const maximizing = state.turn === forPlayer
  let bestMove = moves[0]
  let bestScore = maximizing ? -Infinity : Infinity
  let alpha = -Infinity
  let beta = Infinity

  for (const move of moves) {
    const score = minimax(apply(state, move), maxDepth - 1, 1, alpha, beta, ctx)

    if (maximizing ? score > bestScore : score < bestScore) {
      bestScore = score
      bestMove = move
    }

    if (ctx.pruning) {
      if (maximizing) alpha = Math.max(alpha, bestScore)
      else beta = Math.min(beta, bestScore)
    }
  }

  const result: SearchResult = {
    move: bestMove,
    score: bestScore,
    depth: maxDepth,
    nodes: ctx.nodes,
    time: performance.now() - startTime,
  }

  if (config.debug) {
    console.debug(
      `[search] ${forPlayer} -> (${bestMove.row}, ${bestMove.col}) score=${bestScore} nodes=${ctx.nodes} time=${result.time.toFixed(1)}ms`
    )
  }

  return result
}

export function bestMove (
  state: GameState,
  forPlayer: Player,
  maxDepth: number,
  options: Omit<SearchConfig, 'maxDepth'> = {}
): Move {
  return search(state, forPlayer, { ...options, maxDepth }).move
}

// Returns the score only; the root loop in search() owns move selection.
function minimax (
  state: GameState,
  depth: number,
  ply: number,
  alpha: number,
  beta: number,
  ctx: SearchContext
): number {
  ctx.nodes++

  const outcome = isTerminal(state)
  if (outcome.over) return terminalScore(outcome.winner, ply, ctx)

  // Out of depth before the game ended
  if (depth === 0) return evaluate(state, ctx.forPlayer)

  const maximizing = state.turn === ctx.forPlayer
  let best = maximizing ? -Infinity : Infinity

  for (const move of legalMoves(state)) {
    const score = minimax(apply(state, move), depth - 1, ply + 1, alpha, beta, ctx)

    if (maximizing) {
      if (score > best) best = score
      if (ctx.pruning) alpha = Math.max(alpha, best)
    } else {
      if (score < best) best = score
      if (ctx.pruning) beta = Math.min(beta, best)
    }

    if (ctx.pruning && alpha >= beta) {
      // Cutoff
      break
    }
  }

  return best
}
