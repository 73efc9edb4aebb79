import type { GameState, Move, Player, StrategyKind } from '../types'
import { isTerminal, legalMoves } from '../logic'
import { DEFAULT_SEARCH_DEPTH } from '../constants'
import { validateSearchDepth } from '../config'
import { InvalidConfigError, NoLegalMoveError } from '../errors'
import { search } from './search'

// Move selection for one player over one game
export interface Strategy {
  readonly kind: StrategyKind
  readonly player: Player
  predictMove (state: GameState): Move
}

export class RandomStrategy implements Strategy {
  readonly kind = 'random'

  constructor (
    readonly player: Player,
    private readonly random: () => number = Math.random
  ) {}

  predictMove (state: GameState): Move {
    if (isTerminal(state).over) throw new NoLegalMoveError()
    const moves = legalMoves(state)
    // Guards against a source returning exactly 1
    const index = Math.min(Math.floor(this.random() * moves.length), moves.length - 1)
    return moves[index]
  }
}

export interface MinimaxOptions {
  depth?: number
  preferFasterWins?: boolean
  pruning?: boolean
  debug?: boolean
}

export class MinimaxStrategy implements Strategy {
  readonly kind = 'minimax'
  readonly depth: number
  private readonly options: MinimaxOptions

  constructor (readonly player: Player, options: MinimaxOptions = {}) {
    this.depth = validateSearchDepth(options.depth ?? DEFAULT_SEARCH_DEPTH)
    this.options = options
  }

  predictMove (state: GameState): Move {
    return search(state, this.player, {
      maxDepth: this.depth,
      preferFasterWins: this.options.preferFasterWins,
      pruning: this.options.pruning,
      debug: this.options.debug,
    }).move
  }
}

export interface StrategyOptions extends MinimaxOptions {
  random?: () => number
}

export const createStrategy = (
  kind: StrategyKind,
  player: Player,
  options: StrategyOptions = {}
): Strategy => {
  switch (kind) {
    case 'random':
      return new RandomStrategy(player, options.random)
    case 'minimax':
      return new MinimaxStrategy(player, options)
    default:
      throw new InvalidConfigError(`Unknown strategy: ${String(kind)}`)
  }
}
