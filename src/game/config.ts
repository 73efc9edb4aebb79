import type { OpeningPolicy, Player, StrategyKind } from './types'
import { DEFAULT_SEARCH_DEPTH, MAX_SEARCH_DEPTH } from './constants'
import { InvalidConfigError } from './errors'

export interface GameConfig {
  opponent: StrategyKind
  searchDepth: number
  preferFasterWins: boolean
  pruning: boolean
  openingMove: OpeningPolicy
  // Pins the human's mark; drawn at random on every reset when absent
  humanPlayer?: Player
  random: () => number
  debug: boolean
}

export const DEFAULT_CONFIG: GameConfig = {
  opponent: 'minimax',
  searchDepth: DEFAULT_SEARCH_DEPTH,
  preferFasterWins: true,
  pruning: false,
  openingMove: 'random',
  random: Math.random,
  debug: false,
}

const STRATEGY_KINDS: readonly StrategyKind[] = ['random', 'minimax']
const OPENING_POLICIES: readonly OpeningPolicy[] = ['random', 'strategy']

// No game lasts more than MAX_SEARCH_DEPTH plies, so deeper bounds are clamped
export const validateSearchDepth = (depth: number): number => {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidConfigError(`Search depth must be a positive integer, got ${depth}`)
  }
  return Math.min(depth, MAX_SEARCH_DEPTH)
}

export const resolveConfig = (overrides: Partial<GameConfig> = {}): GameConfig => {
  const config: GameConfig = { ...DEFAULT_CONFIG, ...overrides }

  if (!STRATEGY_KINDS.includes(config.opponent)) {
    throw new InvalidConfigError(`Unknown opponent strategy: ${String(config.opponent)}`)
  }
  if (!OPENING_POLICIES.includes(config.openingMove)) {
    throw new InvalidConfigError(`Unknown opening policy: ${String(config.openingMove)}`)
  }
  if (config.humanPlayer !== undefined && config.humanPlayer !== 'X' && config.humanPlayer !== 'O') {
    throw new InvalidConfigError(`Unknown player: ${String(config.humanPlayer)}`)
  }
  config.searchDepth = validateSearchDepth(config.searchDepth)

  return config
}
