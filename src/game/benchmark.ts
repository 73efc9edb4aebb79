import { search } from './ai/search'
import type { SearchResult } from './ai/types'
import { createState } from './logic'
import { FIRST_PLAYER, MAX_SEARCH_DEPTH } from './constants'

export interface BenchmarkOptions {
  searchDepth?: number
  pruning?: boolean
  preferFasterWins?: boolean
}

// Full search for the first mover on the empty board: the largest tree the game has.
export const runBenchmark = (options: BenchmarkOptions = {}): SearchResult => {
  const targetDepth = options.searchDepth ?? MAX_SEARCH_DEPTH
  const pruning = options.pruning ?? false

  console.log('Starting Benchmark on the empty board...')
  console.log(`Mode: ${pruning ? 'Alpha-beta' : 'Plain minimax'}. Search Depth: ${targetDepth}`)

  const result = search(createState(), FIRST_PLAYER, {
    maxDepth: targetDepth,
    pruning,
    preferFasterWins: options.preferFasterWins,
  })

  const nps = result.time > 0 ? result.nodes / (result.time / 1000) : 0

  console.table({
    'Search Depth': result.depth,
    Pruning: pruning,
    'Time (ms)': Math.round(result.time),
    Nodes: result.nodes.toLocaleString(),
    NPS: Math.round(nps).toLocaleString(),
    'Best Move': `(${result.move.row}, ${result.move.col})`,
    'Best Score': result.score,
  })

  return result
}
