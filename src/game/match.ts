import type { GameState, Move, Outcome, Player } from './types'
import { apply, createState, isTerminal } from './logic'
import { InvalidConfigError } from './errors'
import type { Strategy } from './ai/strategies'

export interface MatchResult {
  state: GameState
  outcome: Outcome
  moves: Move[]
}

// Computer against computer: each side's strategy moves in turn until the game ends.
export const playMatch = (
  strategies: Record<Player, Strategy>,
  start: GameState = createState()
): MatchResult => {
  for (const player of ['X', 'O'] as const) {
    if (strategies[player].player !== player) {
      throw new InvalidConfigError(
        `Strategy for ${player} is bound to ${strategies[player].player}`
      )
    }
  }

  const moves: Move[] = []
  let state = start
  let outcome = isTerminal(state)

  while (!outcome.over) {
    const move = strategies[state.turn].predictMove(state)
    state = apply(state, move)
    moves.push(move)
    outcome = isTerminal(state)
  }

  return { state, outcome, moves }
}
