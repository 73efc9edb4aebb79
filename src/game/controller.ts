import type { GamePhase, GameState, Move, Outcome, Player, Winner } from './types'
import { FIRST_PLAYER } from './constants'
import { apply, createState, formatBoard, isTerminal, opponent } from './logic'
import { resolveConfig } from './config'
import type { GameConfig } from './config'
import { IllegalMoveError } from './errors'
import { RandomStrategy, createStrategy } from './ai/strategies'
import type { Strategy } from './ai/strategies'

export interface GameControllerListeners {
  onStateChanged?: (state: GameState, phase: GamePhase) => void
  onGameOver?: (winner: Winner) => void
}

export interface GameControllerOptions extends Partial<GameConfig>, GameControllerListeners {}

interface GameSetup {
  human: Player
  strategy: Strategy
  state: GameState
}

/**
 * Owns the canonical game state and runs the turn cycle between a human and
 * a computer strategy. All calls are synchronous: a human move that does not
 * end the game is answered by the computer before submitHumanMove returns.
 *
 * The presentation layer hears back only through onStateChanged and
 * onGameOver. The constructor sets up the first game without notifying.
 */
export class GameController {
  private readonly config: GameConfig
  private readonly listeners: GameControllerListeners

  private current: GameState
  private currentPhase: GamePhase
  private human: Player
  private opponentStrategy: Strategy

  constructor (options: GameControllerOptions = {}) {
    const { onStateChanged, onGameOver, ...overrides } = options
    this.config = resolveConfig(overrides)
    this.listeners = { onStateChanged, onGameOver }

    const setup = this.setupGame()
    this.human = setup.human
    this.opponentStrategy = setup.strategy
    this.current = setup.state
    this.currentPhase = { kind: 'awaitingInput' }
  }

  get state (): GameState {
    return this.current
  }

  get phase (): GamePhase {
    return this.currentPhase
  }

  get humanPlayer (): Player {
    return this.human
  }

  get computerPlayer (): Player {
    return this.opponentStrategy.player
  }

  get strategy (): Strategy {
    return this.opponentStrategy
  }

  get outcome (): Outcome {
    return isTerminal(this.current)
  }

  /**
   * Plays the human's mark at (row, col). Returns false, changing nothing,
   * when it is not the human's turn or the cell cannot be played.
   */
  submitHumanMove (row: number, col: number): boolean {
    if (this.currentPhase.kind !== 'awaitingInput') {
      this.log(`ignored move (${row}, ${col}) during ${this.currentPhase.kind}`)
      return false
    }

    let next: GameState
    try {
      next = apply(this.current, { row, col })
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        this.log(`ignored move (${row}, ${col}): ${err.reason}`)
        return false
      }
      throw err
    }

    if (this.commit(next).kind === 'awaitingStrategy') this.playStrategyTurn()
    return true
  }

  resetGame (): void {
    const setup = this.setupGame()
    this.human = setup.human
    this.opponentStrategy = setup.strategy
    this.current = setup.state
    this.currentPhase = { kind: 'awaitingInput' }

    this.log(`new game: human ${this.human}, computer ${this.computerPlayer} (${setup.strategy.kind})`)
    this.listeners.onStateChanged?.(this.current, this.currentPhase)
  }

  private setupGame (): GameSetup {
    const { random } = this.config
    const human = this.config.humanPlayer ?? (random() < 0.5 ? 'X' : 'O')
    const computer = opponent(human)
    const strategy = createStrategy(this.config.opponent, computer, {
      depth: this.config.searchDepth,
      preferFasterWins: this.config.preferFasterWins,
      pruning: this.config.pruning,
      debug: this.config.debug,
      random,
    })

    let state = createState()
    if (human !== FIRST_PLAYER) {
      // The computer opens; by default with a random cell rather than a search
      const opener = this.config.openingMove === 'random'
        ? new RandomStrategy(computer, random)
        : strategy
      state = apply(state, opener.predictMove(state))
    }

    return { human, strategy, state }
  }

  private playStrategyTurn (): void {
    const move: Move = this.opponentStrategy.predictMove(this.current)
    this.log(`computer ${this.computerPlayer} plays (${move.row}, ${move.col})`)
    this.commit(apply(this.current, move))
  }

  private commit (next: GameState): GamePhase {
    this.current = next
    const outcome = isTerminal(next)

    if (outcome.over) {
      this.currentPhase = { kind: 'gameOver', winner: outcome.winner }
    } else if (next.turn === this.human) {
      this.currentPhase = { kind: 'awaitingInput' }
    } else {
      this.currentPhase = { kind: 'awaitingStrategy' }
    }

    this.listeners.onStateChanged?.(next, this.currentPhase)

    if (outcome.over) {
      this.log(`game over\n${formatBoard(next)}`)
      this.listeners.onGameOver?.(outcome.winner)
    }
    return this.currentPhase
  }

  private log (message: string): void {
    if (this.config.debug) console.debug(`[controller] ${message}`)
  }
}
