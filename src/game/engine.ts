import { useCallback, useState } from 'react'
import type { GamePhase, GameState, Player } from './types'
import { describeOutcome, isLegalMove, isTerminal, winningLines } from './logic'
import { GameController } from './controller'
import type { GameControllerOptions } from './controller'

interface ControllerView {
  state: GameState
  phase: GamePhase
  humanPlayer: Player
  computerPlayer: Player
}

const viewOf = (controller: GameController): ControllerView => ({
  state: controller.state,
  phase: controller.phase,
  humanPlayer: controller.humanPlayer,
  computerPlayer: controller.computerPlayer,
})

// Binds one GameController to a component. Options are read on the first render only.
export const useGameController = (options: GameControllerOptions = {}) => {
  const [controller] = useState(() => new GameController(options))
  const [view, setView] = useState<ControllerView>(() => viewOf(controller))

  // The controller answers synchronously, so its state is final once a call returns
  const submitMove = useCallback((row: number, col: number): boolean => {
    const accepted = controller.submitHumanMove(row, col)
    if (accepted) setView(viewOf(controller))
    return accepted
  }, [controller])

  // For the UI to mark which cells take a click right now
  const canPlay = (row: number, col: number): boolean =>
    view.phase.kind === 'awaitingInput' && isLegalMove(view.state, { row, col })

  const resetGame = useCallback(() => {
    controller.resetGame()
    setView(viewOf(controller))
  }, [controller])

  return {
    ...view,
    status: describeOutcome(isTerminal(view.state)),
    winningLines: winningLines(view.state),
    canPlay,
    submitMove,
    resetGame,
  }
}
