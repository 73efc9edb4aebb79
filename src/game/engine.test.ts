// @vitest-environment jsdom
import { describe, it, expect, vi } from 'vitest'
import { act, renderHook } from '@testing-library/react'
import { useGameController } from './engine'

const render = () =>
  renderHook(() => useGameController({ humanPlayer: 'O', opponent: 'random', random: () => 0 }))

describe('useGameController', () => {
  it('exposes the opening position', () => {
    const { result } = render()
    expect(result.current.state.moveCount).toBe(0)
    expect(result.current.phase).toEqual({ kind: 'awaitingInput' })
    expect(result.current.humanPlayer).toBe('O')
    expect(result.current.computerPlayer).toBe('X')
    expect(result.current.status).toBe('Tic-tac-toe!')
    expect(result.current.winningLines).toEqual([])
    expect(result.current.canPlay(0, 0)).toBe(true)
  })

  it('tells which cells can be played', () => {
    const { result } = render()
    act(() => {
      result.current.submitMove(1, 0)
    })
    expect(result.current.canPlay(1, 0)).toBe(false)
    expect(result.current.canPlay(0, 0)).toBe(false)
    expect(result.current.canPlay(0, 1)).toBe(true)
    expect(result.current.canPlay(3, 0)).toBe(false)
  })

  it('re-renders after the human and computer moves', () => {
    const { result } = render()
    let accepted = false
    act(() => {
      accepted = result.current.submitMove(1, 0)
    })
    expect(accepted).toBe(true)
    expect(result.current.state.moveCount).toBe(2)
    expect(result.current.state.board[0][0]).toBe('X')
  })

  it('reports rejected moves without re-rendering', () => {
    const { result } = render()
    const before = result.current.state
    let accepted = true
    act(() => {
      accepted = result.current.submitMove(5, 5)
    })
    expect(accepted).toBe(false)
    expect(result.current.state).toBe(before)
  })

  it('shows the winner and the winning line, then resets', () => {
    const onGameOver = vi.fn()
    const { result } = renderHook(() =>
      useGameController({ humanPlayer: 'O', opponent: 'random', random: () => 0, onGameOver })
    )
    act(() => {
      result.current.submitMove(1, 0)
    })
    act(() => {
      result.current.submitMove(1, 1)
    })
    act(() => {
      result.current.submitMove(1, 2)
    })

    expect(result.current.status).toBe('O wins!')
    expect(result.current.phase).toEqual({ kind: 'gameOver', winner: 'O' })
    expect(result.current.winningLines.map(line => line.pattern)).toEqual([1])
    expect(onGameOver).toHaveBeenCalledWith('O')
    expect(result.current.canPlay(2, 2)).toBe(false)

    act(() => {
      result.current.resetGame()
    })
    expect(result.current.state.moveCount).toBe(0)
    expect(result.current.status).toBe('Tic-tac-toe!')
  })
})
