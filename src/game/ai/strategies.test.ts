import { describe, it, expect } from 'vitest'
import type { Cell } from '../types'
import { apply, createState, isTerminal, legalMoves } from '../logic'
import { DEFAULT_SEARCH_DEPTH } from '../constants'
import { InvalidConfigError, NoLegalMoveError } from '../errors'
import { MinimaxStrategy, RandomStrategy, createStrategy } from './strategies'

const parse = (rows: string[]): Cell[][] =>
  rows.map(row => [...row].map(ch => (ch === 'X' || ch === 'O' ? ch : null)))

// Deterministic stand-in for Math.random
const seeded = (seed: number) => () => {
  seed = (seed * 1664525 + 1013904223) % 4294967296
  return seed / 4294967296
}

describe('RandomStrategy', () => {
  const state = createState(parse(['X.O', '.O.', 'X..']))

  it('maps the random source onto the legal moves', () => {
    expect(new RandomStrategy('O', () => 0).predictMove(state)).toEqual({ row: 0, col: 1 })
    expect(new RandomStrategy('O', () => 0.5).predictMove(state)).toEqual({ row: 1, col: 2 })
    expect(new RandomStrategy('O', () => 0.99).predictMove(state)).toEqual({ row: 2, col: 2 })
  })

  it('stays in range when the source returns 1', () => {
    expect(new RandomStrategy('O', () => 1).predictMove(state)).toEqual({ row: 2, col: 2 })
  })

  it('only ever returns legal moves', () => {
    const strategy = new RandomStrategy('X', seeded(7))
    for (let game = 0; game < 20; game++) {
      let current = createState()
      while (!isTerminal(current).over) {
        const move = strategy.predictMove(current)
        expect(legalMoves(current)).toContainEqual(move)
        current = apply(current, move)
      }
    }
  })

  it('refuses finished games', () => {
    const won = createState(parse(['XXX', 'OO.', 'O..']))
    expect(() => new RandomStrategy('O').predictMove(won)).toThrow(NoLegalMoveError)
  })
})

describe('MinimaxStrategy', () => {
  it('searches eight plies by default', () => {
    expect(new MinimaxStrategy('X').depth).toBe(DEFAULT_SEARCH_DEPTH)
    expect(DEFAULT_SEARCH_DEPTH).toBe(8)
  })

  it('blocks the opponent by taking the winning cell', () => {
    const state = createState(parse(['XX.', 'OO.', '...']))
    expect(state.turn).toBe('O')
    expect(new MinimaxStrategy('O').predictMove(state)).toEqual({ row: 1, col: 2 })
  })

  it('can score every win alike', () => {
    const state = createState(parse(['XX.', 'OO.', '...']))
    const strategy = new MinimaxStrategy('O', { preferFasterWins: false })
    expect(strategy.predictMove(state)).toEqual({ row: 0, col: 2 })
  })

  it('rejects an invalid depth', () => {
    expect(() => new MinimaxStrategy('X', { depth: 0 })).toThrow(InvalidConfigError)
    expect(() => new MinimaxStrategy('X', { depth: 1.5 })).toThrow(InvalidConfigError)
  })

  it('clamps depths beyond the length of a game', () => {
    expect(new MinimaxStrategy('X', { depth: 12 }).depth).toBe(9)
  })

  it('refuses finished games', () => {
    const drawn = createState(parse(['OXO', 'OXX', 'XOO']))
    expect(() => new MinimaxStrategy('X').predictMove(drawn)).toThrow(NoLegalMoveError)
  })
})

describe('createStrategy', () => {
  it('builds the requested kind bound to the player', () => {
    const random = createStrategy('random', 'X')
    const minimax = createStrategy('minimax', 'O', { depth: 5 })
    expect(random).toBeInstanceOf(RandomStrategy)
    expect(random.player).toBe('X')
    expect(minimax).toBeInstanceOf(MinimaxStrategy)
    expect(minimax.player).toBe('O')
    expect(minimax.kind).toBe('minimax')
  })

  it('passes the random source through', () => {
    const state = createState()
    expect(createStrategy('random', 'O', { random: () => 0.99 }).predictMove(state)).toEqual({ row: 2, col: 2 })
  })
})
