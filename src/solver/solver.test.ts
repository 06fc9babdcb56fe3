import { describe, it, expect } from 'vitest'
import { formatBottles, parseBottles } from '../game/encoding'
import { createPuzzleState, isWin, replayMoves } from '../game/puzzle'
import { InvalidInputError } from '../lib/errorUtils'
import { searchOptimal, solve, solveWithPath } from './solver'

function stateOf(notation: string) {
  return createPuzzleState(parseBottles(notation))
}

describe('Optimal Solver', () => {
  describe('trivial positions', () => {
    it('returns 0 with an empty path for a position that is already won', () => {
      const result = solveWithPath(stateOf('AA|..'), 1000, 1000)
      expect(result.optimalMoves).toBe(0)
      expect(result.path).toEqual([])
      expect(result.status).toBe('solved')
    })

    it('reports a position without moves as unsolvable', () => {
      const result = solve(stateOf('AB|BA'), 1000, 1000)
      expect(result.optimalMoves).toBe(-1)
      expect(result.status).toBe('unsolvable')
      expect(result.nodesExpanded).toBe(1)
    })
  })

  describe('small positions', () => {
    it('solves a one-move position', () => {
      const result = solveWithPath(stateOf('AB..|B...|....'), 1000, 1000)
      expect(result.optimalMoves).toBe(1)
      expect(result.path).toEqual([{ source: 0, target: 1, amount: 1 }])
      expect(result.nodesExpanded).toBe(1)
    })

    it('solves a two-move position', () => {
      const result = solveWithPath(stateOf('BA|A.|B.'), 1000, 1000)
      expect(result.optimalMoves).toBe(2)
      expect(result.path).toEqual([
        { source: 0, target: 1, amount: 1 },
        { source: 0, target: 2, amount: 1 },
      ])
    })

    it('depth-only mode reports the same depth without a path', () => {
      const result = solve(stateOf('BA|A.|B.'), 1000, 1000)
      expect(result.optimalMoves).toBe(2)
      expect(result.path).toEqual([])
      expect(result.status).toBe('solved')
    })

    it('applying the returned path reaches a win', () => {
      const state = stateOf('ABA.|BAB.|....|....')
      const result = solveWithPath(state, 50_000, 5_000)
      expect(result.status).toBe('solved')

      const end = replayMoves(state, result.path)
      expect(end).not.toBeNull()
      expect(isWin(end?.bottles ?? [])).toBe(true)
      expect(result.path).toHaveLength(result.optimalMoves)
    })

    it('is repeatable', () => {
      const state = stateOf('ABA.|BAB.|....|....')
      const first = solveWithPath(state, 50_000, 5_000)
      const second = solveWithPath(state, 50_000, 5_000)
      expect(second.optimalMoves).toBe(first.optimalMoves)
      expect(second.path).toEqual(first.path)
    })

    it('does not modify the input state', () => {
      const state = stateOf('ABA.|BAB.|....|....')
      solveWithPath(state, 50_000, 5_000)
      expect(formatBottles(state.bottles)).toBe('ABA.|BAB.|....|....')
      expect(state.movesUsed).toBe(0)
    })
  })

  describe('sink moves', () => {
    const state = stateOf('AB|BA|*..')

    it('routes through a sink when allowed', () => {
      const result = solveWithPath(state, 1000, 1000, true)
      expect(result.optimalMoves).toBe(3)
      expect(result.path).toEqual([
        { source: 0, target: 2, amount: 1 },
        { source: 1, target: 0, amount: 1 },
        { source: 1, target: 2, amount: 1 },
      ])
    })

    it('finds nothing when sink targets are disabled', () => {
      const result = solveWithPath(state, 1000, 1000, false)
      expect(result.optimalMoves).toBe(-1)
      expect(result.status).toBe('unsolvable')
    })

    it('depth-only mode always allows sink targets', () => {
      expect(solve(state, 1000, 1000).optimalMoves).toBe(3)
    })
  })

  describe('budgets', () => {
    it('falls back to the interactive budget when none is given', () => {
      expect(solve(stateOf('BA|A.|B.'))).toMatchObject({ optimalMoves: 2, status: 'solved' })
      expect(solveWithPath(stateOf('AB..|B...|....')).path).toEqual([
        { source: 0, target: 1, amount: 1 },
      ])
    })

    it('stops when the node budget runs out', () => {
      const result = solve(stateOf('BA|A.|B.'), 1, 1000)
      expect(result.optimalMoves).toBe(-1)
      expect(result.status).toBe('budget-exhausted')
      expect(result.nodesExpanded).toBe(1)
    })

    it('treats a depth cut-off as an exhausted budget', () => {
      const bottles = parseBottles('BA|A.|B.')
      const limited = searchOptimal(bottles, { maxNodes: 100, maxMillis: 1000, maxDepth: 1 })
      expect(limited.status).toBe('budget-exhausted')

      const enough = searchOptimal(bottles, { maxNodes: 100, maxMillis: 1000, maxDepth: 2 })
      expect(enough.optimalMoves).toBe(2)
    })
  })

  describe('input validation', () => {
    it('rejects non-positive or fractional node budgets', () => {
      const state = stateOf('BA|A.|B.')
      expect(() => solve(state, 0, 1000)).toThrow(InvalidInputError)
      expect(() => solve(state, 1.5, 1000)).toThrow(InvalidInputError)
    })

    it('rejects non-positive time budgets', () => {
      expect(() => solveWithPath(stateOf('BA|A.|B.'), 100, 0)).toThrow(InvalidInputError)
    })

    it('rejects malformed states', () => {
      expect(() => solve(createPuzzleState([]), 100, 100)).toThrow(InvalidInputError)
      expect(() =>
        solve(createPuzzleState([{ slots: [9, null], isSink: false }]), 100, 100)
      ).toThrow(InvalidInputError)
      expect(() =>
        solve(createPuzzleState([{ slots: [null, 0], isSink: false }]), 100, 100)
      ).toThrow(InvalidInputError)
    })
  })
})
