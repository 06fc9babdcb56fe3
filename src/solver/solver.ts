/**
 * Optimal Solver
 *
 * Breadth-first search over the pour graph. Every pour costs one move, so
 * the depth of the first winning position reached is the optimal move
 * count. Visited positions are deduplicated by their encoded key, and
 * search moves skip relocations of solved bottles into empty ones.
 *
 * Moves are enumerated by ascending source, then ascending target, so a
 * given position and budget always yield the same depth and path.
 */

import type { Bottle } from '../game/bottle'
import { encodeBottles } from '../game/encoding'
import { type Move, type PuzzleState, applyPour, getSearchMoves, isWin } from '../game/puzzle'
import { INTERACTIVE_BUDGET } from '../lib/engineConfig'
import { parseOrThrow, puzzleStateSchema, solverBudgetSchema } from '../lib/schemas/puzzle'

// ============================================================================
// TYPES
// ============================================================================

/**
 * - solved: a winning position was reached
 * - unsolvable: every reachable position was visited without a win
 * - budget-exhausted: the node, time or depth budget ran out first
 */
export type SolverStatus = 'solved' | 'unsolvable' | 'budget-exhausted'

export interface SolverResult {
  /** Optimal move count, or -1 when unsolved (see status) */
  optimalMoves: number
  /** Moves from the start to a win; empty unless the path was requested */
  path: Move[]
  status: SolverStatus
  nodesExpanded: number
  elapsedMs: number
}

export interface SearchOptions {
  maxNodes: number
  maxMillis: number
  /** Keep back-pointers and return the move path (default false) */
  trackPath?: boolean
  /** Allow pours into sink bottles (default true) */
  allowSinkTargets?: boolean
  /** Stop expanding positions at this depth */
  maxDepth?: number
}

// How often (in expanded nodes) the wall clock is consulted
const CLOCK_CHECK_INTERVAL = 256

const RELEASED: Bottle[] = []

// ============================================================================
// SEARCH CORE
// ============================================================================

/**
 * Runs the breadth-first search on trusted input.
 * The public entry points validate their arguments and delegate here.
 */
export function searchOptimal(bottles: Bottle[], options: SearchOptions): SolverResult {
  const { maxNodes, maxMillis, trackPath = false, allowSinkTargets = true, maxDepth } = options
  const startTime = Date.now()
  const finish = (status: SolverStatus, optimalMoves: number, path: Move[], expanded: number) => ({
    optimalMoves,
    path,
    status,
    nodesExpanded: expanded,
    elapsedMs: Date.now() - startTime,
  })

  if (isWin(bottles)) {
    return finish('solved', 0, [], 0)
  }

  // Parallel arrays indexed by discovery order. Positions are released once
  // expanded; depths, parents and moves stay for path reconstruction.
  const positions: Bottle[][] = [bottles]
  const depths: number[] = [0]
  const parents: number[] = [-1]
  const moves: (Move | null)[] = [null]
  const visited = new Set<string>([encodeBottles(bottles)])

  let head = 0
  let expanded = 0
  let depthLimited = false

  while (head < positions.length) {
    if (expanded >= maxNodes) {
      return finish('budget-exhausted', -1, [], expanded)
    }
    if (expanded % CLOCK_CHECK_INTERVAL === 0 && Date.now() - startTime > maxMillis) {
      return finish('budget-exhausted', -1, [], expanded)
    }

    const index = head++
    const current = positions[index]
    const depth = depths[index]
    positions[index] = RELEASED
    expanded++

    if (maxDepth !== undefined && depth >= maxDepth) {
      depthLimited = true
      continue
    }

    for (const move of getSearchMoves(current, allowSinkTargets)) {
      const next = applyPour(current, move)
      const key = encodeBottles(next)
      if (visited.has(key)) continue
      visited.add(key)

      // Testing at discovery finds the same depth and path as testing at
      // dequeue, since the queue is first-in first-out.
      if (isWin(next)) {
        const path = trackPath ? reconstructPath(parents, moves, index, move) : []
        return finish('solved', depth + 1, path, expanded)
      }

      positions.push(next)
      depths.push(depth + 1)
      if (trackPath) {
        parents.push(index)
        moves.push(move)
      }
    }
  }

  return finish(depthLimited ? 'budget-exhausted' : 'unsolvable', -1, [], expanded)
}

function reconstructPath(
  parents: number[],
  moves: (Move | null)[],
  fromIndex: number,
  lastMove: Move
): Move[] {
  const path: Move[] = [lastMove]
  for (let index = fromIndex; index > 0; index = parents[index]) {
    const move = moves[index]
    if (move !== null) path.push(move)
  }
  return path.reverse()
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Computes the optimal move count from a position.
 *
 * @param state - Position to solve (validated, never mutated)
 * @param maxNodes - Expansion budget (positive integer, default 100,000)
 * @param maxMillis - Wall-clock budget in milliseconds (default 1,000)
 * @returns Result with optimalMoves -1 when no win was found; check `status`
 *   to tell an exhausted budget from a proven dead end
 * @throws InvalidInputError for a malformed state or non-positive budgets
 *
 * @example
 * const result = solve(state, 100_000, 1_000)
 * if (result.status === 'solved') {
 *   console.log(`Solvable in ${result.optimalMoves} moves`)
 * }
 */
export function solve(
  state: PuzzleState,
  maxNodes = INTERACTIVE_BUDGET.maxNodes,
  maxMillis = INTERACTIVE_BUDGET.maxMillis
): SolverResult {
  const input = parseOrThrow(puzzleStateSchema, state, 'puzzle state')
  const budget = parseOrThrow(solverBudgetSchema, { maxNodes, maxMillis }, 'solver budget')
  return searchOptimal(input.bottles, { ...budget, trackPath: false })
}

/**
 * Computes the optimal move count and one optimal move path.
 *
 * @param allowSinkMoves - When false, pours into sink bottles are not considered
 * @throws InvalidInputError for a malformed state or non-positive budgets
 */
export function solveWithPath(
  state: PuzzleState,
  maxNodes = INTERACTIVE_BUDGET.maxNodes,
  maxMillis = INTERACTIVE_BUDGET.maxMillis,
  allowSinkMoves = true
): SolverResult {
  const input = parseOrThrow(puzzleStateSchema, state, 'puzzle state')
  const budget = parseOrThrow(solverBudgetSchema, { maxNodes, maxMillis }, 'solver budget')
  return searchOptimal(input.bottles, {
    ...budget,
    trackPath: true,
    allowSinkTargets: allowSinkMoves,
  })
}
