/**
 * Liquid Sort Puzzle Rules
 *
 * Pure functions over plain puzzle data. Bottles are addressed by their
 * index in the bottle array; a move pours the contiguous top run of one
 * color from a source bottle into a target that is empty or shows the same
 * top color, limited by the target's free space.
 */

import {
  type Bottle,
  type ColorId,
  cloneBottle,
  getCount,
  getFreeSpace,
  getMaxPourAmount,
  getTopColor,
  isEmpty,
  isMonochrome,
  isSolvedBottle,
  pourBetween,
} from './bottle'
import { bottleIndexSchema, parseOrThrow, puzzleStateSchema } from '../lib/schemas/puzzle'

// ============================================================================
// TYPES
// ============================================================================

export interface PuzzleMetadata {
  movesUsed: number
  movesAllowed: number
  /** Optimal move count from the starting position, -1 when unknown */
  optimalMoves: number
  levelIndex: number
  seed: number
  /** Number of inverse pours used to build the position */
  scrambleMoves: number
}

export interface PuzzleState extends PuzzleMetadata {
  bottles: Bottle[]
}

export interface Move {
  source: number
  target: number
  amount: number
}

export interface MoveEnumerationOptions {
  /** When false, moves into sink bottles are skipped (default true) */
  allowSinkTargets?: boolean
  /** Skip pours that only relocate a solved bottle into an empty one (default false) */
  pruneRelocations?: boolean
}

export type MoveOutcome =
  | { success: true; state: PuzzleState; poured: number; move: Move }
  | { success: false; state: PuzzleState; poured: 0 }

const DEFAULT_METADATA: PuzzleMetadata = {
  movesUsed: 0,
  movesAllowed: 0,
  optimalMoves: -1,
  levelIndex: 1,
  seed: 0,
  scrambleMoves: 0,
}

// ============================================================================
// STATE CONSTRUCTION
// ============================================================================

/**
 * Creates a puzzle state from bottles, filling unspecified metadata with defaults.
 */
export function createPuzzleState(
  bottles: Bottle[],
  metadata: Partial<PuzzleMetadata> = {}
): PuzzleState {
  return {
    ...DEFAULT_METADATA,
    ...metadata,
    bottles: bottles.map(cloneBottle),
  }
}

/**
 * Deep clones a puzzle state.
 */
export function clonePuzzleState(state: PuzzleState): PuzzleState {
  return { ...state, bottles: state.bottles.map(cloneBottle) }
}

// ============================================================================
// MOVE RULES
// ============================================================================

/**
 * Number of units a pour from source to target would move under play rules.
 * Zero for out-of-range or equal indices, sink sources, and incompatible targets.
 */
export function getPourAmount(bottles: Bottle[], source: number, target: number): number {
  if (source === target) return 0
  if (source < 0 || source >= bottles.length) return 0
  if (target < 0 || target >= bottles.length) return 0

  const from = bottles[source]
  if (from.isSink) return 0

  return getMaxPourAmount(from, bottles[target])
}

/**
 * True for a pour that would carry a solved bottle's entire contents into an
 * empty bottle. Such a pour never changes the position up to relabelling.
 */
export function isRelocation(bottles: Bottle[], move: Move): boolean {
  const from = bottles[move.source]
  return (
    isEmpty(bottles[move.target]) && isSolvedBottle(from) && move.amount === getCount(from)
  )
}

/**
 * Enumerates legal moves in fixed order: ascending source, then ascending target.
 */
export function getLegalMoves(bottles: Bottle[], options: MoveEnumerationOptions = {}): Move[] {
  const { allowSinkTargets = true, pruneRelocations = false } = options
  const moves: Move[] = []

  for (let source = 0; source < bottles.length; source++) {
    if (bottles[source].isSink || isEmpty(bottles[source])) continue

    for (let target = 0; target < bottles.length; target++) {
      if (!allowSinkTargets && bottles[target].isSink) continue

      const amount = getPourAmount(bottles, source, target)
      if (amount === 0) continue

      const move = { source, target, amount }
      if (pruneRelocations && isRelocation(bottles, move)) continue
      moves.push(move)
    }
  }

  return moves
}

/**
 * Moves considered by the solver: legal moves minus relocations.
 */
export function getSearchMoves(bottles: Bottle[], allowSinkTargets = true): Move[] {
  return getLegalMoves(bottles, { allowSinkTargets, pruneRelocations: true })
}

export function hasAnyLegalMove(bottles: Bottle[]): boolean {
  for (let source = 0; source < bottles.length; source++) {
    for (let target = 0; target < bottles.length; target++) {
      if (getPourAmount(bottles, source, target) > 0) return true
    }
  }
  return false
}

/**
 * Applies a move known to be legal, returning a new bottle array.
 * Bottles the move does not touch are shared with the input.
 */
export function applyPour(bottles: Bottle[], move: Move): Bottle[] {
  const [from, to] = pourBetween(bottles[move.source], bottles[move.target], move.amount)
  const next = bottles.slice()
  next[move.source] = from
  next[move.target] = to
  return next
}

/**
 * Attempts a pour under play rules. Never mutates the input state.
 * Out-of-range indices are an illegal pour, not malformed input.
 *
 * @returns The post-move state and amount poured, or the unchanged input
 *   with success false when the pour is not legal
 * @throws InvalidInputError for a malformed state or non-integer indices
 *
 * @example
 * const outcome = tryApplyMove(state, 0, 2)
 * if (outcome.success) {
 *   state = outcome.state
 * }
 */
export function tryApplyMove(state: PuzzleState, source: number, target: number): MoveOutcome {
  parseOrThrow(puzzleStateSchema, state, 'puzzle state')
  parseOrThrow(bottleIndexSchema, source, 'source index')
  parseOrThrow(bottleIndexSchema, target, 'target index')

  const amount = getPourAmount(state.bottles, source, target)
  if (amount === 0) {
    return { success: false, state, poured: 0 }
  }

  const move = { source, target, amount }
  const bottles = applyPour(state.bottles, move).map(cloneBottle)
  return {
    success: true,
    state: { ...state, bottles, movesUsed: state.movesUsed + 1 },
    poured: amount,
    move,
  }
}

/**
 * Replays a sequence of moves from a starting state.
 * Returns null if any move is illegal at the point it is played.
 */
export function replayMoves(state: PuzzleState, moves: Move[]): PuzzleState | null {
  let current = state
  for (const move of moves) {
    const outcome = tryApplyMove(current, move.source, move.target)
    if (!outcome.success) return null
    current = outcome.state
  }
  return current
}

// ============================================================================
// WIN / FAIL DETECTION
// ============================================================================

/**
 * Checks for a finished position: every bottle is empty or solved, and no
 * legal pour could empty one bottle into another holding the same color.
 */
export function isWin(bottles: Bottle[]): boolean {
  for (const bottle of bottles) {
    if (!isMonochrome(bottle)) return false
  }

  for (let source = 0; source < bottles.length; source++) {
    const from = bottles[source]
    if (from.isSink || isEmpty(from)) continue

    const count = getCount(from)
    const color = getTopColor(from)
    for (let target = 0; target < bottles.length; target++) {
      if (target === source) continue
      const to = bottles[target]
      if (isEmpty(to) || getTopColor(to) !== color) continue
      if (getFreeSpace(to) >= count) return false
    }
  }

  return true
}

/**
 * The move budget is spent without reaching a win.
 * A state with no budget only fails once a move has been made.
 */
export function isFail(state: PuzzleState): boolean {
  if (state.movesAllowed <= 0) {
    return state.movesUsed > 0 && !isWin(state.bottles)
  }
  return state.movesUsed >= state.movesAllowed && !isWin(state.bottles)
}

// ============================================================================
// COLOR ACCOUNTING
// ============================================================================

/**
 * Units of each color across all bottles.
 */
export function countColorUnits(bottles: Bottle[]): Map<ColorId, number> {
  const counts = new Map<ColorId, number>()
  for (const bottle of bottles) {
    for (const slot of bottle.slots) {
      if (slot === null) continue
      counts.set(slot, (counts.get(slot) ?? 0) + 1)
    }
  }
  return counts
}
