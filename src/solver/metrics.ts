/**
 * Decision-Density Metrics
 *
 * Measures how much real choice a position offers along its optimal line,
 * and how costly it is to stray from that line.
 */

import { type Bottle, bottleSignature, countDistinctColors, getTopColor, isEmpty } from '../game/bottle'
import { type Move, applyPour, getLegalMoves, getPourAmount, isWin } from '../game/puzzle'
import { DEFAULT_ENGINE_CONFIG, type MetricsConfig } from '../lib/engineConfig'
import { searchOptimal } from './solver'

// ============================================================================
// TYPES
// ============================================================================

export interface PathMetrics {
  /** Share of positions on the optimal line with exactly one legal move */
  forcedMoveRatio: number
  /** Mean legal-move count over positions on the optimal line */
  averageBranchingFactor: number
  /** Optimal-line steps before the first position offering two or more moves */
  decisionDepth: number
  /** Share of optimal-line moves that pour into an empty bottle */
  emptyBottleUsageRatio: number
}

export interface StructuralMetrics {
  /** Bottles holding two or more colors */
  mixedBottleCount: number
  /** Distinct non-empty bottle signatures */
  distinctSignatureCount: number
  /** Distinct colors showing at the top of non-empty bottles */
  topColorVariety: number
}

export interface LevelMetrics extends PathMetrics, StructuralMetrics {
  trapScore: number
  solutionMultiplicity: number
}

export interface AlternativeOpening {
  move: Move
  /** Total moves to a win when opening with `move`, or null if unresolved within budget */
  totalMoves: number | null
}

// ============================================================================
// OPTIMAL LINE
// ============================================================================

/**
 * Walks the optimal path, counting legal moves at every position before the win.
 */
export function computePathMetrics(bottles: Bottle[], path: Move[]): PathMetrics {
  if (path.length === 0) {
    return {
      forcedMoveRatio: 0,
      averageBranchingFactor: 0,
      decisionDepth: 0,
      emptyBottleUsageRatio: 0,
    }
  }

  let current = bottles
  let forced = 0
  let branchTotal = 0
  let intoEmpty = 0
  let decisionDepth = -1

  path.forEach((move, step) => {
    const options = getLegalMoves(current).length
    if (options === 1) forced++
    if (options >= 2 && decisionDepth === -1) decisionDepth = step
    branchTotal += options
    if (isEmpty(current[move.target])) intoEmpty++
    current = applyPour(current, move)
  })

  return {
    forcedMoveRatio: forced / path.length,
    averageBranchingFactor: branchTotal / path.length,
    decisionDepth: decisionDepth === -1 ? path.length : decisionDepth,
    emptyBottleUsageRatio: intoEmpty / path.length,
  }
}

// ============================================================================
// DEVIATIONS FROM THE OPTIMAL LINE
// ============================================================================

/**
 * Re-solves the position after each legal opening move other than the
 * optimal one, in enumeration order.
 *
 * Re-solves share one node budget and one wall-clock deadline, and stop at
 * the depth past which an opening can no longer count toward multiplicity.
 * Openings left once either budget runs out are reported unresolved.
 *
 * @param deadline - Epoch milliseconds after which no re-solve starts or continues
 */
export function evaluateAlternativeOpenings(
  bottles: Bottle[],
  path: Move[],
  config: MetricsConfig = DEFAULT_ENGINE_CONFIG.metrics,
  deadline: number = Date.now() + config.metricsMillisBudget
): AlternativeOpening[] {
  const optimalOpening = path.length > 0 ? path[0] : null
  const candidates = getLegalMoves(bottles)
    .filter(
      (move) =>
        optimalOpening === null ||
        move.source !== optimalOpening.source ||
        move.target !== optimalOpening.target
    )
    .slice(0, config.trapSampleCount)

  // Remaining moves after the opening beyond which the opening is a trap
  // and misses the multiplicity margin either way
  const maxDepth = path.length + config.multiplicityMargin - 1
  let nodesLeft = config.metricsNodeBudget

  return candidates.map((move) => {
    const next = applyPour(bottles, move)
    if (isWin(next)) return { move, totalMoves: 1 }
    if (path.length > 0 && reachesWinByReordering(next, path, move)) {
      return { move, totalMoves: path.length }
    }

    const millisLeft = deadline - Date.now()
    if (nodesLeft <= 0 || millisLeft <= 0 || maxDepth < 1) return { move, totalMoves: null }

    const result = searchOptimal(next, {
      maxNodes: Math.min(config.trapNodeBudget, nodesLeft),
      maxMillis: millisLeft,
      maxDepth,
    })
    nodesLeft -= result.nodesExpanded
    return { move, totalMoves: result.status === 'solved' ? result.optimalMoves + 1 : null }
  })
}

/**
 * True when `opening` is a later move of the optimal path played early and
 * the rest of the path, in order, still wins from `next`. That proves the
 * opening optimal without a search.
 */
export function reachesWinByReordering(next: Bottle[], path: Move[], opening: Move): boolean {
  const later = path.findIndex(
    (move, step) => step > 0 && move.source === opening.source && move.target === opening.target
  )
  if (later === -1) return false

  let current = next
  for (let step = 0; step < path.length; step++) {
    if (step === later) continue
    const { source, target } = path[step]
    const amount = getPourAmount(current, source, target)
    if (amount === 0) return false
    current = applyPour(current, { source, target, amount })
  }
  return isWin(current)
}

/**
 * Share of sampled deviations that are unresolved within budget or longer than optimal.
 */
export function computeTrapScore(optimalMoves: number, alternatives: AlternativeOpening[]): number {
  if (alternatives.length === 0) return 0

  const traps = alternatives.filter(
    (alt) => alt.totalMoves === null || alt.totalMoves > optimalMoves
  ).length
  return traps / alternatives.length
}

/**
 * Number of distinct openings that still finish within optimal + margin,
 * counting the optimal opening itself. Never below 1, never above `cap`.
 */
export function computeSolutionMultiplicity(
  optimalMoves: number,
  alternatives: AlternativeOpening[],
  cap: number,
  margin: number
): number {
  let count = 1
  for (const alt of alternatives) {
    if (count >= cap) break
    if (alt.totalMoves !== null && alt.totalMoves <= optimalMoves + margin) count++
  }
  return Math.min(count, cap)
}

// ============================================================================
// STRUCTURE
// ============================================================================

export function computeStructuralMetrics(bottles: Bottle[]): StructuralMetrics {
  const signatures = new Set<string>()
  const topColors = new Set<number>()
  let mixedBottleCount = 0

  for (const bottle of bottles) {
    if (isEmpty(bottle)) continue
    if (countDistinctColors(bottle) >= 2) mixedBottleCount++
    signatures.add(bottleSignature(bottle))
    const top = getTopColor(bottle)
    if (top !== null) topColors.add(top)
  }

  return {
    mixedBottleCount,
    distinctSignatureCount: signatures.size,
    topColorVariety: topColors.size,
  }
}

// ============================================================================
// COMBINED
// ============================================================================

/**
 * Computes every metric for a starting position and its optimal path,
 * within `config.metricsMillisBudget` of wall-clock time for the whole call.
 */
export function computeLevelMetrics(
  bottles: Bottle[],
  path: Move[],
  config: MetricsConfig = DEFAULT_ENGINE_CONFIG.metrics
): LevelMetrics {
  const deadline = Date.now() + config.metricsMillisBudget
  const alternatives = evaluateAlternativeOpenings(bottles, path, config, deadline)
  const optimalMoves = path.length

  return {
    ...computePathMetrics(bottles, path),
    ...computeStructuralMetrics(bottles),
    trapScore: computeTrapScore(optimalMoves, alternatives),
    solutionMultiplicity: computeSolutionMultiplicity(
      optimalMoves,
      alternatives,
      config.multiplicityCap,
      config.multiplicityMargin
    ),
  }
}
