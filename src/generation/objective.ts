/**
 * Difficulty scoring
 *
 * `scoreDifficulty` ranks candidate scrambles against each other (higher is
 * more interesting). `computeIntrinsicDifficulty` rates a finished level on
 * a 1-100 scale for display and telemetry.
 */

import type { LevelMetrics } from '../solver/metrics'
import type { LevelBand } from './profile'

export interface DifficultyWeights {
  forcedMoves: number
  branching: number
  trap: number
  decisionDepth: number
  multiplicity: number
  emptyUsage: number
}

export const DEFAULT_WEIGHTS: DifficultyWeights = {
  forcedMoves: 0.15,
  branching: 0.25,
  trap: 0.3,
  decisionDepth: 0.2,
  multiplicity: 0.15,
  emptyUsage: 0.1,
}

export const TRAP_FOCUSED_WEIGHTS: DifficultyWeights = {
  forcedMoves: 0.15,
  branching: 0.2,
  trap: 0.4,
  decisionDepth: 0.15,
  multiplicity: 0.15,
  emptyUsage: 0.1,
}

export const BRANCHING_FOCUSED_WEIGHTS: DifficultyWeights = {
  forcedMoves: 0.15,
  branching: 0.35,
  trap: 0.2,
  decisionDepth: 0.25,
  multiplicity: 0.1,
  emptyUsage: 0.1,
}

export function getWeightsForBand(band: LevelBand): DifficultyWeights {
  switch (band) {
    case 'A':
    case 'B':
      return DEFAULT_WEIGHTS
    case 'C':
      return BRANCHING_FOCUSED_WEIGHTS
    case 'D':
    case 'E':
      return TRAP_FOCUSED_WEIGHTS
  }
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value))
}

/**
 * Weighted sum of normalized components, each in [0, 1]:
 * - 1 - forced-move ratio
 * - branching factor, mapped from [1, 3]
 * - trap score
 * - 1 / (1 + decision depth)
 * - solution multiplicity, mapped from [1, 3]
 * - 1 - empty-bottle usage
 */
export function scoreDifficulty(
  metrics: LevelMetrics,
  weights: DifficultyWeights = DEFAULT_WEIGHTS
): number {
  return (
    weights.forcedMoves * clamp01(1 - metrics.forcedMoveRatio) +
    weights.branching * clamp01((metrics.averageBranchingFactor - 1) / 2) +
    weights.trap * clamp01(metrics.trapScore) +
    weights.decisionDepth * (1 / (1 + Math.max(0, metrics.decisionDepth))) +
    weights.multiplicity * clamp01((metrics.solutionMultiplicity - 1) / 2) +
    weights.emptyUsage * clamp01(1 - metrics.emptyBottleUsageRatio)
  )
}

/**
 * Rates how hard a level feels to play, from 1 to 100.
 * Solution length dominates; branching, traps, decision frequency and a
 * unique solution add to it.
 */
export function computeIntrinsicDifficulty(metrics: LevelMetrics, optimalMoves: number): number {
  if (optimalMoves <= 0) return 1

  // Up to 40 points
  let lengthPoints: number
  if (optimalMoves <= 5) {
    lengthPoints = optimalMoves * 4
  } else if (optimalMoves <= 12) {
    lengthPoints = 20 + (optimalMoves - 5) * 2.5
  } else {
    lengthPoints = 37.5 + Math.min(2.5, (optimalMoves - 12) * 0.3)
  }

  const branchPoints = clamp01((metrics.averageBranchingFactor - 1) / 3.5) * 25
  const trapPoints = metrics.trapScore * metrics.trapScore * 20
  const decisionPoints = (1 - clamp01(metrics.forcedMoveRatio)) * 10
  const uniquePoints =
    metrics.solutionMultiplicity <= 1 ? 5 : metrics.solutionMultiplicity <= 3 ? 3 : 1

  const total = Math.round(lengthPoints + branchPoints + trapPoints + decisionPoints + uniquePoints)
  return Math.max(1, Math.min(100, total))
}
