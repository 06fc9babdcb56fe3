/**
 * Quality Gate
 *
 * Per-band acceptance thresholds over level metrics. Thresholds tighten
 * from band A to band E. A structural check rejects positions that pass
 * numerically but look degenerate (few mixed bottles, repeated bottles,
 * one color showing on every top).
 */

import type { LevelMetrics } from '../solver/metrics'
import type { LevelBand } from './profile'

export interface QualityThresholds {
  maxForcedMoveRatio: number
  maxDecisionDepth: number
  minBranchingFactor: number
  minTrapScore: number
  minSolutionMultiplicity: number
  maxEmptyBottleUsageRatio: number
  minMixedBottles: number
  minDistinctSignatures: number
  minTopColorVariety: number
}

export interface GateResult {
  accepted: boolean
  /** First failed requirement, null when accepted */
  reason: string | null
}

export const BAND_THRESHOLDS: Record<LevelBand, QualityThresholds> = {
  A: {
    maxForcedMoveRatio: 0.7,
    maxDecisionDepth: 4,
    minBranchingFactor: 1.2,
    minTrapScore: 0.05,
    minSolutionMultiplicity: 1,
    maxEmptyBottleUsageRatio: 0.8,
    minMixedBottles: 1,
    minDistinctSignatures: 2,
    minTopColorVariety: 2,
  },
  B: {
    maxForcedMoveRatio: 0.6,
    maxDecisionDepth: 3,
    minBranchingFactor: 1.3,
    minTrapScore: 0.1,
    minSolutionMultiplicity: 1,
    maxEmptyBottleUsageRatio: 0.7,
    minMixedBottles: 2,
    minDistinctSignatures: 3,
    minTopColorVariety: 2,
  },
  C: {
    maxForcedMoveRatio: 0.55,
    maxDecisionDepth: 2,
    minBranchingFactor: 1.4,
    minTrapScore: 0.15,
    minSolutionMultiplicity: 1,
    maxEmptyBottleUsageRatio: 0.6,
    minMixedBottles: 2,
    minDistinctSignatures: 3,
    minTopColorVariety: 3,
  },
  D: {
    maxForcedMoveRatio: 0.5,
    maxDecisionDepth: 2,
    minBranchingFactor: 1.5,
    minTrapScore: 0.18,
    minSolutionMultiplicity: 1,
    maxEmptyBottleUsageRatio: 0.55,
    minMixedBottles: 3,
    minDistinctSignatures: 4,
    minTopColorVariety: 3,
  },
  E: {
    maxForcedMoveRatio: 0.45,
    maxDecisionDepth: 2,
    minBranchingFactor: 1.5,
    minTrapScore: 0.2,
    minSolutionMultiplicity: 1,
    maxEmptyBottleUsageRatio: 0.5,
    minMixedBottles: 3,
    minDistinctSignatures: 4,
    minTopColorVariety: 3,
  },
}

/**
 * Thresholds for the relaxed fallback: only a playable, non-trivial position is required.
 */
export const RELAXED_THRESHOLDS: QualityThresholds = {
  maxForcedMoveRatio: 1,
  maxDecisionDepth: Number.MAX_SAFE_INTEGER,
  minBranchingFactor: 0,
  minTrapScore: 0,
  minSolutionMultiplicity: 1,
  maxEmptyBottleUsageRatio: 1,
  minMixedBottles: 0,
  minDistinctSignatures: 1,
  minTopColorVariety: 1,
}

export function getThresholds(band: LevelBand, relaxed = false): QualityThresholds {
  return relaxed ? RELAXED_THRESHOLDS : BAND_THRESHOLDS[band]
}

function format(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2)
}

/**
 * Checks metrics against thresholds and names the first requirement missed.
 *
 * @example
 * const gate = evaluateQualityGate(metrics, BAND_THRESHOLDS.C)
 * if (!gate.accepted) log.debug(`rejected: ${gate.reason}`)
 */
export function evaluateQualityGate(
  metrics: LevelMetrics,
  thresholds: QualityThresholds
): GateResult {
  const checks: [boolean, string][] = [
    [
      metrics.forcedMoveRatio <= thresholds.maxForcedMoveRatio,
      `forced-move ratio ${format(metrics.forcedMoveRatio)} above ${format(thresholds.maxForcedMoveRatio)}`,
    ],
    [
      metrics.decisionDepth <= thresholds.maxDecisionDepth,
      `decision depth ${metrics.decisionDepth} above ${format(thresholds.maxDecisionDepth)}`,
    ],
    [
      metrics.averageBranchingFactor >= thresholds.minBranchingFactor,
      `branching factor ${format(metrics.averageBranchingFactor)} below ${format(thresholds.minBranchingFactor)}`,
    ],
    [
      metrics.trapScore >= thresholds.minTrapScore,
      `trap score ${format(metrics.trapScore)} below ${format(thresholds.minTrapScore)}`,
    ],
    [
      metrics.solutionMultiplicity >= thresholds.minSolutionMultiplicity,
      `solution multiplicity ${metrics.solutionMultiplicity} below ${format(thresholds.minSolutionMultiplicity)}`,
    ],
    [
      metrics.emptyBottleUsageRatio <= thresholds.maxEmptyBottleUsageRatio,
      `empty-bottle usage ${format(metrics.emptyBottleUsageRatio)} above ${format(thresholds.maxEmptyBottleUsageRatio)}`,
    ],
    [
      metrics.mixedBottleCount >= thresholds.minMixedBottles,
      `mixed bottles ${metrics.mixedBottleCount} below ${thresholds.minMixedBottles}`,
    ],
    [
      metrics.distinctSignatureCount >= thresholds.minDistinctSignatures,
      `distinct signatures ${metrics.distinctSignatureCount} below ${thresholds.minDistinctSignatures}`,
    ],
    [
      metrics.topColorVariety >= thresholds.minTopColorVariety,
      `top-color variety ${metrics.topColorVariety} below ${thresholds.minTopColorVariety}`,
    ],
  ]

  const failed = checks.find(([passed]) => !passed)
  return failed ? { accepted: false, reason: failed[1] } : { accepted: true, reason: null }
}

/**
 * Pure acceptance predicate.
 */
export function acceptQuality(metrics: LevelMetrics, thresholds: QualityThresholds): boolean {
  return evaluateQualityGate(metrics, thresholds).accepted
}
