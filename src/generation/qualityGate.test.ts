import { describe, it, expect } from 'vitest'
import type { LevelMetrics } from '../solver/metrics'
import type { LevelBand } from './profile'
import {
  BAND_THRESHOLDS,
  RELAXED_THRESHOLDS,
  acceptQuality,
  evaluateQualityGate,
  getThresholds,
} from './qualityGate'

function makeMetrics(overrides: Partial<LevelMetrics> = {}): LevelMetrics {
  return {
    forcedMoveRatio: 0.2,
    averageBranchingFactor: 3,
    decisionDepth: 0,
    emptyBottleUsageRatio: 0.1,
    trapScore: 0.5,
    solutionMultiplicity: 2,
    mixedBottleCount: 5,
    distinctSignatureCount: 6,
    topColorVariety: 4,
    ...overrides,
  }
}

const BANDS: LevelBand[] = ['A', 'B', 'C', 'D', 'E']

describe('Quality Gate', () => {
  it('accepts strong metrics in every band', () => {
    for (const band of BANDS) {
      expect(evaluateQualityGate(makeMetrics(), BAND_THRESHOLDS[band])).toEqual({
        accepted: true,
        reason: null,
      })
    }
  })

  it('names the forced-move ceiling', () => {
    expect(evaluateQualityGate(makeMetrics({ forcedMoveRatio: 0.75 }), BAND_THRESHOLDS.A)).toEqual({
      accepted: false,
      reason: 'forced-move ratio 0.75 above 0.70',
    })
  })

  it('names the decision-depth ceiling', () => {
    expect(evaluateQualityGate(makeMetrics({ decisionDepth: 5 }), BAND_THRESHOLDS.A).reason).toBe(
      'decision depth 5 above 4'
    )
  })

  it('tightens the branching floor between bands', () => {
    const metrics = makeMetrics({ averageBranchingFactor: 1.25 })
    expect(acceptQuality(metrics, BAND_THRESHOLDS.A)).toBe(true)
    expect(evaluateQualityGate(metrics, BAND_THRESHOLDS.B).reason).toBe(
      'branching factor 1.25 below 1.30'
    )
  })

  it('tightens the trap floor between bands', () => {
    const metrics = makeMetrics({ trapScore: 0.12 })
    expect(acceptQuality(metrics, BAND_THRESHOLDS.B)).toBe(true)
    expect(evaluateQualityGate(metrics, BAND_THRESHOLDS.C).reason).toBe(
      'trap score 0.12 below 0.15'
    )
  })

  it('rejects structurally degenerate positions', () => {
    expect(evaluateQualityGate(makeMetrics({ mixedBottleCount: 2 }), BAND_THRESHOLDS.D).reason).toBe(
      'mixed bottles 2 below 3'
    )
    expect(evaluateQualityGate(makeMetrics({ topColorVariety: 2 }), BAND_THRESHOLDS.C).reason).toBe(
      'top-color variety 2 below 3'
    )
    expect(
      evaluateQualityGate(makeMetrics({ distinctSignatureCount: 1 }), BAND_THRESHOLDS.A).reason
    ).toBe('distinct signatures 1 below 2')
  })

  it('reports the first failed requirement', () => {
    const metrics = makeMetrics({ forcedMoveRatio: 0.9, trapScore: 0 })
    expect(evaluateQualityGate(metrics, BAND_THRESHOLDS.E).reason).toBe(
      'forced-move ratio 0.90 above 0.45'
    )
  })

  it('never loosens from band A to band E', () => {
    for (let i = 1; i < BANDS.length; i++) {
      const prev = BAND_THRESHOLDS[BANDS[i - 1]]
      const next = BAND_THRESHOLDS[BANDS[i]]
      expect(next.maxForcedMoveRatio).toBeLessThanOrEqual(prev.maxForcedMoveRatio)
      expect(next.maxDecisionDepth).toBeLessThanOrEqual(prev.maxDecisionDepth)
      expect(next.minBranchingFactor).toBeGreaterThanOrEqual(prev.minBranchingFactor)
      expect(next.minTrapScore).toBeGreaterThanOrEqual(prev.minTrapScore)
      expect(next.minSolutionMultiplicity).toBeGreaterThanOrEqual(prev.minSolutionMultiplicity)
      expect(next.maxEmptyBottleUsageRatio).toBeLessThanOrEqual(prev.maxEmptyBottleUsageRatio)
      expect(next.minMixedBottles).toBeGreaterThanOrEqual(prev.minMixedBottles)
    }
  })

  it('relaxed thresholds accept any playable position', () => {
    const weak = makeMetrics({
      forcedMoveRatio: 1,
      averageBranchingFactor: 1,
      decisionDepth: 12,
      emptyBottleUsageRatio: 1,
      trapScore: 0,
      solutionMultiplicity: 1,
      mixedBottleCount: 0,
      distinctSignatureCount: 1,
      topColorVariety: 1,
    })
    expect(acceptQuality(weak, RELAXED_THRESHOLDS)).toBe(true)
    expect(acceptQuality(weak, BAND_THRESHOLDS.A)).toBe(false)
  })

  it('getThresholds selects the band or the relaxed set', () => {
    expect(getThresholds('C')).toBe(BAND_THRESHOLDS.C)
    expect(getThresholds('C', true)).toBe(RELAXED_THRESHOLDS)
  })
})
