/**
 * Difficulty / Capacity Profiles
 *
 * Maps a level index to the parameters used to build that level. Every
 * parameter moves linearly from its level-1 value to its level-100 value;
 * past level 100 the level-100 values are kept and only the seed varies.
 *
 * Every generated level is solved in exactly `targetOptimalMoves` moves. The
 * target never falls as the level rises, so neither does the optimum.
 */

import { levelIndexSchema, parseOrThrow } from '../lib/schemas/puzzle'

// ============================================================================
// TYPES
// ============================================================================

export type LevelBand = 'A' | 'B' | 'C' | 'D' | 'E'

export interface CapacityProfile {
  /** Capacities a bottle may be given, ascending */
  capacityPool: number[]
  minDistinctCapacities: number
  /** Bottles with capacity at most SMALL_CAPACITY_MAX */
  minSmall: number
  /** Bottles with capacity at least LARGE_CAPACITY_MIN */
  minLarge: number
}

export interface FragmentationTargets {
  /** Mean number of separate runs each color is split into */
  minAverageFragmentsPerColor: number
  /** Variance of run lengths across all runs */
  minFragmentSizeVariance: number
  minMixedBottles: number
}

export interface DifficultyProfile {
  levelIndex: number
  band: LevelBand
  colorCount: number
  /** Empty non-sink bottles in the solved configuration */
  emptyBottleCount: number
  sinkCount: number
  bottleCount: number
  capacity: CapacityProfile
  fragmentation: FragmentationTargets
  reverseMoveCount: number
  /** Exact optimal move count a generated level must have */
  targetOptimalMoves: number
  /** Multiplier from optimal moves to allowed moves */
  slackFactor: number
  /** Effective level (capped at the plateau) times 100 */
  difficultyRating: number
  /** Lenient fallback variant */
  relaxed: boolean
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const PLATEAU_LEVEL = 100
export const SMALL_CAPACITY_MAX = 3
export const LARGE_CAPACITY_MIN = 6

const BAND_LIMITS: [LevelBand, number][] = [
  ['A', 10],
  ['B', 25],
  ['C', 50],
  ['D', 75],
]

// ============================================================================
// PROFILE
// ============================================================================

export function getBand(levelIndex: number): LevelBand {
  for (const [band, limit] of BAND_LIMITS) {
    if (levelIndex <= limit) return band
  }
  return 'E'
}

/**
 * Position of a level on the ramp: 0 at level 1, 1 at the plateau and beyond.
 */
export function rampPosition(levelIndex: number): number {
  const effective = Math.min(levelIndex, PLATEAU_LEVEL)
  return (effective - 1) / (PLATEAU_LEVEL - 1)
}

function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * t
}

/**
 * Builds the profile for a level.
 *
 * @param levelIndex - Level number, starting at 1
 * @throws InvalidInputError for non-integer or non-positive levels
 *
 * @example
 * getDifficultyProfile(1).colorCount   // 3
 * getDifficultyProfile(100).colorCount // 7
 */
export function getDifficultyProfile(levelIndex: number): DifficultyProfile {
  parseOrThrow(levelIndexSchema, levelIndex, 'level index')

  const t = rampPosition(levelIndex)
  const effectiveLevel = Math.min(levelIndex, PLATEAU_LEVEL)

  const colorCount = Math.round(lerp(3, 7, t))
  const sinkCount = Math.round(t)
  const emptyBottleCount = 2 - sinkCount

  return {
    levelIndex,
    band: getBand(levelIndex),
    colorCount,
    emptyBottleCount,
    sinkCount,
    bottleCount: colorCount + emptyBottleCount + sinkCount,
    capacity: getCapacityProfile(t),
    fragmentation: {
      minAverageFragmentsPerColor: lerp(1, 2, t),
      minFragmentSizeVariance: lerp(0, 0.25, t),
      minMixedBottles: Math.round(lerp(1, 3, t)),
    },
    reverseMoveCount: Math.round(lerp(6, 18, t)),
    targetOptimalMoves: getTargetOptimalMoves(levelIndex),
    slackFactor: lerp(2, 1.25, t),
    difficultyRating: effectiveLevel * 100,
    relaxed: false,
  }
}

/**
 * Optimal move count every level at this index is generated with.
 * Non-decreasing in the level index, constant past the plateau.
 *
 * @example
 * getTargetOptimalMoves(1)   // 3
 * getTargetOptimalMoves(100) // 10
 */
export function getTargetOptimalMoves(levelIndex: number): number {
  return Math.round(lerp(3, 10, rampPosition(levelIndex)))
}

function getCapacityProfile(t: number): CapacityProfile {
  const minCapacity = 4 - Math.round(2 * t)
  const maxCapacity = 4 + Math.round(3 * t)
  const capacityPool = Array.from(
    { length: maxCapacity - minCapacity + 1 },
    (_, i) => minCapacity + i
  )

  return {
    capacityPool,
    minDistinctCapacities: Math.min(capacityPool.length, 1 + Math.round(3 * t)),
    minSmall: minCapacity <= SMALL_CAPACITY_MAX ? Math.round(2 * t) : 0,
    minLarge: maxCapacity >= LARGE_CAPACITY_MIN ? Math.round(2 * t) : 0,
  }
}

/**
 * Fallback profile: a shorter scramble and no fragmentation requirements.
 * The target optimum is kept so the fallback cannot break the progression.
 */
export function relaxProfile(profile: DifficultyProfile): DifficultyProfile {
  return {
    ...profile,
    reverseMoveCount: Math.max(
      profile.targetOptimalMoves,
      4,
      Math.round(profile.reverseMoveCount * 0.75)
    ),
    fragmentation: {
      minAverageFragmentsPerColor: 0,
      minFragmentSizeVariance: 0,
      minMixedBottles: 0,
    },
    relaxed: true,
  }
}

/**
 * Allowed moves for a level: the optimum scaled by the profile's slack.
 */
export function computeMovesAllowed(optimalMoves: number, slackFactor: number): number {
  return Math.max(optimalMoves, Math.ceil(optimalMoves * slackFactor))
}
