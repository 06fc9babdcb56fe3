/**
 * Liquid Sort Engine
 *
 * Entry points for the session layer:
 * - generate: build a level from a seed and level index
 * - solve / solveWithPath: optimal move count (and path) for a position
 * - tryApplyMove: play one pour
 *
 * Every call takes values and returns new values; nothing is cached or
 * shared between calls.
 */

import {
  type GenerateOptions as GeneratorOptions,
  type GeneratedLevel,
  generateLevel,
} from './generation/generator'
import { getDifficultyProfile } from './generation/profile'
import { type EngineConfigOverrides, resolveEngineConfig } from './lib/engineConfig'
import type { Logger } from './lib/logger'

export interface GenerateOptions {
  config?: EngineConfigOverrides
  logger?: Logger
}

/**
 * Generates the level for a seed and level index.
 *
 * @throws GenerationError when no conforming level was found; retry with `perturbSeed(seed, n)`
 * @throws InvalidInputError for a non-integer seed, a bad level index or bad config overrides
 *
 * @example
 * const { state, report } = generate(1234, 12)
 * console.log(`${state.optimalMoves} moves, ${state.movesAllowed} allowed`)
 */
export function generate(
  seed: number,
  levelIndex: number,
  options: GenerateOptions = {}
): GeneratedLevel {
  const profile = getDifficultyProfile(levelIndex)
  const generatorOptions: GeneratorOptions = {
    config: resolveEngineConfig(options.config),
    logger: options.logger,
  }
  return generateLevel(seed, profile, generatorOptions)
}

export { solve, solveWithPath } from './solver/solver'
export type { SearchOptions, SolverResult, SolverStatus } from './solver/solver'

export {
  createPuzzleState,
  clonePuzzleState,
  getLegalMoves,
  getPourAmount,
  isFail,
  isWin,
  replayMoves,
  tryApplyMove,
} from './game/puzzle'
export type { Move, MoveOutcome, PuzzleMetadata, PuzzleState } from './game/puzzle'

export { COLOR_NAMES, MAX_COLORS, createBottle } from './game/bottle'
export type { Bottle, ColorId, ColorName, Slot } from './game/bottle'

export { encodeCanonical, encodeState, formatBottles, parseBottles } from './game/encoding'
export { validateLevelStart, validatePuzzleIntegrity } from './game/integrity'

export { computeLevelMetrics } from './solver/metrics'
export type { LevelMetrics } from './solver/metrics'

export { generateLevel } from './generation/generator'
export type { GeneratedLevel, GenerationReport } from './generation/generator'
export { getDifficultyProfile, computeMovesAllowed } from './generation/profile'
export type { DifficultyProfile, LevelBand } from './generation/profile'
export { BAND_THRESHOLDS, acceptQuality, evaluateQualityGate } from './generation/qualityGate'
export type { QualityThresholds } from './generation/qualityGate'
export { computeIntrinsicDifficulty, scoreDifficulty } from './generation/objective'
export { perturbSeed } from './generation/random'

export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from './lib/engineConfig'
export type { EngineConfig, EngineConfigOverrides } from './lib/engineConfig'
export {
  GenerationError,
  InvalidInputError,
  getErrorMessage,
  isGenerationError,
  isInvalidInputError,
  logError,
} from './lib/errorUtils'
export { createLogger } from './lib/logger'
export type { LogLevel, Logger } from './lib/logger'
