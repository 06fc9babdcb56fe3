/**
 * Engine configuration
 *
 * Search budgets, metric sampling caps and generation attempt ceilings.
 * The generation time budget sits well above what its node budget needs so
 * that the node budget binds and results stay reproducible. A metrics call
 * shares one node budget and one wall-clock deadline across its re-solves.
 */

import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from './logger'
import { parseOrThrow, solverBudgetSchema, type SolverBudget } from './schemas/puzzle'

// ============================================================================
// SCHEMA
// ============================================================================

export const metricsConfigSchema = z.object({
  /** Non-optimal opening moves re-solved when measuring trap risk */
  trapSampleCount: z.number().int().min(1).max(64),
  /** Node cap for each re-solve */
  trapNodeBudget: z.number().int().positive(),
  /** Node cap shared by all re-solves of one metrics call */
  metricsNodeBudget: z.number().int().positive(),
  /** Wall-clock cap for one whole metrics call */
  metricsMillisBudget: z.number().positive(),
  /** Upper bound on the reported solution multiplicity */
  multiplicityCap: z.number().int().min(1).max(16),
  /** Extra moves over optimal that still count as a near-optimal solution */
  multiplicityMargin: z.number().int().min(0).max(2),
})

export const generationConfigSchema = z.object({
  maxAttempts: z.number().int().min(1),
  candidatesPerAttempt: z.number().int().min(1),
  /** Attempts made with the relaxed profile once maxAttempts is spent */
  relaxedAttempts: z.number().int().min(0),
  /** Most sources allowed to reach an empty bottle when two or more are empty */
  chainRiskLimit: z.number().int().min(1),
  /** Seed offset between attempts */
  seedStride: z.number().int().min(1),
})

export const engineConfigSchema = z.object({
  generationBudget: solverBudgetSchema,
  metrics: metricsConfigSchema,
  generation: generationConfigSchema,
  logLevel: z.enum(LOG_LEVELS),
})

export type MetricsConfig = z.infer<typeof metricsConfigSchema>
export type GenerationConfig = z.infer<typeof generationConfigSchema>
export type EngineConfig = z.infer<typeof engineConfigSchema>

export interface EngineConfigOverrides {
  generationBudget?: Partial<SolverBudget>
  metrics?: Partial<MetricsConfig>
  generation?: Partial<GenerationConfig>
  logLevel?: LogLevel
}

// ============================================================================
// DEFAULTS
// ============================================================================

/** Default budget for `solve` and `solveWithPath` */
export const INTERACTIVE_BUDGET: SolverBudget = {
  maxNodes: 100_000,
  maxMillis: 1_000,
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  generationBudget: {
    maxNodes: 150_000,
    maxMillis: 15_000,
  },
  metrics: {
    trapSampleCount: 12,
    trapNodeBudget: 250,
    metricsNodeBudget: 1_200,
    metricsMillisBudget: 80,
    multiplicityCap: 3,
    multiplicityMargin: 1,
  },
  generation: {
    maxAttempts: 6,
    candidatesPerAttempt: 3,
    relaxedAttempts: 4,
    chainRiskLimit: 4,
    seedStride: 7919,
  },
  logLevel: 'warn',
}

/**
 * Merges section-level overrides onto the defaults and validates the result.
 *
 * @throws InvalidInputError when an override is out of range
 *
 * @example
 * const config = resolveEngineConfig({ metrics: { trapSampleCount: 10 } })
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const merged = {
    generationBudget: { ...DEFAULT_ENGINE_CONFIG.generationBudget, ...overrides.generationBudget },
    metrics: { ...DEFAULT_ENGINE_CONFIG.metrics, ...overrides.metrics },
    generation: { ...DEFAULT_ENGINE_CONFIG.generation, ...overrides.generation },
    logLevel: overrides.logLevel ?? DEFAULT_ENGINE_CONFIG.logLevel,
  }
  return parseOrThrow(engineConfigSchema, merged, 'engine config')
}
