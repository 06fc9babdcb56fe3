/**
 * Error handling utilities
 *
 * Error classes raised by the engine and helpers for extracting and logging
 * error messages consistently.
 */

/**
 * A caller passed malformed input: a bad state, budget, level index or config.
 * Indicates a bug in the caller, never an expected outcome.
 */
export class InvalidInputError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(message)
    this.name = 'InvalidInputError'
    this.issues = issues
  }
}

/**
 * Every generation attempt, including the relaxed fallback, was rejected.
 * Callers are expected to retry with a perturbed seed.
 */
export class GenerationError extends Error {
  readonly levelIndex: number
  readonly seed: number
  readonly attempts: number
  readonly lastRejectionReason: string | null

  constructor(options: {
    levelIndex: number
    seed: number
    attempts: number
    lastRejectionReason: string | null
  }) {
    const reason = options.lastRejectionReason ?? 'no candidate produced'
    super(
      `Failed to generate level ${options.levelIndex} from seed ${options.seed} after ${options.attempts} attempts (last rejection: ${reason})`
    )
    this.name = 'GenerationError'
    this.levelIndex = options.levelIndex
    this.seed = options.seed
    this.attempts = options.attempts
    this.lastRejectionReason = options.lastRejectionReason
  }
}

/**
 * Extract an error message from an unknown error value.
 * Handles Error objects, strings, and objects with a message property.
 *
 * @param err - The error to extract a message from
 * @param fallback - Fallback message if no message can be extracted (default: 'An error occurred')
 *
 * @example
 * try {
 *   generate(seed, level)
 * } catch (err) {
 *   console.warn(getErrorMessage(err))
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}

export function isGenerationError(err: unknown): err is GenerationError {
  return err instanceof GenerationError
}

export function isInvalidInputError(err: unknown): err is InvalidInputError {
  return err instanceof InvalidInputError
}

/**
 * Log an error with context for debugging.
 *
 * @param context - A description of where/what the error occurred
 * @param err - The error to log
 */
export function logError(context: string, err: unknown): void {
  const message = getErrorMessage(err)
  console.error(`[${context}]`, message, err)
}
