import { z } from 'zod'
import { MAX_COLORS } from '../../game/bottle'
import { InvalidInputError } from '../errorUtils'

// Puzzle schemas
export const slotSchema = z.number().int().min(0).max(MAX_COLORS - 1).nullable()

export const bottleSchema = z
  .object({
    slots: z.array(slotSchema).min(1, 'Bottle capacity must be at least 1'),
    isSink: z.boolean(),
  })
  .refine(
    (bottle) => {
      const firstEmpty = bottle.slots.indexOf(null)
      return firstEmpty === -1 || bottle.slots.slice(firstEmpty).every((slot) => slot === null)
    },
    { message: 'Occupied slots must be contiguous from the bottom' }
  )

export type BottleInput = z.infer<typeof bottleSchema>

export const puzzleStateSchema = z.object({
  bottles: z.array(bottleSchema).min(1, 'Puzzle must have at least one bottle'),
  movesUsed: z.number().int().min(0),
  movesAllowed: z.number().int().min(0),
  optimalMoves: z.number().int().min(-1),
  levelIndex: z.number().int().min(1),
  seed: z.number().int(),
  scrambleMoves: z.number().int().min(0),
})

export type PuzzleStateInput = z.infer<typeof puzzleStateSchema>

// Search budgets
export const solverBudgetSchema = z.object({
  maxNodes: z.number().int().positive('maxNodes must be a positive integer'),
  maxMillis: z.number().positive('maxMillis must be positive'),
})

export type SolverBudget = z.infer<typeof solverBudgetSchema>

export const bottleIndexSchema = z.number().int('Bottle index must be an integer')

export const levelIndexSchema = z.number().int().min(1, 'Level index must be at least 1')

export const seedSchema = z.number().int('Seed must be an integer')

/**
 * Parses a value with a schema, throwing InvalidInputError with every issue on failure.
 *
 * @param schema - The zod schema to validate against
 * @param value - The untrusted value
 * @param label - What is being validated, used in the error message
 * @returns The parsed value (a fresh copy for object schemas)
 *
 * @example
 * const state = parseOrThrow(puzzleStateSchema, input, 'puzzle state')
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    )
    throw new InvalidInputError(`Invalid ${label}: ${issues.join('; ')}`, issues)
  }
  return result.data
}
