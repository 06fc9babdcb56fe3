/**
 * Level Generator
 *
 * Builds levels by reverse construction: start from a solved configuration,
 * apply inverse pours, then solve, measure and gate the result. Because
 * every inverse pour can be undone by a legal forward pour, the scrambled
 * position is solvable by replaying the scramble backwards; the solver then
 * finds the true optimum, which is usually shorter.
 *
 * A level must be solvable in exactly the profile's target number of moves.
 * One inverse pour raises the optimum by at most one (a single forward pour
 * undoes it) and the solved start has optimum 0, so once the full scramble
 * reaches the target, some prefix of it sits exactly on the target. The
 * generator keeps the longest such prefix.
 *
 * Each attempt builds several candidate scrambles and keeps the best one
 * that clears the quality gate. After the attempt ceiling a relaxed profile
 * is tried before giving up with a GenerationError.
 */

import {
  type Bottle,
  type ColorId,
  MAX_COLORS,
  createBottle,
  getCount,
  getFreeSpace,
  getTopColor,
  getTopRunLength,
  isEmpty,
  isSolvedBottle,
  pourBetween,
} from '../game/bottle'
import { encodeCanonical } from '../game/encoding'
import { validateLevelStart, validatePuzzleIntegrity } from '../game/integrity'
import { type Move, type PuzzleState, createPuzzleState } from '../game/puzzle'
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../lib/engineConfig'
import { GenerationError } from '../lib/errorUtils'
import { type Logger, createLogger } from '../lib/logger'
import { parseOrThrow, seedSchema } from '../lib/schemas/puzzle'
import { type LevelMetrics, computeLevelMetrics, computeStructuralMetrics } from '../solver/metrics'
import { searchOptimal } from '../solver/solver'
import { computeIntrinsicDifficulty, getWeightsForBand, scoreDifficulty } from './objective'
import {
  type CapacityProfile,
  type DifficultyProfile,
  LARGE_CAPACITY_MIN,
  SMALL_CAPACITY_MAX,
  computeMovesAllowed,
  relaxProfile,
} from './profile'
import { evaluateQualityGate, getThresholds } from './qualityGate'
import { SeededRandom, mixSeed, perturbSeed } from './random'

// ============================================================================
// TYPES
// ============================================================================

export interface GenerateOptions {
  config?: EngineConfig
  logger?: Logger
}

export interface GenerationReport {
  levelIndex: number
  seed: number
  attemptsUsed: number
  candidatesEvaluated: number
  /** True when the relaxed fallback produced the level */
  relaxed: boolean
  metrics: LevelMetrics
  optimalMoves: number
  movesAllowed: number
  scrambleMoves: number
  /** Profile rating for the level: effective level times 100 */
  difficultyRating: number
  /** Objective score used to rank candidates */
  difficultyScore: number
  /** Player-facing difficulty, 1-100 */
  intrinsicDifficulty: number
  elapsedMs: number
  /** Why the last rejected candidate failed, null if none was rejected */
  lastRejectionReason: string | null
}

export interface GeneratedLevel {
  state: PuzzleState
  report: GenerationReport
}

export interface ScrambleResult {
  bottles: Bottle[]
  /** Inverse pours actually applied (fewer than requested when none were available) */
  applied: number
  /** positions[k] is the position after k inverse pours; positions[applied] is `bottles` */
  positions: Bottle[][]
}

export interface FragmentationStats {
  averageFragmentsPerColor: number
  fragmentSizeVariance: number
}

interface Candidate {
  bottles: Bottle[]
  scrambleMoves: number
  optimalMoves: number
  metrics: LevelMetrics
  score: number
}

type CandidateResult = { ok: true; candidate: Candidate } | { ok: false; reason: string }

interface AttemptPlan {
  attempt: number
  profile: DifficultyProfile
  reverseMoves: number
}

// ============================================================================
// SOLVED CONFIGURATION
// ============================================================================

/**
 * Chooses one capacity per bottle, honoring the small, large and
 * distinct-capacity minimums, in random order.
 */
export function planCapacities(
  profile: CapacityProfile,
  bottleCount: number,
  rng: SeededRandom
): number[] {
  const pool = profile.capacityPool
  const small = pool.filter((capacity) => capacity <= SMALL_CAPACITY_MAX)
  const large = pool.filter((capacity) => capacity >= LARGE_CAPACITY_MIN)
  const capacities: number[] = []

  for (let i = 0; i < profile.minSmall && small.length > 0; i++) {
    capacities.push(rng.pick(small))
  }
  for (let i = 0; i < profile.minLarge && large.length > 0; i++) {
    capacities.push(rng.pick(large))
  }

  while (
    new Set(capacities).size < profile.minDistinctCapacities &&
    capacities.length < bottleCount
  ) {
    const unused = pool.filter((capacity) => !capacities.includes(capacity))
    if (unused.length === 0) break
    capacities.push(rng.pick(unused))
  }

  while (capacities.length < bottleCount) {
    capacities.push(rng.pick(pool))
  }

  return rng.shuffle(capacities.slice(0, bottleCount))
}

/**
 * Solved starting point: one full single-color bottle per color, then the
 * empty bottles and sinks, in shuffled order.
 */
export function buildSolvedBottles(profile: DifficultyProfile, rng: SeededRandom): Bottle[] {
  const capacities = planCapacities(profile.capacity, profile.bottleCount, rng)
  const palette: ColorId[] = rng
    .shuffle(Array.from({ length: MAX_COLORS }, (_, color) => color))
    .slice(0, profile.colorCount)

  const bottles: Bottle[] = capacities.map((capacity, index) => {
    if (index < palette.length) {
      return createBottle(capacity, Array<ColorId>(capacity).fill(palette[index]))
    }
    const isSink = index >= palette.length + profile.emptyBottleCount
    return createBottle(capacity, [], isSink)
  })

  return rng.shuffle(bottles)
}

// ============================================================================
// SCRAMBLE
// ============================================================================

/**
 * Inverse pours available from a position. Moving `amount` units of color c
 * from S onto T is allowed when the forward pour T to S would move exactly
 * those units back and is a search move:
 * - T is not a sink and has room; T is empty or shows a color other than c
 * - S is left empty or still shows c on top
 * - the pour is not a plain relocation of a whole bottle into an empty one
 * - it does not undo the previous inverse pour
 */
export function getInverseMoves(bottles: Bottle[], previous: Move | null = null): Move[] {
  const moves: Move[] = []

  for (let source = 0; source < bottles.length; source++) {
    const from = bottles[source]
    if (from.isSink || isEmpty(from)) continue

    const color = getTopColor(from)
    const run = getTopRunLength(from)
    const count = getCount(from)

    for (let target = 0; target < bottles.length; target++) {
      if (target === source) continue
      const to = bottles[target]
      if (to.isSink || getTopColor(to) === color) continue
      if (previous !== null && previous.source === target && previous.target === source) continue

      const limit = Math.min(run, getFreeSpace(to))
      for (let amount = 1; amount <= limit; amount++) {
        const remaining = count - amount
        if (amount === run && remaining > 0) continue
        if (remaining === 0 && isEmpty(to)) continue
        moves.push({ source, target, amount })
      }
    }
  }

  return moves
}

/**
 * Applies up to `count` random inverse pours.
 */
export function scramble(bottles: Bottle[], count: number, rng: SeededRandom): ScrambleResult {
  let current = bottles
  let previous: Move | null = null
  const positions: Bottle[][] = [bottles]

  while (positions.length <= count) {
    const options = getInverseMoves(current, previous)
    if (options.length === 0) break

    const move = rng.pick(options)
    const [from, to] = pourBetween(current[move.source], current[move.target], move.amount)
    current = current.slice()
    current[move.source] = from
    current[move.target] = to
    positions.push(current)
    previous = move
  }

  return { bottles: current, applied: positions.length - 1, positions }
}

/**
 * Number of bottles that could start filling an empty bottle when two or
 * more non-sink bottles are empty; 0 otherwise.
 */
export function measureChainRisk(bottles: Bottle[]): number {
  const empties = bottles.filter((bottle) => !bottle.isSink && isEmpty(bottle)).length
  if (empties < 2) return 0

  return bottles.filter(
    (bottle) => !bottle.isSink && !isEmpty(bottle) && !isSolvedBottle(bottle)
  ).length
}

/**
 * Run statistics: how many separate runs each color is split into, and the
 * variance of run lengths.
 */
export function measureFragmentation(bottles: Bottle[]): FragmentationStats {
  const runsPerColor = new Map<ColorId, number>()
  const runLengths: number[] = []

  for (const bottle of bottles) {
    let runColor: ColorId | null = null
    let runLength = 0
    for (const slot of bottle.slots) {
      if (slot === runColor) {
        runLength++
        continue
      }
      if (runColor !== null) {
        runsPerColor.set(runColor, (runsPerColor.get(runColor) ?? 0) + 1)
        runLengths.push(runLength)
      }
      runColor = slot
      runLength = 1
    }
    if (runColor !== null) {
      runsPerColor.set(runColor, (runsPerColor.get(runColor) ?? 0) + 1)
      runLengths.push(runLength)
    }
  }

  if (runLengths.length === 0) {
    return { averageFragmentsPerColor: 0, fragmentSizeVariance: 0 }
  }

  const totalRuns = runLengths.length
  const mean = runLengths.reduce((sum, length) => sum + length, 0) / totalRuns
  const variance =
    runLengths.reduce((sum, length) => sum + (length - mean) * (length - mean), 0) / totalRuns

  return {
    averageFragmentsPerColor: totalRuns / runsPerColor.size,
    fragmentSizeVariance: variance,
  }
}

// ============================================================================
// CANDIDATES
// ============================================================================

function buildCandidate(
  seed: number,
  candidateIndex: number,
  plan: AttemptPlan,
  config: EngineConfig,
  seen: Set<string>
): CandidateResult {
  const { profile } = plan
  const target = profile.targetOptimalMoves
  const rng = new SeededRandom(mixSeed(seed, profile.levelIndex, plan.attempt, candidateIndex))

  const solved = buildSolvedBottles(profile, rng)
  const { bottles, applied, positions } = scramble(solved, plan.reverseMoves, rng)
  if (applied < target) {
    return { ok: false, reason: `scramble of ${applied} pours cannot reach optimal ${target}` }
  }

  const key = encodeCanonical(bottles)
  if (seen.has(key)) {
    return { ok: false, reason: 'duplicate scramble' }
  }
  seen.add(key)

  // Walk back from the full scramble. The optimum drops by at most one per
  // step, so an excess of k moves skips the next k - 1 prefixes.
  let step = applied
  while (step >= target) {
    const position = positions[step]
    const result = searchOptimal(position, { ...config.generationBudget, trackPath: true })
    if (result.status !== 'solved') {
      return { ok: false, reason: `solver ${result.status} after ${result.nodesExpanded} nodes` }
    }
    if (result.optimalMoves > target) {
      step -= result.optimalMoves - target
      continue
    }
    if (result.optimalMoves < target) {
      return { ok: false, reason: `optimal ${result.optimalMoves} below target ${target}` }
    }

    const structural = checkStructure(position, profile, config)
    if (structural !== null) {
      return { ok: false, reason: structural }
    }

    const metrics = computeLevelMetrics(position, result.path, config.metrics)
    const gate = evaluateQualityGate(metrics, getThresholds(profile.band, profile.relaxed))
    if (!gate.accepted) {
      return { ok: false, reason: `gate: ${gate.reason}` }
    }

    return {
      ok: true,
      candidate: {
        bottles: position,
        scrambleMoves: step,
        optimalMoves: result.optimalMoves,
        metrics,
        score: scoreDifficulty(metrics, getWeightsForBand(profile.band)),
      },
    }
  }

  return { ok: false, reason: `no scramble prefix reaches optimal ${target}` }
}

/**
 * Cheap structural checks on a chosen position. Returns the rejection
 * reason, or null when the position passes.
 */
function checkStructure(
  bottles: Bottle[],
  profile: DifficultyProfile,
  config: EngineConfig
): string | null {
  const integrity = validatePuzzleIntegrity(bottles)
  if (!integrity.isValid) return `integrity: ${integrity.error}`

  const start = validateLevelStart(bottles)
  if (!start.isValid) return `start: ${start.error}`

  const chainRisk = measureChainRisk(bottles)
  if (chainRisk > config.generation.chainRiskLimit) {
    return `chain risk ${chainRisk} above ${config.generation.chainRiskLimit}`
  }

  const targets = profile.fragmentation
  const fragmentation = measureFragmentation(bottles)
  if (fragmentation.averageFragmentsPerColor < targets.minAverageFragmentsPerColor) {
    return 'too few fragments per color'
  }
  if (fragmentation.fragmentSizeVariance < targets.minFragmentSizeVariance) {
    return 'fragment sizes too uniform'
  }
  if (computeStructuralMetrics(bottles).mixedBottleCount < targets.minMixedBottles) {
    return 'too few mixed bottles'
  }
  return null
}

// ============================================================================
// GENERATION
// ============================================================================

/**
 * Generates a level for a profile.
 *
 * @param seed - Any integer; the same seed and profile always give the same level
 * @param profile - Usually `getDifficultyProfile(levelIndex)`
 * @throws GenerationError when every attempt, including the relaxed fallback, is rejected
 *
 * @example
 * const { state, report } = generateLevel(42, getDifficultyProfile(12))
 * console.log(state.optimalMoves, report.difficultyScore)
 */
export function generateLevel(
  seed: number,
  profile: DifficultyProfile,
  options: GenerateOptions = {}
): GeneratedLevel {
  parseOrThrow(seedSchema, seed, 'seed')
  const config = options.config ?? DEFAULT_ENGINE_CONFIG
  const log = options.logger ?? createLogger('Generator', config.logLevel)
  const startTime = Date.now()

  const plans = planAttempts(profile, config)
  const seen = new Set<string>()
  let candidatesEvaluated = 0
  let lastRejectionReason: string | null = null

  for (const plan of plans) {
    if (plan.profile.relaxed && plan.attempt === config.generation.maxAttempts) {
      log.warn(`level ${profile.levelIndex} seed ${seed}: falling back to relaxed profile`)
    }

    const attemptSeed = perturbSeed(seed, plan.attempt, config.generation.seedStride)
    let best: Candidate | null = null

    for (let index = 0; index < config.generation.candidatesPerAttempt; index++) {
      const result = buildCandidate(attemptSeed, index, plan, config, seen)
      candidatesEvaluated++

      if (!result.ok) {
        lastRejectionReason = result.reason
        log.debug(`level ${profile.levelIndex} attempt ${plan.attempt}.${index}: ${result.reason}`)
        continue
      }
      if (best === null || result.candidate.score > best.score) {
        best = result.candidate
      }
    }

    if (best !== null) {
      const level = finalizeLevel(best, seed, plan, {
        attemptsUsed: plan.attempt + 1,
        candidatesEvaluated,
        lastRejectionReason,
        elapsedMs: Date.now() - startTime,
      })
      log.info(
        `level ${profile.levelIndex} seed ${seed}: optimal ${best.optimalMoves}, score ${best.score.toFixed(3)}`
      )
      return level
    }
  }

  const error = new GenerationError({
    levelIndex: profile.levelIndex,
    seed,
    attempts: plans.length,
    lastRejectionReason,
  })
  log.error(error.message)
  throw error
}

function planAttempts(profile: DifficultyProfile, config: EngineConfig): AttemptPlan[] {
  const { maxAttempts, relaxedAttempts } = config.generation
  const plans: AttemptPlan[] = []

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    plans.push({
      attempt,
      profile,
      reverseMoves: Math.max(
        profile.targetOptimalMoves,
        4,
        profile.reverseMoveCount - Math.floor(attempt / 2)
      ),
    })
  }

  const relaxed = relaxProfile(profile)
  for (let i = 0; i < relaxedAttempts; i++) {
    plans.push({
      attempt: maxAttempts + i,
      profile: relaxed,
      reverseMoves: Math.max(
        relaxed.targetOptimalMoves,
        4,
        relaxed.reverseMoveCount - Math.floor(i / 2)
      ),
    })
  }

  return plans
}

function finalizeLevel(
  candidate: Candidate,
  seed: number,
  plan: AttemptPlan,
  stats: {
    attemptsUsed: number
    candidatesEvaluated: number
    lastRejectionReason: string | null
    elapsedMs: number
  }
): GeneratedLevel {
  const { profile } = plan
  const movesAllowed = computeMovesAllowed(candidate.optimalMoves, profile.slackFactor)

  const state = createPuzzleState(candidate.bottles, {
    movesUsed: 0,
    movesAllowed,
    optimalMoves: candidate.optimalMoves,
    levelIndex: profile.levelIndex,
    seed,
    scrambleMoves: candidate.scrambleMoves,
  })

  return {
    state,
    report: {
      levelIndex: profile.levelIndex,
      seed,
      attemptsUsed: stats.attemptsUsed,
      candidatesEvaluated: stats.candidatesEvaluated,
      relaxed: profile.relaxed,
      metrics: candidate.metrics,
      optimalMoves: candidate.optimalMoves,
      movesAllowed,
      scrambleMoves: candidate.scrambleMoves,
      difficultyRating: profile.difficultyRating,
      difficultyScore: candidate.score,
      intrinsicDifficulty: computeIntrinsicDifficulty(candidate.metrics, candidate.optimalMoves),
      elapsedMs: stats.elapsedMs,
      lastRejectionReason: stats.lastRejectionReason,
    },
  }
}
