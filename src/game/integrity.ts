/**
 * Structural checks for puzzle positions.
 */

import {
  type Bottle,
  getCapacity,
  getCount,
  isFull,
  isMonochrome,
  isSolvedBottle,
  getTopColor,
} from './bottle'
import { countColorUnits, hasAnyLegalMove, isWin } from './puzzle'

export interface ValidationResult {
  isValid: boolean
  error?: string
}

/**
 * Validates that a position is well formed and can in principle be finished:
 * - at least one bottle, no gaps, no overfilled bottles
 * - every color fits into some non-sink bottle
 * - sink bottles never hold mixed colors
 * - a full sink holds every unit of its color
 */
export function validatePuzzleIntegrity(bottles: Bottle[]): ValidationResult {
  if (bottles.length === 0) {
    return { isValid: false, error: 'Puzzle has no bottles' }
  }

  for (let i = 0; i < bottles.length; i++) {
    const bottle = bottles[i]
    if (getCapacity(bottle) < 1) {
      return { isValid: false, error: `Bottle ${i} has invalid capacity` }
    }
    const count = getCount(bottle)
    if (bottle.slots.slice(count).some((slot) => slot !== null)) {
      return { isValid: false, error: `Bottle ${i} has a gap below its top unit` }
    }
  }

  const volumes = countColorUnits(bottles)
  const largestNonSink = Math.max(
    0,
    ...bottles.filter((bottle) => !bottle.isSink).map(getCapacity)
  )
  for (const [color, volume] of volumes) {
    if (volume > largestNonSink) {
      return {
        isValid: false,
        error: `No non-sink bottle can hold all ${volume} units of color ${color}`,
      }
    }
  }

  for (let i = 0; i < bottles.length; i++) {
    const bottle = bottles[i]
    if (!bottle.isSink) continue

    if (!isMonochrome(bottle)) {
      return { isValid: false, error: `Sink bottle ${i} has mixed colors` }
    }
    if (isFull(bottle) && isSolvedBottle(bottle)) {
      const color = getTopColor(bottle)
      const volume = color === null ? 0 : (volumes.get(color) ?? 0)
      if (volume !== getCapacity(bottle)) {
        return {
          isValid: false,
          error: `Sink bottle ${i} is sealed with ${getCapacity(bottle)} of ${volume} units of color ${color}`,
        }
      }
    }
  }

  return { isValid: true }
}

/**
 * A playable starting position is not already finished and offers at least one move.
 */
export function validateLevelStart(bottles: Bottle[]): ValidationResult {
  if (isWin(bottles)) {
    return { isValid: false, error: 'Position is already solved' }
  }
  if (!hasAnyLegalMove(bottles)) {
    return { isValid: false, error: 'Position has no legal opening move' }
  }
  return { isValid: true }
}
