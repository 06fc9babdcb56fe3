/**
 * State Encoding
 *
 * String keys for puzzle positions. `encodeBottles` is the search
 * deduplication key: one character per slot, bottles separated by '|'.
 * It depends on slot contents only, never on move counters or metadata.
 *
 * The same characters double as a compact text notation for positions,
 * with a leading '*' marking a sink bottle:
 *
 *   'AAB.|BBA.|....|*...'
 */

import { InvalidInputError } from '../lib/errorUtils'
import { type Bottle, type Slot, MAX_COLORS, bottleSignature, slotToChar } from './bottle'
import type { PuzzleState } from './puzzle'

const SINK_MARK = '*'
const EMPTY_CHAR = '.'

// ============================================================================
// SEARCH KEYS
// ============================================================================

export function encodeBottles(bottles: Bottle[]): string {
  let key = ''
  for (let i = 0; i < bottles.length; i++) {
    if (i > 0) key += '|'
    for (const slot of bottles[i].slots) {
      key += slotToChar(slot)
    }
  }
  return key
}

/**
 * Deduplication key for a puzzle state.
 */
export function encodeState(state: PuzzleState): string {
  return encodeBottles(state.bottles)
}

/**
 * Order-independent key: positions that differ only by a permutation of
 * bottles share it.
 */
export function encodeCanonical(bottles: Bottle[]): string {
  return bottles.map(bottleSignature).sort().join('|')
}

// ============================================================================
// TEXT NOTATION
// ============================================================================

/**
 * Formats bottles in text notation.
 *
 * @example
 * formatBottles([createBottle(2, [0, 0]), createBottle(2, [], true)]) // 'AA|*..'
 */
export function formatBottles(bottles: Bottle[]): string {
  return bottles
    .map((bottle) => (bottle.isSink ? SINK_MARK : '') + bottle.slots.map(slotToChar).join(''))
    .join('|')
}

/**
 * Parses text notation into bottles. Capacity is the number of slot
 * characters; whitespace around bottles is ignored.
 *
 * @throws InvalidInputError on unknown characters, gaps, or empty bottles
 */
export function parseBottles(text: string): Bottle[] {
  const parts = text.split('|').map((part) => part.trim())

  return parts.map((part, index) => {
    const isSink = part.startsWith(SINK_MARK)
    const body = isSink ? part.slice(SINK_MARK.length) : part
    if (body.length === 0) {
      throw new InvalidInputError(`Bottle ${index} has no slots in "${text}"`)
    }

    const slots: Slot[] = []
    for (const char of body) {
      slots.push(charToSlot(char, index))
    }

    const firstEmpty = slots.indexOf(null)
    if (firstEmpty !== -1 && slots.slice(firstEmpty).some((slot) => slot !== null)) {
      throw new InvalidInputError(`Bottle ${index} has a gap below its top unit: "${part}"`)
    }

    return { slots, isSink }
  })
}

function charToSlot(char: string, bottleIndex: number): Slot {
  if (char === EMPTY_CHAR) return null

  const color = char.charCodeAt(0) - 65
  if (char.length !== 1 || color < 0 || color >= MAX_COLORS) {
    throw new InvalidInputError(`Unknown slot character "${char}" in bottle ${bottleIndex}`)
  }
  return color
}
