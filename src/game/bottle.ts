/**
 * Bottle Model
 *
 * A bottle is a fixed-capacity stack of colored liquid units. Bottles are
 * plain values: every operation that changes contents returns new bottles
 * and leaves its inputs untouched, so search layers can hold independent
 * snapshots without aliasing.
 */

// Palette
export const COLOR_NAMES = [
  'red',
  'blue',
  'green',
  'yellow',
  'purple',
  'orange',
  'cyan',
  'magenta',
] as const

export const MAX_COLORS = COLOR_NAMES.length

export type ColorName = (typeof COLOR_NAMES)[number]

// Index into COLOR_NAMES (0 to MAX_COLORS - 1)
export type ColorId = number
export type Slot = ColorId | null

// slots[0] is the BOTTOM of the bottle; occupied slots are contiguous from there
export interface Bottle {
  slots: Slot[]
  isSink: boolean
}

/**
 * Creates a bottle with the given capacity and bottom-up contents.
 *
 * @param capacity - Number of unit slots
 * @param contents - Colors from bottom to top (must not exceed capacity)
 * @param isSink - Sink bottles receive pours but are never poured from
 *
 * @example
 * createBottle(4, [0, 0, 1]) // red, red, blue, (empty)
 */
export function createBottle(capacity: number, contents: ColorId[] = [], isSink = false): Bottle {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Bottle capacity must be a positive integer, got ${capacity}`)
  }
  if (contents.length > capacity) {
    throw new RangeError(`Cannot place ${contents.length} units in a bottle of capacity ${capacity}`)
  }

  const slots: Slot[] = Array.from({ length: capacity }, (_, i) =>
    i < contents.length ? contents[i] : null
  )
  return { slots, isSink }
}

/**
 * Deep clones a bottle.
 */
export function cloneBottle(bottle: Bottle): Bottle {
  return { slots: [...bottle.slots], isSink: bottle.isSink }
}

export function getCapacity(bottle: Bottle): number {
  return bottle.slots.length
}

/**
 * Number of occupied slots.
 */
export function getCount(bottle: Bottle): number {
  let count = 0
  for (const slot of bottle.slots) {
    if (slot === null) break
    count++
  }
  return count
}

export function getFreeSpace(bottle: Bottle): number {
  return bottle.slots.length - getCount(bottle)
}

export function isEmpty(bottle: Bottle): boolean {
  return bottle.slots.length === 0 || bottle.slots[0] === null
}

export function isFull(bottle: Bottle): boolean {
  return getFreeSpace(bottle) === 0
}

/**
 * Color of the highest occupied slot, or null for an empty bottle.
 */
export function getTopColor(bottle: Bottle): ColorId | null {
  const count = getCount(bottle)
  return count === 0 ? null : bottle.slots[count - 1]
}

/**
 * Length of the run of identical colors at the top of the bottle.
 */
export function getTopRunLength(bottle: Bottle): number {
  const count = getCount(bottle)
  if (count === 0) return 0

  const top = bottle.slots[count - 1]
  let run = 0
  for (let i = count - 1; i >= 0 && bottle.slots[i] === top; i--) {
    run++
  }
  return run
}

/**
 * A bottle is solved when it holds at least one unit and every unit has the same color.
 */
export function isSolvedBottle(bottle: Bottle): boolean {
  const count = getCount(bottle)
  return count > 0 && getTopRunLength(bottle) === count
}

/**
 * True for empty bottles and solved bottles.
 */
export function isMonochrome(bottle: Bottle): boolean {
  return isEmpty(bottle) || isSolvedBottle(bottle)
}

/**
 * Number of distinct colors in the bottle (0 for empty).
 */
export function countDistinctColors(bottle: Bottle): number {
  const seen = new Set<ColorId>()
  for (const slot of bottle.slots) {
    if (slot !== null) seen.add(slot)
  }
  return seen.size
}

/**
 * Amount that would move from source to target, ignoring sink rules.
 * Zero when the source is empty, the target is full, or the target's top
 * color differs from the source's top color.
 */
export function getMaxPourAmount(source: Bottle, target: Bottle): number {
  const color = getTopColor(source)
  if (color === null) return 0

  const free = getFreeSpace(target)
  if (free === 0) return 0

  const targetTop = getTopColor(target)
  if (targetTop !== null && targetTop !== color) return 0

  return Math.min(getTopRunLength(source), free)
}

/**
 * Moves `amount` units of the source's top color onto the target.
 * Returns new bottles; the inputs are not modified.
 */
export function pourBetween(source: Bottle, target: Bottle, amount: number): [Bottle, Bottle] {
  const nextSource = cloneBottle(source)
  const nextTarget = cloneBottle(target)

  let sourceCount = getCount(source)
  let targetCount = getCount(target)
  for (let i = 0; i < amount; i++) {
    const unit = nextSource.slots[sourceCount - 1]
    nextSource.slots[sourceCount - 1] = null
    nextTarget.slots[targetCount] = unit
    sourceCount--
    targetCount++
  }

  return [nextSource, nextTarget]
}

/**
 * Stable per-bottle description: sink flag, capacity and slot contents.
 *
 * @example
 * bottleSignature(createBottle(3, [1, 0])) // 'N3:BA.'
 */
export function bottleSignature(bottle: Bottle): string {
  return `${bottle.isSink ? 'S' : 'N'}${bottle.slots.length}:${bottle.slots.map(slotToChar).join('')}`
}

/**
 * One-character slot code: '.' for empty, 'A' for color 0, 'B' for color 1, ...
 */
export function slotToChar(slot: Slot): string {
  return slot === null ? '.' : String.fromCharCode(65 + slot)
}
