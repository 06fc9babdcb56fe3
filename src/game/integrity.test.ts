import { describe, it, expect } from 'vitest'
import { parseBottles } from './encoding'
import { validateLevelStart, validatePuzzleIntegrity } from './integrity'

describe('validatePuzzleIntegrity', () => {
  it('accepts a well-formed position', () => {
    expect(validatePuzzleIntegrity(parseBottles('AB..|BA..|....'))).toEqual({ isValid: true })
  })

  it('rejects an empty bottle list', () => {
    expect(validatePuzzleIntegrity([])).toEqual({
      isValid: false,
      error: 'Puzzle has no bottles',
    })
  })

  it('rejects gaps', () => {
    expect(validatePuzzleIntegrity([{ slots: [null, 0], isSink: false }])).toEqual({
      isValid: false,
      error: 'Bottle 0 has a gap below its top unit',
    })
  })

  it('rejects a color with more units than any regular bottle holds', () => {
    expect(validatePuzzleIntegrity(parseBottles('AA|AA|..'))).toEqual({
      isValid: false,
      error: 'No non-sink bottle can hold all 4 units of color 0',
    })
  })

  it('rejects mixed colors in a sink', () => {
    expect(validatePuzzleIntegrity(parseBottles('AB..|*BA..'))).toEqual({
      isValid: false,
      error: 'Sink bottle 1 has mixed colors',
    })
  })

  it('rejects a full sink that holds only part of its color', () => {
    expect(validatePuzzleIntegrity(parseBottles('*AA|A..'))).toEqual({
      isValid: false,
      error: 'Sink bottle 0 is sealed with 2 of 3 units of color 0',
    })
  })

  it('accepts a full sink holding its whole color', () => {
    expect(validatePuzzleIntegrity(parseBottles('*AA|BB.|...'))).toEqual({ isValid: true })
  })
})

describe('validateLevelStart', () => {
  it('rejects an already finished position', () => {
    expect(validateLevelStart(parseBottles('AA|BB|..'))).toEqual({
      isValid: false,
      error: 'Position is already solved',
    })
  })

  it('rejects a position without moves', () => {
    expect(validateLevelStart(parseBottles('AB|BA'))).toEqual({
      isValid: false,
      error: 'Position has no legal opening move',
    })
  })

  it('accepts a playable position', () => {
    expect(validateLevelStart(parseBottles('AB..|B...|....'))).toEqual({ isValid: true })
  })
})
