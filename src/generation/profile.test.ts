import { describe, it, expect } from 'vitest'
import { InvalidInputError } from '../lib/errorUtils'
import {
  PLATEAU_LEVEL,
  computeMovesAllowed,
  getBand,
  getDifficultyProfile,
  getTargetOptimalMoves,
  rampPosition,
  relaxProfile,
} from './profile'

describe('Difficulty Profiles', () => {
  describe('getDifficultyProfile', () => {
    it('starts small at level 1', () => {
      const profile = getDifficultyProfile(1)
      expect(profile.band).toBe('A')
      expect(profile.colorCount).toBe(3)
      expect(profile.emptyBottleCount).toBe(2)
      expect(profile.sinkCount).toBe(0)
      expect(profile.bottleCount).toBe(5)
      expect(profile.reverseMoveCount).toBe(6)
      expect(profile.targetOptimalMoves).toBe(3)
      expect(profile.slackFactor).toBe(2)
      expect(profile.difficultyRating).toBe(100)
      expect(profile.capacity).toEqual({
        capacityPool: [4],
        minDistinctCapacities: 1,
        minSmall: 0,
        minLarge: 0,
      })
      expect(profile.fragmentation).toEqual({
        minAverageFragmentsPerColor: 1,
        minFragmentSizeVariance: 0,
        minMixedBottles: 1,
      })
    })

    it('reaches its ceiling at level 100', () => {
      const profile = getDifficultyProfile(100)
      expect(profile.band).toBe('E')
      expect(profile.colorCount).toBe(7)
      expect(profile.emptyBottleCount).toBe(1)
      expect(profile.sinkCount).toBe(1)
      expect(profile.bottleCount).toBe(9)
      expect(profile.reverseMoveCount).toBe(18)
      expect(profile.targetOptimalMoves).toBe(10)
      expect(profile.slackFactor).toBe(1.25)
      expect(profile.difficultyRating).toBe(10_000)
      expect(profile.capacity).toEqual({
        capacityPool: [2, 3, 4, 5, 6, 7],
        minDistinctCapacities: 4,
        minSmall: 2,
        minLarge: 2,
      })
      expect(profile.fragmentation).toEqual({
        minAverageFragmentsPerColor: 2,
        minFragmentSizeVariance: 0.25,
        minMixedBottles: 3,
      })
    })

    it('keeps level-100 values beyond the plateau', () => {
      const ceiling = getDifficultyProfile(PLATEAU_LEVEL)
      for (const level of [101, 150, 1000]) {
        const profile = getDifficultyProfile(level)
        expect(profile.levelIndex).toBe(level)
        expect({ ...profile, levelIndex: PLATEAU_LEVEL }).toEqual(ceiling)
      }
    })

    it('never eases off as the level rises', () => {
      for (let level = 2; level <= PLATEAU_LEVEL; level++) {
        const prev = getDifficultyProfile(level - 1)
        const next = getDifficultyProfile(level)

        expect(next.colorCount).toBeGreaterThanOrEqual(prev.colorCount)
        expect(next.sinkCount).toBeGreaterThanOrEqual(prev.sinkCount)
        expect(next.emptyBottleCount).toBeLessThanOrEqual(prev.emptyBottleCount)
        expect(next.reverseMoveCount).toBeGreaterThanOrEqual(prev.reverseMoveCount)
        expect(next.targetOptimalMoves).toBeGreaterThanOrEqual(prev.targetOptimalMoves)
        expect(next.slackFactor).toBeLessThanOrEqual(prev.slackFactor)
        expect(next.capacity.capacityPool.length).toBeGreaterThanOrEqual(
          prev.capacity.capacityPool.length
        )
        expect(next.capacity.minDistinctCapacities).toBeGreaterThanOrEqual(
          prev.capacity.minDistinctCapacities
        )
        expect(next.capacity.minSmall).toBeGreaterThanOrEqual(prev.capacity.minSmall)
        expect(next.capacity.minLarge).toBeGreaterThanOrEqual(prev.capacity.minLarge)
        expect(next.fragmentation.minAverageFragmentsPerColor).toBeGreaterThanOrEqual(
          prev.fragmentation.minAverageFragmentsPerColor
        )
      }
    })

    it('only asks for capacities the pool can provide', () => {
      for (let level = 1; level <= PLATEAU_LEVEL; level++) {
        const { capacity, bottleCount } = getDifficultyProfile(level)
        const small = capacity.capacityPool.filter((c) => c <= 3)
        const large = capacity.capacityPool.filter((c) => c >= 6)

        if (capacity.minSmall > 0) expect(small.length).toBeGreaterThan(0)
        if (capacity.minLarge > 0) expect(large.length).toBeGreaterThan(0)
        expect(capacity.minDistinctCapacities).toBeLessThanOrEqual(capacity.capacityPool.length)
        expect(capacity.minSmall + capacity.minLarge).toBeLessThanOrEqual(bottleCount)
      }
    })

    it('rejects invalid level indices', () => {
      expect(() => getDifficultyProfile(0)).toThrow(InvalidInputError)
      expect(() => getDifficultyProfile(-3)).toThrow(InvalidInputError)
      expect(() => getDifficultyProfile(1.5)).toThrow(InvalidInputError)
    })
  })

  describe('getBand', () => {
    it('maps level ranges to bands', () => {
      expect(getBand(1)).toBe('A')
      expect(getBand(10)).toBe('A')
      expect(getBand(11)).toBe('B')
      expect(getBand(25)).toBe('B')
      expect(getBand(26)).toBe('C')
      expect(getBand(50)).toBe('C')
      expect(getBand(51)).toBe('D')
      expect(getBand(75)).toBe('D')
      expect(getBand(76)).toBe('E')
      expect(getBand(500)).toBe('E')
    })
  })

  describe('rampPosition', () => {
    it('runs from 0 to 1 and stays there', () => {
      expect(rampPosition(1)).toBe(0)
      expect(rampPosition(100)).toBe(1)
      expect(rampPosition(400)).toBe(1)
    })
  })

  describe('relaxProfile', () => {
    it('shortens the scramble and drops fragmentation requirements', () => {
      const relaxed = relaxProfile(getDifficultyProfile(100))
      expect(relaxed.relaxed).toBe(true)
      expect(relaxed.reverseMoveCount).toBe(14)
      expect(relaxed.targetOptimalMoves).toBe(10)
      expect(relaxed.fragmentation).toEqual({
        minAverageFragmentsPerColor: 0,
        minFragmentSizeVariance: 0,
        minMixedBottles: 0,
      })
      expect(relaxed.colorCount).toBe(7)
    })

    it('keeps at least four reverse moves', () => {
      expect(relaxProfile(getDifficultyProfile(1)).reverseMoveCount).toBe(5)
    })

    it('never scrambles fewer moves than the target optimum', () => {
      for (let level = 1; level <= PLATEAU_LEVEL; level++) {
        const relaxed = relaxProfile(getDifficultyProfile(level))
        expect(relaxed.reverseMoveCount).toBeGreaterThanOrEqual(relaxed.targetOptimalMoves)
      }
    })
  })

  describe('getTargetOptimalMoves', () => {
    it('rises from 3 to 10 and never falls', () => {
      expect(getTargetOptimalMoves(1)).toBe(3)
      expect(getTargetOptimalMoves(50)).toBe(6)
      expect(getTargetOptimalMoves(100)).toBe(10)
      expect(getTargetOptimalMoves(250)).toBe(10)
      for (let level = 2; level <= 150; level++) {
        expect(getTargetOptimalMoves(level)).toBeGreaterThanOrEqual(getTargetOptimalMoves(level - 1))
      }
    })
  })

  describe('computeMovesAllowed', () => {
    it('scales the optimum by the slack factor, rounding up', () => {
      expect(computeMovesAllowed(5, 2)).toBe(10)
      expect(computeMovesAllowed(7, 1.25)).toBe(9)
      expect(computeMovesAllowed(4, 1)).toBe(4)
      expect(computeMovesAllowed(0, 2)).toBe(0)
    })
  })
})
