import { describe, it, expect } from 'vitest'
import { SpeedPolicy } from './SpeedPolicy.js'

const THRESHOLDS = [10, 25, 45, 75, 110]
const STEPS = [2, 3, 5, 10, 15]

describe('SpeedPolicy', () => {
  const policy = new SpeedPolicy(THRESHOLDS, STEPS)

  describe('levelFor', () => {
    it('should stay at level 0 below the first threshold', () => {
      expect(policy.levelFor(0)).toBe(0)
      expect(policy.levelFor(9)).toBe(0)
    })

    it('should step up at each threshold', () => {
      expect(policy.levelFor(10)).toBe(1)
      expect(policy.levelFor(24)).toBe(1)
      expect(policy.levelFor(25)).toBe(2)
      expect(policy.levelFor(45)).toBe(3)
      expect(policy.levelFor(74)).toBe(3)
      expect(policy.levelFor(75)).toBe(4)
      expect(policy.levelFor(109)).toBe(4)
    })

    it('should clamp past the last threshold', () => {
      expect(policy.levelFor(110)).toBe(4)
      expect(policy.levelFor(5000)).toBe(4)
    })

    it('should never drop below the previous level', () => {
      expect(policy.levelFor(5, 3)).toBe(3)
      expect(policy.levelFor(30, 3)).toBe(3)
    })

    it('should be monotonic and bounded as the score grows', () => {
      let level = 0
      for (let score = 0; score <= 200; score++) {
        const next = policy.levelFor(score, level)
        expect(next).toBeGreaterThanOrEqual(level)
        expect(next).toBeLessThanOrEqual(policy.maxLevel)
        expect(policy.levelFor(score)).toBeGreaterThanOrEqual(policy.levelFor(Math.max(0, score - 1)))
        level = next
      }
      expect(level).toBe(4)
    })
  })

  describe('speedFor', () => {
    it('should map levels to pixel steps', () => {
      expect(policy.speedFor(0)).toBe(2)
      expect(policy.speedFor(2)).toBe(5)
      expect(policy.speedFor(4)).toBe(15)
    })

    it('should clamp out of range levels', () => {
      expect(policy.speedFor(-1)).toBe(2)
      expect(policy.speedFor(9)).toBe(15)
    })
  })

  describe('construction', () => {
    it('should reject mismatched tables', () => {
      expect(() => new SpeedPolicy([10, 20], [2])).toThrow('2 thresholds but 1 speed steps')
    })

    it('should reject empty tables', () => {
      expect(() => new SpeedPolicy([], [])).toThrow('at least one threshold')
    })

    it('should reject thresholds that are not ascending', () => {
      expect(() => new SpeedPolicy([10, 10], [2, 3])).toThrow('strictly ascending')
    })

    it('should reject non-positive speeds', () => {
      expect(() => new SpeedPolicy([10, 20], [2, 0])).toThrow('must be positive')
    })
  })
})
