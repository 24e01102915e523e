import { describe, expect, it } from 'vitest'
import { computeIndex, directionOf, normalize } from './shockIndex'

describe('normalize', () => {
  it('divides by the magnitude of the anchor', () => {
    expect(normalize([10, -20], -100)).toEqual([0.1, -0.2])
  })

  it('falls back to 1 for a zero anchor', () => {
    expect(normalize([3], 0)).toEqual([3])
  })
})

describe('directionOf', () => {
  it('treats values within epsilon as neutral', () => {
    expect(directionOf(0.02, 0.01)).toBe('Positive')
    expect(directionOf(-0.02, 0.01)).toBe('Negative')
    expect(directionOf(0.01, 0.01)).toBe('Neutral')
    expect(directionOf(-0.005, 0.01)).toBe('Neutral')
  })
})

describe('computeIndex', () => {
  it('gives full confidence to identical samples', () => {
    const index = computeIndex([-2, -2, -2], 100)
    expect(index.value).toBeCloseTo(-0.02)
    expect(index.direction).toBe('Negative')
    expect(index.confidence).toBe(1)
  })

  it('gives zero confidence when the spread swamps the mean', () => {
    const index = computeIndex([1, -1], 1)
    expect(index.value).toBe(0)
    expect(index.direction).toBe('Neutral')
    expect(index.confidence).toBe(0)
  })

  it('lowers confidence as the spread grows', () => {
    // mean 2, sample sd 1
    const index = computeIndex([1, 2, 3], 1)
    expect(index.value).toBe(2)
    expect(index.confidence).toBeCloseTo(0.5, 5)
  })

  it('is neutral with no samples', () => {
    expect(computeIndex([], 10)).toEqual({ value: 0, direction: 'Neutral', confidence: 1 })
  })
})
