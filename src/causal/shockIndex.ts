import { mean, stdDeviation } from './stats'
import { Direction, ShockIndex } from './types'

export interface IndexOptions {
  epsilon: number
  delta: number
}

export function normalize(samples: readonly number[], scaleAnchor: number): number[] {
  const anchor = Math.abs(scaleAnchor) > 0 && Number.isFinite(scaleAnchor) ? Math.abs(scaleAnchor) : 1
  return samples.map((s) => s / anchor)
}

export function directionOf(value: number, epsilon: number): Direction {
  if (value > epsilon) return 'Positive'
  if (value < -epsilon) return 'Negative'
  return 'Neutral'
}

/**
 * Reduces one stakeholder's raw samples to a signed index in units of its scale anchor.
 * Confidence is high when the spread is small next to the mean.
 */
export function computeIndex(
  samples: readonly number[],
  scaleAnchor: number,
  { epsilon, delta }: IndexOptions = { epsilon: 0.01, delta: 1e-6 }
): ShockIndex {
  const normalized = normalize(samples, scaleAnchor)
  const value = mean(normalized)
  const sd = stdDeviation(normalized)
  const raw = 1 - Math.min(1, sd / (Math.abs(value) + delta))
  return {
    value,
    direction: directionOf(value, epsilon),
    confidence: Math.min(1, Math.max(0, raw))
  }
}
