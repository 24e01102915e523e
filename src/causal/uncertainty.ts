import { mean, pearson, percentile, stdDeviation, tCritical95, Z_95 } from './stats'
import { SCENARIO_PARAMETERS, ScenarioParameter, ScenarioSample, UncertaintyMetrics } from './types'

export interface UncertaintyOptions {
  minSamplesForNormal: number
}

export function dominantDriver(sensitivity: Record<ScenarioParameter, number>): ScenarioParameter {
  let best: ScenarioParameter = SCENARIO_PARAMETERS[0]
  for (const p of SCENARIO_PARAMETERS) {
    if (Math.abs(sensitivity[p]) > Math.abs(sensitivity[best])) best = p
  }
  return best
}

export function computeUncertainty(
  samples: readonly number[],
  scenarioSamples: readonly ScenarioSample[],
  { minSamplesForNormal }: UncertaintyOptions = { minSamplesForNormal: 30 }
): UncertaintyMetrics {
  const n = samples.length
  const m = mean(samples)
  const sd = stdDeviation(samples)
  const standardError = n > 0 ? sd / Math.sqrt(n) : 0
  // small samples get the wider Student-t multiplier
  const multiplier = n >= minSamplesForNormal ? Z_95 : tCritical95(n - 1)
  const halfWidth = multiplier * standardError

  const correlate = (p: ScenarioParameter) => pearson(scenarioSamples.map((s) => s[p]), samples)
  const sensitivity: Record<ScenarioParameter, number> = {
    elasticity: correlate('elasticity'),
    adoptionRate: correlate('adoptionRate'),
    complianceRate: correlate('complianceRate'),
    passThroughRate: correlate('passThroughRate')
  }

  return {
    stdDeviation: sd,
    confidenceInterval: [m - halfWidth, m + halfWidth],
    sensitivity,
    dominantDriver: dominantDriver(sensitivity),
    percentiles: {
      p5: percentile(samples, 0.05),
      p50: percentile(samples, 0.5),
      p95: percentile(samples, 0.95)
    },
    sampleCount: n
  }
}
