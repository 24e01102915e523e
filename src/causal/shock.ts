import { InvalidPolicyError, InvalidScenarioError, StaleBaselineDataError } from './errors'
import {
  BaselineData,
  PolicyShock,
  PolicyVariables,
  ScenarioParameters,
  SimulationConfig,
  Stakeholder,
  StateMetric,
  StateMetrics
} from './types'

const DAY_MS = 24 * 60 * 60 * 1000

export function derivePolicyShock(policy: PolicyVariables, cfg: SimulationConfig): PolicyShock {
  const effect = cfg.policyEffects[policy.policyType]
  if (!effect) throw new InvalidPolicyError(`no effect mapping configured for ${policy.policyType}`)
  const magnitude = policy.parameters[effect.shockParameter]
  if (typeof magnitude !== 'number' || !Number.isFinite(magnitude)) {
    throw new InvalidPolicyError(`${policy.policyType} requires numeric parameter "${effect.shockParameter}"`, {
      policyType: policy.policyType,
      parameter: effect.shockParameter
    })
  }
  if (policy.targetGroup.length === 0) throw new InvalidPolicyError('target group is empty')

  const impacts: PolicyShock['impacts'] = {}
  for (const s of policy.targetGroup) impacts[s] = effect.sign * magnitude
  return { policyType: policy.policyType, impacts, parameters: { ...policy.parameters } }
}

export function resolveScenario(partial: Partial<ScenarioParameters> | undefined, cfg: SimulationConfig) {
  const scenario: ScenarioParameters = { ...cfg.defaults, ...partial }
  validateScenario(scenario)
  return scenario
}

export function validateScenario(s: ScenarioParameters) {
  if (!Number.isFinite(s.elasticity) || s.elasticity < 0) {
    throw new InvalidScenarioError('elasticity', s.elasticity, '[0, ∞)')
  }
  for (const field of ['adoptionRate', 'complianceRate', 'passThroughRate'] as const) {
    const v = s[field]
    if (!Number.isFinite(v) || v < 0 || v > 1) throw new InvalidScenarioError(field, v, '[0, 1]')
  }
  if (!Number.isInteger(s.iterationCount) || s.iterationCount < 1) {
    throw new InvalidScenarioError('iterationCount', s.iterationCount, 'positive integer')
  }
}

export function assertFreshBaseline(baseline: BaselineData, cfg: SimulationConfig, asOf: Date = new Date()) {
  const { minConfidence, maxAgeDays } = cfg.baseline
  for (const [name, indicator] of Object.entries(baseline.indicators)) {
    if (!(indicator.confidence >= minConfidence)) {
      throw new StaleBaselineDataError(name, 'confidence', indicator.confidence, minConfidence)
    }
    const ts = Date.parse(indicator.timestamp)
    if (Number.isNaN(ts) || (asOf.getTime() - ts) / DAY_MS > maxAgeDays) {
      throw new StaleBaselineDataError(name, 'age', indicator.timestamp, maxAgeDays)
    }
  }
}

const INDICATOR_FIELDS: Record<StateMetric, string> = {
  incomeLevel: 'income_level',
  costBurden: 'cost_burden',
  benefitReceived: 'benefit_received'
}

export function indicatorName(stakeholder: Stakeholder, metric: StateMetric) {
  return `${stakeholder}.${INDICATOR_FIELDS[metric]}`
}

export function baselineStateFor(baseline: BaselineData, stakeholder: Stakeholder): StateMetrics {
  const read = (metric: StateMetric) => baseline.indicators[indicatorName(stakeholder, metric)]?.value ?? 0
  return {
    incomeLevel: read('incomeLevel'),
    costBurden: read('costBurden'),
    benefitReceived: read('benefitReceived')
  }
}
