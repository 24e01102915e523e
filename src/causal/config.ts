import appRootPath from 'app-root-path'
import fsp from 'node:fs/promises'
import path from 'node:path'
import { ConfigError } from './errors'
import { formatIssues, GraphConfigSchema } from './schema'
import { GraphConfig, PolicyEffect, PolicyType, SimulationConfig, STAKEHOLDERS } from './types'

// Subsidy cuts and tax rises arrive as positive percentages and hurt the target group;
// credit incentives help it. A negative impact raises cost burden (coefficient -1).
const DEFAULT_POLICY_EFFECTS: Record<PolicyType, PolicyEffect> = {
  SubsidyChange: {
    shockParameter: 'subsidy_reduction_percent',
    sign: -1,
    metrics: { incomeLevel: 1, costBurden: -1, benefitReceived: 1 }
  },
  TaxChange: {
    shockParameter: 'tax_increase_percent',
    sign: -1,
    metrics: { incomeLevel: 1, costBurden: -1 }
  },
  CreditIncentive: {
    shockParameter: 'credit_increase_percent',
    sign: 1,
    metrics: { incomeLevel: 0.5, costBurden: -1, benefitReceived: 1 }
  }
}

export const defaultSimulationConfig: SimulationConfig = {
  defaults: {
    elasticity: 0.5,
    adoptionRate: 0.7,
    complianceRate: 0.8,
    passThroughRate: 0.6,
    iterationCount: 1000
  },
  requiredStakeholders: [...STAKEHOLDERS],
  hopLimit: 3,
  instabilityFactor: 10,
  discardThreshold: 0.05,
  directionEpsilon: 0.01,
  confidenceDelta: 1e-6,
  minSamplesForNormal: 30,
  // elasticity is the least observable behavioural input, so it carries the widest spread
  perturbation: {
    elasticity: 0.25,
    adoptionRate: 0.1,
    complianceRate: 0.1,
    passThroughRate: 0.1
  },
  concurrency: 4,
  maxReportedCycles: 20,
  baseline: {
    minConfidence: 0.6,
    maxAgeDays: 730
  },
  policyEffects: DEFAULT_POLICY_EFFECTS
}

export type SimulationConfigOverrides = Partial<
  Omit<SimulationConfig, 'defaults' | 'perturbation' | 'baseline' | 'policyEffects'>
> & {
  defaults?: Partial<SimulationConfig['defaults']>
  perturbation?: Partial<SimulationConfig['perturbation']>
  baseline?: Partial<SimulationConfig['baseline']>
  policyEffects?: Partial<SimulationConfig['policyEffects']>
}

export function mergeSimulationConfig(
  partial?: SimulationConfigOverrides,
  base: SimulationConfig = defaultSimulationConfig
): SimulationConfig {
  if (!partial) return base
  return {
    ...base,
    ...partial,
    defaults: { ...base.defaults, ...partial.defaults },
    perturbation: { ...base.perturbation, ...partial.perturbation },
    baseline: { ...base.baseline, ...partial.baseline },
    policyEffects: { ...base.policyEffects, ...partial.policyEffects },
    requiredStakeholders: partial.requiredStakeholders ?? base.requiredStakeholders
  }
}

export function parseGraphConfig(input: unknown): GraphConfig {
  const parsed = GraphConfigSchema.safeParse(input)
  if (!parsed.success) throw new ConfigError(`invalid graph config: ${formatIssues(parsed.error)}`)
  return parsed.data
}

export async function loadGraphConfig(filePath: string): Promise<GraphConfig> {
  const absPath = path.resolve(appRootPath.path, filePath)
  const text = await fsp.readFile(absPath, 'utf8')
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new ConfigError(`graph config ${absPath} is not valid JSON: ${reason}`, { path: absPath })
  }
  return parseGraphConfig(json)
}

export default defaultSimulationConfig
