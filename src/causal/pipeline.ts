import { createLogger } from '../logger'
import { mergeSimulationConfig, SimulationConfigOverrides } from './config'
import { InvalidPolicyError } from './errors'
import { assertValidGraph, buildGraph } from './graph'
import { simulateValidated } from './sampler'
import { formatIssues, PolicyVariablesSchema } from './schema'
import { derivePolicyShock } from './shock'
import {
  BaselineData,
  CausalGraph,
  GraphConfig,
  PolicyVariables,
  ScenarioParameters,
  SimulationResult,
  ValidationReport
} from './types'

const log = createLogger('pipeline')

export interface PipelineOptions {
  config?: SimulationConfigOverrides
  scenario?: Partial<ScenarioParameters>
  seed?: number
  timeoutMs?: number
  asOf?: Date
}

export interface ImpactRun {
  graph: CausalGraph
  validation: ValidationReport
  result: SimulationResult
}

export function parsePolicyVariables(input: unknown): PolicyVariables {
  const parsed = PolicyVariablesSchema.safeParse(input)
  if (!parsed.success) throw new InvalidPolicyError(formatIssues(parsed.error))
  return parsed.data
}

export async function runImpactSimulation(
  policy: PolicyVariables,
  baseline: BaselineData,
  graphConfig: GraphConfig,
  opts: PipelineOptions = {}
): Promise<ImpactRun> {
  const cfg = mergeSimulationConfig(opts.config)
  // 1. Graph
  const graph = buildGraph(graphConfig)
  const validation = assertValidGraph(graph, cfg.requiredStakeholders, cfg.maxReportedCycles)
  for (const w of validation.warnings) log.info(w.message)
  // 2. Shock
  const shock = derivePolicyShock(policy, cfg)
  // 3. Simulation
  const result = await simulateValidated(graph, shock, baseline, opts.scenario, {
    config: cfg,
    seed: opts.seed,
    timeoutMs: opts.timeoutMs,
    asOf: opts.asOf
  })
  log.info(
    `${policy.policyType}: ${result.metadata.aggregatedIterations} samples aggregated (seed ${result.metadata.seed})`
  )
  return { graph, validation, result }
}
