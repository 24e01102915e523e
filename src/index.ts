export * from './causal/types'
export * from './causal/errors'
export { defaultSimulationConfig, loadGraphConfig, mergeSimulationConfig, parseGraphConfig } from './causal/config'
export type { SimulationConfigOverrides } from './causal/config'
export {
  assertValidGraph,
  buildGraph,
  deserializeGraph,
  indexGraph,
  serializeGraph,
  validateGraph
} from './causal/graph'
export { connectedComponents, findFeedbackLoops, reachableFrom, stronglyConnectedComponents } from './causal/loops'
export type { Cycle } from './causal/loops'
export { deriveStateMetrics, propagate } from './causal/propagation'
export type { PropagationLimits, RawImpact } from './causal/propagation'
export { assertFreshBaseline, baselineStateFor, derivePolicyShock, resolveScenario } from './causal/shock'
export { drawScenarioSamples, simulate, simulateValidated } from './causal/sampler'
export type { SimulateOptions } from './causal/sampler'
export { computeIndex } from './causal/shockIndex'
export { computeUncertainty } from './causal/uncertainty'
export { SeededRandom } from './causal/random'
export { parsePolicyVariables, runImpactSimulation } from './causal/pipeline'
export type { ImpactRun, PipelineOptions } from './causal/pipeline'
export { loadBaselineFromFile, parseBaselineCsv } from './csv'
export { loadEnv, loadSimulationConfigFromEnv } from './env'
export { createLogger } from './logger'
export type { Logger } from './logger'
