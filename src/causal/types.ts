// Data model for the policy impact engine

export const STAKEHOLDERS = ['Citizen', 'MSME', 'Farmer', 'Government'] as const

export type Stakeholder = (typeof STAKEHOLDERS)[number]

export type StakeholderRecord<T> = Partial<Record<Stakeholder, T>>

export interface NodeAttributes {
  label?: string
  region?: string
  sector?: string
  population?: number
  households?: number
  incomeLevel?: number // same unit as the baseline income_level indicator
}

export interface StakeholderNode {
  id: string
  type: Stakeholder
  attributes: NodeAttributes
}

export interface CausalEdge {
  source: string
  target: string
  weight: number // [0,1]
  relation: string
}

export interface CausalGraph {
  nodes: StakeholderNode[]
  edges: CausalEdge[]
}

export interface GraphIndex {
  graph: CausalGraph
  nodesById: Map<string, StakeholderNode>
  outgoing: Map<string, CausalEdge[]>
  stakeholders: Stakeholder[] // distinct node types, in first-seen order
}

export type GraphIssueKind =
  | 'dangling-endpoint'
  | 'missing-stakeholder'
  | 'weight-out-of-range'
  | 'duplicate-node'
  | 'self-loop'
  | 'duplicate-edge'
  | 'cycle'
  | 'disconnected-component'

export interface GraphIssue {
  kind: GraphIssueKind
  message: string
  detail?: string
  nodeIds?: string[]
  edge?: { source: string; target: string }
  value?: number
  gain?: number // product of edge weights around a cycle
}

export interface ValidationReport {
  ok: boolean
  errors: GraphIssue[]
  warnings: GraphIssue[]
}

export const POLICY_TYPES = ['SubsidyChange', 'TaxChange', 'CreditIncentive'] as const

export type PolicyType = (typeof POLICY_TYPES)[number]

export interface PolicyTimeline {
  start?: string
  end?: string
  phases?: number
}

export interface PolicyVariables {
  policyType: PolicyType
  targetGroup: Stakeholder[]
  parameters: Record<string, number>
  timeline?: PolicyTimeline
}

export interface PolicyShock {
  policyType: PolicyType
  impacts: StakeholderRecord<number>
  parameters: Record<string, number>
}

export const SCENARIO_PARAMETERS = ['elasticity', 'adoptionRate', 'complianceRate', 'passThroughRate'] as const

export type ScenarioParameter = (typeof SCENARIO_PARAMETERS)[number]

export type ScenarioSample = Record<ScenarioParameter, number>

export interface ScenarioParameters extends ScenarioSample {
  iterationCount: number
}

export interface BaselineIndicator {
  value: number
  unit: string
  source: string
  timestamp: string // ISO-8601
  confidence: number // [0,1]
}

export interface BaselineData {
  indicators: Record<string, BaselineIndicator>
  metadata: Record<string, string>
}

export const STATE_METRICS = ['incomeLevel', 'costBurden', 'benefitReceived'] as const

export type StateMetric = (typeof STATE_METRICS)[number]

export type StateMetrics = Record<StateMetric, number>

export interface PolicyEffect {
  shockParameter: string // key in PolicyVariables.parameters
  sign: 1 | -1
  metrics: Partial<Record<StateMetric, number>>
}

export type Direction = 'Positive' | 'Negative' | 'Neutral'

export interface ShockIndex {
  value: number
  direction: Direction
  confidence: number
}

export interface UncertaintyMetrics {
  stdDeviation: number
  confidenceInterval: [number, number]
  sensitivity: Record<ScenarioParameter, number>
  dominantDriver: ScenarioParameter
  percentiles: { p5: number; p50: number; p95: number }
  sampleCount: number
}

export interface SimulationMetadata {
  seed: number
  requestedIterations: number
  aggregatedIterations: number
  discardedIterations: number
  discardRate: number
  hopLimit: number
  policyType: PolicyType
}

export interface SimulationResult {
  shockIndices: StakeholderRecord<ShockIndex>
  beforeState: StakeholderRecord<StateMetrics>
  afterState: StakeholderRecord<StateMetrics>
  uncertainty: StakeholderRecord<UncertaintyMetrics>
  scenario: ScenarioParameters
  metadata: SimulationMetadata
}

export interface SimulationConfig {
  defaults: ScenarioParameters
  requiredStakeholders: Stakeholder[]
  hopLimit: number
  instabilityFactor: number // bound = factor * largest seeded magnitude
  discardThreshold: number
  directionEpsilon: number
  confidenceDelta: number
  minSamplesForNormal: number
  perturbation: Record<ScenarioParameter, number> // relative standard deviation
  concurrency: number
  maxReportedCycles: number // feedback-loop warnings listed before a summary
  baseline: {
    minConfidence: number
    maxAgeDays: number
  }
  policyEffects: Record<PolicyType, PolicyEffect>
}

export interface GraphConfig {
  nodes: Array<{ id: string; type: Stakeholder; attributes?: NodeAttributes }>
  edges: CausalEdge[]
}
