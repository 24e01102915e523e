import { NumericalInstabilityError } from './errors'
import { indexGraph } from './graph'
import {
  CausalGraph,
  GraphIndex,
  PolicyEffect,
  PolicyShock,
  ScenarioSample,
  Stakeholder,
  STATE_METRICS,
  StateMetrics
} from './types'

export type RawImpact = Map<Stakeholder, number>

export interface PropagationLimits {
  hopLimit: number
  instabilityFactor: number
}

export const DEFAULT_LIMITS: PropagationLimits = { hopLimit: 3, instabilityFactor: 10 }

export function propagate(
  graph: CausalGraph,
  shock: PolicyShock,
  scenario: ScenarioSample,
  limits: PropagationLimits = DEFAULT_LIMITS
): RawImpact {
  return propagateIndexed(indexGraph(graph), shock, scenario, limits)
}

function sumByStakeholder(index: GraphIndex, totals: Map<string, number>): RawImpact {
  const raw: RawImpact = new Map()
  for (const s of index.stakeholders) raw.set(s, 0)
  for (const node of index.graph.nodes) {
    raw.set(node.type, (raw.get(node.type) ?? 0) + (totals.get(node.id) ?? 0))
  }
  return raw
}

function assertWithinBound(raw: RawImpact, hop: number, bound: number) {
  for (const [stakeholder, value] of raw) {
    if (!Number.isFinite(value) || Math.abs(value) > bound) {
      throw new NumericalInstabilityError(stakeholder, hop, Math.abs(value), bound)
    }
  }
}

/**
 * One deterministic propagation of the shock across the graph.
 *
 * Targeted nodes are seeded with shock * elasticity * adoptionRate, then up to `hopLimit` waves push
 * each wave's fresh impact along outgoing edges scaled by weight * passThroughRate * complianceRate.
 * Totals accumulate across waves. After the seeding and after every wave, a stakeholder whose summed
 * impact exceeds `instabilityFactor` times the largest seed magnitude aborts the sample with
 * NumericalInstabilityError.
 */
export function propagateIndexed(
  index: GraphIndex,
  shock: PolicyShock,
  scenario: ScenarioSample,
  limits: PropagationLimits = DEFAULT_LIMITS
): RawImpact {
  const totals = new Map<string, number>()
  let frontier = new Map<string, number>()

  const seedScale = scenario.elasticity * scenario.adoptionRate
  let largestSeed = 0
  for (const node of index.graph.nodes) {
    const magnitude = shock.impacts[node.type]
    if (magnitude === undefined) continue
    const seed = magnitude * seedScale
    frontier.set(node.id, seed)
    totals.set(node.id, seed)
    largestSeed = Math.max(largestSeed, Math.abs(seed))
  }

  const bound = limits.instabilityFactor * largestSeed
  const transfer = scenario.passThroughRate * scenario.complianceRate
  let raw = sumByStakeholder(index, totals)
  assertWithinBound(raw, 0, bound)

  for (let hop = 1; hop <= limits.hopLimit && frontier.size > 0; hop++) {
    const next = new Map<string, number>()
    for (const [sourceId, impact] of frontier) {
      if (impact === 0) continue
      for (const edge of index.outgoing.get(sourceId) || []) {
        if (!index.nodesById.has(edge.target)) continue
        next.set(edge.target, (next.get(edge.target) ?? 0) + impact * edge.weight * transfer)
      }
    }
    for (const [nodeId, contribution] of next) {
      totals.set(nodeId, (totals.get(nodeId) ?? 0) + contribution)
    }
    raw = sumByStakeholder(index, totals)
    assertWithinBound(raw, hop, bound)
    frontier = next
  }

  return raw
}

/**
 * Applies a stakeholder's mean raw impact (percentage points) to its baseline metrics using the
 * policy's configured coefficients. Metrics without a coefficient are carried over unchanged.
 */
export function deriveStateMetrics(before: StateMetrics, rawImpact: number, effect: PolicyEffect): StateMetrics {
  const after = { ...before }
  for (const metric of STATE_METRICS) {
    const coefficient = effect.metrics[metric]
    if (coefficient === undefined || coefficient === 0) continue
    after[metric] = before[metric] * (1 + (coefficient * rawImpact) / 100)
  }
  return after
}
