import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import { createLogger } from '../logger'
import { defaultSimulationConfig } from './config'
import { InvalidPolicyError, NumericalInstabilityError, SimulationError } from './errors'
import { assertValidGraph, indexGraph } from './graph'
import { deriveStateMetrics, PropagationLimits, propagateIndexed } from './propagation'
import { SeededRandom, generateSeed } from './random'
import { assertFreshBaseline, baselineStateFor, resolveScenario } from './shock'
import { computeIndex, normalize } from './shockIndex'
import { mean } from './stats'
import { computeUncertainty } from './uncertainty'
import {
  BaselineData,
  CausalGraph,
  GraphIndex,
  PolicyShock,
  ScenarioParameter,
  ScenarioParameters,
  ScenarioSample,
  SimulationConfig,
  SimulationResult,
  Stakeholder,
  STAKEHOLDERS
} from './types'

const log = createLogger('sampler')

const YIELD_EVERY = 64

export interface SimulateOptions {
  seed?: number
  timeoutMs?: number
  asOf?: Date
  config?: SimulationConfig
}

interface ChunkResult {
  outcomes: Map<Stakeholder, number[]>
  scenarios: ScenarioSample[]
  discarded: number
}

interface RunState {
  completed: number
  deadline: number
  requested: number
}

export function drawScenarioSamples(
  rng: SeededRandom,
  scenario: ScenarioParameters,
  perturbation: Record<ScenarioParameter, number>
): ScenarioSample[] {
  const draw = (p: ScenarioParameter, max: number) => {
    const centre = scenario[p]
    return rng.truncatedNormal(centre, Math.abs(centre) * perturbation[p], 0, max)
  }
  const samples: ScenarioSample[] = []
  for (let i = 0; i < scenario.iterationCount; i++) {
    samples.push({
      elasticity: draw('elasticity', Infinity),
      adoptionRate: draw('adoptionRate', 1),
      complianceRate: draw('complianceRate', 1),
      passThroughRate: draw('passThroughRate', 1)
    })
  }
  return samples
}

function splitRange(total: number, parts: number): Array<[number, number]> {
  const size = Math.ceil(total / Math.max(1, Math.floor(parts)))
  const ranges: Array<[number, number]> = []
  for (let start = 0; start < total; start += size) ranges.push([start, Math.min(total, start + size)])
  return ranges
}

async function runChunk(
  index: GraphIndex,
  shock: PolicyShock,
  draws: readonly ScenarioSample[],
  [start, end]: [number, number],
  limits: PropagationLimits,
  state: RunState
): Promise<ChunkResult> {
  const outcomes = new Map<Stakeholder, number[]>(index.stakeholders.map((s) => [s, []]))
  const scenarios: ScenarioSample[] = []
  let discarded = 0

  for (let i = start; i < end; i++) {
    if (Date.now() >= state.deadline) {
      throw new SimulationError('timeout', `${state.completed} of ${state.requested} iterations completed`, {
        completed: state.completed,
        requested: state.requested
      })
    }
    try {
      const raw = propagateIndexed(index, shock, draws[i], limits)
      for (const [s, value] of raw) outcomes.get(s)?.push(value)
      scenarios.push(draws[i])
    } catch (e) {
      if (!(e instanceof NumericalInstabilityError)) throw e
      discarded++
      log.debug(`iteration ${i} discarded:`, e.message)
    }
    state.completed++
    if ((i - start + 1) % YIELD_EVERY === 0) await yieldToEventLoop()
  }

  return { outcomes, scenarios, discarded }
}

function scaleAnchorFor(index: GraphIndex, baseline: BaselineData, s: Stakeholder) {
  const income = baselineStateFor(baseline, s).incomeLevel
  if (income !== 0) return income
  let fromNodes = 0
  for (const n of index.graph.nodes) if (n.type === s) fromNodes += n.attributes.incomeLevel ?? 0
  return fromNodes !== 0 ? fromNodes : 1
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreeze(v)
    Object.freeze(value)
  }
  return value
}

/**
 * Monte Carlo simulation of a policy shock.
 *
 * All perturbed scenarios are drawn up front from one generator seeded with `options.seed`
 * (or a generated seed recorded in the metadata); the iterations are then split into
 * `concurrency` chunks that run as independent tasks and are merged in chunk order, so the
 * same inputs and seed always produce the same result.
 */
export async function simulate(
  graph: CausalGraph,
  shock: PolicyShock,
  baseline: BaselineData,
  scenarioInput?: Partial<ScenarioParameters>,
  options: SimulateOptions = {}
): Promise<SimulationResult> {
  const cfg = options.config ?? defaultSimulationConfig
  assertValidGraph(graph, cfg.requiredStakeholders, cfg.maxReportedCycles)
  return simulateValidated(graph, shock, baseline, scenarioInput, options)
}

// Same as simulate for a graph the caller has already passed through assertValidGraph.
export async function simulateValidated(
  graph: CausalGraph,
  shock: PolicyShock,
  baseline: BaselineData,
  scenarioInput?: Partial<ScenarioParameters>,
  options: SimulateOptions = {}
): Promise<SimulationResult> {
  const cfg = options.config ?? defaultSimulationConfig
  const scenario = resolveScenario(scenarioInput, cfg)
  assertFreshBaseline(baseline, cfg, options.asOf)

  const index = indexGraph(graph)
  for (const s of STAKEHOLDERS) {
    if (shock.impacts[s] !== undefined && !index.stakeholders.includes(s)) {
      throw new InvalidPolicyError(`shock targets ${s}, which has no node in the graph`, { stakeholder: s })
    }
  }
  const effect = cfg.policyEffects[shock.policyType]
  if (!effect) throw new InvalidPolicyError(`no effect mapping configured for ${shock.policyType}`)

  const seed = options.seed ?? generateSeed()
  const requested = scenario.iterationCount
  const draws = drawScenarioSamples(new SeededRandom(seed), scenario, cfg.perturbation)
  const limits: PropagationLimits = { hopLimit: cfg.hopLimit, instabilityFactor: cfg.instabilityFactor }
  const state: RunState = {
    completed: 0,
    requested,
    deadline: options.timeoutMs === undefined ? Infinity : Date.now() + options.timeoutMs
  }
  log.debug(`simulating ${shock.policyType} with ${requested} iterations, seed ${seed}`)

  const partials = await Promise.all(
    splitRange(requested, cfg.concurrency).map((range) => runChunk(index, shock, draws, range, limits, state))
  )

  const outcomes = new Map<Stakeholder, number[]>(index.stakeholders.map((s) => [s, []]))
  const scenarios: ScenarioSample[] = []
  let discarded = 0
  for (const part of partials) {
    for (const [s, values] of part.outcomes) outcomes.get(s)?.push(...values)
    scenarios.push(...part.scenarios)
    discarded += part.discarded
  }

  const discardRate = discarded / requested
  if (discardRate > cfg.discardThreshold || scenarios.length === 0) {
    throw new SimulationError(
      'convergence',
      `discard rate ${discardRate} exceeds ${cfg.discardThreshold} (${discarded} of ${requested} samples unstable)`,
      { discarded, requested, discardRate, threshold: cfg.discardThreshold }
    )
  }
  if (discarded > 0) log.warn(`${discarded} of ${requested} samples discarded as numerically unstable`)

  const result: SimulationResult = {
    shockIndices: {},
    beforeState: {},
    afterState: {},
    uncertainty: {},
    scenario: { ...scenario },
    metadata: {
      seed,
      requestedIterations: requested,
      aggregatedIterations: scenarios.length,
      discardedIterations: discarded,
      discardRate,
      hopLimit: cfg.hopLimit,
      policyType: shock.policyType
    }
  }

  for (const s of index.stakeholders) {
    const samples = outcomes.get(s) ?? []
    const anchor = scaleAnchorFor(index, baseline, s)
    const before = baselineStateFor(baseline, s)
    result.shockIndices[s] = computeIndex(samples, anchor, {
      epsilon: cfg.directionEpsilon,
      delta: cfg.confidenceDelta
    })
    result.uncertainty[s] = computeUncertainty(normalize(samples, anchor), scenarios, {
      minSamplesForNormal: cfg.minSamplesForNormal
    })
    result.beforeState[s] = before
    result.afterState[s] = deriveStateMetrics(before, mean(samples), effect)
  }

  return deepFreeze(result)
}
