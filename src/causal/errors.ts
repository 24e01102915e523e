import type { Stakeholder } from './types'

export class ImpactEngineError extends Error {
  readonly context: Record<string, unknown>

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message)
    this.name = new.target.name
    this.context = context
  }
}

export type InvalidGraphReason =
  | 'dangling-endpoint'
  | 'missing-stakeholder'
  | 'weight-out-of-range'
  | 'duplicate-node'
  | 'self-loop'
  | 'duplicate-edge'

const GRAPH_REASON_TEXT: Record<InvalidGraphReason, string> = {
  'dangling-endpoint': 'dangling edge endpoint',
  'missing-stakeholder': 'missing stakeholder type',
  'weight-out-of-range': 'weight out of range',
  'duplicate-node': 'duplicate node id',
  'self-loop': 'self-loop',
  'duplicate-edge': 'duplicate edge'
}

export function graphReasonText(reason: InvalidGraphReason) {
  return GRAPH_REASON_TEXT[reason]
}

export class InvalidGraphError extends ImpactEngineError {
  constructor(
    readonly reason: InvalidGraphReason,
    detail: string,
    context: Record<string, unknown> = {}
  ) {
    super(`InvalidGraph: ${GRAPH_REASON_TEXT[reason]} (${detail})`, { reason, ...context })
  }
}

export class InvalidScenarioError extends ImpactEngineError {
  constructor(
    readonly field: string,
    readonly value: unknown,
    readonly range: string
  ) {
    super(`InvalidScenario: ${field} = ${String(value)} is outside ${range}`, { field, value, range })
  }
}

export class InvalidPolicyError extends ImpactEngineError {
  constructor(detail: string, context: Record<string, unknown> = {}) {
    super(`InvalidPolicy: ${detail}`, context)
  }
}

export class StaleBaselineDataError extends ImpactEngineError {
  constructor(
    readonly indicator: string,
    readonly check: 'confidence' | 'age',
    readonly observed: number | string,
    readonly threshold: number
  ) {
    const detail =
      check === 'confidence'
        ? `confidence ${observed} is below the minimum ${threshold}`
        : `timestamp ${observed} is older than ${threshold} days`
    super(`StaleBaselineData: indicator "${indicator}" ${detail}`, { indicator, check, observed, threshold })
  }
}

export class NumericalInstabilityError extends ImpactEngineError {
  constructor(
    readonly stakeholder: Stakeholder,
    readonly hop: number,
    readonly magnitude: number,
    readonly bound: number
  ) {
    super(`NumericalInstability: ${stakeholder} reached |impact| ${magnitude} at hop ${hop}, bound is ${bound}`, {
      stakeholder,
      hop,
      magnitude,
      bound
    })
  }
}

export type SimulationErrorKind = 'convergence' | 'timeout'

export class SimulationError extends ImpactEngineError {
  constructor(
    readonly kind: SimulationErrorKind,
    detail: string,
    context: Record<string, unknown> = {}
  ) {
    super(`SimulationError: ${kind === 'convergence' ? 'convergence failure' : 'timeout'} (${detail})`, {
      kind,
      ...context
    })
  }
}

export class ConfigError extends ImpactEngineError {
  constructor(detail: string, context: Record<string, unknown> = {}) {
    super(`ConfigError: ${detail}`, context)
  }
}
