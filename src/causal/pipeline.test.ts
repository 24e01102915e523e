import { describe, expect, it, vi } from 'vitest'
import { AS_OF, baselineFor } from '../../test/fixtures/graphs'
import { InvalidGraphError, InvalidPolicyError } from './errors'
import * as graphModule from './graph'
import { parsePolicyVariables, runImpactSimulation } from './pipeline'
import { GraphConfig } from './types'

vi.mock('./graph', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./graph')>()
  return { ...actual, assertValidGraph: vi.fn(actual.assertValidGraph) }
})

const graphConfig: GraphConfig = {
  nodes: [
    { id: 'gov', type: 'Government', attributes: { label: 'Treasury' } },
    { id: 'cit', type: 'Citizen', attributes: { households: 1200 } },
    { id: 'msme', type: 'MSME', attributes: { sector: 'retail' } }
  ],
  edges: [
    { source: 'gov', target: 'cit', weight: 0.8, relation: 'transfers' },
    { source: 'gov', target: 'msme', weight: 0.6, relation: 'procurement' }
  ]
}

const subsidyCut = parsePolicyVariables({
  policyType: 'SubsidyChange',
  targetGroup: ['Government'],
  parameters: { subsidy_reduction_percent: 20 }
})

describe('runImpactSimulation', () => {
  const baseline = baselineFor({ Government: 1000, Citizen: 100, MSME: 100 })
  const config = { requiredStakeholders: ['Government' as const, 'Citizen' as const, 'MSME' as const] }

  it('spreads a government subsidy cut to citizens and small businesses', async () => {
    const { validation, result } = await runImpactSimulation(subsidyCut, baseline, graphConfig, {
      config,
      seed: 42,
      asOf: AS_OF
    })
    expect(validation.warnings).toEqual([])

    // seed -20 * 0.5 * 0.7 = -7; Citizen -7 * 0.8 * 0.48, MSME -7 * 0.6 * 0.48
    expect(result.shockIndices.Citizen?.direction).toBe('Negative')
    expect(result.shockIndices.Citizen?.value).toBeCloseTo(-0.027, 2)
    expect(result.shockIndices.MSME?.direction).toBe('Negative')
    expect(result.shockIndices.MSME?.value).toBeCloseTo(-0.02, 2)
    // -7 against an income of 1000 stays inside epsilon
    expect(result.shockIndices.Government?.direction).toBe('Neutral')
    expect(result.shockIndices.Government?.value).toBeCloseTo(-0.007, 3)

    for (const s of ['Citizen', 'MSME'] as const) {
      const sensitivity = result.uncertainty[s]?.sensitivity
      expect(result.uncertainty[s]?.dominantDriver).toBe('elasticity')
      expect(Math.abs(sensitivity?.elasticity ?? 0)).toBeGreaterThan(Math.abs(sensitivity?.adoptionRate ?? 1))
    }
    expect(result.metadata.discardedIterations).toBe(0)
    expect(result.metadata.seed).toBe(42)
  })

  it('validates the graph once per run', async () => {
    const assertValidGraph = vi.mocked(graphModule.assertValidGraph)
    assertValidGraph.mockClear()
    await runImpactSimulation(subsidyCut, baseline, graphConfig, {
      config,
      scenario: { iterationCount: 10 },
      seed: 1,
      asOf: AS_OF
    })
    expect(assertValidGraph).toHaveBeenCalledTimes(1)
  })

  it('fails fast on a graph missing a required stakeholder', async () => {
    await expect(runImpactSimulation(subsidyCut, baseline, graphConfig, { asOf: AS_OF })).rejects.toThrow(
      'InvalidGraph: missing stakeholder type (no node of type Farmer)'
    )
    await expect(runImpactSimulation(subsidyCut, baseline, graphConfig, { asOf: AS_OF })).rejects.toThrow(
      InvalidGraphError
    )
  })

  it('rejects a policy without its shock parameter', async () => {
    const policy = { ...subsidyCut, parameters: { tax_increase_percent: 5 } }
    await expect(runImpactSimulation(policy, baseline, graphConfig, { config, asOf: AS_OF })).rejects.toThrow(
      InvalidPolicyError
    )
  })
})

describe('parsePolicyVariables', () => {
  it('accepts a structured policy with a timeline', () => {
    const policy = parsePolicyVariables({
      policyType: 'CreditIncentive',
      targetGroup: ['MSME', 'Farmer'],
      parameters: { credit_increase_percent: 5 },
      timeline: { start: '2027-01-01', phases: 2 }
    })
    expect(policy.timeline).toEqual({ start: '2027-01-01', phases: 2 })
  })

  it('rejects unknown policy types and stakeholders', () => {
    expect(() =>
      parsePolicyVariables({ policyType: 'Tariff', targetGroup: ['MSME'], parameters: {} })
    ).toThrow(/^InvalidPolicy: policyType: /)
    expect(() =>
      parsePolicyVariables({ policyType: 'TaxChange', targetGroup: ['Pensioner'], parameters: {} })
    ).toThrow(InvalidPolicyError)
  })
})
