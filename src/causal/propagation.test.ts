import { describe, expect, it } from 'vitest'
import { mvpGraph } from '../../test/fixtures/graphs'
import { defaultSimulationConfig } from './config'
import { NumericalInstabilityError } from './errors'
import { buildGraph } from './graph'
import { deriveStateMetrics, propagate } from './propagation'
import { CausalGraph, PolicyShock, ScenarioSample } from './types'

const defaults: ScenarioSample = { elasticity: 0.5, adoptionRate: 0.7, complianceRate: 0.8, passThroughRate: 0.6 }
const subsidyCut: PolicyShock = {
  policyType: 'SubsidyChange',
  impacts: { Government: -20 },
  parameters: { subsidy_reduction_percent: 20 }
}

describe('propagate', () => {
  const graph = buildGraph(mvpGraph)

  it('seeds targets and pushes impact along weighted edges', () => {
    const raw = propagate(graph, subsidyCut, defaults)
    // seed -20 * 0.5 * 0.7 = -7, transfer 0.6 * 0.8 = 0.48
    expect(raw.get('Government')).toBeCloseTo(-7)
    expect(raw.get('MSME')).toBeCloseTo(-7 * 0.6 * 0.48)
    expect(raw.get('Farmer')).toBeCloseTo(-7 * 0.7 * 0.48)
    // direct -2.688 plus the second hop through MSME
    expect(raw.get('Citizen')).toBeCloseTo(-2.688 + -2.016 * 0.5 * 0.48)
    expect([...raw.keys()]).toEqual(['Government', 'Citizen', 'MSME', 'Farmer'])
  })

  it('stops after the hop limit', () => {
    const limits = { hopLimit: 1, instabilityFactor: 10 }
    expect(propagate(graph, subsidyCut, defaults, limits).get('Citizen')).toBeCloseTo(-2.688)
    const seedsOnly = propagate(graph, subsidyCut, defaults, { hopLimit: 0, instabilityFactor: 10 })
    expect(seedsOnly.get('Government')).toBeCloseTo(-7)
    expect(seedsOnly.get('Citizen')).toBe(0)
  })

  it('sums every node of a stakeholder type', () => {
    const twoRegions: CausalGraph = buildGraph({
      nodes: [
        { id: 'gov', type: 'Government' },
        { id: 'north', type: 'Citizen' },
        { id: 'south', type: 'Citizen' }
      ],
      edges: [
        { source: 'gov', target: 'north', weight: 1, relation: 'transfers' },
        { source: 'gov', target: 'south', weight: 0.5, relation: 'transfers' }
      ]
    })
    const scenario = { elasticity: 1, adoptionRate: 1, complianceRate: 1, passThroughRate: 1 }
    const raw = propagate(twoRegions, { ...subsidyCut, impacts: { Government: -10 } }, scenario)
    expect(raw.get('Citizen')).toBe(-15)
  })

  it('does nothing when elasticity is zero', () => {
    const raw = propagate(graph, subsidyCut, { ...defaults, elasticity: 0 })
    for (const value of raw.values()) expect(Math.abs(value)).toBe(0)
  })

  it('does not modify its inputs', () => {
    const before = JSON.stringify({ graph, subsidyCut, defaults })
    propagate(graph, subsidyCut, defaults)
    expect(JSON.stringify({ graph, subsidyCut, defaults })).toBe(before)
  })

  it('raises NumericalInstability when a loop amplifies past the bound', () => {
    const loop = buildGraph({
      nodes: [
        { id: 'msme', type: 'MSME' },
        { id: 'cit', type: 'Citizen' }
      ],
      edges: [
        { source: 'msme', target: 'cit', weight: 1, relation: 'wages' },
        { source: 'cit', target: 'msme', weight: 1, relation: 'demand' }
      ]
    })
    const unit = { elasticity: 1, adoptionRate: 1, complianceRate: 1, passThroughRate: 1 }
    const shock: PolicyShock = { policyType: 'CreditIncentive', impacts: { MSME: 10 }, parameters: {} }
    // hop 1 brings Citizen to exactly the bound, hop 2 doubles MSME
    try {
      propagate(loop, shock, unit, { hopLimit: 3, instabilityFactor: 1 })
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(NumericalInstabilityError)
      if (!(e instanceof NumericalInstabilityError)) return
      expect(e.stakeholder).toBe('MSME')
      expect(e.hop).toBe(2)
      expect(e.magnitude).toBe(20)
      expect(e.bound).toBe(10)
    }
    expect(propagate(loop, shock, unit, { hopLimit: 3, instabilityFactor: 10 }).get('MSME')).toBe(20)
  })
  it('bounds the summed impact of a stakeholder spread over several nodes', () => {
    const split = buildGraph({
      nodes: [
        { id: 'gov', type: 'Government' },
        { id: 'c1', type: 'Citizen' },
        { id: 'c2', type: 'Citizen' }
      ],
      edges: [
        { source: 'gov', target: 'c1', weight: 1, relation: 'transfers' },
        { source: 'gov', target: 'c2', weight: 1, relation: 'transfers' }
      ]
    })
    const unit = { elasticity: 1, adoptionRate: 1, complianceRate: 1, passThroughRate: 1 }
    const shock = { ...subsidyCut, impacts: { Government: -10 } }
    // each node stays at 10, the Citizen total of 20 passes the bound of 15
    expect(() => propagate(split, shock, unit, { hopLimit: 3, instabilityFactor: 1.5 })).toThrow(
      'NumericalInstability: Citizen reached |impact| 20 at hop 1, bound is 15'
    )
    expect(propagate(split, shock, unit, { hopLimit: 3, instabilityFactor: 2 }).get('Citizen')).toBe(-20)
  })

  it('checks the seeded stakeholders before the first wave', () => {
    const unit = { elasticity: 1, adoptionRate: 1, complianceRate: 1, passThroughRate: 1 }
    const shock = { ...subsidyCut, impacts: { Government: -10 } }
    try {
      propagate(graph, shock, unit, { hopLimit: 3, instabilityFactor: 0.5 })
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(NumericalInstabilityError)
      if (!(e instanceof NumericalInstabilityError)) return
      expect(e.stakeholder).toBe('Government')
      expect(e.hop).toBe(0)
      expect(e.bound).toBe(5)
    }
  })
})

describe('deriveStateMetrics', () => {
  const before = { incomeLevel: 100, costBurden: 50, benefitReceived: 10 }
  const effects = defaultSimulationConfig.policyEffects

  it('maps a subsidy cut onto income, cost and benefit', () => {
    const after = deriveStateMetrics(before, -5, effects.SubsidyChange)
    expect(after.incomeLevel).toBeCloseTo(95)
    expect(after.costBurden).toBeCloseTo(52.5)
    expect(after.benefitReceived).toBeCloseTo(9.5)
  })

  it('leaves benefits untouched for a tax change', () => {
    const after = deriveStateMetrics(before, -5, effects.TaxChange)
    expect(after.incomeLevel).toBeCloseTo(95)
    expect(after.costBurden).toBeCloseTo(52.5)
    expect(after.benefitReceived).toBe(10)
  })

  it('lowers cost burden under a credit incentive', () => {
    const after = deriveStateMetrics(before, 4, effects.CreditIncentive)
    expect(after.incomeLevel).toBeCloseTo(102)
    expect(after.costBurden).toBeCloseTo(48)
    expect(after.benefitReceived).toBeCloseTo(10.4)
    expect(before).toEqual({ incomeLevel: 100, costBurden: 50, benefitReceived: 10 })
  })
})
