// Shared fixtures for the causal tests.
import { BaselineData, GraphConfig, Stakeholder } from '../../src/causal/types'

export const mvpGraph: GraphConfig = {
  nodes: [
    { id: 'gov', type: 'Government' },
    { id: 'cit', type: 'Citizen' },
    { id: 'msme', type: 'MSME' },
    { id: 'farm', type: 'Farmer' }
  ],
  edges: [
    { source: 'gov', target: 'cit', weight: 0.8, relation: 'transfers' },
    { source: 'gov', target: 'msme', weight: 0.6, relation: 'procurement' },
    { source: 'msme', target: 'cit', weight: 0.5, relation: 'employment' },
    { source: 'gov', target: 'farm', weight: 0.7, relation: 'input_subsidy' }
  ]
}

export const AS_OF = new Date('2026-06-01T00:00:00Z')

export function baselineFor(income: Partial<Record<Stakeholder, number>>, confidence = 0.9): BaselineData {
  const indicators: BaselineData['indicators'] = {}
  for (const [s, value] of Object.entries(income)) {
    if (value === undefined) continue
    const common = { unit: 'index', source: 'test', timestamp: '2026-01-01T00:00:00Z', confidence }
    indicators[`${s}.income_level`] = { value, ...common }
    indicators[`${s}.cost_burden`] = { value: 50, ...common }
    indicators[`${s}.benefit_received`] = { value: 10, ...common }
  }
  return { indicators, metadata: { source: 'test' } }
}
