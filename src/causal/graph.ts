import { createLogger } from '../logger'
import { ConfigError, graphReasonText, InvalidGraphError, InvalidGraphReason } from './errors'
import { connectedComponents, findFeedbackLoops } from './loops'
import { formatIssues, SERIALIZED_GRAPH_VERSION, SerializedGraphSchema } from './schema'
import {
  CausalEdge,
  CausalGraph,
  GraphConfig,
  GraphIndex,
  GraphIssue,
  Stakeholder,
  STAKEHOLDERS,
  StakeholderNode,
  ValidationReport
} from './types'

const log = createLogger('graph')

export function buildGraph(config: GraphConfig): CausalGraph {
  return {
    nodes: config.nodes.map((n) => ({ id: n.id, type: n.type, attributes: { ...n.attributes } })),
    edges: config.edges.map((e) => ({ ...e }))
  }
}

export function indexGraph(graph: CausalGraph): GraphIndex {
  const nodesById = new Map<string, StakeholderNode>()
  const outgoing = new Map<string, CausalEdge[]>()
  const stakeholders: Stakeholder[] = []
  for (const n of graph.nodes) {
    nodesById.set(n.id, n)
    outgoing.set(n.id, [])
    if (!stakeholders.includes(n.type)) stakeholders.push(n.type)
  }
  for (const e of graph.edges) {
    outgoing.get(e.source)?.push(e)
  }
  return { graph, nodesById, outgoing, stakeholders }
}

const edgeLabel = (e: { source: string; target: string }) => `${e.source}->${e.target}`

function hardIssue(kind: InvalidGraphReason, detail: string, extra: Partial<GraphIssue> = {}): GraphIssue {
  return { kind, message: `InvalidGraph: ${graphReasonText(kind)} (${detail})`, detail, ...extra }
}

export function validateGraph(
  graph: CausalGraph,
  requiredStakeholders: readonly Stakeholder[] = STAKEHOLDERS,
  maxReportedCycles = 20
): ValidationReport {
  const errors: GraphIssue[] = []
  const warnings: GraphIssue[] = []
  const ids = new Set(graph.nodes.map((n) => n.id))

  // (a) endpoints
  for (const e of graph.edges) {
    for (const id of [e.source, e.target]) {
      if (!ids.has(id)) {
        errors.push(hardIssue('dangling-endpoint', `edge ${edgeLabel(e)} references missing node "${id}"`, {
          nodeIds: [id],
          edge: { source: e.source, target: e.target }
        }))
      }
    }
  }

  // (b) stakeholder coverage
  const present = new Set(graph.nodes.map((n) => n.type))
  for (const s of requiredStakeholders) {
    if (!present.has(s)) errors.push(hardIssue('missing-stakeholder', `no node of type ${s}`))
  }

  // (c) weights
  for (const e of graph.edges) {
    if (!Number.isFinite(e.weight) || e.weight < 0 || e.weight > 1) {
      errors.push(hardIssue('weight-out-of-range', `edge ${edgeLabel(e)} has weight ${e.weight}, expected [0, 1]`, {
        edge: { source: e.source, target: e.target },
        value: e.weight
      }))
    }
  }

  // structural uniqueness
  const seenIds = new Set<string>()
  for (const n of graph.nodes) {
    if (seenIds.has(n.id)) errors.push(hardIssue('duplicate-node', `node id "${n.id}"`, { nodeIds: [n.id] }))
    seenIds.add(n.id)
  }
  const seenEdges = new Set<string>()
  for (const e of graph.edges) {
    const key = edgeLabel(e)
    if (e.source === e.target) {
      errors.push(hardIssue('self-loop', `edge ${key}`, { edge: { source: e.source, target: e.target } }))
    }
    if (seenEdges.has(key)) {
      errors.push(hardIssue('duplicate-edge', `edge ${key}`, { edge: { source: e.source, target: e.target } }))
    }
    seenEdges.add(key)
  }

  // (d) feedback loops are expected, so they only warn; one per strongly connected component
  const loops = findFeedbackLoops(graph)
  for (const cycle of loops.slice(0, maxReportedCycles)) {
    warnings.push({
      kind: 'cycle',
      message: `feedback loop ${[...cycle.nodeIds, cycle.nodeIds[0]].join(' -> ')} (gain ${cycle.gain})`,
      nodeIds: cycle.nodeIds,
      gain: cycle.gain
    })
  }
  if (loops.length > maxReportedCycles) {
    warnings.push({
      kind: 'cycle',
      message: `${loops.length - maxReportedCycles} more feedback loops not listed`,
      value: loops.length - maxReportedCycles
    })
  }

  // (e) connectivity
  const components = connectedComponents(graph)
  for (const component of components.slice(1)) {
    warnings.push({
      kind: 'disconnected-component',
      message: `disconnected component: ${component.join(', ')}`,
      nodeIds: component
    })
  }

  return { ok: errors.length === 0, errors, warnings }
}

export function assertValidGraph(
  graph: CausalGraph,
  requiredStakeholders: readonly Stakeholder[] = STAKEHOLDERS,
  maxReportedCycles = 20
): ValidationReport {
  const report = validateGraph(graph, requiredStakeholders, maxReportedCycles)
  const [first] = report.errors
  if (first) {
    const reason = toReason(first.kind)
    throw new InvalidGraphError(reason, first.detail ?? first.message, {
      edge: first.edge,
      nodeIds: first.nodeIds,
      value: first.value,
      errorCount: report.errors.length
    })
  }
  for (const w of report.warnings) log.debug(w.message)
  return report
}

function toReason(kind: GraphIssue['kind']): InvalidGraphReason {
  switch (kind) {
    case 'dangling-endpoint':
    case 'missing-stakeholder':
    case 'weight-out-of-range':
    case 'duplicate-node':
    case 'self-loop':
    case 'duplicate-edge':
      return kind
    default:
      throw new Error(`not a structural error: ${kind}`)
  }
}

export function serializeGraph(graph: CausalGraph): string {
  return JSON.stringify({
    version: SERIALIZED_GRAPH_VERSION,
    nodes: graph.nodes.map((n) => ({ id: n.id, type: n.type, attributes: n.attributes })),
    edges: graph.edges.map((e) => ({ source: e.source, target: e.target, weight: e.weight, relation: e.relation }))
  })
}

export function deserializeGraph(text: string): CausalGraph {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (e) {
    throw new ConfigError(`serialized graph is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  const parsed = SerializedGraphSchema.safeParse(json)
  if (!parsed.success) throw new ConfigError(`invalid serialized graph: ${formatIssues(parsed.error)}`)
  return buildGraph(parsed.data)
}
