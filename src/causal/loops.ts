import { CausalEdge, CausalGraph } from './types'

export interface Cycle {
  nodeIds: string[] // in traversal order, first node not repeated
  edges: CausalEdge[]
  gain: number
}

function adjacency(edges: CausalEdge[]) {
  const out = new Map<string, CausalEdge[]>()
  for (const e of edges) {
    const list = out.get(e.source)
    if (list) list.push(e)
    else out.set(e.source, [e])
  }
  return out
}

/**
 * Tarjan's algorithm. Members of each component are listed in node order, and components are
 * ordered by their first member.
 */
export function stronglyConnectedComponents(graph: CausalGraph): string[][] {
  const adj = adjacency(graph.edges)
  const rank = new Map<string, number>()
  graph.nodes.forEach((n, i) => {
    if (!rank.has(n.id)) rank.set(n.id, i)
  })

  let counter = 0
  const index = new Map<string, number>()
  const low = new Map<string, number>()
  const stack: string[] = []
  const onStack = new Set<string>()
  const components: string[][] = []

  function strongConnect(v: string) {
    const vIndex = counter++
    let vLow = vIndex
    index.set(v, vIndex)
    stack.push(v)
    onStack.add(v)

    for (const e of adj.get(v) || []) {
      const w = e.target
      if (!rank.has(w)) continue
      const wIndex = index.get(w)
      if (wIndex === undefined) {
        strongConnect(w)
        vLow = Math.min(vLow, low.get(w) ?? vLow)
      } else if (onStack.has(w)) {
        vLow = Math.min(vLow, wIndex)
      }
    }
    low.set(v, vLow)

    if (vLow === vIndex) {
      const component: string[] = []
      for (let w = stack.pop(); w !== undefined; w = stack.pop()) {
        onStack.delete(w)
        component.push(w)
        if (w === v) break
      }
      components.push(component)
    }
  }

  for (const n of graph.nodes) {
    if (!index.has(n.id)) strongConnect(n.id)
  }

  const byRank = (a: string, b: string) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0)
  return components.map((c) => c.sort(byRank)).sort((a, b) => byRank(a[0], b[0]))
}

// breadth-first, so the loop returned is a shortest one through `start`
function shortestLoopThrough(start: string, members: Set<string>, adj: Map<string, CausalEdge[]>): Cycle | undefined {
  const via = new Map<string, CausalEdge>()
  const queue = [start]
  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined) break
    for (const e of adj.get(current) || []) {
      if (!members.has(e.target)) continue
      if (e.target === start) {
        const edges = [e]
        for (let back = via.get(current); back; back = via.get(back.source)) edges.unshift(back)
        return {
          nodeIds: edges.map((x) => x.source),
          edges,
          gain: edges.reduce((acc, x) => acc * x.weight, 1)
        }
      }
      if (via.has(e.target)) continue
      via.set(e.target, e)
      queue.push(e.target)
    }
  }
  return undefined
}

/**
 * One representative feedback loop per strongly connected component of two or more nodes.
 * Runs in linear time however dense the component is.
 */
export function findFeedbackLoops(graph: CausalGraph): Cycle[] {
  const adj = adjacency(graph.edges)
  const loops: Cycle[] = []
  for (const component of stronglyConnectedComponents(graph)) {
    if (component.length < 2) continue
    const loop = shortestLoopThrough(component[0], new Set(component), adj)
    if (loop) loops.push(loop)
  }
  return loops
}

// Treats edges as undirected; components are returned largest first, ties in node order.
export function connectedComponents(graph: CausalGraph): string[][] {
  const neighbours = new Map<string, Set<string>>()
  for (const n of graph.nodes) neighbours.set(n.id, new Set())
  for (const e of graph.edges) {
    neighbours.get(e.source)?.add(e.target)
    neighbours.get(e.target)?.add(e.source)
  }

  const visited = new Set<string>()
  const components: string[][] = []
  for (const n of graph.nodes) {
    if (visited.has(n.id)) continue
    const component: string[] = []
    const queue = [n.id]
    visited.add(n.id)
    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      component.push(current)
      for (const next of neighbours.get(current) || []) {
        if (visited.has(next)) continue
        visited.add(next)
        queue.push(next)
      }
    }
    components.push(component)
  }

  return components
    .map((c, i) => ({ c, i }))
    .sort((a, b) => b.c.length - a.c.length || a.i - b.i)
    .map(({ c }) => c)
}

export function reachableFrom(graph: CausalGraph, startIds: Iterable<string>): Set<string> {
  const adj = adjacency(graph.edges)
  const reached = new Set<string>()
  const queue = [...startIds]
  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined) break
    for (const e of adj.get(current) || []) {
      if (reached.has(e.target)) continue
      reached.add(e.target)
      queue.push(e.target)
    }
  }
  return reached
}
