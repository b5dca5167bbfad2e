/* eslint-disable complexity */
import type { ShardGraph } from '../graph/graph.js';
import { SLOT_DIRECTIONS } from '../graph/nodes.js';

/**
 * Directed producer/consumer graph over tensor and operation ids.
 * Vertices keep the order in which they were first met.
 */
export interface LinkGraph {
  readonly vertices: readonly string[];
  readonly successors: ReadonlyMap<string, readonly string[]>;
}

/**
 * Edges run from each input tensor to its operation and from each
 * operation to its output tensors. Operations are scanned in graph order;
 * an operation is met before the tensors it references.
 */
export function buildLinkGraph(graph: ShardGraph): LinkGraph {
  const vertices: string[] = [];
  const successors = new Map<string, string[]>();

  const addVertex = (id: string): void => {
    if (!successors.has(id)) {
      successors.set(id, []);
      vertices.push(id);
    }
  };
  const addEdge = (from: string, to: string): void => {
    const out = successors.get(from);
    if (out !== undefined && !out.includes(to)) out.push(to);
  };

  for (const op of graph.nodesOfKind('operation')) {
    addVertex(op.id);
    for (const direction of SLOT_DIRECTIONS) {
      for (const selections of Object.values(op.body[direction])) {
        for (const { tensorId } of selections) {
          addVertex(tensorId);
          if (direction === 'inputs') {
            addEdge(tensorId, op.id);
          } else {
            addEdge(op.id, tensorId);
          }
        }
      }
    }
  }

  return { vertices, successors };
}

/**
 * Tarjan's strongly connected components over `vertices`, following
 * only edges that stay inside `allowed`.
 */
export function stronglyConnectedComponents(
  vertices: readonly string[],
  successors: ReadonlyMap<string, readonly string[]>,
  allowed: ReadonlySet<string> = new Set(vertices)
): string[][] {
  let nextIndex = 0;
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];

  const connect = (v: string): void => {
    index.set(v, nextIndex);
    lowlink.set(v, nextIndex);
    nextIndex++;
    stack.push(v);
    onStack.add(v);

    for (const w of successors.get(v) ?? []) {
      if (!allowed.has(w)) continue;
      const wIndex = index.get(w);
      if (wIndex === undefined) {
        connect(w);
        lowlink.set(v, Math.min(lowlink.get(v) ?? 0, lowlink.get(w) ?? 0));
      } else if (onStack.has(w)) {
        lowlink.set(v, Math.min(lowlink.get(v) ?? 0, wIndex));
      }
    }

    if (lowlink.get(v) === index.get(v)) {
      const component: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        component.push(w);
      } while (w !== v);
      components.push(component);
    }
  };

  for (const v of vertices) {
    if (allowed.has(v) && !index.has(v)) connect(v);
  }
  return components;
}

export interface CycleSearchResult {
  cycles: string[][];
  /** True when the search stopped at the limit. */
  truncated: boolean;
}

/**
 * Johnson's elementary circuit enumeration.
 *
 * Each cycle is listed once, starting at its earliest vertex in
 * `graph.vertices` order. Cycles of a single vertex are not reported.
 */
export function findSimpleCycles(
  graph: LinkGraph,
  limit = Number.POSITIVE_INFINITY
): CycleSearchResult {
  const { vertices, successors } = graph;
  const cycles: string[][] = [];
  let truncated = false;

  for (let s = 0; s < vertices.length && !truncated; s++) {
    const start = vertices[s];
    const remaining = new Set(vertices.slice(s));
    const component = stronglyConnectedComponents(
      vertices.slice(s),
      successors,
      remaining
    ).find((c) => c.includes(start));
    if (component === undefined || component.length < 2) continue;

    const scope = new Set(component);
    const blocked = new Set<string>();
    const blockedBy = new Map<string, Set<string>>();
    const path: string[] = [];

    const unblock = (u: string): void => {
      blocked.delete(u);
      const waiting = blockedBy.get(u);
      if (waiting === undefined) return;
      blockedBy.delete(u);
      for (const w of waiting) {
        if (blocked.has(w)) unblock(w);
      }
    };

    const circuit = (v: string): boolean => {
      let found = false;
      path.push(v);
      blocked.add(v);
      for (const w of successors.get(v) ?? []) {
        if (truncated) break;
        if (!scope.has(w)) continue;
        if (w === start) {
          cycles.push([...path]);
          found = true;
          if (cycles.length >= limit) truncated = true;
        } else if (!blocked.has(w) && circuit(w)) {
          found = true;
        }
      }
      if (found) {
        unblock(v);
      } else {
        for (const w of successors.get(v) ?? []) {
          if (!scope.has(w)) continue;
          const set = blockedBy.get(w) ?? new Set<string>();
          set.add(v);
          blockedBy.set(w, set);
        }
      }
      path.pop();
      return found;
    };

    circuit(start);
  }

  return { cycles, truncated };
}
