import { describe, it, expect } from 'vitest';

import {
  buildLinkGraph,
  findSimpleCycles,
  stronglyConnectedComponents,
  type LinkGraph,
} from '../cycles.js';
import { ShardGraph } from '../../graph/graph.js';
import { select } from '../../graph/nodes.js';
import { Range } from '../../zspace/range.js';
import { selfLoopGraph } from '../../test-utils/graphs.js';

function linkGraph(edges: Record<string, string[]>): LinkGraph {
  return {
    vertices: Object.keys(edges),
    successors: new Map(Object.entries(edges)),
  };
}

describe('buildLinkGraph', () => {
  it('orders each operation before the tensors it first meets', () => {
    const graph = new ShardGraph();
    const r = Range.fromShape([2]);
    graph.addTensor({ id: 'a', dtype: 'f32', range: r });
    graph.addTensor({ id: 'b', dtype: 'f32', range: r });
    graph.addOperation({
      id: 'f',
      kernel: 'f',
      inputs: { x: [select('a', r), select('a', r)] },
      outputs: { y: [select('b', r)] },
    });
    graph.addOperation({
      id: 'g',
      kernel: 'g',
      inputs: { x: [select('b', r)] },
      outputs: { y: [select('a', r)] },
    });

    const { vertices, successors } = buildLinkGraph(graph);
    expect(vertices).toEqual(['f', 'a', 'b', 'g']);
    expect(successors.get('a')).toEqual(['f']);
    expect(successors.get('f')).toEqual(['b']);
    expect(successors.get('b')).toEqual(['g']);
    expect(successors.get('g')).toEqual(['a']);
  });
});

describe('stronglyConnectedComponents', () => {
  it('groups mutually reachable vertices', () => {
    const g = linkGraph({ a: ['b'], b: ['a', 'c'], c: [] });
    expect(stronglyConnectedComponents(g.vertices, g.successors)).toEqual([
      ['c'],
      ['b', 'a'],
    ]);
  });

  it('ignores edges leaving the allowed set', () => {
    const g = linkGraph({ a: ['b'], b: ['a'] });
    expect(
      stronglyConnectedComponents(['b'], g.successors, new Set(['b']))
    ).toEqual([['b']]);
  });
});

describe('findSimpleCycles', () => {
  it('finds the single cycle of an operation reading and writing one tensor', () => {
    expect(findSimpleCycles(buildLinkGraph(selfLoopGraph()))).toEqual({
      cycles: [['op', 't']],
      truncated: false,
    });
  });

  it('lists every elementary cycle once, from its earliest vertex', () => {
    const g = linkGraph({ '1': ['2'], '2': ['3', '1'], '3': ['1'] });
    expect(findSimpleCycles(g).cycles).toEqual([
      ['1', '2', '3'],
      ['1', '2'],
    ]);
  });

  it('returns nothing for an acyclic graph', () => {
    const g = linkGraph({ a: ['b', 'c'], b: ['c'], c: [] });
    expect(findSimpleCycles(g)).toEqual({ cycles: [], truncated: false });
  });

  it('stops at the limit', () => {
    const g = linkGraph({ '1': ['2'], '2': ['3', '1'], '3': ['1'] });
    expect(findSimpleCycles(g, 1)).toEqual({
      cycles: [['1', '2', '3']],
      truncated: true,
    });
  });

  it('counts the cycles of a complete graph', () => {
    // K4 has 6 two-cycles, 8 three-cycles and 6 four-cycles
    const ids = ['a', 'b', 'c', 'd'];
    const g = linkGraph(
      Object.fromEntries(ids.map((v) => [v, ids.filter((w) => w !== v)]))
    );
    expect(findSimpleCycles(g).cycles).toHaveLength(20);
  });
});
