import { describe, it, expect } from 'vitest';

import {
  checkNodeReference,
  checkTensorSelection,
  nodeContext,
  selectionPath,
} from '../references.js';
import { ShardGraph } from '../../graph/graph.js';
import { select } from '../../graph/nodes.js';
import { ListIssueCollector } from '../../validation/collector.js';
import { Range } from '../../zspace/range.js';

function tensorGraph(): ShardGraph {
  const graph = new ShardGraph();
  graph.addTensor({ id: 'x', dtype: 'float32', range: Range.fromShape([4, 4]), label: 'input' });
  graph.addNote('not a tensor', { id: 'memo' });
  graph.addOperation({ id: 'op', kernel: 'noop', inputs: {}, outputs: {} });
  return graph;
}

describe('nodeContext / selectionPath', () => {
  it('points at the node and carries its label', () => {
    const graph = tensorGraph();
    const tensor = graph.getTypedNode('x', 'tensor');
    if (tensor === undefined) throw new Error('fixture');

    expect(nodeContext(graph, 'Tensor', tensor)).toEqual({
      name: 'Tensor',
      path: '/nodes/0',
      message: 'label: input',
    });
    expect(selectionPath(graph, tensor, 'inputs', 'a/b', 1)).toBe(
      '/nodes/0/body/inputs/a~1b/1'
    );
  });
});

describe('checkNodeReference', () => {
  const referrer = { name: 'Application', path: '/nodes/9' };

  it('returns the typed node when it exists', () => {
    const graph = tensorGraph();
    const collector = new ListIssueCollector();

    expect(checkNodeReference(graph, 'op', 'operation', referrer, collector)?.id).toBe('op');
    expect(collector.isEmpty()).toBe(true);
  });

  it('reports a missing node', () => {
    const graph = tensorGraph();
    const collector = new ListIssueCollector();

    expect(checkNodeReference(graph, 'ghost', 'operation', referrer, collector)).toBeUndefined();
    expect(collector.issues).toEqual([
      {
        kind: 'NodeReferenceError',
        summary: 'Referenced node does not exist',
        params: { nodeId: 'ghost', nodeKind: 'operation' },
        contexts: [referrer],
      },
    ]);
  });

  it('reports a node of the wrong kind', () => {
    const graph = tensorGraph();
    const collector = new ListIssueCollector();

    checkNodeReference(graph, 'memo', 'tensor', referrer, collector);
    expect(collector.issues).toEqual([
      {
        kind: 'NodeReferenceError',
        summary: 'Referenced node has the wrong kind',
        params: { nodeId: 'memo', expectedKind: 'tensor', actualKind: 'note' },
        contexts: [referrer, { name: 'Referenced Node', path: '/nodes/1' }],
      },
    ]);
  });
});

describe('checkTensorSelection', () => {
  function check(selection: ReturnType<typeof select>): ListIssueCollector {
    const graph = tensorGraph();
    const op = graph.getTypedNode('op', 'operation');
    if (op === undefined) throw new Error('fixture');
    const collector = new ListIssueCollector();
    const path = selectionPath(graph, op, 'inputs', 'a', 0);
    const passed = checkTensorSelection(graph, op, selection, path, collector);
    expect(passed).toBe(collector.isEmpty());
    return collector;
  }

  it('accepts a selection inside the tensor', () => {
    expect(check(select('x', new Range([1, 1], [4, 4]))).isEmpty()).toBe(true);
  });

  it('reports a selection of a missing tensor in its owner', () => {
    const [issue] = check(select('y', Range.fromShape([1, 1]))).issues;

    expect(issue.summary).toBe('Referenced node does not exist');
    expect(issue.contexts).toEqual([
      {
        name: 'Tensor Selection',
        path: '/nodes/2/body/inputs/a/0',
        message: 'in operation op',
        data: { tensorId: 'y', range: { start: [0, 0], end: [1, 1] } },
      },
    ]);
  });

  it('reports a rank mismatch', () => {
    const { issues } = check(select('x', Range.fromShape([4])));

    expect(issues).toHaveLength(1);
    expect(issues[0].summary).toBe('Tensor selection has the wrong number of dimensions');
    expect(issues[0].params).toEqual({
      nodeType: 'operation',
      expectedDimensions: '2',
      actualDimensions: '1',
    });
  });

  it('reports a selection outside the tensor', () => {
    const { issues } = check(select('x', new Range([2, 0], [5, 4])));

    expect(issues).toHaveLength(1);
    expect(issues[0].summary).toBe('Tensor selection is out of bounds');
    expect(issues[0].message).toBe('[2:5, 0:4] is not inside [0:4, 0:4]');
    expect(issues[0].contexts?.map((c) => c.path)).toEqual([
      '/nodes/2/body/inputs/a/0/range',
      '/nodes/0/body/range',
    ]);
  });
});
