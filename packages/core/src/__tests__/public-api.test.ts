import { describe, it, expect } from 'vitest';
import {
  AffineMap,
  IndexProjection,
  Point,
  Range,
  ShardGraph,
  ValidationFailedError,
  assertValidGraph,
  canonicalJSON,
  cellwise,
  formatIssues,
  isErr,
  isOk,
  parseGraphDocument,
  select,
  serializeGraph,
  validateGraph,
  type ValidationOptions,
} from '../index.js';

function matmulGraph(rowSplit: number): ShardGraph {
  const graph = new ShardGraph();
  const lhs = Range.fromShape([4, 2]);
  const rhs = Range.fromShape([2, 3]);
  const out = Range.fromShape([4, 3]);
  graph.addTensor({ id: 'lhs', dtype: 'float32', range: lhs });
  graph.addTensor({ id: 'rhs', dtype: 'float32', range: rhs });
  graph.addTensor({ id: 'out', dtype: 'float32', range: out, label: 'product' });
  graph.addOperation({
    id: 'mm',
    label: 'matmul',
    kernel: 'matmul',
    inputs: { lhs: [select('lhs', lhs)], rhs: [select('rhs', rhs)] },
    outputs: { out: [select('out', out)] },
  });
  for (const [start, end] of [
    [0, rowSplit],
    [rowSplit, 4],
  ]) {
    graph.addApplication({
      operationId: 'mm',
      inputs: {
        lhs: [select('lhs', new Range([start, 0], [end, 2]))],
        rhs: [select('rhs', rhs)],
      },
      outputs: { out: [select('out', new Range([start, 0], [end, 3]))] },
    });
  }
  return graph;
}

describe('public API surface', () => {
  it('exports usable geometry entry points', () => {
    expect(Point.of(1, 2).add(3).toArray()).toEqual([4, 5]);
    expect(cellwise.maximum([1, 5], 3)).toEqual([3, 5]);
    expect(Range.boundingRange(new Range([0], [1]), new Range([3], [4])).toString()).toBe(
      '[0:4]'
    );
    const ipf = new IndexProjection(AffineMap.identity(1), [2]);
    expect(ipf.apply(new Range([0], [3])).toString()).toBe('[0:4]');
  });

  it('validates a row-sharded matmul end to end', () => {
    const graph = matmulGraph(2);
    const report = validateGraph(graph);

    expect(report.issues).toEqual([]);
    expect(report.stats?.nodeCounts.application).toBe(2);
    expect(() => assertValidGraph(graph)).not.toThrow();

    const parsed = parseGraphDocument(JSON.parse(canonicalJSON(serializeGraph(graph))));
    expect(isOk(parsed) && validateGraph(parsed.value).issues).toEqual([]);
  });

  it('leaves stats out when asked', () => {
    const options: ValidationOptions = { collectStats: false };
    expect(validateGraph(matmulGraph(1), options).stats).toBeUndefined();
  });

  it('raises one aggregate error for an invalid graph', () => {
    const graph = new ShardGraph();
    graph.addOperation({ id: 'op', kernel: 'noop', inputs: {}, outputs: {} });

    expect(() => assertValidGraph(graph)).toThrow(ValidationFailedError);
    expect(() => assertValidGraph(graph)).toThrow(
      formatIssues(validateGraph(graph).issues)
    );
  });

  it('returns document errors instead of throwing', () => {
    expect(isErr(parseGraphDocument([]))).toBe(true);
  });
});
