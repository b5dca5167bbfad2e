import { ShardGraph } from '../graph/graph.js';
import { select } from '../graph/nodes.js';
import { AffineMap } from '../zspace/affine-map.js';
import { IndexProjection } from '../zspace/projection.js';
import { Range } from '../zspace/range.js';

/**
 * `op` reads tensor `x` and writes tensor `y`, both spanning `signature`.
 * Every shard reads all of `x`; shard `app-i` writes `shardOutputs[i]`.
 */
export function coverageGraph(
  signature: Range,
  shardOutputs: readonly Range[]
): ShardGraph {
  const graph = new ShardGraph();
  graph.addTensor({ id: 'x', dtype: 'float32', range: signature });
  graph.addTensor({ id: 'y', dtype: 'float32', range: signature });
  graph.addOperation({
    id: 'op',
    label: 'copy',
    kernel: 'copy',
    inputs: { x: [select('x', signature)] },
    outputs: { y: [select('y', signature)] },
  });
  shardOutputs.forEach((output, i) => {
    graph.addApplication({
      id: `app-${i}`,
      operationId: 'op',
      inputs: { x: [select('x', signature)] },
      outputs: { y: [select('y', output)] },
    });
  });
  return graph;
}

/** `op` consumes and produces tensor `t` through a single full shard. */
export function selfLoopGraph(): ShardGraph {
  const graph = new ShardGraph();
  const range = Range.fromShape([4]);
  graph.addTensor({ id: 't', dtype: 'int32', range, label: 'state' });
  graph.addOperation({
    id: 'op',
    kernel: 'step',
    inputs: { in: [select('t', range)] },
    outputs: { out: [select('t', range)] },
  });
  graph.addApplication({
    id: 'app',
    operationId: 'op',
    inputs: { in: [select('t', range)] },
    outputs: { out: [select('t', range)] },
  });
  return graph;
}

/**
 * Row-blocked matrix scale over index space `[0, rows)`: each index row
 * selects one row of `a` and one row of `b`. One shard per entry of
 * `blocks`, covering index rows `[start, end)`.
 */
export function projectedGraph(
  rows: number,
  cols: number,
  blocks: ReadonlyArray<readonly [number, number]>
): ShardGraph {
  const graph = new ShardGraph();
  const tensorRange = Range.fromShape([rows, cols]);
  const projection = new IndexProjection(AffineMap.fromMatrix([1], [0]), [1, cols]);
  const index = Range.fromShape([rows]);

  graph.addTensor({ id: 'a', dtype: 'float32', range: tensorRange });
  graph.addTensor({ id: 'b', dtype: 'float32', range: tensorRange });
  graph.addOperation({
    id: 'scale',
    kernel: 'scale',
    params: { factor: 2 },
    inputs: { a: [select('a', tensorRange)] },
    outputs: { b: [select('b', tensorRange)] },
    index,
    projections: { inputs: { a: [projection] }, outputs: { b: [projection] } },
  });
  blocks.forEach(([start, end], i) => {
    const shardIndex = new Range([start], [end]);
    const selected = projection.apply(shardIndex);
    graph.addApplication({
      id: `block-${i}`,
      operationId: 'scale',
      inputs: { a: [select('a', selected)] },
      outputs: { b: [select('b', selected)] },
      index: shardIndex,
    });
  });
  return graph;
}
