import type { ShardGraph } from '../graph/graph.js';
import {
  displayName,
  type GraphNode,
  type NodeKind,
  type NodeOfKind,
  type TensorSelection,
} from '../graph/nodes.js';
import { joinPointer } from '../util/json-safe.js';
import type { ValidationIssueCollector } from '../validation/collector.js';
import {
  ISSUE_KINDS,
  createContext,
  createIssue,
  type IssueContext,
} from '../validation/issue.js';

/** Context describing a node, pointing at its place in the document. */
export function nodeContext(
  graph: ShardGraph,
  name: string,
  node: GraphNode
): IssueContext {
  return createContext(name, {
    path: graph.nodePath(node.id),
    message: node.label === undefined ? undefined : `label: ${node.label}`,
  });
}

/** JSON pointer to a selection inside a node body. */
export function selectionPath(
  graph: ShardGraph,
  node: GraphNode,
  direction: string,
  slot: string,
  index: number
): string {
  return joinPointer(graph.nodePath(node.id), 'body', direction, slot, index);
}

/**
 * Resolve `id` to a node of `kind`, reporting a NodeReferenceError
 * when it is missing or has another kind.
 */
export function checkNodeReference<K extends NodeKind>(
  graph: ShardGraph,
  id: string,
  kind: K,
  referrer: IssueContext,
  collector: ValidationIssueCollector
): NodeOfKind<K> | undefined {
  const node = graph.getNode(id);
  if (node === undefined) {
    collector.add(
      createIssue(ISSUE_KINDS.NODE_REFERENCE, 'Referenced node does not exist', {
        params: { nodeId: id, nodeKind: kind },
        contexts: [referrer],
      })
    );
    return undefined;
  }
  const typed = graph.getTypedNode(id, kind);
  if (typed === undefined) {
    collector.add(
      createIssue(ISSUE_KINDS.NODE_REFERENCE, 'Referenced node has the wrong kind', {
        params: { nodeId: id, expectedKind: kind, actualKind: node.kind },
        contexts: [referrer, nodeContext(graph, 'Referenced Node', node)],
      })
    );
  }
  return typed;
}

/**
 * Reference integrity of one selection: the tensor exists, the ranks agree
 * and the selected range lies inside the tensor's range.
 *
 * @returns whether the selection passed
 */
export function checkTensorSelection(
  graph: ShardGraph,
  owner: GraphNode,
  selection: TensorSelection,
  path: string,
  collector: ValidationIssueCollector
): boolean {
  const referrer = createContext('Tensor Selection', {
    path,
    message: `in ${owner.kind} ${displayName(owner)}`,
    data: selection,
  });
  const tensor = checkNodeReference(
    graph,
    selection.tensorId,
    'tensor',
    referrer,
    collector
  );
  if (tensor === undefined) return false;

  const tensorRange = tensor.body.range;
  const selectionRange = selection.range;
  const contexts = [
    createContext('Selection Range', {
      path: joinPointer(path, 'range'),
      data: selectionRange,
    }),
    createContext('Tensor Range', {
      path: joinPointer(graph.nodePath(tensor.id), 'body', 'range'),
      data: tensorRange,
    }),
  ];

  if (selectionRange.ndim !== tensorRange.ndim) {
    collector.add(
      createIssue(
        ISSUE_KINDS.NODE_VALIDATION,
        'Tensor selection has the wrong number of dimensions',
        {
          params: {
            nodeType: owner.kind,
            expectedDimensions: tensorRange.ndim,
            actualDimensions: selectionRange.ndim,
          },
          contexts,
        }
      )
    );
    return false;
  }

  if (!tensorRange.contains(selectionRange)) {
    collector.add(
      createIssue(ISSUE_KINDS.NODE_VALIDATION, 'Tensor selection is out of bounds', {
        params: { nodeType: owner.kind },
        message: `${selectionRange} is not inside ${tensorRange}`,
        contexts,
      })
    );
    return false;
  }
  return true;
}
