import { randomUUID } from 'node:crypto';

import { ErrorCode } from '../errors/codes.js';
import { DocumentError } from '../types/errors.js';
import type { Range } from '../zspace/range.js';
import {
  TensorBody,
  isNodeOfKind,
  type ApplicationNode,
  type GraphNode,
  type NodeKind,
  type NodeOfKind,
  type NoteNode,
  type OperationBody,
  type OperationNode,
  type SelectionMap,
  type TensorNode,
} from './nodes.js';

interface NewNode {
  id?: string;
  label?: string;
}

export interface NewTensor extends NewNode {
  dtype: string;
  range: Range;
}

export type NewOperation = NewNode & OperationBody;

export interface NewApplication extends NewNode {
  operationId: string;
  inputs: SelectionMap;
  outputs: SelectionMap;
  index?: Range;
}

/**
 * Insertion-ordered node store.
 *
 * Nodes are added once and never replaced, so a graph handed to the
 * validator is a stable snapshot.
 */
export class ShardGraph {
  readonly id: string;
  readonly #nodes = new Map<string, GraphNode>();
  readonly #positions = new Map<string, number>();

  constructor(id: string = randomUUID()) {
    this.id = id;
  }

  get size(): number {
    return this.#nodes.size;
  }

  /** A fresh id not used by any node of this graph. */
  newNodeId(): string {
    let id = randomUUID();
    while (this.#nodes.has(id)) {
      id = randomUUID();
    }
    return id;
  }

  addNode<N extends GraphNode>(node: N): N {
    if (this.#nodes.has(node.id)) {
      throw new DocumentError({
        message: `duplicate node id ${node.id}`,
        path: this.nodePath(node.id),
        errorCode: ErrorCode.DUPLICATE_NODE_ID,
        context: { nodeId: node.id },
      });
    }
    this.#positions.set(node.id, this.#nodes.size);
    this.#nodes.set(node.id, node);
    return node;
  }

  hasNode(id: string): boolean {
    return this.#nodes.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    return this.#nodes.get(id);
  }

  /** The node with `id` when it exists and has the given kind. */
  getTypedNode<K extends NodeKind>(
    id: string,
    kind: K
  ): NodeOfKind<K> | undefined {
    const node = this.#nodes.get(id);
    return node !== undefined && isNodeOfKind(node, kind) ? node : undefined;
  }

  nodes(): GraphNode[] {
    return [...this.#nodes.values()];
  }

  nodesOfKind<K extends NodeKind>(kind: K): NodeOfKind<K>[] {
    const out: NodeOfKind<K>[] = [];
    for (const node of this.#nodes.values()) {
      if (isNodeOfKind(node, kind)) out.push(node);
    }
    return out;
  }

  /** Shards of an operation, in graph order. */
  applicationsOf(operationId: string): ApplicationNode[] {
    return this.nodesOfKind('application').filter(
      (app) => app.body.operationId === operationId
    );
  }

  /** JSON pointer to the node in the serialized document. */
  nodePath(id: string): string {
    const index = this.#positions.get(id);
    return index === undefined ? `/nodes/-` : `/nodes/${index}`;
  }

  addTensor(init: NewTensor): TensorNode {
    return this.addNode({
      id: init.id ?? this.newNodeId(),
      kind: 'tensor',
      label: init.label,
      body: new TensorBody(init.dtype, init.range),
    });
  }

  addOperation(init: NewOperation): OperationNode {
    const { id, label, ...body } = init;
    return this.addNode({
      id: id ?? this.newNodeId(),
      kind: 'operation',
      label,
      body,
    });
  }

  addApplication(init: NewApplication): ApplicationNode {
    const { id, label, ...body } = init;
    return this.addNode({
      id: id ?? this.newNodeId(),
      kind: 'application',
      label,
      body,
    });
  }

  addNote(message: string, init: NewNode = {}): NoteNode {
    return this.addNode({
      id: init.id ?? this.newNodeId(),
      kind: 'note',
      label: init.label,
      body: { message },
    });
  }
}
