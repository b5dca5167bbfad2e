/**
 * Node model for sharded tensor-program graphs.
 *
 * Nodes are a tagged union on `kind`; each payload is an immutable value.
 * Payloads with a geometric extent implement HasExtent.
 */

import type { Point } from '../zspace/point.js';
import type { IndexProjection } from '../zspace/projection.js';
import type { HasExtent, Range, RangeJSON } from '../zspace/range.js';

export const NODE_KINDS = ['tensor', 'operation', 'application', 'note'] as const;
export type NodeKind = (typeof NODE_KINDS)[number];

abstract class Extent implements HasExtent {
  abstract readonly range: Range;

  get shape(): Point {
    return this.range.shape;
  }

  get size(): number {
    return this.range.size;
  }

  get ndim(): number {
    return this.range.ndim;
  }
}

/**
 * A tensor's element type and the coordinate box it occupies.
 */
export class TensorBody extends Extent {
  constructor(
    readonly dtype: string,
    readonly range: Range
  ) {
    super();
  }

  toJSON(): { dtype: string; range: RangeJSON } {
    return { dtype: this.dtype, range: this.range.toJSON() };
  }
}

/**
 * A reference to a tensor plus a sub-range of its coordinate space.
 */
export class TensorSelection extends Extent {
  constructor(
    readonly tensorId: string,
    readonly range: Range
  ) {
    super();
  }

  equals(other: TensorSelection): boolean {
    return this.tensorId === other.tensorId && this.range.equals(other.range);
  }

  toJSON(): TensorSelectionJSON {
    return { tensorId: this.tensorId, range: this.range.toJSON() };
  }
}

export interface TensorSelectionJSON {
  tensorId: string;
  range: RangeJSON;
}

export function select(tensorId: string, range: Range): TensorSelection {
  return new TensorSelection(tensorId, range);
}

/** Named slots, each an ordered list of selections. */
export type SelectionMap = Readonly<Record<string, readonly TensorSelection[]>>;

/** Per slot position, the projection from index space to that selection. */
export type ProjectionMap = Readonly<Record<string, readonly IndexProjection[]>>;

export interface SlotProjections {
  readonly inputs: ProjectionMap;
  readonly outputs: ProjectionMap;
}

/** The slot's list, ignoring keys inherited from `Object.prototype`. */
export function slotOf<T>(
  map: Readonly<Record<string, readonly T[]>>,
  slot: string
): readonly T[] | undefined {
  return Object.hasOwn(map, slot) ? map[slot] : undefined;
}

export type SlotDirection = 'inputs' | 'outputs';
export const SLOT_DIRECTIONS: readonly SlotDirection[] = ['inputs', 'outputs'];

/**
 * The whole (unsharded) access pattern of an operation.
 */
export interface OperationBody {
  readonly kernel: string;
  readonly params?: Readonly<Record<string, unknown>>;
  readonly inputs: SelectionMap;
  readonly outputs: SelectionMap;
  readonly index?: Range;
  readonly projections?: SlotProjections;
}

/**
 * One shard of an operation.
 */
export interface ApplicationBody {
  readonly operationId: string;
  readonly inputs: SelectionMap;
  readonly outputs: SelectionMap;
  readonly index?: Range;
}

export interface NoteBody {
  readonly message: string;
}

interface NodeBase<K extends NodeKind, B> {
  readonly id: string;
  readonly kind: K;
  readonly label?: string;
  readonly body: B;
}

export type TensorNode = NodeBase<'tensor', TensorBody>;
export type OperationNode = NodeBase<'operation', OperationBody>;
export type ApplicationNode = NodeBase<'application', ApplicationBody>;
export type NoteNode = NodeBase<'note', NoteBody>;

export type GraphNode = TensorNode | OperationNode | ApplicationNode | NoteNode;
export type NodeOfKind<K extends NodeKind> = Extract<GraphNode, { kind: K }>;

export function isNodeOfKind<K extends NodeKind>(
  node: GraphNode,
  kind: K
): node is NodeOfKind<K> {
  return node.kind === kind;
}

export function isNodeKind(value: string): value is NodeKind {
  return NODE_KINDS.some((kind) => kind === value);
}

/** Human-facing name: the label when present, else the id. */
export function displayName(node: GraphNode): string {
  return node.label ?? node.id;
}
