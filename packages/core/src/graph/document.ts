/* eslint-disable max-lines-per-function */
import type { ErrorObject, ValidateFunction } from 'ajv';
import _Ajv2020 from 'ajv/dist/2020.js';
import _addFormats from 'ajv-formats';

import { ErrorCode } from '../errors/codes.js';
import { DocumentError, isShardCheckError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { joinPointer } from '../util/json-safe.js';
import { IndexProjection, type IndexProjectionJSON } from '../zspace/projection.js';
import { Range, type RangeJSON } from '../zspace/range.js';
import { ShardGraph } from './graph.js';
import {
  TensorBody,
  TensorSelection,
  type GraphNode,
  type ProjectionMap,
  type SelectionMap,
  type TensorSelectionJSON,
} from './nodes.js';
import { GRAPH_DOCUMENT_SCHEMA } from './schema.js';

const Ajv2020 = _Ajv2020.default;
const addFormats = _addFormats.default;

type SelectionMapJSON = Record<string, TensorSelectionJSON[]>;
type ProjectionMapJSON = Record<string, IndexProjectionJSON[]>;

interface NodeDocumentBase<K extends string, B> {
  id: string;
  kind: K;
  label?: string;
  body: B;
}

export type TensorNodeDocument = NodeDocumentBase<
  'tensor',
  { dtype: string; range: RangeJSON }
>;
export type OperationNodeDocument = NodeDocumentBase<
  'operation',
  {
    kernel: string;
    params?: Record<string, unknown>;
    inputs: SelectionMapJSON;
    outputs: SelectionMapJSON;
    index?: RangeJSON;
    projections?: { inputs: ProjectionMapJSON; outputs: ProjectionMapJSON };
  }
>;
export type ApplicationNodeDocument = NodeDocumentBase<
  'application',
  {
    operationId: string;
    inputs: SelectionMapJSON;
    outputs: SelectionMapJSON;
    index?: RangeJSON;
  }
>;
export type NoteNodeDocument = NodeDocumentBase<'note', { message: string }>;

export type NodeDocument =
  | TensorNodeDocument
  | OperationNodeDocument
  | ApplicationNodeDocument
  | NoteNodeDocument;

export interface GraphDocument {
  id?: string;
  nodes: NodeDocument[];
}

let cachedValidator: ValidateFunction<GraphDocument> | undefined;

function compileValidator(): ValidateFunction<GraphDocument> {
  const ajv = new Ajv2020({ strictTypes: false, allErrors: false });
  addFormats(ajv);
  return ajv.compile<GraphDocument>(GRAPH_DOCUMENT_SCHEMA);
}

function getValidator(): ValidateFunction<GraphDocument> {
  cachedValidator ??= compileValidator();
  return cachedValidator;
}

function describeSchemaError(error: ErrorObject): string {
  const where = error.instancePath === '' ? 'document' : error.instancePath;
  return `${where} ${error.message ?? 'is invalid'}`;
}

function mapEntries<V, W>(
  record: Readonly<Record<string, readonly V[]>>,
  fn: (value: V) => W
): Record<string, W[]> {
  return Object.fromEntries(
    Object.entries(record).map(([key, values]) => [key, values.map(fn)])
  );
}

function selectionsFromJSON(map: SelectionMapJSON): SelectionMap {
  return mapEntries(
    map,
    (s) => new TensorSelection(s.tensorId, Range.fromJSON(s.range))
  );
}

function projectionsFromJSON(map: ProjectionMapJSON): ProjectionMap {
  return mapEntries(map, (p) => IndexProjection.fromJSON(p));
}

function nodeFromDocument(doc: NodeDocument): GraphNode {
  const { id, label } = doc;
  switch (doc.kind) {
    case 'tensor':
      return {
        id,
        kind: 'tensor',
        label,
        body: new TensorBody(doc.body.dtype, Range.fromJSON(doc.body.range)),
      };
    case 'operation': {
      const { kernel, params, inputs, outputs, index, projections } = doc.body;
      return {
        id,
        kind: 'operation',
        label,
        body: {
          kernel,
          params,
          inputs: selectionsFromJSON(inputs),
          outputs: selectionsFromJSON(outputs),
          index: index === undefined ? undefined : Range.fromJSON(index),
          projections:
            projections === undefined
              ? undefined
              : {
                  inputs: projectionsFromJSON(projections.inputs),
                  outputs: projectionsFromJSON(projections.outputs),
                },
        },
      };
    }
    case 'application': {
      const { operationId, inputs, outputs, index } = doc.body;
      return {
        id,
        kind: 'application',
        label,
        body: {
          operationId,
          inputs: selectionsFromJSON(inputs),
          outputs: selectionsFromJSON(outputs),
          index: index === undefined ? undefined : Range.fromJSON(index),
        },
      };
    }
    case 'note':
      return { id, kind: 'note', label, body: { message: doc.body.message } };
  }
}

/**
 * Validate and decode a graph document.
 *
 * Structural problems, invalid geometry and duplicate ids come back as a
 * DocumentError whose `path` points into the document.
 */
export function parseGraphDocument(
  value: unknown
): Result<ShardGraph, DocumentError> {
  const validate = getValidator();
  if (!validate(value)) {
    const [first] = validate.errors ?? [];
    return err(
      new DocumentError({
        message:
          first === undefined
            ? 'invalid graph document'
            : `invalid graph document: ${describeSchemaError(first)}`,
        path: first?.instancePath === '' ? '/' : first?.instancePath,
        context: first === undefined ? undefined : { schemaPath: first.schemaPath },
      })
    );
  }

  const graph = new ShardGraph(value.id);
  for (const [index, doc] of value.nodes.entries()) {
    const path = joinPointer('/nodes', index);
    if (graph.hasNode(doc.id)) {
      return err(
        new DocumentError({
          message: `duplicate node id ${doc.id}`,
          path: joinPointer(path, 'id'),
          errorCode: ErrorCode.DUPLICATE_NODE_ID,
          context: { nodeId: doc.id },
        })
      );
    }
    try {
      graph.addNode(nodeFromDocument(doc));
    } catch (error) {
      if (!isShardCheckError(error)) throw error;
      return err(
        new DocumentError({
          message: `invalid ${doc.kind} node ${doc.id}: ${error.message}`,
          path: joinPointer(path, 'body'),
          context: { nodeId: doc.id },
          cause: error,
        })
      );
    }
  }
  return ok(graph);
}

function selectionsToJSON(map: SelectionMap): SelectionMapJSON {
  return mapEntries(map, (s) => s.toJSON());
}

function projectionsToJSON(map: ProjectionMap): ProjectionMapJSON {
  return mapEntries(map, (p) => p.toJSON());
}

function nodeToDocument(node: GraphNode): NodeDocument {
  const base = {
    id: node.id,
    ...(node.label === undefined ? {} : { label: node.label }),
  };
  switch (node.kind) {
    case 'tensor':
      return { ...base, kind: 'tensor', body: node.body.toJSON() };
    case 'operation': {
      const { kernel, params, inputs, outputs, index, projections } = node.body;
      return {
        ...base,
        kind: 'operation',
        body: {
          kernel,
          ...(params === undefined ? {} : { params: { ...params } }),
          inputs: selectionsToJSON(inputs),
          outputs: selectionsToJSON(outputs),
          ...(index === undefined ? {} : { index: index.toJSON() }),
          ...(projections === undefined
            ? {}
            : {
                projections: {
                  inputs: projectionsToJSON(projections.inputs),
                  outputs: projectionsToJSON(projections.outputs),
                },
              }),
        },
      };
    }
    case 'application': {
      const { operationId, inputs, outputs, index } = node.body;
      return {
        ...base,
        kind: 'application',
        body: {
          operationId,
          inputs: selectionsToJSON(inputs),
          outputs: selectionsToJSON(outputs),
          ...(index === undefined ? {} : { index: index.toJSON() }),
        },
      };
    }
    case 'note':
      return { ...base, kind: 'note', body: { message: node.body.message } };
  }
}

/** Document form of `graph`, nodes in insertion order. */
export function serializeGraph(graph: ShardGraph): GraphDocument {
  return { id: graph.id, nodes: graph.nodes().map(nodeToDocument) };
}
