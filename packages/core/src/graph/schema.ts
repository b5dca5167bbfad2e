/**
 * JSON Schema (2020-12) for serialized graph documents.
 */

const integerVector = {
  type: 'array',
  items: { type: 'integer' },
} as const;

export const GRAPH_DOCUMENT_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'https://shardcheck.dev/schemas/graph-document.json',
  type: 'object',
  required: ['nodes'],
  additionalProperties: false,
  properties: {
    id: { type: 'string', format: 'uuid' },
    nodes: { type: 'array', items: { $ref: '#/$defs/node' } },
  },
  $defs: {
    point: integerVector,
    range: {
      type: 'object',
      required: ['start', 'end'],
      additionalProperties: false,
      properties: {
        start: { $ref: '#/$defs/point' },
        end: { $ref: '#/$defs/point' },
      },
    },
    selection: {
      type: 'object',
      required: ['tensorId', 'range'],
      additionalProperties: false,
      properties: {
        tensorId: { type: 'string', minLength: 1 },
        range: { $ref: '#/$defs/range' },
      },
    },
    selectionMap: {
      type: 'object',
      additionalProperties: {
        type: 'array',
        items: { $ref: '#/$defs/selection' },
      },
    },
    affineMap: {
      type: 'object',
      required: ['A', 'b'],
      additionalProperties: false,
      properties: {
        A: { type: 'array', items: integerVector },
        b: { $ref: '#/$defs/point' },
      },
    },
    projection: {
      type: 'object',
      required: ['affineMap', 'shape'],
      additionalProperties: false,
      properties: {
        affineMap: { $ref: '#/$defs/affineMap' },
        shape: { $ref: '#/$defs/point' },
      },
    },
    projectionMap: {
      type: 'object',
      additionalProperties: {
        type: 'array',
        items: { $ref: '#/$defs/projection' },
      },
    },
    tensorBody: {
      type: 'object',
      required: ['dtype', 'range'],
      additionalProperties: false,
      properties: {
        dtype: { type: 'string', minLength: 1 },
        range: { $ref: '#/$defs/range' },
      },
    },
    operationBody: {
      type: 'object',
      required: ['kernel', 'inputs', 'outputs'],
      additionalProperties: false,
      properties: {
        kernel: { type: 'string', minLength: 1 },
        params: { type: 'object' },
        inputs: { $ref: '#/$defs/selectionMap' },
        outputs: { $ref: '#/$defs/selectionMap' },
        index: { $ref: '#/$defs/range' },
        projections: {
          type: 'object',
          required: ['inputs', 'outputs'],
          additionalProperties: false,
          properties: {
            inputs: { $ref: '#/$defs/projectionMap' },
            outputs: { $ref: '#/$defs/projectionMap' },
          },
        },
      },
    },
    applicationBody: {
      type: 'object',
      required: ['operationId', 'inputs', 'outputs'],
      additionalProperties: false,
      properties: {
        operationId: { type: 'string', minLength: 1 },
        inputs: { $ref: '#/$defs/selectionMap' },
        outputs: { $ref: '#/$defs/selectionMap' },
        index: { $ref: '#/$defs/range' },
      },
    },
    noteBody: {
      type: 'object',
      required: ['message'],
      additionalProperties: false,
      properties: {
        message: { type: 'string' },
      },
    },
    node: {
      type: 'object',
      required: ['id', 'kind', 'body'],
      additionalProperties: false,
      properties: {
        id: { type: 'string', minLength: 1 },
        kind: { enum: ['tensor', 'operation', 'application', 'note'] },
        label: { type: 'string' },
        body: { type: 'object' },
      },
      allOf: [
        {
          if: { properties: { kind: { const: 'tensor' } } },
          then: { properties: { body: { $ref: '#/$defs/tensorBody' } } },
        },
        {
          if: { properties: { kind: { const: 'operation' } } },
          then: { properties: { body: { $ref: '#/$defs/operationBody' } } },
        },
        {
          if: { properties: { kind: { const: 'application' } } },
          then: { properties: { body: { $ref: '#/$defs/applicationBody' } } },
        },
        {
          if: { properties: { kind: { const: 'note' } } },
          then: { properties: { body: { $ref: '#/$defs/noteBody' } } },
        },
      ],
    },
  },
} as const;
