// @shardcheck/core entry point
//
// Public API:
// - Integer geometry: Point, Range, AffineMap, IndexProjection and the
//   cellwise/indexing helpers behind them.
// - Graph model, document codec and the validation facades in ./api.js.
// - Errors, presenter, options and the Result type shared with the CLI.

// High-level facades
export * from './api.js';

// Integer geometry
export * as cellwise from './zspace/cellwise.js';
export type { ZOperand } from './zspace/cellwise.js';
export {
  assertInteger,
  intPow,
  intLog,
  iota,
  resolveIndex,
  resolveDim,
  resolvePermutation,
  applyPermutation,
  shapeToSize,
  commonBroadcastShape,
} from './zspace/indexing.js';
export { Point, PointBuilder, type PointLike } from './zspace/point.js';
export { Range, type RangeJSON, type HasExtent } from './zspace/range.js';
export { AffineMap, type AffineMapJSON } from './zspace/affine-map.js';
export {
  IndexProjection,
  type IndexProjectionJSON,
} from './zspace/projection.js';

// Graph
export * from './graph/nodes.js';
export { ShardGraph, type NewTensor, type NewOperation, type NewApplication } from './graph/graph.js';
export {
  parseGraphDocument,
  serializeGraph,
  type GraphDocument,
  type NodeDocument,
  type TensorNodeDocument,
  type OperationNodeDocument,
  type ApplicationNodeDocument,
  type NoteNodeDocument,
} from './graph/document.js';
export { GRAPH_DOCUMENT_SCHEMA } from './graph/schema.js';

// Validation
export * from './validation/issue.js';
export * from './validation/collector.js';
export { formatIssues, formatIssue, formatContext } from './validation/format.js';
export type {
  ConstraintContext,
  GraphConstraint,
  ValidationStats,
} from './constraints/constraint.js';
export {
  createEnvironment,
  defaultConstraints,
  type EnvironmentOptions,
  type ValidationEnvironment,
} from './constraints/environment.js';
export { OperationAgreementConstraint } from './constraints/operation-agreement.js';
export { ProjectionAgreementConstraint } from './constraints/projection-agreement.js';
export {
  buildLinkGraph,
  findSimpleCycles,
  type LinkGraph,
  type CycleSearchResult,
} from './constraints/cycles.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export * from './types/errors.js';

// Options and results
export * from './types/options.js';
export * from './types/result.js';

// Utilities
export { canonicalJSON } from './util/canonical-json.js';
export { toJsonData, joinPointer, type JsonValue } from './util/json-safe.js';
