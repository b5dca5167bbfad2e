/**
 * Error Code Infrastructure
 * Stable error codes and their CLI exit codes.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Document Errors (E001–E099)
  INVALID_GRAPH_DOCUMENT = 'E010',
  DOCUMENT_PARSE_FAILED = 'E011',
  DUPLICATE_NODE_ID = 'E012',

  // Geometry Errors (E100–E199)
  GEOMETRY_PRECONDITION = 'E100',
  SHAPE_MISMATCH = 'E101',

  // Validation Errors (E200–E299)
  GRAPH_VALIDATION_FAILED = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Input Errors (E400–E499)
  INPUT_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.INVALID_GRAPH_DOCUMENT]: 20,
  [ErrorCode.DOCUMENT_PARSE_FAILED]: 21,
  [ErrorCode.DUPLICATE_NODE_ID]: 22,
  [ErrorCode.GEOMETRY_PRECONDITION]: 30,
  [ErrorCode.SHAPE_MISMATCH]: 31,
  [ErrorCode.GRAPH_VALIDATION_FAILED]: 40,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INPUT_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
