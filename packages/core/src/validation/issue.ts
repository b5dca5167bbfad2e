import { toJsonData, type JsonValue } from '../util/json-safe.js';

export const ISSUE_KINDS = {
  NODE_VALIDATION: 'NodeValidationError',
  NODE_REFERENCE: 'NodeReferenceError',
  REFERENCE_CYCLE: 'ReferenceCycleError',
} as const;

export type KnownIssueKind = (typeof ISSUE_KINDS)[keyof typeof ISSUE_KINDS];

/**
 * Where an issue was found, with an optional snapshot of the value there.
 */
export interface IssueContext {
  name: string;
  /** JSON pointer into the graph document */
  path?: string;
  message?: string;
  data?: JsonValue;
}

export interface ValidationIssue {
  kind: KnownIssueKind | (string & {});
  params?: Record<string, string>;
  summary: string;
  message?: string;
  contexts?: IssueContext[];
}

export interface IssueInit {
  params?: Record<string, string | number | boolean>;
  message?: string;
  contexts?: Array<IssueContext | undefined>;
}

export function createIssue(
  kind: ValidationIssue['kind'],
  summary: string,
  init: IssueInit = {}
): ValidationIssue {
  const issue: ValidationIssue = { kind, summary };
  if (init.params) {
    issue.params = Object.fromEntries(
      Object.entries(init.params).map(([k, v]) => [k, String(v)])
    );
  }
  if (init.message !== undefined) issue.message = init.message;
  const contexts = (init.contexts ?? []).filter(
    (c): c is IssueContext => c !== undefined
  );
  if (contexts.length > 0) issue.contexts = contexts;
  return issue;
}

/**
 * Build a context; `data` is copied to plain JSON right away.
 */
export function createContext(
  name: string,
  init: { path?: string; message?: string; data?: unknown } = {}
): IssueContext {
  const ctx: IssueContext = { name };
  if (init.path !== undefined) ctx.path = init.path;
  if (init.message !== undefined) ctx.message = init.message;
  if (init.data !== undefined) ctx.data = toJsonData(init.data);
  return ctx;
}
