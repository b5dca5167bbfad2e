import { createEnvironment } from './constraints/environment.js';
import type { ValidationStats } from './constraints/constraint.js';
import type { ShardGraph } from './graph/graph.js';
import { ValidationFailedError } from './types/errors.js';
import type { ValidationOptions } from './types/options.js';
import { ListIssueCollector } from './validation/collector.js';
import type { ValidationIssue } from './validation/issue.js';

export interface ValidationReport {
  /** Issues in the order the constraints reported them. */
  issues: ValidationIssue[];
  /** Absent when `collectStats` is false. */
  stats?: ValidationStats;
}

/**
 * Validate a fully built graph with the default environment.
 *
 * Data defects land in `issues`; only invalid options or an unregistered
 * node kind throw.
 */
export function validateGraph(
  graph: ShardGraph,
  options: ValidationOptions = {}
): ValidationReport {
  const environment = createEnvironment(options);
  const collector = new ListIssueCollector();
  const stats = environment.validateGraph(graph, collector);
  const report: ValidationReport = { issues: [...collector.issues] };
  if (environment.options.collectStats) report.stats = stats;
  return report;
}

/**
 * @throws {ValidationFailedError} listing every issue when the graph is invalid
 */
export function assertValidGraph(
  graph: ShardGraph,
  options: ValidationOptions = {}
): void {
  const { issues } = validateGraph(graph, options);
  if (issues.length > 0) {
    throw new ValidationFailedError(issues);
  }
}
