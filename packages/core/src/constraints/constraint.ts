import type { ShardGraph } from '../graph/graph.js';
import type { NodeKind } from '../graph/nodes.js';
import type { ResolvedOptions } from '../types/options.js';
import type { ValidationIssueCollector } from '../validation/collector.js';

export interface ValidationStats {
  nodeCounts: Record<NodeKind, number>;
  operationsChecked: number;
  cyclesFound: number;
  durationMs: number;
}

export interface ConstraintContext {
  readonly options: ResolvedOptions;
  readonly stats: ValidationStats;
}

/**
 * One graph-wide rule. Data defects go to the collector; only broken
 * preconditions throw.
 */
export interface GraphConstraint {
  readonly name: string;
  check(
    graph: ShardGraph,
    collector: ValidationIssueCollector,
    context: ConstraintContext
  ): void;
}

export function emptyStats(): ValidationStats {
  return {
    nodeCounts: { tensor: 0, operation: 0, application: 0, note: 0 },
    operationsChecked: 0,
    cyclesFound: 0,
    durationMs: 0,
  };
}
