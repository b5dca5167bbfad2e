import { performance } from 'node:perf_hooks';

import type { ShardGraph } from '../graph/graph.js';
import { NODE_KINDS, type NodeKind } from '../graph/nodes.js';
import { ConfigurationError } from '../types/errors.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type ValidationOptions,
} from '../types/options.js';
import type { ValidationIssueCollector } from '../validation/collector.js';
import {
  emptyStats,
  type GraphConstraint,
  type ValidationStats,
} from './constraint.js';
import { OperationAgreementConstraint } from './operation-agreement.js';
import { ProjectionAgreementConstraint } from './projection-agreement.js';

export interface EnvironmentOptions {
  /** Node kinds the environment accepts (default: every known kind) */
  kinds?: readonly NodeKind[];
  /** Constraints in run order (default: operation then projection agreement) */
  constraints?: readonly GraphConstraint[];
  now?: () => number;
}

/**
 * Explicit validation configuration: which node kinds are legal and which
 * constraints run, in order.
 */
export interface ValidationEnvironment {
  readonly options: ResolvedOptions;
  readonly kinds: ReadonlySet<string>;
  readonly constraints: readonly GraphConstraint[];
  /**
   * Run every constraint against `graph`.
   *
   * @throws {ConfigurationError} when the graph holds an unregistered kind
   */
  validateGraph(graph: ShardGraph, collector: ValidationIssueCollector): ValidationStats;
}

export function defaultConstraints(): GraphConstraint[] {
  return [new OperationAgreementConstraint(), new ProjectionAgreementConstraint()];
}

export function createEnvironment(
  options: ValidationOptions = {},
  environment: EnvironmentOptions = {}
): ValidationEnvironment {
  const resolved = resolveOptions(options);
  const kinds = new Set<string>(environment.kinds ?? NODE_KINDS);
  const constraints = [...(environment.constraints ?? defaultConstraints())];
  const now = environment.now ?? (() => performance.now());

  return {
    options: resolved,
    kinds,
    constraints,
    validateGraph(graph, collector) {
      const startedAt = now();
      const stats = emptyStats();

      for (const node of graph.nodes()) {
        if (!kinds.has(node.kind)) {
          throw new ConfigurationError(`node kind "${node.kind}" is not registered`, {
            nodeId: node.id,
            path: graph.nodePath(node.id),
          });
        }
        stats.nodeCounts[node.kind]++;
      }

      for (const constraint of constraints) {
        constraint.check(graph, collector, { options: resolved, stats });
      }

      stats.durationMs = now() - startedAt;
      return stats;
    },
  };
}
