import type { ShardGraph } from '../graph/graph.js';
import {
  SLOT_DIRECTIONS,
  displayName,
  slotOf,
  type OperationNode,
  type SlotProjections,
} from '../graph/nodes.js';
import { joinPointer } from '../util/json-safe.js';
import type { Range } from '../zspace/range.js';
import type { ValidationIssueCollector } from '../validation/collector.js';
import { ISSUE_KINDS, createContext, createIssue } from '../validation/issue.js';
import type { ConstraintContext, GraphConstraint } from './constraint.js';
import { nodeContext, selectionPath } from './references.js';

/**
 * Operations that declare an index space and per-slot projections must
 * select exactly what those projections produce, for the whole signature
 * and for every shard.
 */
export class ProjectionAgreementConstraint implements GraphConstraint {
  readonly name = 'projection-agreement';

  check(
    graph: ShardGraph,
    collector: ValidationIssueCollector,
    context: ConstraintContext
  ): void {
    if (!context.options.projections.enabled) return;
    for (const op of graph.nodesOfKind('operation')) {
      const { index, projections } = op.body;
      if (index === undefined || projections === undefined) continue;
      if (!checkProjectionSlots(graph, op, projections, collector)) continue;
      checkProjectedSelections(graph, op, index, projections, collector);
    }
  }
}

function checkProjectionSlots(
  graph: ShardGraph,
  op: OperationNode,
  projections: SlotProjections,
  collector: ValidationIssueCollector
): boolean {
  let valid = true;
  const opContext = nodeContext(graph, 'Operation Signature', op);

  for (const direction of SLOT_DIRECTIONS) {
    const selectionKeys = Object.keys(op.body[direction]).sort();
    const projectionKeys = Object.keys(projections[direction]).sort();
    if (selectionKeys.join('\u0000') !== projectionKeys.join('\u0000')) {
      collector.add(
        createIssue(
          ISSUE_KINDS.NODE_VALIDATION,
          `Operation Signature ${direction} projection keys [${projectionKeys.join(', ')}] != selection keys [${selectionKeys.join(', ')}]`,
          { contexts: [opContext] }
        )
      );
      valid = false;
      continue;
    }

    for (const slot of selectionKeys) {
      const selections = op.body[direction][slot];
      const slotProjections = slotOf(projections[direction], slot);
      if (slotProjections === undefined) continue;
      if (selections.length !== slotProjections.length) {
        collector.add(
          createIssue(
            ISSUE_KINDS.NODE_VALIDATION,
            `Operation Signature ${direction} slot "${slot}" has ${slotProjections.length} projections for ${selections.length} selections`,
            { contexts: [opContext] }
          )
        );
        valid = false;
        continue;
      }
      slotProjections.forEach((projection, i) => {
        const selection = selections[i];
        if (projection.outputNDim !== selection.ndim) {
          collector.add(
            createIssue(
              ISSUE_KINDS.NODE_VALIDATION,
              'Index projection has the wrong number of output dimensions',
              {
                params: {
                  slot: `${slot}[${i}]`,
                  expectedDimensions: selection.ndim,
                  actualDimensions: projection.outputNDim,
                },
                contexts: [
                  opContext,
                  createContext('Index Projection', {
                    path: joinPointer(
                      graph.nodePath(op.id),
                      'body',
                      'projections',
                      direction,
                      slot,
                      i
                    ),
                    data: projection,
                  }),
                ],
              }
            )
          );
          valid = false;
        }
      });
    }
  }
  return valid;
}

function checkProjectedSelections(
  graph: ShardGraph,
  op: OperationNode,
  index: Range,
  projections: SlotProjections,
  collector: ValidationIssueCollector
): void {
  const name = displayName(op);

  for (const direction of SLOT_DIRECTIONS) {
    for (const [slot, slotProjections] of Object.entries(projections[direction])) {
      slotProjections.forEach((projection, i) => {
        if (projection.inputNDim !== index.ndim) {
          collector.add(
            createIssue(
              ISSUE_KINDS.NODE_VALIDATION,
              'Index projection has the wrong number of input dimensions',
              {
                params: {
                  slot: `${slot}[${i}]`,
                  expectedDimensions: index.ndim,
                  actualDimensions: projection.inputNDim,
                },
                contexts: [nodeContext(graph, 'Operation Signature', op)],
              }
            )
          );
          return;
        }
        const expected = projection.apply(index);
        const actual = op.body[direction][slot][i].range;
        if (!actual.equals(expected)) {
          collector.add(
            createIssue(
              ISSUE_KINDS.NODE_VALIDATION,
              `Operation Signature ${name} ${direction} ${slot}[${i}] range ${actual} != projected range ${expected}`,
              {
                contexts: [
                  createContext('Tensor Selection', {
                    path: selectionPath(graph, op, direction, slot, i),
                    data: op.body[direction][slot][i],
                  }),
                  createContext('Index Projection', { data: projection }),
                ],
              }
            )
          );
        }
      });
    }
  }

  for (const shard of graph.applicationsOf(op.id)) {
    const shardContext = nodeContext(graph, 'Application', shard);
    const shardIndex = shard.body.index;
    if (shardIndex === undefined) {
      collector.add(
        createIssue(
          ISSUE_KINDS.NODE_VALIDATION,
          `Application of ${name} declares no index range`,
          { contexts: [shardContext] }
        )
      );
      continue;
    }
    if (shardIndex.ndim !== index.ndim || !index.contains(shardIndex)) {
      collector.add(
        createIssue(
          ISSUE_KINDS.NODE_VALIDATION,
          `Application index ${shardIndex} is outside Operation Signature index ${index}`,
          { contexts: [shardContext, nodeContext(graph, 'Operation Signature', op)] }
        )
      );
      continue;
    }

    for (const direction of SLOT_DIRECTIONS) {
      for (const [slot, slotProjections] of Object.entries(projections[direction])) {
        const shardSelections = slotOf(shard.body[direction], slot);
        // key and arity disagreements are reported by operation agreement
        if (shardSelections === undefined) continue;
        slotProjections.forEach((projection, i) => {
          const selection = shardSelections[i];
          if (selection === undefined || projection.inputNDim !== index.ndim) return;
          const expected = projection.apply(shardIndex);
          if (!selection.range.equals(expected)) {
            collector.add(
              createIssue(
                ISSUE_KINDS.NODE_VALIDATION,
                `Application ${direction} ${slot}[${i}] range ${selection.range} != projected range ${expected}`,
                {
                  contexts: [
                    createContext('Application Tensor Selection', {
                      path: selectionPath(graph, shard, direction, slot, i),
                      data: selection,
                    }),
                    createContext('Application Index', { data: shardIndex }),
                  ],
                }
              )
            );
          }
        });
      }
    }
  }
}
