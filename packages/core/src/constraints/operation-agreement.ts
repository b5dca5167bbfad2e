/* eslint-disable max-lines */
/* eslint-disable complexity */
import type { ShardGraph } from '../graph/graph.js';
import {
  SLOT_DIRECTIONS,
  displayName,
  slotOf,
  type ApplicationNode,
  type OperationNode,
  type SlotDirection,
} from '../graph/nodes.js';
import { Range } from '../zspace/range.js';
import {
  CountingIssueCollector,
  type ValidationIssueCollector,
} from '../validation/collector.js';
import {
  ISSUE_KINDS,
  createContext,
  createIssue,
  type IssueContext,
} from '../validation/issue.js';
import type { ConstraintContext, GraphConstraint } from './constraint.js';
import { buildLinkGraph, findSimpleCycles } from './cycles.js';
import {
  checkNodeReference,
  checkTensorSelection,
  nodeContext,
  selectionPath,
} from './references.js';

const DIRECTION_NOUN: Record<SlotDirection, string> = {
  inputs: 'input',
  outputs: 'output',
};

function sortedKeys(map: object): string[] {
  return Object.keys(map).sort();
}

/**
 * Reference integrity, shard agreement, coverage and cycle freedom
 * between operation signatures and their application shards.
 */
export class OperationAgreementConstraint implements GraphConstraint {
  readonly name = 'operation-agreement';

  check(
    graph: ShardGraph,
    collector: ValidationIssueCollector,
    context: ConstraintContext
  ): void {
    const counter = new CountingIssueCollector(collector);

    for (const app of graph.nodesOfKind('application')) {
      checkNodeReference(
        graph,
        app.body.operationId,
        'operation',
        nodeContext(graph, 'Application', app),
        counter
      );
    }

    for (const op of graph.nodesOfKind('operation')) {
      validateOperation(graph, op, counter);
      context.stats.operationsChecked++;
    }

    // dangling or malformed references make cycle results meaningless
    if (counter.count > 0 || !context.options.cycles.enabled) return;

    reportCycles(graph, collector, context);
  }
}

/**
 * Check one operation signature against its shards.
 *
 * @returns whether no issue was reported
 */
export function validateOperation(
  graph: ShardGraph,
  op: OperationNode,
  collector: ValidationIssueCollector
): boolean {
  let valid = true;
  const opContext = nodeContext(graph, 'Operation Signature', op);

  for (const direction of SLOT_DIRECTIONS) {
    for (const [slot, selections] of Object.entries(op.body[direction])) {
      selections.forEach((selection, index) => {
        const path = selectionPath(graph, op, direction, slot, index);
        if (!checkTensorSelection(graph, op, selection, path, collector)) {
          valid = false;
        }
      });
    }
  }

  const shards = graph.applicationsOf(op.id);
  if (shards.length === 0) {
    collector.add(
      createIssue(
        ISSUE_KINDS.NODE_VALIDATION,
        `Operation Signature ${displayName(op)} has no Application shards`,
        { contexts: [opContext] }
      )
    );
    return false;
  }

  let shardsAgree = true;
  for (const shard of shards) {
    for (const direction of SLOT_DIRECTIONS) {
      if (!checkShardAgreement(graph, op, shard, direction, collector)) {
        shardsAgree = false;
      }
    }
  }
  // coverage arithmetic needs every shard to line up with the signature
  if (!shardsAgree) return false;

  for (const direction of SLOT_DIRECTIONS) {
    if (!checkCoverage(graph, op, shards, direction, opContext, collector)) {
      valid = false;
    }
  }
  return valid;
}

/**
 * Key/arity agreement and shard-subset containment for one direction.
 */
export function checkShardAgreement(
  graph: ShardGraph,
  op: OperationNode,
  shard: ApplicationNode,
  direction: SlotDirection,
  collector: ValidationIssueCollector
): boolean {
  let valid = true;
  const appMap = shard.body[direction];
  const sigMap = op.body[direction];
  const appKeys = sortedKeys(appMap);
  const sigKeys = sortedKeys(sigMap);
  const shardContext = nodeContext(graph, 'Application', shard);

  if (appKeys.join('\u0000') !== sigKeys.join('\u0000')) {
    collector.add(
      createIssue(
        ISSUE_KINDS.NODE_VALIDATION,
        `Application ${direction} keys [${appKeys.join(', ')}] != Operation Signature ${direction} keys [${sigKeys.join(', ')}]`,
        { contexts: [shardContext, nodeContext(graph, 'Operation Signature', op)] }
      )
    );
    valid = false;
  }

  for (const slot of appKeys) {
    const appSelections = appMap[slot];
    const sigSelections = slotOf(sigMap, slot);
    if (sigSelections === undefined) continue;

    if (appSelections.length !== sigSelections.length) {
      collector.add(
        createIssue(
          ISSUE_KINDS.NODE_VALIDATION,
          `Application ${direction} slot "${slot}" has ${appSelections.length} selections, Operation Signature has ${sigSelections.length}`,
          { contexts: [shardContext] }
        )
      );
      valid = false;
      continue;
    }

    appSelections.forEach((appSelection, index) => {
      const sigSelection = sigSelections[index];
      const contexts = [
        createContext('Application Tensor Selection', {
          path: selectionPath(graph, shard, direction, slot, index),
          data: appSelection,
        }),
        createContext('Operation Tensor Selection', {
          path: selectionPath(graph, op, direction, slot, index),
          data: sigSelection,
        }),
        shardContext,
      ];

      if (appSelection.tensorId !== sigSelection.tensorId) {
        collector.add(
          createIssue(
            ISSUE_KINDS.NODE_VALIDATION,
            'Application Tensor Selection Tensor Id != Signature Tensor Id',
            {
              params: {
                applicationTensorId: appSelection.tensorId,
                signatureTensorId: sigSelection.tensorId,
              },
              contexts,
            }
          )
        );
        valid = false;
      } else if (appSelection.ndim !== sigSelection.ndim) {
        collector.add(
          createIssue(
            ISSUE_KINDS.NODE_VALIDATION,
            'Tensor selection has the wrong number of dimensions',
            {
              params: {
                nodeType: shard.kind,
                expectedDimensions: sigSelection.ndim,
                actualDimensions: appSelection.ndim,
              },
              contexts,
            }
          )
        );
        valid = false;
      } else if (!sigSelection.range.contains(appSelection.range)) {
        collector.add(
          createIssue(
            ISSUE_KINDS.NODE_VALIDATION,
            `Application Tensor Selection range ${appSelection.range} is outside Signature range ${sigSelection.range}`,
            { contexts }
          )
        );
        valid = false;
      }
    });
  }

  return valid;
}

function shardRangesContext(shards: ApplicationNode[], ranges: Range[]): IssueContext {
  return createContext('Application Shard Ranges', {
    data: Object.fromEntries(shards.map((shard, i) => [shard.id, ranges[i]])),
  });
}

/**
 * Coverage per slot position. Inputs need their bounding range to equal
 * the signature range; outputs must also tile it without overlap or gap.
 */
export function checkCoverage(
  graph: ShardGraph,
  op: OperationNode,
  shards: ApplicationNode[],
  direction: SlotDirection,
  opContext: IssueContext,
  collector: ValidationIssueCollector
): boolean {
  let valid = true;
  const name = displayName(op);
  const noun = DIRECTION_NOUN[direction];

  for (const [slot, selections] of Object.entries(op.body[direction])) {
    selections.forEach((selection, index) => {
      const where = `${noun} ${slot}[${index}]`;
      const sigRange = selection.range;
      // agreement has matched every shard's slots and arities to the signature
      const ranges = shards.map((shard) => shard.body[direction][slot][index].range);
      const bound = Range.boundingRange(...ranges);
      const rangesContext = shardRangesContext(shards, ranges);

      let overlapping = false;
      if (direction === 'outputs') {
        const pairs: Array<{ first: string; second: string; intersection: Range }> = [];
        for (let i = 0; i < ranges.length; i++) {
          for (let j = i + 1; j < ranges.length; j++) {
            const intersection = ranges[i].intersection(ranges[j]);
            if (intersection !== undefined) {
              pairs.push({ first: shards[i].id, second: shards[j].id, intersection });
            }
          }
        }
        if (pairs.length > 0) {
          overlapping = true;
          collector.add(
            createIssue(ISSUE_KINDS.NODE_VALIDATION, 'Overlapping Application output ranges', {
              params: { operation: name, slot: `${slot}[${index}]` },
              contexts: [
                opContext,
                createContext('Overlapping Shards', { data: pairs }),
              ],
            })
          );
          valid = false;
        }
      }

      if (!bound.equals(sigRange)) {
        collector.add(
          createIssue(
            ISSUE_KINDS.NODE_VALIDATION,
            `Operation Signature ${name} ${where} range ${sigRange} != shard bounding range ${bound}`,
            { contexts: [opContext, rangesContext] }
          )
        );
        valid = false;
        return;
      }

      if (direction === 'outputs' && !overlapping) {
        const total = ranges.reduce((acc, r) => acc + r.size, 0);
        if (total !== sigRange.size) {
          collector.add(
            createIssue(
              ISSUE_KINDS.NODE_VALIDATION,
              `Operation Signature ${name} ${where} shards cover ${total} of ${sigRange.size} points`,
              { contexts: [opContext, rangesContext] }
            )
          );
          valid = false;
        }
      }
    });
  }
  return valid;
}

function reportCycles(
  graph: ShardGraph,
  collector: ValidationIssueCollector,
  context: ConstraintContext
): void {
  const { maxCycles } = context.options.cycles;
  const { cycles, truncated } = findSimpleCycles(buildLinkGraph(graph), maxCycles);
  context.stats.cyclesFound = cycles.length;

  cycles.forEach((cycle, i) => {
    const last = i === cycles.length - 1;
    collector.add(
      createIssue(ISSUE_KINDS.REFERENCE_CYCLE, 'Reference cycle detected', {
        params: truncated && last ? { truncated: 'true', maxCycles } : undefined,
        contexts: [
          createContext('Cycle', {
            data: cycle.map((id) => {
              const node = graph.getNode(id);
              return { id, kind: node?.kind, label: node?.label };
            }),
          }),
        ],
      })
    );
  });
}
