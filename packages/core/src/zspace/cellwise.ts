/**
 * Broadcasting elementwise integer arithmetic.
 *
 * Operands are integers (rank 0) or integer vectors (rank 1). Vectors of
 * length 1 and scalars stretch to the length of the other operand; any
 * other length mismatch is a shape error. Results are always fresh arrays.
 */

import { ErrorCode } from '../errors/codes.js';
import { GeometryError } from '../types/errors.js';
import { commonBroadcastShape, intLog, intPow } from './indexing.js';

export type ZOperand = number | readonly number[];

type UnaryOp = (a: number) => number;
type BinaryOp = (a: number, b: number) => number;

function shapeOf(operand: ZOperand): number[] {
  return typeof operand === 'number' ? [] : [operand.length];
}

function at(operand: ZOperand, i: number): number {
  if (typeof operand === 'number') return operand;
  return operand.length === 1 ? operand[0] : operand[i];
}

export function broadcastLength(...operands: ZOperand[]): number {
  const [len = 1] = commonBroadcastShape(...operands.map(shapeOf));
  return len;
}

function foldNegativeZero(v: number): number {
  return Object.is(v, -0) ? 0 : v;
}

export function unaryOp(op: UnaryOp, a: ZOperand): number[] {
  if (typeof a === 'number') return [foldNegativeZero(op(a))];
  return a.map((v) => foldNegativeZero(op(v)));
}

export function binaryOp(op: BinaryOp, a: ZOperand, b: ZOperand): number[] {
  const len = broadcastLength(a, b);
  const out = new Array<number>(len);
  for (let i = 0; i < len; i++) {
    out[i] = foldNegativeZero(op(at(a, i), at(b, i)));
  }
  return out;
}

function checkedDivisor(b: number, operation: string): number {
  if (b === 0) {
    throw new GeometryError('division by zero', { operation });
  }
  return b;
}

const truncDiv: BinaryOp = (a, b) => Math.trunc(a / checkedDivisor(b, 'div'));
const truncMod: BinaryOp = (a, b) => a % checkedDivisor(b, 'mod');

export const neg = (a: ZOperand): number[] => unaryOp((v) => 0 - v, a);
export const abs = (a: ZOperand): number[] => unaryOp(Math.abs, a);

export const add = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp((x, y) => x + y, a, b);
export const sub = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp((x, y) => x - y, a, b);
export const mul = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp((x, y) => x * y, a, b);
export const div = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp(truncDiv, a, b);
export const mod = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp(truncMod, a, b);
export const pow = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp(intPow, a, b);
export const log = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp(intLog, a, b);
export const minimum = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp(Math.min, a, b);
export const maximum = (a: ZOperand, b: ZOperand): number[] =>
  binaryOp(Math.max, a, b);

/**
 * Fold a binary kernel across every operand, broadcasting as it goes.
 */
export function reduceCellwise(
  op: (a: ZOperand, b: ZOperand) => number[],
  first: ZOperand,
  ...rest: ZOperand[]
): number[] {
  let acc: number[] = typeof first === 'number' ? [first] : [...first];
  for (const operand of rest) {
    acc = op(acc, operand);
  }
  return acc;
}

/**
 * Dot product of two equal-length vectors.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new GeometryError(
      `dot: length mismatch ${a.length} != ${b.length}`,
      { operation: 'dot' },
      ErrorCode.SHAPE_MISMATCH
    );
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}
