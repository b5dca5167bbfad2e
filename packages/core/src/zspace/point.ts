import { ErrorCode } from '../errors/codes.js';
import { GeometryError } from '../types/errors.js';
import * as cellwise from './cellwise.js';
import type { ZOperand } from './cellwise.js';
import { applyPermutation, assertInteger, resolveDim } from './indexing.js';

/** Anything a Point broadcasts against. */
export type PointLike = Point | ZOperand;

function toOperand(value: PointLike): ZOperand {
  return value instanceof Point ? value.coords : value;
}

type Comparison = (a: number, b: number) => boolean;

/**
 * Immutable integer coordinate vector.
 *
 * Comparisons are componentwise and hold only when they hold on every
 * coordinate, so `a.lt(b)` and `a.ge(b)` may both be false.
 */
export class Point {
  readonly coords: readonly number[];

  constructor(coords: Iterable<number>) {
    const values = Array.from(coords);
    values.forEach((v, i) => assertInteger(v, `coordinate ${i}`));
    this.coords = Object.freeze(values);
  }

  static of(...coords: number[]): Point {
    return new Point(coords);
  }

  static full(ndim: number, value: number): Point {
    return new Point(new Array<number>(ndim).fill(value));
  }

  static zeros(ndim: number): Point {
    return Point.full(ndim, 0);
  }

  static ones(ndim: number): Point {
    return Point.full(ndim, 1);
  }

  static from(value: PointLike): Point {
    if (value instanceof Point) return value;
    return new Point(typeof value === 'number' ? [value] : value);
  }

  get ndim(): number {
    return this.coords.length;
  }

  /** Coordinate at `dim`; negative dims count from the end. */
  get(dim: number): number {
    return this.coords[resolveDim(dim, this.ndim)];
  }

  toArray(): number[] {
    return [...this.coords];
  }

  /** Reorder coordinates so that `out[i] = this[permutation[i]]`. */
  permute(permutation: readonly number[]): Point {
    return new Point(applyPermutation(this.coords, permutation));
  }

  neg(): Point {
    return new Point(cellwise.neg(this.coords));
  }

  abs(): Point {
    return new Point(cellwise.abs(this.coords));
  }

  add(other: PointLike): Point {
    return new Point(cellwise.add(this.coords, toOperand(other)));
  }

  sub(other: PointLike): Point {
    return new Point(cellwise.sub(this.coords, toOperand(other)));
  }

  mul(other: PointLike): Point {
    return new Point(cellwise.mul(this.coords, toOperand(other)));
  }

  div(other: PointLike): Point {
    return new Point(cellwise.div(this.coords, toOperand(other)));
  }

  mod(other: PointLike): Point {
    return new Point(cellwise.mod(this.coords, toOperand(other)));
  }

  pow(exponent: PointLike): Point {
    return new Point(cellwise.pow(this.coords, toOperand(exponent)));
  }

  log(base: PointLike): Point {
    return new Point(cellwise.log(this.coords, toOperand(base)));
  }

  minimum(other: PointLike): Point {
    return new Point(cellwise.minimum(this.coords, toOperand(other)));
  }

  maximum(other: PointLike): Point {
    return new Point(cellwise.maximum(this.coords, toOperand(other)));
  }

  sum(): number {
    return this.coords.reduce((acc, v) => acc + v, 0);
  }

  prod(): number {
    return this.coords.reduce((acc, v) => acc * v, 1);
  }

  #every(other: PointLike, cmp: Comparison): boolean {
    const rhs = toOperand(other);
    const len = cellwise.broadcastLength(this.coords, rhs);
    for (let i = 0; i < len; i++) {
      const a = this.coords.length === 1 ? this.coords[0] : this.coords[i];
      const b =
        typeof rhs === 'number' ? rhs : rhs.length === 1 ? rhs[0] : rhs[i];
      if (!cmp(a, b)) return false;
    }
    return true;
  }

  eq(other: PointLike): boolean {
    return this.#every(other, (a, b) => a === b);
  }

  /** True only when every coordinate differs. */
  ne(other: PointLike): boolean {
    return this.#every(other, (a, b) => a !== b);
  }

  lt(other: PointLike): boolean {
    return this.#every(other, (a, b) => a < b);
  }

  le(other: PointLike): boolean {
    return this.#every(other, (a, b) => a <= b);
  }

  gt(other: PointLike): boolean {
    return this.#every(other, (a, b) => a > b);
  }

  ge(other: PointLike): boolean {
    return this.#every(other, (a, b) => a >= b);
  }

  /** Value equality: same rank and same coordinates. */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof Point) || other.ndim !== this.ndim) return false;
    return this.coords.every((v, i) => v === other.coords[i]);
  }

  toString(): string {
    return `[${this.coords.join(', ')}]`;
  }

  toJSON(): number[] {
    return this.toArray();
  }
}

/**
 * Exclusively owned mutable coordinate buffer.
 *
 * The buffer never leaves the builder; `build()` freezes it into a Point
 * and retires the builder, so later mutation attempts throw.
 */
export class PointBuilder {
  #coords: number[] | undefined;

  constructor(initial: PointLike) {
    const start = Point.from(initial);
    this.#coords = start.toArray();
  }

  get ndim(): number {
    return this.#owned('ndim').length;
  }

  #owned(operation: string): number[] {
    if (this.#coords === undefined) {
      throw new GeometryError('PointBuilder was already built', {
        operation,
      });
    }
    return this.#coords;
  }

  #assign(operation: string, result: number[]): this {
    const coords = this.#owned(operation);
    if (result.length !== coords.length) {
      throw new GeometryError(
        `${operation}: result rank ${result.length} != buffer rank ${coords.length}`,
        { operation },
        ErrorCode.SHAPE_MISMATCH
      );
    }
    for (let i = 0; i < coords.length; i++) {
      coords[i] = result[i];
    }
    return this;
  }

  set(dim: number, value: number): this {
    const coords = this.#owned('set');
    coords[resolveDim(dim, coords.length)] = assertInteger(value);
    return this;
  }

  addInPlace(other: PointLike): this {
    return this.#assign(
      'addInPlace',
      cellwise.add(this.#owned('addInPlace'), toOperand(other))
    );
  }

  subInPlace(other: PointLike): this {
    return this.#assign(
      'subInPlace',
      cellwise.sub(this.#owned('subInPlace'), toOperand(other))
    );
  }

  mulInPlace(other: PointLike): this {
    return this.#assign(
      'mulInPlace',
      cellwise.mul(this.#owned('mulInPlace'), toOperand(other))
    );
  }

  minimumInPlace(other: PointLike): this {
    return this.#assign(
      'minimumInPlace',
      cellwise.minimum(this.#owned('minimumInPlace'), toOperand(other))
    );
  }

  maximumInPlace(other: PointLike): this {
    return this.#assign(
      'maximumInPlace',
      cellwise.maximum(this.#owned('maximumInPlace'), toOperand(other))
    );
  }

  build(): Point {
    const coords = this.#owned('build');
    this.#coords = undefined;
    return new Point(coords);
  }
}
