import { ErrorCode } from '../errors/codes.js';
import { GeometryError } from '../types/errors.js';
import { Point, PointBuilder, type PointLike } from './point.js';

export interface RangeJSON {
  start: number[];
  end: number[];
}

/**
 * Capability shared by every payload with a geometric extent.
 */
export interface HasExtent {
  readonly range: Range;
  readonly shape: Point;
  readonly size: number;
  readonly ndim: number;
}

function assertSameRank(operation: string, a: number, b: number): void {
  if (a !== b) {
    throw new GeometryError(
      `${operation}: rank mismatch ${a} != ${b}`,
      { operation },
      ErrorCode.SHAPE_MISMATCH
    );
  }
}

/**
 * Half-open integer box `[start, end)`.
 */
export class Range implements HasExtent {
  readonly start: Point;
  readonly end: Point;

  constructor(start: PointLike, end: PointLike) {
    const s = Point.from(start);
    const e = Point.from(end);
    assertSameRank('Range', s.ndim, e.ndim);
    if (!e.ge(s)) {
      throw new GeometryError(`Range end ${e} must be >= start ${s}`, {
        operation: 'Range',
        value: { start: s.toArray(), end: e.toArray() },
      });
    }
    this.start = s;
    this.end = e;
  }

  /** `[0, shape)` */
  static fromShape(shape: PointLike): Range {
    const s = Point.from(shape);
    return new Range(Point.zeros(s.ndim), s);
  }

  static fromStartShape(start: PointLike, shape: PointLike): Range {
    const s = Point.from(start);
    return new Range(s, s.add(shape));
  }

  static fromJSON(json: RangeJSON): Range {
    return new Range(json.start, json.end);
  }

  /**
   * Smallest range containing every given range.
   */
  static boundingRange(...ranges: Range[]): Range {
    const [first, ...rest] = ranges;
    if (first === undefined) {
      throw new GeometryError('boundingRange of no ranges', {
        operation: 'boundingRange',
      });
    }
    const start = new PointBuilder(first.start);
    const end = new PointBuilder(first.end);
    for (const r of rest) {
      assertSameRank('boundingRange', first.ndim, r.ndim);
      start.minimumInPlace(r.start);
      end.maximumInPlace(r.end);
    }
    return new Range(start.build(), end.build());
  }

  get range(): Range {
    return this;
  }

  get ndim(): number {
    return this.start.ndim;
  }

  get shape(): Point {
    return this.end.sub(this.start);
  }

  get size(): number {
    return this.shape.prod();
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /** Last point inside the range. */
  get inclusiveEnd(): Point {
    if (this.isEmpty()) {
      throw new GeometryError(`empty range ${this} has no inclusive end`, {
        operation: 'inclusiveEnd',
      });
    }
    return this.end.sub(1);
  }

  contains(other: Point | Range): boolean {
    if (other instanceof Range) {
      assertSameRank('contains', this.ndim, other.ndim);
      if (other.isEmpty()) {
        return this.start.le(other.start) && other.start.le(this.end);
      }
      return this.contains(other.start) && this.contains(other.inclusiveEnd);
    }
    assertSameRank('contains', this.ndim, other.ndim);
    return this.start.le(other) && other.lt(this.end);
  }

  /** Overlap of two ranges, or `undefined` when they share no point. */
  intersection(other: Range): Range | undefined {
    assertSameRank('intersection', this.ndim, other.ndim);
    const start = this.start.maximum(other.start);
    const end = this.end.minimum(other.end);
    if (!start.lt(end)) return undefined;
    return new Range(start, end);
  }

  overlaps(other: Range): boolean {
    return this.intersection(other) !== undefined;
  }

  translate(offset: PointLike): Range {
    return new Range(this.start.add(offset), this.end.add(offset));
  }

  /** Same shape, moved to `start`. */
  withStart(start: PointLike): Range {
    return Range.fromStartShape(start, this.shape);
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    return (
      other instanceof Range &&
      this.start.equals(other.start) &&
      this.end.equals(other.end)
    );
  }

  toString(): string {
    const axes = this.start.coords.map((s, i) => `${s}:${this.end.coords[i]}`);
    return `[${axes.join(', ')}]`;
  }

  toJSON(): RangeJSON {
    return { start: this.start.toArray(), end: this.end.toArray() };
  }
}
