import { ErrorCode } from '../errors/codes.js';
import { GeometryError } from '../types/errors.js';
import { dot } from './cellwise.js';
import { applyPermutation, assertInteger } from './indexing.js';
import { Point, type PointLike } from './point.js';

export interface AffineMapJSON {
  A: number[][];
  b: number[];
}

/**
 * Integer affine transform `x -> A·x + b`.
 *
 * `A` is stored row-major with `outputNDim` rows of `inputNDim` columns.
 */
export class AffineMap {
  readonly A: ReadonlyArray<readonly number[]>;
  readonly b: Point;
  readonly inputNDim: number;

  /**
   * @param inputNDim - only needed when `A` has no rows
   */
  constructor(
    A: ReadonlyArray<readonly number[]>,
    b?: PointLike,
    inputNDim?: number
  ) {
    const cols = inputNDim ?? (A.length > 0 ? A[0].length : 0);
    A.forEach((row, i) => {
      if (row.length !== cols) {
        throw new GeometryError(
          `AffineMap: row ${i} has ${row.length} columns, expected ${cols}`,
          { operation: 'AffineMap' },
          ErrorCode.SHAPE_MISMATCH
        );
      }
      row.forEach((v, j) => assertInteger(v, `A[${i}][${j}]`));
    });
    const offset = b === undefined ? Point.zeros(A.length) : Point.from(b);
    if (offset.ndim !== A.length) {
      throw new GeometryError(
        `AffineMap: offset length ${offset.ndim} != output dims ${A.length}`,
        { operation: 'AffineMap' },
        ErrorCode.SHAPE_MISMATCH
      );
    }
    this.A = Object.freeze(A.map((row) => Object.freeze([...row])));
    this.b = offset;
    this.inputNDim = cols;
  }

  static fromMatrix(...rows: number[][]): AffineMap {
    return new AffineMap(rows);
  }

  static identity(ndim: number): AffineMap {
    const rows = Array.from({ length: ndim }, (_, i) =>
      Array.from({ length: ndim }, (_, j) => (i === j ? 1 : 0))
    );
    return new AffineMap(rows, undefined, ndim);
  }

  static fromJSON(json: AffineMapJSON): AffineMap {
    return new AffineMap(json.A, json.b);
  }

  get outputNDim(): number {
    return this.A.length;
  }

  apply(x: PointLike): Point {
    const p = Point.from(x);
    if (p.ndim !== this.inputNDim) {
      throw new GeometryError(
        `AffineMap.apply: point ${p} has ${p.ndim} dims, expected ${this.inputNDim}`,
        { operation: 'apply' },
        ErrorCode.SHAPE_MISMATCH
      );
    }
    return new Point(this.A.map((row, i) => dot(row, p.coords) + this.b.coords[i]));
  }

  translate(offset: PointLike): AffineMap {
    return new AffineMap(this.A, this.b.add(offset), this.inputNDim);
  }

  /** Reorder columns: `A'[i][j] = A[i][permutation[j]]`. */
  permuteInput(permutation: readonly number[]): AffineMap {
    return new AffineMap(
      this.A.map((row) => applyPermutation(row, permutation)),
      this.b,
      this.inputNDim
    );
  }

  /** Reorder rows and offset: `A'[i] = A[permutation[i]]`. */
  permuteOutput(permutation: readonly number[]): AffineMap {
    return new AffineMap(
      applyPermutation(this.A, permutation),
      this.b.permute(permutation),
      this.inputNDim
    );
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    return (
      other instanceof AffineMap &&
      other.inputNDim === this.inputNDim &&
      other.b.equals(this.b) &&
      other.A.every((row, i) => row.every((v, j) => v === this.A[i][j]))
    );
  }

  toString(): string {
    const matrix = this.A.map((row) => `[${row.join(', ')}]`).join(', ');
    return `λx.[${matrix}]⋅x + ${this.b}`;
  }

  toJSON(): AffineMapJSON {
    return { A: this.A.map((row) => [...row]), b: this.b.toArray() };
  }
}
