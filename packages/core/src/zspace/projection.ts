import { ErrorCode } from '../errors/codes.js';
import { GeometryError } from '../types/errors.js';
import { AffineMap, type AffineMapJSON } from './affine-map.js';
import { Point, type PointLike } from './point.js';
import { Range } from './range.js';

export interface IndexProjectionJSON {
  affineMap: AffineMapJSON;
  shape: number[];
}

/**
 * Index projection function: maps index-space coordinates and ranges to
 * tensor sub-ranges through an affine map and a fixed output shape.
 */
export class IndexProjection {
  readonly affineMap: AffineMap;
  readonly shape: Point;

  constructor(affineMap: AffineMap, shape?: PointLike) {
    const s =
      shape === undefined ? Point.ones(affineMap.outputNDim) : Point.from(shape);
    if (s.ndim !== affineMap.outputNDim) {
      throw new GeometryError(
        `IndexProjection: shape ${s} has ${s.ndim} dims, expected ${affineMap.outputNDim}`,
        { operation: 'IndexProjection' },
        ErrorCode.SHAPE_MISMATCH
      );
    }
    if (!s.ge(0)) {
      throw new GeometryError(`IndexProjection: negative shape ${s}`, {
        operation: 'IndexProjection',
      });
    }
    this.affineMap = affineMap;
    this.shape = s;
  }

  static fromJSON(json: IndexProjectionJSON): IndexProjection {
    return new IndexProjection(AffineMap.fromJSON(json.affineMap), json.shape);
  }

  get inputNDim(): number {
    return this.affineMap.inputNDim;
  }

  get outputNDim(): number {
    return this.affineMap.outputNDim;
  }

  /**
   * Project an index-space point or range.
   *
   * A range projects to the bounding range of the projections of all of
   * its points. Each output axis takes its extreme from the per-column
   * extremes, which is exact for sign-reversing coefficients as well.
   */
  apply(source: Point | Range): Range {
    if (source instanceof Point) {
      return Range.fromStartShape(this.affineMap.apply(source), this.shape);
    }
    if (source.isEmpty()) {
      return Range.fromShape(Point.zeros(this.outputNDim)).translate(
        this.affineMap.apply(source.start)
      );
    }

    const lo = source.start.coords;
    const hi = source.inclusiveEnd.coords;
    const { A, b } = this.affineMap;
    const min: number[] = [];
    const max: number[] = [];
    for (let i = 0; i < A.length; i++) {
      let mn = b.coords[i];
      let mx = b.coords[i];
      A[i].forEach((coef, j) => {
        const x = coef * lo[j];
        const y = coef * hi[j];
        mn += Math.min(x, y);
        mx += Math.max(x, y);
      });
      min.push(mn);
      max.push(mx);
    }
    return new Range(min, new Point(max).add(this.shape));
  }

  translate(offset: PointLike): IndexProjection {
    return new IndexProjection(this.affineMap.translate(offset), this.shape);
  }

  equals(other: unknown): boolean {
    if (this === other) return true;
    return (
      other instanceof IndexProjection &&
      this.affineMap.equals(other.affineMap) &&
      this.shape.equals(other.shape)
    );
  }

  toString(): string {
    return `ipf(${this.affineMap}, shape=${this.shape})`;
  }

  toJSON(): IndexProjectionJSON {
    return { affineMap: this.affineMap.toJSON(), shape: this.shape.toArray() };
  }
}
