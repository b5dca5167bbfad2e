import { describe, it, expect } from 'vitest';

import * as cellwise from '../cellwise.js';
import { Point, PointBuilder } from '../point.js';
import { GeometryError } from '../../types/errors.js';

describe('cellwise', () => {
  it('broadcasts scalars and unit vectors', () => {
    expect(cellwise.add([1, 2, 3], 10)).toEqual([11, 12, 13]);
    expect(cellwise.mul([2], [1, 2, 3])).toEqual([2, 4, 6]);
    expect(cellwise.sub(5, [1, 2])).toEqual([4, 3]);
  });

  it('truncates division and remainder toward zero', () => {
    expect(cellwise.div([7, -7, 7, -7], [2, 2, -2, -2])).toEqual([
      3, -3, -3, 3,
    ]);
    expect(cellwise.mod([7, -7, 7, -7], [2, 2, -2, -2])).toEqual([
      1, -1, 1, -1,
    ]);
    expect(cellwise.div([-1], [3])).toEqual([0]);
  });

  it('rejects division by zero', () => {
    expect(() => cellwise.div([1, 2], [1, 0])).toThrow('division by zero');
    expect(() => cellwise.mod([1], 0)).toThrow(GeometryError);
  });

  it('computes integer pow and log elementwise', () => {
    expect(cellwise.pow([2, 3, 4], 2)).toEqual([4, 9, 16]);
    expect(cellwise.log([8, 9, 1], 2)).toEqual([3, 3, 0]);
    expect(() => cellwise.pow([2], -1)).toThrow(GeometryError);
    expect(() => cellwise.pow([2, 3], [10, 34])).toThrow(
      '3 ** 34 exceeds the safe integer range'
    );
  });

  it('computes unary ops, min and max', () => {
    expect(cellwise.neg([1, -2, 0])).toEqual([-1, 2, 0]);
    expect(cellwise.abs([-3, 4])).toEqual([3, 4]);
    expect(cellwise.minimum([1, 5], [3, 2])).toEqual([1, 2]);
    expect(cellwise.maximum([1, 5], 3)).toEqual([3, 5]);
  });

  it('folds negative zero but keeps NaN', () => {
    expect(Object.is(cellwise.neg(0)[0], 0)).toBe(true);
    expect(Object.is(cellwise.mul([-1], [0])[0], 0)).toBe(true);
    expect(cellwise.add([Number.NaN], 1)).toEqual([Number.NaN]);
    expect(() => new Point(cellwise.sub([Number.NaN, 1], 1))).toThrow(
      'coordinate 0 must be a safe integer, got NaN'
    );
  });

  it('fails on incompatible lengths', () => {
    expect(() => cellwise.add([1, 2], [1, 2, 3])).toThrow(
      'cannot broadcast shapes: [2], [3]'
    );
  });

  it('folds across operands and computes dot products', () => {
    expect(
      cellwise.reduceCellwise(cellwise.maximum, [1, 9], [4, 2], [3, 3])
    ).toEqual([4, 9]);
    expect(cellwise.dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(() => cellwise.dot([1], [1, 2])).toThrow(GeometryError);
  });
});

describe('Point', () => {
  it('is immutable', () => {
    const p = Point.of(1, 2);
    expect(Object.isFrozen(p.coords)).toBe(true);
    expect(p.add(1).toArray()).toEqual([2, 3]);
    expect(p.toArray()).toEqual([1, 2]);
  });

  it('rejects non-integer coordinates', () => {
    expect(() => Point.of(1.5)).toThrow('coordinate 0 must be a safe integer');
  });

  it('indexes from either end', () => {
    const p = Point.of(4, 5, 6);
    expect(p.get(0)).toBe(4);
    expect(p.get(-1)).toBe(6);
    expect(p.ndim).toBe(3);
  });

  it('compares componentwise', () => {
    const a = Point.of(0, 0);
    const b = Point.of(1, 2);
    const c = Point.of(1, 0);

    expect(a.lt(b)).toBe(true);
    expect(a.le(c)).toBe(true);
    expect(a.lt(c)).toBe(false);
    expect(c.ge(a)).toBe(true);
    expect(c.gt(a)).toBe(false);
    // neither ordering holds for incomparable points
    expect(c.le(Point.of(0, 1))).toBe(false);
    expect(c.ge(Point.of(0, 1))).toBe(false);
  });

  it('treats ne as "every coordinate differs"', () => {
    expect(Point.of(1, 2).ne(Point.of(3, 4))).toBe(true);
    expect(Point.of(1, 2).ne(Point.of(1, 4))).toBe(false);
    expect(Point.of(1, 2).eq(Point.of(1, 2))).toBe(true);
  });

  it('broadcasts comparisons against scalars', () => {
    expect(Point.of(0, 3).ge(0)).toBe(true);
    expect(Point.of(-1, 3).ge(0)).toBe(false);
  });

  it('permutes coordinates', () => {
    expect(Point.of(1, 2, 3).permute([2, 0, 1]).toArray()).toEqual([3, 1, 2]);
  });

  it('formats and serializes', () => {
    const p = Point.of(0, 1);
    expect(p.toString()).toBe('[0, 1]');
    expect(JSON.stringify({ p })).toBe('{"p":[0,1]}');
    expect(p.equals(Point.of(0, 1))).toBe(true);
    expect(p.equals(Point.of(0, 1, 0))).toBe(false);
    expect(p.equals([0, 1])).toBe(false);
  });

  it('reduces', () => {
    expect(Point.of(2, 3, 4).prod()).toBe(24);
    expect(Point.of(2, 3, 4).sum()).toBe(9);
    expect(Point.of().prod()).toBe(1);
  });
});

describe('PointBuilder', () => {
  it('mutates its own buffer and freezes on build', () => {
    const source = Point.of(5, 1);
    const builder = new PointBuilder(source);
    builder.minimumInPlace(Point.of(2, 4)).addInPlace(1);
    builder.set(-1, 9);
    const built = builder.build();

    expect(built.toArray()).toEqual([3, 9]);
    expect(source.toArray()).toEqual([5, 1]);
  });

  it('refuses mutation after build', () => {
    const builder = new PointBuilder([1, 2]);
    builder.build();
    expect(() => builder.addInPlace(1)).toThrow(
      'PointBuilder was already built'
    );
    expect(() => builder.build()).toThrow(GeometryError);
  });

  it('refuses results that change the rank', () => {
    const builder = new PointBuilder([1]);
    expect(() => builder.maximumInPlace([1, 2, 3])).toThrow(
      'maximumInPlace: result rank 3 != buffer rank 1'
    );
  });
});
