/**
 * Integer indexing helpers shared by the vector space types.
 *
 * Every function here works on plain safe integers and throws a
 * GeometryError on a violated precondition.
 */

import { ErrorCode } from '../errors/codes.js';
import { GeometryError } from '../types/errors.js';

export function assertInteger(value: number, label = 'value'): number {
  if (!Number.isSafeInteger(value)) {
    throw new GeometryError(`${label} must be a safe integer, got ${value}`, {
      operation: 'assertInteger',
      value,
    });
  }
  return value;
}

/**
 * `base ** exp` by squaring, or `undefined` once the magnitude passes
 * `limit`. A squared base that is still needed always reaches the
 * result, so it is checked too.
 */
function boundedPow(base: number, exp: number, limit: number): number | undefined {
  let result = 1;
  let b = base;
  let e = exp;
  while (e > 0) {
    if (e % 2 === 1) {
      result *= b;
      if (Math.abs(result) > limit) return undefined;
    }
    e = Math.floor(e / 2);
    if (e > 0) {
      b *= b;
      if (b > limit) return undefined;
    }
  }
  return result;
}

/**
 * Integer exponentiation by squaring. Throws when the exact result is
 * not a safe integer.
 */
export function intPow(base: number, exp: number): number {
  assertInteger(base, 'base');
  assertInteger(exp, 'exponent');
  if (exp < 0) {
    throw new GeometryError('exponent must be non-negative', {
      operation: 'intPow',
      value: exp,
    });
  }
  const result = boundedPow(base, exp, Number.MAX_SAFE_INTEGER);
  if (result === undefined) {
    throw new GeometryError(
      `${base} ** ${exp} exceeds the safe integer range`,
      { operation: 'intPow', value: [base, exp] }
    );
  }
  return result;
}

/**
 * Floor of the logarithm of `value` in `base`: the largest `k`
 * with `base ** k <= value`.
 */
export function intLog(value: number, base: number): number {
  assertInteger(value, 'value');
  assertInteger(base, 'base');
  if (base <= 1) {
    throw new GeometryError('base must be greater than 1', {
      operation: 'intLog',
      value: base,
    });
  }
  if (value <= 0) {
    throw new GeometryError('value must be positive', {
      operation: 'intLog',
      value,
    });
  }

  // base >= 2, so the answer never exceeds the bit length of value
  let low = 0;
  let high = Math.floor(Math.log2(value)) + 2;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    // past `value` counts as too large
    const pow = boundedPow(base, mid, value);
    if (pow === undefined) {
      high = mid;
    } else if (pow === value) {
      return mid;
    } else if (pow < value) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low - 1;
}

/** `[0, 1, ..., n - 1]` */
export function iota(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/**
 * Resolve a possibly negative index against `size`.
 */
export function resolveIndex(label: string, idx: number, size: number): number {
  const resolved = idx < 0 ? idx + size : idx;
  if (!Number.isInteger(idx) || resolved < 0 || resolved >= size) {
    throw new GeometryError(
      `${label}: index ${idx} out of range [${-size}, ${size})`,
      { operation: 'resolveIndex', value: idx }
    );
  }
  return resolved;
}

export function resolveDim(dim: number, ndim: number): number {
  return resolveIndex('invalid dimension', dim, ndim);
}

/**
 * Resolve a permutation of `0..ndim` with negative entries allowed.
 * A valid permutation has no duplicate and sums to `ndim * (ndim - 1) / 2`.
 */
export function resolvePermutation(
  permutation: readonly number[],
  ndim: number
): number[] {
  if (permutation.length !== ndim) {
    throw new GeometryError(
      `invalid permutation [${permutation.join(', ')}] for ndim ${ndim}`,
      { operation: 'resolvePermutation', value: [...permutation] }
    );
  }
  const resolved = permutation.map((d) => resolveDim(d, ndim));
  const sum = resolved.reduce((acc, d) => acc + d, 0);
  if (
    sum !== (ndim * (ndim - 1)) / 2 ||
    new Set(resolved).size !== resolved.length
  ) {
    throw new GeometryError(
      `invalid permutation [${permutation.join(', ')}] for ndim ${ndim}`,
      { operation: 'resolvePermutation', value: [...permutation] }
    );
  }
  return resolved;
}

/**
 * Reorder `arr` so that `out[i] = arr[permutation[i]]`.
 */
export function applyPermutation<T>(
  arr: readonly T[],
  permutation: readonly number[]
): T[] {
  const perm = resolvePermutation(permutation, arr.length);
  return perm.map((src) => arr[src]);
}

export function shapeToSize(shape: readonly number[]): number {
  let size = 1;
  for (const dim of shape) {
    size *= dim;
  }
  return size;
}

/**
 * Right-aligned broadcast of the given shapes.
 *
 * Each axis is either unset (the shape is shorter), 1, or a size shared
 * by every operand that sets it to something other than 1.
 */
export function commonBroadcastShape(
  ...shapes: ReadonlyArray<readonly number[]>
): number[] {
  const ndim = Math.max(0, ...shapes.map((s) => s.length));
  const result: number[] = new Array<number>(ndim).fill(-1);

  for (const shape of shapes) {
    const offset = ndim - shape.length;
    for (let i = 0; i < shape.length; i++) {
      const dim = shape[i];
      const current = result[offset + i];
      if (current === -1 || current === 1) {
        result[offset + i] = dim;
      } else if (dim !== 1 && dim !== current) {
        throw new GeometryError(
          `cannot broadcast shapes: ${shapes
            .map((s) => `[${s.join(', ')}]`)
            .join(', ')}`,
          { operation: 'commonBroadcastShape' },
          ErrorCode.SHAPE_MISMATCH
        );
      }
    }
  }

  return result.map((d) => (d === -1 ? 1 : d));
}
