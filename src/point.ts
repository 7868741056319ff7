import { dimensionMismatchError } from './errors.js';

/**
 * Affine combination `base + factor * (other - base)`, element-wise.
 *
 * Every simplex move is one of these:
 * - reflection:  makePoint(-alpha, centroid, worst)
 * - expansion:   makePoint(gamma, centroid, reflected)
 * - contraction: makePoint(rho, centroid, worst)
 * - shrink:      makePoint(sigma, best, vertex)
 */
export function makePoint(
  factor: number,
  base: readonly number[],
  other: readonly number[]
): number[] {
  if (base.length !== other.length) {
    throw dimensionMismatchError(base.length, other.length);
  }

  const point = new Array<number>(base.length);
  for (let i = 0; i < base.length; i++) {
    point[i] = base[i] + factor * (other[i] - base[i]);
  }
  return point;
}
