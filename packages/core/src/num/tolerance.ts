/**
 * Approximate equality and tolerance-consistent hashing
 *
 * Equality here is relative: two values are "close" when their difference is
 * small compared to the larger of their magnitudes. Hashing is absolute: each
 * axis is quantized into buckets of width `tolerance`. The two only agree
 * inside a bucket, see {@link hashVec3}.
 */

import type { Vec3 } from './vec3.js';

/**
 * Default fractional difference for {@link closeEqual} and {@link closeEqual3}
 */
export const DEFAULT_CLOSE_TOLERANCE = 0.001;

/**
 * Default bucket width for {@link hashVec3} and {@link CloseVec3Comparer}
 */
export const DEFAULT_HASH_TOLERANCE = 0.0001;

// Multiplier used to mix bucket indices
const HASH_MIX = 397;

/**
 * Check whether two numbers are equal within a fractional difference.
 *
 * The allowed difference is `tolerance * max(|a|, |b|)`, so the test is
 * scale-invariant. Near zero it becomes very strict: two values that should
 * both be zero but carry rounding noise of opposite sign will not compare
 * equal. Compare against an absolute threshold in that case.
 */
export function closeEqual(a: number, b: number, tolerance: number = DEFAULT_CLOSE_TOLERANCE): boolean {
  if (a === b) return true;
  const diff = Math.abs(a - b);
  const larger = Math.max(Math.abs(a), Math.abs(b));
  return diff <= tolerance * larger;
}

/**
 * Check whether every component of two vectors passes {@link closeEqual}.
 *
 * Each axis is tested on its own scale, so this is not a distance threshold:
 * a vector with one large and one tiny component is compared loosely on the
 * first axis and strictly on the second.
 */
export function closeEqual3(a: Vec3, b: Vec3, tolerance: number = DEFAULT_CLOSE_TOLERANCE): boolean {
  return (
    closeEqual(a[0], b[0], tolerance) &&
    closeEqual(a[1], b[1], tolerance) &&
    closeEqual(a[2], b[2], tolerance)
  );
}

/**
 * Integer bucket of a scalar at the given bucket width
 */
export function bucketIndex(value: number, tolerance: number = DEFAULT_HASH_TOLERANCE): number {
  return Math.round(value / tolerance) | 0;
}

/**
 * 32-bit hash of a vector, quantized to buckets of width `tolerance`.
 *
 * Vectors that round into the same bucket on every axis hash identically.
 * Closeness is not transitive, so two close vectors on either side of a
 * bucket boundary can still hash differently; containers keyed by this hash
 * only find matches within the key's own bucket.
 */
export function hashVec3(v: Vec3, tolerance: number = DEFAULT_HASH_TOLERANCE): number {
  let hash = bucketIndex(v[0], tolerance);
  hash = Math.imul(hash, HASH_MIX) ^ bucketIndex(v[1], tolerance);
  hash = Math.imul(hash, HASH_MIX) ^ bucketIndex(v[2], tolerance);
  return hash;
}

/**
 * Equality/hash pair for keying containers by approximate position
 */
export class CloseVec3Comparer {
  readonly tolerance: number;

  constructor(tolerance: number = DEFAULT_HASH_TOLERANCE) {
    this.tolerance = tolerance;
  }

  equals(a: Vec3, b: Vec3): boolean {
    return closeEqual3(a, b, this.tolerance);
  }

  hash(v: Vec3): number {
    return hashVec3(v, this.tolerance);
  }
}
