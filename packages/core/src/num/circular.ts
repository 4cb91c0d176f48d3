/**
 * Circular indexing
 */

import { InvalidArgumentError } from '../errors.js';

/**
 * Wrap `index` into `[0, size)` using floor modulo.
 *
 * Unlike `%`, negative indices wrap to the high end:
 * `circularIndex(-1, 5) === 4`.
 *
 * @throws InvalidArgumentError if size is not a positive integer
 */
export function circularIndex(index: number, size: number): number {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidArgumentError('size', `circularIndex size must be a positive integer, got ${size}`);
  }
  const r = index % size;
  // Math.abs folds -0 into 0
  return r < 0 ? r + size : Math.abs(r);
}
