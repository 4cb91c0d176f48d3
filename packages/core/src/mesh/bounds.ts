/**
 * Axis-aligned bounding boxes in center/size form
 */

import type { Vec3 } from '../num/vec3.js';

/**
 * Axis-aligned bounds
 *
 * `size` is the full extent on each axis (max - min), not the half extent.
 */
export interface Bounds {
  center: Vec3;
  size: Vec3;
}

/**
 * Zero-sized bounds at the origin
 */
export const EMPTY_BOUNDS: Readonly<Bounds> = {
  center: [0, 0, 0],
  size: [0, 0, 0],
};

export function createBounds(center: Vec3, size: Vec3): Bounds {
  return { center: [center[0], center[1], center[2]], size: [size[0], size[1], size[2]] };
}

/**
 * Build bounds from per-axis minimum and maximum corners
 */
export function boundsFromMinMax(min: Vec3, max: Vec3): Bounds {
  return {
    center: [(min[0] + max[0]) * 0.5, (min[1] + max[1]) * 0.5, (min[2] + max[2]) * 0.5],
    size: [max[0] - min[0], max[1] - min[1], max[2] - min[2]],
  };
}

export function boundsMin(b: Bounds): Vec3 {
  return [
    b.center[0] - b.size[0] * 0.5,
    b.center[1] - b.size[1] * 0.5,
    b.center[2] - b.size[2] * 0.5,
  ];
}

export function boundsMax(b: Bounds): Vec3 {
  return [
    b.center[0] + b.size[0] * 0.5,
    b.center[1] + b.size[1] * 0.5,
    b.center[2] + b.size[2] * 0.5,
  ];
}

/**
 * Check whether a point lies inside or on the boundary of the box
 */
export function boundsContains(b: Bounds, p: Vec3): boolean {
  const min = boundsMin(b);
  const max = boundsMax(b);
  return (
    p[0] >= min[0] && p[0] <= max[0] &&
    p[1] >= min[1] && p[1] <= max[1] &&
    p[2] >= min[2] && p[2] <= max[2]
  );
}

/**
 * Tight bounds of a point set, or undefined when it is empty
 */
export function computeBounds(points: readonly Vec3[]): Bounds | undefined {
  if (points.length === 0) {
    return undefined;
  }

  const first = points[0];
  const min: Vec3 = [first[0], first[1], first[2]];
  const max: Vec3 = [first[0], first[1], first[2]];

  for (let i = 1; i < points.length; i++) {
    const p = points[i];
    if (p[0] < min[0]) min[0] = p[0];
    if (p[1] < min[1]) min[1] = p[1];
    if (p[2] < min[2]) min[2] = p[2];
    if (p[0] > max[0]) max[0] = p[0];
    if (p[1] > max[1]) max[1] = p[1];
    if (p[2] > max[2]) max[2] = p[2];
  }

  return boundsFromMinMax(min, max);
}
