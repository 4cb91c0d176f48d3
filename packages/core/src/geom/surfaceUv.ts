/**
 * Surface UV mapping
 *
 * Maps 3D points to 2D parameters: spherical directions to cylindrical UVs,
 * and arbitrary points to the local coordinates of a plane.
 */

import type { Vec2 } from "../num/vec2.js";
import type { Vec3 } from "../num/vec3.js";
import { vec2 } from "../num/vec2.js";
import { sub3, dot3, cross3, normalize3, lengthSq3, UP, RIGHT, FORWARD } from "../num/vec3.js";
import { closeEqual3 } from "../num/tolerance.js";
import { InvalidArgumentError } from "../errors.js";

// Radians to full turns
const RAD_TO_TURNS = 1 / (2 * Math.PI);

// Normals shorter than 1e-5 are treated as zero
const ZERO_NORMAL_LENGTH_SQ = 1e-10;

/**
 * Orthonormal in-plane axes of a plane
 */
export interface PlaneBasis {
  xAxis: Vec3;
  yAxis: Vec3;
}

/**
 * Map a direction on the unit sphere to cylindrical UV coordinates.
 *
 * - u: longitude, `atan2(z, x)` in turns shifted by 0.5, so it runs 0..1
 *   around the Y axis with u = 0.5 on +X.
 * - v: latitude, `asin(y)` in half turns shifted by 0.5, so the south pole
 *   is 0 and the north pole is 1. Equal steps in v are equal steps in angle,
 *   not in height.
 *
 * The input is normalized first; a zero vector maps to (0.5, 0.5).
 */
export function cylindricalUV(vertex: Vec3): Vec2 {
  const dir = normalize3(vertex);

  const u = Math.atan2(dir[2], dir[0]) * RAD_TO_TURNS + 0.5;

  const y = Math.min(1, Math.max(-1, dir[1]));
  const v = Math.asin(y) * RAD_TO_TURNS * 2 + 0.5;

  return vec2(u, v);
}

function fixedBasis(): PlaneBasis {
  return { xAxis: [...RIGHT], yAxis: [...FORWARD] };
}

/**
 * Compute the in-plane basis for a plane normal.
 *
 * A normal close to world up uses the fixed RIGHT/FORWARD axes. So does any
 * other normal parallel to up, such as (0, -1, 0) or (0, 5, 0), whose cross
 * product with up would be zero. Otherwise x = normalize(UP × n) and
 * y = n × x. y is not renormalized: for a unit normal it is already unit
 * length.
 *
 * The returned axes are new arrays and may be modified by the caller.
 *
 * @throws InvalidArgumentError if the normal is zero
 */
export function planeBasis(planeNormal: Vec3): PlaneBasis {
  if (lengthSq3(planeNormal) < ZERO_NORMAL_LENGTH_SQ) {
    throw new InvalidArgumentError('planeNormal', 'Plane normal cannot be zero');
  }

  if (closeEqual3(planeNormal, UP)) {
    return fixedBasis();
  }

  const xAxis = normalize3(cross3(UP, planeNormal));
  if (lengthSq3(xAxis) === 0) {
    // Parallel to UP without being close to it (pointing down, or scaled)
    return fixedBasis();
  }
  const yAxis = cross3(planeNormal, xAxis);
  return { xAxis, yAxis };
}

/**
 * Project a 3D point into the 2D coordinate system of a plane.
 *
 * @param point The point to project
 * @param planeNormal Plane normal (need not be exactly unit length)
 * @param planeOrigin Point on the plane that maps to (0, 0)
 * @throws InvalidArgumentError if the normal is zero
 */
export function projectPointOntoPlane(point: Vec3, planeNormal: Vec3, planeOrigin: Vec3): Vec2 {
  const { xAxis, yAxis } = planeBasis(planeNormal);
  const offset = sub3(point, planeOrigin);
  return vec2(dot3(offset, xAxis), dot3(offset, yAxis));
}
