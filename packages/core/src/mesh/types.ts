/**
 * Geometry buffer types
 *
 * Plain data shapes shared by the buffer, its validators and serializers,
 * and the host gateways.
 */

import type { Vec2 } from '../num/vec2.js';
import type { Vec3, Vec4 } from '../num/vec3.js';
import type { Bounds } from './bounds.js';

/**
 * Width of triangle indices when handed to a host
 */
export type IndexFormat = 'uint16' | 'uint32';

/**
 * Vertex count at which 16-bit indices stop being usable
 */
export const WIDE_INDEX_THRESHOLD = 0xffff;

/**
 * Back-reference to whatever tracks the host mesh built from a buffer.
 * The gateway stores its result in `meshRef`.
 */
export interface MeshTracker<THandle> {
  meshRef?: THandle;
}

/**
 * Anything mesh-shaped a buffer can be copied from
 */
export interface GeometrySource {
  readonly indexFormat?: IndexFormat;
  readonly vertices?: readonly Vec3[];
  readonly triangles?: readonly number[];
  readonly normals?: readonly Vec3[];
  readonly uv0?: readonly Vec2[];
  readonly uv1?: readonly Vec2[];
  readonly uv2?: readonly Vec2[];
  readonly colors?: readonly Vec4[];
  readonly tangents?: readonly Vec4[];
  readonly bounds?: Bounds;
  readonly name?: string;
}

/**
 * Fields accepted by the buffer constructor; arrays are adopted, not copied
 */
export interface GeometryBufferInit<THandle = unknown> {
  indexFormat?: IndexFormat;
  vertices?: Vec3[];
  triangles?: number[];
  normals?: Vec3[];
  uv0?: Vec2[];
  uv1?: Vec2[];
  uv2?: Vec2[];
  colors?: Vec4[];
  tangents?: Vec4[];
  bounds?: Bounds;
  tracker?: MeshTracker<THandle>;
  name?: string;
}

/**
 * Names of the optional per-vertex channels
 */
export const VERTEX_ATTRIBUTES = ['normals', 'uv0', 'uv1', 'uv2', 'colors', 'tangents'] as const;

export type VertexAttributeName = (typeof VERTEX_ATTRIBUTES)[number];
