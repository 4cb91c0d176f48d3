/**
 * Geometry buffer serialization
 *
 * Two forms:
 * - SerializedGeometry: flat typed arrays, for posting a buffer to the
 *   thread that owns the host renderer (the arrays can be transferred).
 * - GeometryJson: plain JSON, validated with zod when read back.
 *
 * Neither form carries the tracker back-reference.
 */

import { z } from 'zod';
import type { Vec2 } from '../num/vec2.js';
import type { Vec3, Vec4 } from '../num/vec3.js';
import { InvalidArgumentError, InvalidGeometryError } from '../errors.js';
import { type Bounds, createBounds } from './bounds.js';
import { GeometryBuffer } from './GeometryBuffer.js';
import type { IndexFormat } from './types.js';
import { validateGeometry } from './validate.js';

// ============================================================================
// Typed-array form
// ============================================================================

/**
 * Buffer flattened to typed arrays (xyzxyz..., uvuv..., rgbargba...)
 */
export interface SerializedGeometry {
  name: string;
  indexFormat: IndexFormat;
  bounds: Bounds;
  positions?: Float32Array;
  triangles?: Uint32Array;
  normals?: Float32Array;
  uv0?: Float32Array;
  uv1?: Float32Array;
  uv2?: Float32Array;
  colors?: Float32Array;
  tangents?: Float32Array;
}

function flatten(items: readonly (readonly number[])[] | undefined, itemSize: number): Float32Array | undefined {
  if (!items) return undefined;
  const out = new Float32Array(items.length * itemSize);
  for (let i = 0; i < items.length; i++) {
    for (let k = 0; k < itemSize; k++) {
      out[i * itemSize + k] = items[i][k];
    }
  }
  return out;
}

function unflatten2(data: Float32Array | undefined): Vec2[] | undefined {
  if (!data) return undefined;
  const out: Vec2[] = [];
  for (let i = 0; i + 1 < data.length; i += 2) {
    out.push([data[i], data[i + 1]]);
  }
  return out;
}

function unflatten3(data: Float32Array | undefined): Vec3[] | undefined {
  if (!data) return undefined;
  const out: Vec3[] = [];
  for (let i = 0; i + 2 < data.length; i += 3) {
    out.push([data[i], data[i + 1], data[i + 2]]);
  }
  return out;
}

function unflatten4(data: Float32Array | undefined): Vec4[] | undefined {
  if (!data) return undefined;
  const out: Vec4[] = [];
  for (let i = 0; i + 3 < data.length; i += 4) {
    out.push([data[i], data[i + 1], data[i + 2], data[i + 3]]);
  }
  return out;
}

/**
 * Flatten a buffer into typed arrays. Positions and attributes are stored
 * as 32-bit floats.
 */
export function serializeGeometry(buffer: GeometryBuffer): SerializedGeometry {
  return {
    name: buffer.name,
    indexFormat: buffer.indexFormat,
    bounds: createBounds(buffer.bounds.center, buffer.bounds.size),
    positions: flatten(buffer.vertices, 3),
    triangles: buffer.triangles ? Uint32Array.from(buffer.triangles) : undefined,
    normals: flatten(buffer.normals, 3),
    uv0: flatten(buffer.uv0, 2),
    uv1: flatten(buffer.uv1, 2),
    uv2: flatten(buffer.uv2, 2),
    colors: flatten(buffer.colors, 4),
    tangents: flatten(buffer.tangents, 4),
  };
}

/**
 * Rebuild a buffer from its typed-array form
 */
export function deserializeGeometry<THandle = unknown>(data: SerializedGeometry): GeometryBuffer<THandle> {
  return new GeometryBuffer<THandle>({
    name: data.name,
    indexFormat: data.indexFormat,
    bounds: createBounds(data.bounds.center, data.bounds.size),
    vertices: unflatten3(data.positions),
    triangles: data.triangles ? Array.from(data.triangles) : undefined,
    normals: unflatten3(data.normals),
    uv0: unflatten2(data.uv0),
    uv1: unflatten2(data.uv1),
    uv2: unflatten2(data.uv2),
    colors: unflatten4(data.colors),
    tangents: unflatten4(data.tangents),
  });
}

/**
 * Underlying buffers of a serialized geometry, for a postMessage transfer list
 */
export function getTransferables(data: SerializedGeometry): ArrayBufferLike[] {
  const transferables: ArrayBufferLike[] = [];
  for (const array of [
    data.positions,
    data.triangles,
    data.normals,
    data.uv0,
    data.uv1,
    data.uv2,
    data.colors,
    data.tangents,
  ]) {
    if (array) {
      transferables.push(array.buffer);
    }
  }
  return transferables;
}

// ============================================================================
// JSON form
// ============================================================================

const vec2Schema = z.tuple([z.number(), z.number()]);
const vec3Schema = z.tuple([z.number(), z.number(), z.number()]);
const vec4Schema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

export const boundsSchema = z.object({
  center: vec3Schema,
  size: vec3Schema,
});

export const geometryJsonSchema = z.object({
  name: z.string().default(''),
  indexFormat: z.enum(['uint16', 'uint32']).default('uint16'),
  vertices: z.array(vec3Schema).optional(),
  triangles: z.array(z.number().int().nonnegative()).optional(),
  normals: z.array(vec3Schema).optional(),
  uv0: z.array(vec2Schema).optional(),
  uv1: z.array(vec2Schema).optional(),
  uv2: z.array(vec2Schema).optional(),
  colors: z.array(vec4Schema).optional(),
  tangents: z.array(vec4Schema).optional(),
  bounds: boundsSchema.optional(),
});

export type GeometryJson = z.infer<typeof geometryJsonSchema>;

/**
 * Plain-JSON snapshot of a buffer. Every channel is copied.
 */
export function toGeometryJson(buffer: GeometryBuffer): GeometryJson {
  const copy = GeometryBuffer.from(buffer);
  const json: GeometryJson = {
    name: copy.name,
    indexFormat: copy.indexFormat,
    bounds: copy.bounds,
  };
  if (copy.vertices) json.vertices = copy.vertices;
  if (copy.triangles) json.triangles = copy.triangles;
  if (copy.normals) json.normals = copy.normals;
  if (copy.uv0) json.uv0 = copy.uv0;
  if (copy.uv1) json.uv1 = copy.uv1;
  if (copy.uv2) json.uv2 = copy.uv2;
  if (copy.colors) json.colors = copy.colors;
  if (copy.tangents) json.tangents = copy.tangents;
  return json;
}

/**
 * Read a buffer from untrusted JSON.
 *
 * Bounds are recomputed from the vertices when the input has none.
 *
 * @throws InvalidArgumentError if the input does not match the JSON form
 * @throws InvalidGeometryError if the data breaks the buffer invariants
 */
export function parseGeometryJson<THandle = unknown>(input: unknown): GeometryBuffer<THandle> {
  const result = geometryJsonSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError('input', `Invalid geometry JSON: ${details}`);
  }

  const buffer = GeometryBuffer.from<THandle>(result.data);
  if (!result.data.bounds) {
    buffer.recalculateBounds();
  }

  const report = validateGeometry(buffer, { checkDegenerate: false });
  if (!report.isValid) {
    throw new InvalidGeometryError(
      `Invalid geometry "${buffer.name}": ${report.issues[0].message}`,
      report
    );
  }
  return buffer;
}
