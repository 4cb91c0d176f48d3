/**
 * Vertex welding
 */

import type { Vec2 } from '../num/vec2.js';
import type { Vec3, Vec4 } from '../num/vec3.js';
import { CloseVec3Comparer, DEFAULT_HASH_TOLERANCE } from '../num/tolerance.js';
import { CloseVec3Map } from '../num/CloseVec3Map.js';
import { GeometryBuffer } from './GeometryBuffer.js';

function pick<T>(channel: readonly T[] | undefined, keep: readonly number[], copy: (v: T) => T): T[] | undefined {
  return channel ? keep.map((i) => copy(channel[i])) : undefined;
}

/**
 * Merge vertices whose positions compare equal under a {@link CloseVec3Comparer}.
 *
 * The first vertex seen at a position is kept along with its attributes;
 * later ones are redirected to it. Triangles that collapse onto a repeated
 * index are dropped, and bounds are recomputed. Close positions that fall
 * into different hash buckets are not merged.
 *
 * @returns A new buffer; the input is not modified
 */
export function weldVertices<THandle>(
  buffer: GeometryBuffer<THandle>,
  tolerance: number = DEFAULT_HASH_TOLERANCE
): GeometryBuffer<THandle> {
  const vertices = buffer.vertices ?? [];
  const lookup = new CloseVec3Map<number>(new CloseVec3Comparer(tolerance));
  const remap = new Array<number>(vertices.length);
  const keep: number[] = [];

  for (let i = 0; i < vertices.length; i++) {
    const existing = lookup.get(vertices[i]);
    if (existing !== undefined) {
      remap[i] = existing;
    } else {
      remap[i] = keep.length;
      lookup.set(vertices[i], keep.length);
      keep.push(i);
    }
  }

  let triangles: number[] | undefined;
  if (buffer.triangles) {
    triangles = [];
    const src = buffer.triangles;
    for (let t = 0; t + 2 < src.length; t += 3) {
      const a = remap[src[t]];
      const b = remap[src[t + 1]];
      const c = remap[src[t + 2]];
      if (a !== b && b !== c && c !== a) {
        triangles.push(a, b, c);
      }
    }
  }

  const copy2 = (v: Vec2): Vec2 => [v[0], v[1]];
  const copy3 = (v: Vec3): Vec3 => [v[0], v[1], v[2]];
  const copy4 = (v: Vec4): Vec4 => [v[0], v[1], v[2], v[3]];

  const welded = new GeometryBuffer<THandle>({
    indexFormat: buffer.indexFormat,
    vertices: buffer.vertices ? keep.map((i) => copy3(vertices[i])) : undefined,
    triangles,
    normals: pick(buffer.normals, keep, copy3),
    uv0: pick(buffer.uv0, keep, copy2),
    uv1: pick(buffer.uv1, keep, copy2),
    uv2: pick(buffer.uv2, keep, copy2),
    colors: pick(buffer.colors, keep, copy4),
    tangents: pick(buffer.tangents, keep, copy4),
    name: buffer.name,
  });
  welded.recalculateBounds();
  return welded;
}
