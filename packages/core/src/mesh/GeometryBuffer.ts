/**
 * GeometryBuffer - engine-independent triangle mesh data
 *
 * A plain value: it holds no host resources, so it can be built, edited,
 * copied and thrown away on any thread. Only turning it into a host mesh
 * (see the `@meshkit/three` gateway) is tied to the host's render thread.
 *
 * Concurrent reads of an unmutated buffer are safe. Mutation is not
 * synchronized; callers that share a buffer must serialize writes.
 */

import type { Vec2 } from '../num/vec2.js';
import type { Vec3, Vec4 } from '../num/vec3.js';
import { cross3, sub3, normalize3 } from '../num/vec3.js';
import { InvalidArgumentError } from '../errors.js';
import { type Bounds, EMPTY_BOUNDS, createBounds, computeBounds } from './bounds.js';
import {
  type IndexFormat,
  type MeshTracker,
  type GeometrySource,
  type GeometryBufferInit,
  WIDE_INDEX_THRESHOLD,
} from './types.js';

const copy2 = (v: Vec2): Vec2 => [v[0], v[1]];
const copy3 = (v: Vec3): Vec3 => [v[0], v[1], v[2]];
const copy4 = (v: Vec4): Vec4 => [v[0], v[1], v[2], v[3]];

export class GeometryBuffer<THandle = unknown> {
  /** Requested index width; forced to 'uint32' for large meshes on conversion */
  indexFormat: IndexFormat;
  /** Vertex positions; their count is the buffer's vertex count */
  vertices?: Vec3[];
  /** Triangle indices, three per triangle, each in [0, vertexCount) */
  triangles?: number[];
  normals?: Vec3[];
  uv0?: Vec2[];
  uv1?: Vec2[];
  uv2?: Vec2[];
  /** RGBA vertex colors */
  colors?: Vec4[];
  tangents?: Vec4[];
  /**
   * Cached bounds. Only as fresh as the last call to
   * {@link recalculateBounds} or the last explicit assignment.
   */
  bounds: Bounds;
  /** Receives the host mesh when the buffer is converted */
  tracker?: MeshTracker<THandle>;
  name: string;

  constructor(init: GeometryBufferInit<THandle> = {}) {
    this.indexFormat = init.indexFormat ?? 'uint16';
    this.vertices = init.vertices;
    this.triangles = init.triangles;
    this.normals = init.normals;
    this.uv0 = init.uv0;
    this.uv1 = init.uv1;
    this.uv2 = init.uv2;
    this.colors = init.colors;
    this.tangents = init.tangents;
    this.bounds = init.bounds ?? createBounds(EMPTY_BOUNDS.center, EMPTY_BOUNDS.size);
    this.tracker = init.tracker;
    this.name = init.name ?? '';
  }

  /**
   * Build a buffer by copying every array of a mesh-like source.
   *
   * @throws InvalidArgumentError if no source is given
   */
  static from<THandle = unknown>(source: GeometrySource | null | undefined): GeometryBuffer<THandle> {
    if (source == null) {
      throw new InvalidArgumentError('source', 'Cannot build a GeometryBuffer without a source mesh');
    }
    return new GeometryBuffer<THandle>({
      indexFormat: source.indexFormat,
      vertices: source.vertices?.map(copy3),
      triangles: source.triangles?.slice(),
      normals: source.normals?.map(copy3),
      uv0: source.uv0?.map(copy2),
      uv1: source.uv1?.map(copy2),
      uv2: source.uv2?.map(copy2),
      colors: source.colors?.map(copy4),
      tangents: source.tangents?.map(copy4),
      bounds: source.bounds ? createBounds(source.bounds.center, source.bounds.size) : undefined,
      name: source.name,
    });
  }

  /**
   * Deep copy. The tracker is shared, not copied.
   */
  clone(): GeometryBuffer<THandle> {
    const copy = GeometryBuffer.from<THandle>(this);
    copy.tracker = this.tracker;
    return copy;
  }

  get vertexCount(): number {
    return this.vertices ? this.vertices.length : 0;
  }

  get triangleCount(): number {
    return this.triangles ? Math.floor(this.triangles.length / 3) : 0;
  }

  /**
   * Index width a host should use: 32-bit once the vertex count reaches
   * 65535, whatever {@link indexFormat} asks for.
   */
  get effectiveIndexFormat(): IndexFormat {
    return this.vertexCount >= WIDE_INDEX_THRESHOLD ? 'uint32' : this.indexFormat;
  }

  /**
   * Recompute {@link bounds} from the vertex positions.
   * Does nothing when there are no vertices.
   */
  recalculateBounds(): void {
    if (!this.vertices) return;
    const bounds = computeBounds(this.vertices);
    if (bounds) {
      this.bounds = bounds;
    }
  }

  /**
   * Recompute per-vertex normals from the triangles.
   *
   * Each triangle adds its unnormalized face normal (v1 - v0) × (v2 - v0) to
   * its three corners, so larger triangles weigh more. A vertex that only
   * touches zero-area triangles, or none, ends up with a zero normal.
   * Does nothing unless both vertices and triangles are present.
   */
  recalculateNormals(): void {
    const { vertices, triangles } = this;
    if (!vertices || !triangles) return;

    let normals = this.normals;
    if (!normals || normals.length !== vertices.length) {
      normals = new Array<Vec3>(vertices.length);
    }
    for (let i = 0; i < normals.length; i++) {
      normals[i] = [0, 0, 0];
    }

    for (let t = 0; t + 2 < triangles.length; t += 3) {
      const i0 = triangles[t];
      const i1 = triangles[t + 1];
      const i2 = triangles[t + 2];

      const v0 = vertices[i0];
      const face = cross3(sub3(vertices[i1], v0), sub3(vertices[i2], v0));

      for (const i of [i0, i1, i2]) {
        const n = normals[i];
        n[0] += face[0];
        n[1] += face[1];
        n[2] += face[2];
      }
    }

    for (let i = 0; i < normals.length; i++) {
      normals[i] = normalize3(normals[i]);
    }

    this.normals = normals;
  }
}
