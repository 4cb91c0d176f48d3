/**
 * MeshAdapter - Converts between meshkit GeometryBuffers and THREE.BufferGeometry
 *
 * This is the only place a buffer meets a host mesh. A BufferGeometry is
 * owned by the thread that renders it, so every method here must run on
 * that thread. Nothing checks this; it is the caller's obligation. Other
 * threads should build GeometryBuffers and post them over (see
 * `serializeGeometry` in @meshkit/core).
 */

import * as THREE from 'three';
import {
  GeometryBuffer,
  InvalidArgumentError,
  InvalidGeometryError,
  validateGeometry,
  type IndexFormat,
  type Vec2,
  type Vec3,
  type Vec4,
} from '@meshkit/core';

type AnyAttribute = THREE.BufferAttribute | THREE.InterleavedBufferAttribute;

/**
 * Gateway options
 */
export interface GatewayOptions {
  /** Refuse buffers that break their invariants instead of building a broken mesh */
  validate?: boolean;
  /** Compute a bounding sphere on each converted geometry */
  computeBoundingSphere?: boolean;
  /** Log conversions to the console */
  verbose?: boolean;
}

export const DEFAULT_GATEWAY_OPTIONS: Required<GatewayOptions> = {
  validate: true,
  computeBoundingSphere: false,
  verbose: false,
};

/**
 * Attribute names used on the three.js side for each buffer channel
 */
export const THREE_ATTRIBUTE_NAMES = {
  vertices: 'position',
  normals: 'normal',
  uv0: 'uv',
  uv1: 'uv1',
  uv2: 'uv2',
  colors: 'color',
  tangents: 'tangent',
} as const;

function flatten(items: readonly (readonly number[])[], itemSize: number): Float32Array {
  const out = new Float32Array(items.length * itemSize);
  for (let i = 0; i < items.length; i++) {
    for (let k = 0; k < itemSize; k++) {
      out[i * itemSize + k] = items[i][k];
    }
  }
  return out;
}

function readVec2s(attr: AnyAttribute): Vec2[] {
  const out: Vec2[] = [];
  for (let i = 0; i < attr.count; i++) {
    out.push([attr.getX(i), attr.getY(i)]);
  }
  return out;
}

function readVec3s(attr: AnyAttribute): Vec3[] {
  const out: Vec3[] = [];
  for (let i = 0; i < attr.count; i++) {
    out.push([attr.getX(i), attr.getY(i), attr.getZ(i)]);
  }
  return out;
}

/**
 * Read 4-component data; 3-component attributes get w = 1
 */
function readVec4s(attr: AnyAttribute): Vec4[] {
  const out: Vec4[] = [];
  for (let i = 0; i < attr.count; i++) {
    const w = attr.itemSize >= 4 ? attr.getW(i) : 1;
    out.push([attr.getX(i), attr.getY(i), attr.getZ(i), w]);
  }
  return out;
}

function optionalAttribute(geometry: THREE.BufferGeometry, name: string): AnyAttribute | undefined {
  return geometry.hasAttribute(name) ? geometry.getAttribute(name) : undefined;
}

/**
 * Index width of a BufferGeometry's index buffer
 */
export function indexFormatOf(geometry: THREE.BufferGeometry): IndexFormat {
  return geometry.index?.array instanceof Uint32Array ? 'uint32' : 'uint16';
}

/**
 * Capability for creating and reading three.js meshes.
 *
 * Open one on the render thread and keep it there; code that only has
 * GeometryBuffers cannot reach a BufferGeometry without it.
 */
export class MeshGateway {
  readonly options: Readonly<Required<GatewayOptions>>;

  private constructor(options: Required<GatewayOptions>) {
    this.options = options;
  }

  /**
   * Open a gateway. Call on the thread that owns the renderer.
   */
  static open(options: GatewayOptions = {}): MeshGateway {
    return new MeshGateway({
      validate: options.validate ?? DEFAULT_GATEWAY_OPTIONS.validate,
      computeBoundingSphere: options.computeBoundingSphere ?? DEFAULT_GATEWAY_OPTIONS.computeBoundingSphere,
      verbose: options.verbose ?? DEFAULT_GATEWAY_OPTIONS.verbose,
    });
  }

  /**
   * Build a THREE.BufferGeometry from the buffer's current contents.
   *
   * Indices are 32-bit once the buffer has 65535 or more vertices, whatever
   * its index format hint says. Channels the buffer lacks are left unset.
   * If the buffer has a tracker, the result is stored in `tracker.meshRef`.
   *
   * @throws InvalidGeometryError if validation is on and the buffer is invalid
   */
  toBufferGeometry(buffer: GeometryBuffer<THREE.BufferGeometry>): THREE.BufferGeometry {
    if (this.options.validate) {
      const report = validateGeometry(buffer, { checkDegenerate: false });
      if (!report.isValid) {
        throw new InvalidGeometryError(
          `Cannot convert geometry "${buffer.name}": ${report.issues[0].message}`,
          report
        );
      }
    }

    const geometry = new THREE.BufferGeometry();
    const vertexCount = buffer.vertexCount;
    const indexFormat = buffer.effectiveIndexFormat;

    if (this.options.verbose && indexFormat !== buffer.indexFormat) {
      console.debug(`[MeshGateway] "${buffer.name}" has ${vertexCount} vertices, using 32-bit indices`);
    }

    if (buffer.vertices) {
      geometry.setAttribute(THREE_ATTRIBUTE_NAMES.vertices, new THREE.BufferAttribute(flatten(buffer.vertices, 3), 3));
    }

    if (buffer.triangles) {
      const index =
        indexFormat === 'uint32'
          ? new THREE.Uint32BufferAttribute(buffer.triangles, 1)
          : new THREE.Uint16BufferAttribute(buffer.triangles, 1);
      geometry.setIndex(index);
    }

    // Normals are only usable when they line up with the vertices
    if (buffer.normals && buffer.normals.length === vertexCount) {
      geometry.setAttribute(THREE_ATTRIBUTE_NAMES.normals, new THREE.BufferAttribute(flatten(buffer.normals, 3), 3));
    }

    if (buffer.uv0) {
      geometry.setAttribute(THREE_ATTRIBUTE_NAMES.uv0, new THREE.BufferAttribute(flatten(buffer.uv0, 2), 2));
    }
    if (buffer.uv1) {
      geometry.setAttribute(THREE_ATTRIBUTE_NAMES.uv1, new THREE.BufferAttribute(flatten(buffer.uv1, 2), 2));
    }
    if (buffer.uv2) {
      geometry.setAttribute(THREE_ATTRIBUTE_NAMES.uv2, new THREE.BufferAttribute(flatten(buffer.uv2, 2), 2));
    }
    if (buffer.colors) {
      geometry.setAttribute(THREE_ATTRIBUTE_NAMES.colors, new THREE.BufferAttribute(flatten(buffer.colors, 4), 4));
    }
    if (buffer.tangents) {
      geometry.setAttribute(THREE_ATTRIBUTE_NAMES.tangents, new THREE.BufferAttribute(flatten(buffer.tangents, 4), 4));
    }

    const { center, size } = buffer.bounds;
    geometry.boundingBox = new THREE.Box3(
      new THREE.Vector3(center[0] - size[0] * 0.5, center[1] - size[1] * 0.5, center[2] - size[2] * 0.5),
      new THREE.Vector3(center[0] + size[0] * 0.5, center[1] + size[1] * 0.5, center[2] + size[2] * 0.5)
    );

    if (this.options.computeBoundingSphere && buffer.vertices) {
      geometry.computeBoundingSphere();
    }

    geometry.name = buffer.name;

    if (buffer.tracker) {
      buffer.tracker.meshRef = geometry;
    }

    if (this.options.verbose) {
      console.debug(
        `[MeshGateway] built "${buffer.name}": ${vertexCount} vertices, ${buffer.triangleCount} triangles`
      );
    }

    return geometry;
  }

  /**
   * Copy a THREE.BufferGeometry into a new GeometryBuffer.
   *
   * Non-indexed geometry gets one triangle per three consecutive vertices.
   * If the geometry has no bounding box, bounds are computed from the
   * copied vertices; the source geometry is never modified.
   *
   * @throws InvalidArgumentError if no geometry is given
   */
  fromBufferGeometry(geometry: THREE.BufferGeometry | null | undefined): GeometryBuffer<THREE.BufferGeometry> {
    if (geometry == null) {
      throw new InvalidArgumentError('geometry', 'Cannot build a GeometryBuffer without a source geometry');
    }

    const position = optionalAttribute(geometry, THREE_ATTRIBUTE_NAMES.vertices);
    const vertices = position ? readVec3s(position) : undefined;

    let triangles: number[] | undefined;
    const index = geometry.getIndex();
    if (index) {
      triangles = [];
      for (let i = 0; i < index.count; i++) {
        triangles.push(index.getX(i));
      }
    } else if (vertices) {
      triangles = [];
      for (let i = 0; i + 2 < vertices.length; i += 3) {
        triangles.push(i, i + 1, i + 2);
      }
      if (this.options.verbose) {
        console.debug(`[MeshGateway] "${geometry.name}" is not indexed, generated ${triangles.length / 3} triangles`);
      }
    }

    const normal = optionalAttribute(geometry, THREE_ATTRIBUTE_NAMES.normals);
    const uv0 = optionalAttribute(geometry, THREE_ATTRIBUTE_NAMES.uv0);
    const uv1 = optionalAttribute(geometry, THREE_ATTRIBUTE_NAMES.uv1);
    const uv2 = optionalAttribute(geometry, THREE_ATTRIBUTE_NAMES.uv2);
    const color = optionalAttribute(geometry, THREE_ATTRIBUTE_NAMES.colors);
    const tangent = optionalAttribute(geometry, THREE_ATTRIBUTE_NAMES.tangents);

    const box = geometry.boundingBox;
    const buffer = new GeometryBuffer<THREE.BufferGeometry>({
      indexFormat: indexFormatOf(geometry),
      vertices,
      triangles,
      normals: normal ? readVec3s(normal) : undefined,
      uv0: uv0 ? readVec2s(uv0) : undefined,
      uv1: uv1 ? readVec2s(uv1) : undefined,
      uv2: uv2 ? readVec2s(uv2) : undefined,
      colors: color ? readVec4s(color) : undefined,
      tangents: tangent ? readVec4s(tangent) : undefined,
      name: geometry.name,
    });

    if (box) {
      buffer.bounds = {
        center: [(box.min.x + box.max.x) * 0.5, (box.min.y + box.max.y) * 0.5, (box.min.z + box.max.z) * 0.5],
        size: [box.max.x - box.min.x, box.max.y - box.min.y, box.max.z - box.min.z],
      };
    } else {
      buffer.recalculateBounds();
    }

    return buffer;
  }
}
