/**
 * GeometryBuffer tests
 */

import { describe, it, expect } from 'vitest';
import { GeometryBuffer } from './GeometryBuffer.js';
import { boundsContains, boundsMin, boundsMax } from './bounds.js';
import type { MeshTracker } from './types.js';
import { vec3, type Vec3 } from '../num/vec3.js';
import { InvalidArgumentError } from '../errors.js';

function triangleBuffer(): GeometryBuffer {
  return new GeometryBuffer({
    vertices: [vec3(0, 0, 0), vec3(1, 0, 0), vec3(0, 1, 0)],
    triangles: [0, 1, 2],
    name: 'tri',
  });
}

describe('GeometryBuffer', () => {
  describe('construction', () => {
    it('should start empty', () => {
      const buffer = new GeometryBuffer();
      expect(buffer.vertexCount).toBe(0);
      expect(buffer.triangleCount).toBe(0);
      expect(buffer.indexFormat).toBe('uint16');
      expect(buffer.name).toBe('');
      expect(buffer.bounds).toEqual({ center: [0, 0, 0], size: [0, 0, 0] });
      expect(buffer.normals).toBeUndefined();
      expect(buffer.uv0).toBeUndefined();
      expect(buffer.colors).toBeUndefined();
      expect(buffer.tangents).toBeUndefined();
    });

    it('should not share default bounds between buffers', () => {
      const a = new GeometryBuffer();
      const b = new GeometryBuffer();
      a.bounds.center[0] = 5;
      expect(b.bounds.center[0]).toBe(0);
    });

    it('should count vertices and triangles', () => {
      const buffer = triangleBuffer();
      expect(buffer.vertexCount).toBe(3);
      expect(buffer.triangleCount).toBe(1);
    });
  });

  describe('from', () => {
    it('should copy every array by value', () => {
      const source = {
        indexFormat: 'uint32' as const,
        vertices: [vec3(0, 0, 0), vec3(1, 0, 0), vec3(0, 1, 0)],
        triangles: [0, 1, 2],
        normals: [vec3(0, 0, 1), vec3(0, 0, 1), vec3(0, 0, 1)],
        uv0: [[0, 0], [1, 0], [0, 1]] as [number, number][],
        colors: [[1, 0, 0, 1], [0, 1, 0, 1], [0, 0, 1, 1]] as [number, number, number, number][],
        bounds: { center: vec3(0.5, 0.5, 0), size: vec3(1, 1, 0) },
        name: 'copied',
      };

      const buffer = GeometryBuffer.from(source);
      source.vertices[0][0] = 99;
      source.triangles[0] = 2;
      source.uv0[1][0] = 7;
      source.bounds.center[0] = 42;

      expect(buffer.indexFormat).toBe('uint32');
      expect(buffer.name).toBe('copied');
      expect(buffer.vertices).toEqual([[0, 0, 0], [1, 0, 0], [0, 1, 0]]);
      expect(buffer.triangles).toEqual([0, 1, 2]);
      expect(buffer.uv0).toEqual([[0, 0], [1, 0], [0, 1]]);
      expect(buffer.colors).toEqual([[1, 0, 0, 1], [0, 1, 0, 1], [0, 0, 1, 1]]);
      expect(buffer.bounds).toEqual({ center: [0.5, 0.5, 0], size: [1, 1, 0] });
      expect(buffer.uv1).toBeUndefined();
      expect(buffer.tangents).toBeUndefined();
    });

    it('should reject a missing source', () => {
      expect(() => GeometryBuffer.from(null)).toThrow(InvalidArgumentError);
      expect(() => GeometryBuffer.from(undefined)).toThrow(/without a source mesh/);
    });
  });

  describe('clone', () => {
    it('should deep copy arrays and share the tracker', () => {
      const tracker: MeshTracker<string> = {};
      const buffer = new GeometryBuffer<string>({
        vertices: [vec3(1, 2, 3)],
        tracker,
        name: 'original',
      });

      const copy = buffer.clone();
      copy.vertices?.push(vec3(4, 5, 6));
      copy.name = 'copy';

      expect(buffer.vertexCount).toBe(1);
      expect(copy.vertexCount).toBe(2);
      expect(buffer.name).toBe('original');
      expect(copy.tracker).toBe(tracker);
    });
  });

  describe('effectiveIndexFormat', () => {
    function withVertexCount(count: number, indexFormat: 'uint16' | 'uint32'): GeometryBuffer {
      const vertices: Vec3[] = [];
      for (let i = 0; i < count; i++) vertices.push([i, 0, 0]);
      return new GeometryBuffer({ vertices, indexFormat });
    }

    it('should keep the hint for small meshes', () => {
      expect(withVertexCount(10, 'uint16').effectiveIndexFormat).toBe('uint16');
      expect(withVertexCount(10, 'uint32').effectiveIndexFormat).toBe('uint32');
      expect(withVertexCount(65534, 'uint16').effectiveIndexFormat).toBe('uint16');
    });

    it('should force 32-bit indices from 65535 vertices', () => {
      expect(withVertexCount(65535, 'uint16').effectiveIndexFormat).toBe('uint32');
      expect(withVertexCount(70000, 'uint16').effectiveIndexFormat).toBe('uint32');
    });

    it('should not change the stored hint', () => {
      const buffer = withVertexCount(70000, 'uint16');
      expect(buffer.effectiveIndexFormat).toBe('uint32');
      expect(buffer.indexFormat).toBe('uint16');
    });
  });

  describe('recalculateBounds', () => {
    it('should fit the per-axis extremes of the vertices', () => {
      const points = [vec3(1, -2, 3), vec3(-1, 4, 0), vec3(0, 0, 5)];
      const buffer = new GeometryBuffer({ vertices: points });

      buffer.recalculateBounds();

      expect(buffer.bounds).toEqual({ center: [0, 1, 2.5], size: [2, 6, 5] });
      expect(boundsMin(buffer.bounds)).toEqual([-1, -2, 0]);
      expect(boundsMax(buffer.bounds)).toEqual([1, 4, 5]);
      for (const p of points) {
        expect(boundsContains(buffer.bounds, p)).toBe(true);
      }
    });

    it('should give a single point zero size', () => {
      const buffer = new GeometryBuffer({ vertices: [vec3(2, 3, 4)] });
      buffer.recalculateBounds();
      expect(buffer.bounds).toEqual({ center: [2, 3, 4], size: [0, 0, 0] });
    });

    it('should leave bounds alone without vertices', () => {
      const bounds = { center: vec3(1, 1, 1), size: vec3(2, 2, 2) };
      const absent = new GeometryBuffer({ bounds });
      absent.recalculateBounds();
      expect(absent.bounds).toBe(bounds);

      const empty = new GeometryBuffer({ vertices: [], bounds });
      empty.recalculateBounds();
      expect(empty.bounds).toBe(bounds);
    });

    it('should not touch other fields', () => {
      const buffer = triangleBuffer();
      buffer.recalculateBounds();
      expect(buffer.normals).toBeUndefined();
      expect(buffer.triangles).toEqual([0, 1, 2]);
    });
  });

  describe('recalculateNormals', () => {
    it('should follow the right-hand rule for a single triangle', () => {
      const buffer = triangleBuffer();
      buffer.recalculateNormals();
      expect(buffer.normals).toEqual([[0, 0, 1], [0, 0, 1], [0, 0, 1]]);
    });

    it('should flip with the winding order', () => {
      const buffer = triangleBuffer();
      buffer.triangles = [0, 2, 1];
      buffer.recalculateNormals();
      expect(buffer.normals).toEqual([[0, 0, -1], [0, 0, -1], [0, 0, -1]]);
    });

    it('should normalize the face normal of a tilted triangle', () => {
      const buffer = new GeometryBuffer({
        vertices: [vec3(1, 0, 0), vec3(0, 1, 0), vec3(0, 0, 1)],
        triangles: [0, 1, 2],
      });
      buffer.recalculateNormals();

      const k = 1 / Math.sqrt(3);
      for (const n of buffer.normals ?? []) {
        expect(n[0]).toBeCloseTo(k, 12);
        expect(n[1]).toBeCloseTo(k, 12);
        expect(n[2]).toBeCloseTo(k, 12);
      }
      expect(buffer.normals).toHaveLength(3);
    });

    it('should weight shared vertices by triangle area', () => {
      // Triangle A (area 2) faces +Z, triangle B (area 1) faces +Y; they share vertices 0 and 1
      const buffer = new GeometryBuffer({
        vertices: [vec3(0, 0, 0), vec3(2, 0, 0), vec3(0, 2, 0), vec3(0, 0, 1)],
        triangles: [0, 1, 2, 0, 3, 1],
      });
      buffer.recalculateNormals();

      const normals = buffer.normals ?? [];
      const shared = [0, 2 / Math.sqrt(20), 4 / Math.sqrt(20)];
      for (const i of [0, 1]) {
        expect(normals[i][0]).toBe(0);
        expect(normals[i][1]).toBeCloseTo(shared[1], 12);
        expect(normals[i][2]).toBeCloseTo(shared[2], 12);
      }
      expect(normals[2]).toEqual([0, 0, 1]);
      expect(normals[3]).toEqual([0, 1, 0]);
    });

    it('should leave degenerate and isolated vertices with zero normals', () => {
      const buffer = new GeometryBuffer({
        vertices: [vec3(0, 0, 0), vec3(1, 0, 0), vec3(2, 0, 0), vec3(5, 5, 5)],
        triangles: [0, 1, 2],
      });
      buffer.recalculateNormals();
      expect(buffer.normals).toEqual([[0, 0, 0], [0, 0, 0], [0, 0, 0], [0, 0, 0]]);
    });

    it('should replace normals of the wrong length', () => {
      const buffer = triangleBuffer();
      buffer.normals = [vec3(1, 0, 0)];
      buffer.recalculateNormals();
      expect(buffer.normals).toHaveLength(3);
      expect(buffer.normals?.[0]).toEqual([0, 0, 1]);
    });

    it('should overwrite stale normals of the right length', () => {
      const buffer = triangleBuffer();
      const normals = [vec3(1, 0, 0), vec3(1, 0, 0), vec3(1, 0, 0)];
      buffer.normals = normals;
      buffer.recalculateNormals();
      expect(buffer.normals).toBe(normals);
      expect(normals).toEqual([[0, 0, 1], [0, 0, 1], [0, 0, 1]]);
    });

    it('should do nothing without vertices or triangles', () => {
      const noTriangles = new GeometryBuffer({ vertices: [vec3(0, 0, 0)] });
      noTriangles.recalculateNormals();
      expect(noTriangles.normals).toBeUndefined();

      const noVertices = new GeometryBuffer({ triangles: [0, 1, 2] });
      noVertices.recalculateNormals();
      expect(noVertices.normals).toBeUndefined();
    });
  });
});
