import { describe, it, expect } from "vitest";
import { GeometryBuffer } from "../../src/mesh/GeometryBuffer.js";
import { weldVertices } from "../../src/mesh/weld.js";
import { vec3 } from "../../src/num/vec3.js";

describe("weldVertices", () => {
  // Two triangles of a quad with the shared edge duplicated
  function splitQuad(): GeometryBuffer {
    return new GeometryBuffer({
      vertices: [
        vec3(0, 0, 0), vec3(1, 0, 0), vec3(1, 1, 0),
        vec3(0, 0, 0), vec3(1, 1, 0), vec3(0, 1, 0),
      ],
      triangles: [0, 1, 2, 3, 4, 5],
      uv0: [[0, 0], [1, 0], [1, 1], [0.5, 0.5], [0.5, 0.5], [0, 1]],
      name: "quad",
    });
  }

  it("should merge coincident vertices and remap triangles", () => {
    const welded = weldVertices(splitQuad());

    expect(welded.vertices).toEqual([[0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0]]);
    expect(welded.triangles).toEqual([0, 1, 2, 0, 2, 3]);
    expect(welded.name).toBe("quad");
  });

  it("should keep the attributes of the first occurrence", () => {
    const welded = weldVertices(splitQuad());
    expect(welded.uv0).toEqual([[0, 0], [1, 0], [1, 1], [0, 1]]);
    expect(welded.normals).toBeUndefined();
  });

  it("should recompute bounds", () => {
    const welded = weldVertices(splitQuad());
    expect(welded.bounds).toEqual({ center: [0.5, 0.5, 0], size: [1, 1, 0] });
  });

  it("should merge vertices within tolerance", () => {
    const buffer = new GeometryBuffer({
      vertices: [vec3(1, 1, 1), vec3(1.00001, 1.00001, 1.00001), vec3(2, 2, 2)],
      triangles: [],
    });
    const welded = weldVertices(buffer, 0.001);
    expect(welded.vertexCount).toBe(2);
  });

  it("should drop triangles that collapse", () => {
    const buffer = new GeometryBuffer({
      vertices: [vec3(0, 0, 0), vec3(0, 0, 0), vec3(1, 0, 0), vec3(0, 1, 0)],
      triangles: [0, 1, 2, 0, 2, 3],
    });
    const welded = weldVertices(buffer);
    expect(welded.triangles).toEqual([0, 1, 2]);
  });

  it("should not modify the input", () => {
    const buffer = splitQuad();
    weldVertices(buffer);
    expect(buffer.vertexCount).toBe(6);
    expect(buffer.triangles).toEqual([0, 1, 2, 3, 4, 5]);
  });
});
