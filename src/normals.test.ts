import { describe, it, expect } from "vitest";
import { computeVertexNormals } from "./normals";
import { makeTetrahedron } from "./primitives";
import { expectVecClose } from "./test-helpers";

describe("computeVertexNormals", () => {
  it("gives every corner of a lone triangle the face normal", () => {
    const positions = new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]);
    expectVecClose(computeVertexNormals(positions, [0, 1, 2]), [0, 0, 1, 0, 0, 1, 0, 0, 1]);
  });

  it("weights shared vertices by triangle area", () => {
    // Triangle 0-1-2 in the XY plane (area 0.5), triangle 0-1-3 in the XZ plane (area 1).
    // prettier-ignore
    const positions = new Float32Array([
      0, 0, 0,
      1, 0, 0,
      0, 1, 0,
      0, 0, -2,
    ]);
    const normals = computeVertexNormals(positions, [0, 1, 2, 0, 1, 3]);
    const shared = [0, 2 / Math.sqrt(5), 1 / Math.sqrt(5)];
    expectVecClose(normals, [...shared, ...shared, 0, 0, 1, 0, 1, 0]);
  });

  it("leaves unreferenced vertices at zero", () => {
    const positions = new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0, 5, 5, 5]);
    const normals = computeVertexNormals(positions, [0, 1, 2]);
    expect(Array.from(normals.subarray(9))).toEqual([0, 0, 0]);
  });

  it("rejects an index list that is not whole triangles", () => {
    expect(() => computeVertexNormals(new Float32Array(9), [0, 1])).toThrow("Index count 2 is not a multiple of 3");
  });

  it("produces outward face normals for a tetrahedron", () => {
    const { positions, indices } = makeTetrahedron([0, 0, 0], [1, 0, 0], [0, 1, 0], [0, 0, 1]);
    const normals = computeVertexNormals(positions, indices);
    const s = 1 / Math.sqrt(3);
    // prettier-ignore
    expectVecClose(normals, [
      0, 0, -1,   0, 0, -1,   0, 0, -1,
      0, -1, 0,   0, -1, 0,   0, -1, 0,
      -1, 0, 0,   -1, 0, 0,   -1, 0, 0,
      s, s, s,    s, s, s,    s, s, s,
    ]);
  });
});
