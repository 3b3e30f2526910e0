import { describe, it, expect } from "vitest";
import { makeSphere, makeTetrahedron } from "./primitives";
import { Mesh } from "./engine";

describe("makeSphere", () => {
  it("emits two triangles per stack/slice cell in the default layout", () => {
    const mesh = new Mesh(makeSphere(2, 4, 6));
    expect(mesh.vertexCount).toBe(4 * 6 * 6);
  });

  it("gives each vertex a unit normal along its position", () => {
    const mesh = new Mesh(makeSphere(2, 4, 6));
    for (const { position, normal } of mesh.vertices()) {
      expect(Math.hypot(normal[0], normal[1], normal[2])).toBeCloseTo(1, 5);
      expect(position[0]).toBeCloseTo(normal[0] * 2, 5);
      expect(position[1]).toBeCloseTo(normal[1] * 2, 5);
      expect(position[2]).toBeCloseTo(normal[2] * 2, 5);
    }
  });
});

describe("makeTetrahedron", () => {
  it("keeps faces unshared, one index per corner", () => {
    const { positions, indices } = makeTetrahedron([0, 0, 0], [1, 0, 0], [0, 1, 0], [0, 0, 1]);
    expect(positions.length).toBe(12 * 3);
    expect(Array.from(indices)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    // First face is c, b, a
    expect(Array.from(positions.subarray(0, 9))).toEqual([0, 1, 0, 1, 0, 0, 0, 0, 0]);
  });
});
