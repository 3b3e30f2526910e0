import { describe, it, expect } from "vitest";
import { Mesh } from "./Mesh";
import { expectVecClose } from "../test-helpers";

// Two vertices in the default pos(3) + uv(2) + normal(3) layout.
// prettier-ignore
const TWO_VERTICES = new Float32Array([
  1, 2, 3,   0, 0,   0, 0, 1,
  4, 5, 6,   1, 1,   0, 1, 0,
]);

describe("Mesh", () => {
  it("derives stride and vertex count from the layout", () => {
    const mesh = new Mesh(TWO_VERTICES);
    expect(mesh.stride).toBe(8);
    expect(mesh.vertexCount).toBe(2);
  });

  it("reads position and normal past the uv slot", () => {
    const v = new Mesh(TWO_VERTICES).vertex(1);
    expectVecClose(v.position, [4, 5, 6]);
    expectVecClose(v.normal, [0, 1, 0]);
  });

  it("supports a custom layout", () => {
    // normal first, then position
    const mesh = new Mesh(new Float32Array([0, 0, 1, 7, 8, 9]), [
      { location: 2, size: 3 },
      { location: 0, size: 3 },
    ]);
    expect(mesh.vertexCount).toBe(1);
    expectVecClose(mesh.vertex(0).position, [7, 8, 9]);
    expectVecClose(mesh.vertex(0).normal, [0, 0, 1]);
  });

  it("iterates every vertex in order", () => {
    const positions = [...new Mesh(TWO_VERTICES).vertices()].map((v) => Array.from(v.position));
    expect(positions).toEqual([[1, 2, 3], [4, 5, 6]]);
  });

  it("rejects data that does not fill whole vertices", () => {
    expect(() => new Mesh(new Float32Array(10))).toThrow("Vertex data length 10 is not a multiple of stride 8");
  });

  it("rejects a layout without a normal", () => {
    expect(() => new Mesh(new Float32Array(3), [{ location: 0, size: 3 }])).toThrow("Vertex layout has no normal attribute");
  });

  it("rejects a position that is not a vec3", () => {
    const layout = [{ location: 0, size: 4 }, { location: 2, size: 3 }];
    expect(() => new Mesh(new Float32Array(7), layout)).toThrow("Vertex position attribute must have 3 components, got 4");
  });

  it("throws a RangeError for an out-of-range index", () => {
    expect(() => new Mesh(TWO_VERTICES).vertex(2)).toThrow(RangeError);
  });

  it("throws a RangeError for a fractional index", () => {
    expect(() => new Mesh(TWO_VERTICES).vertex(0.5)).toThrow("Vertex index 0.5 out of range [0, 2)");
  });

  it("rejects a layout that repeats a location", () => {
    const layout = [
      { location: 0, size: 3 },
      { location: 2, size: 3 },
      { location: 0, size: 3 },
    ];
    expect(() => new Mesh(new Float32Array(9), layout)).toThrow("Vertex layout repeats location 0");
  });
});
