import type { ReadonlyVec3 } from "gl-matrix";

export interface Material {
  /** Linear RGB albedo; multiplied into the ambient and diffuse terms. */
  diffuseColor: ReadonlyVec3;
}
