// Host-side checks run once per draw call, before dispatch. The stages
// themselves never validate; a bad input there just yields bad numbers.

import { mat3, mat4 } from "gl-matrix";
import type { TransformSet } from "./VertexStage";

/**
 * Throws if the model-view matrix has no inverse-transpose to give normals.
 * Rejects exactly what mat3.invert gives up on: a zero determinant. A small
 * but non-zero determinant (e.g. a tiny uniform scale) is still invertible.
 */
export function validateTransformSet(transforms: TransformSet): void {
  const modelView = mat4.multiply(mat4.create(), transforms.view, transforms.model);
  const det = mat3.determinant(mat3.fromMat4(mat3.create(), modelView));
  if (!Number.isFinite(det) || det === 0) {
    throw new Error(`Model-view matrix is singular (det=${det}); normals cannot be transformed`);
  }
}
