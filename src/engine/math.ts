// Shared vector/matrix helpers for the shading stages. Everything here writes
// into a caller-supplied `out`, gl-matrix style, so the stages can reuse
// scratch storage.

import { mat3, vec3, vec4 } from "gl-matrix";
import type { ReadonlyMat4, ReadonlyVec3 } from "gl-matrix";

/**
 * Inverse-transpose of the upper-left 3×3 of `modelView`.
 *
 * Normals must go through this rather than the model-view matrix itself:
 * under non-uniform scale the plain linear part tilts them off the surface.
 * For a rotation with uniform scale it is the same matrix up to a scale factor.
 *
 * Precondition: the 3×3 is invertible. A singular input leaves `out` holding
 * the transposed linear part (gl-matrix skips the inverse).
 */
export function normalMatrix(out: mat3, modelView: ReadonlyMat4): mat3 {
  mat3.fromMat4(out, modelView);
  mat3.invert(out, out);
  mat3.transpose(out, out);
  return out;
}

/** Homogeneous transform of a point (w = 1). No perspective divide. */
export function transformPoint(out: vec4, point: ReadonlyVec3, m: ReadonlyMat4): vec4 {
  vec4.set(out, point[0], point[1], point[2], 1);
  return vec4.transformMat4(out, out, m);
}

/** Direction from a view-space position toward the viewer at the origin. */
export function viewDirection(out: vec3, position: ReadonlyVec3): vec3 {
  vec3.negate(out, position);
  return vec3.normalize(out, out);
}

/** Blinn half-vector: normalize(L + V). */
export function halfVector(out: vec3, toLight: ReadonlyVec3, toViewer: ReadonlyVec3): vec3 {
  vec3.add(out, toLight, toViewer);
  return vec3.normalize(out, out);
}
