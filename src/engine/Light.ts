import { mat3, vec3 } from "gl-matrix";
import type { ReadonlyMat4, ReadonlyVec3 } from "gl-matrix";

/**
 * Which way `direction` points.
 *   "toLight"   — from the surface toward the light (used as-is)
 *   "fromLight" — from the light toward the surface (negated before shading)
 */
export type LightDirectionConvention = "toLight" | "fromLight";

/** Infinitely distant light. Only the direction matters. */
export interface DirectionalLight {
  readonly direction: ReadonlyVec3;
  readonly convention: LightDirectionConvention;
}

export function directionalLight(
  direction: ReadonlyVec3,
  convention: LightDirectionConvention = "toLight",
): DirectionalLight {
  return { direction: vec3.clone(direction), convention };
}

/** Unit vector from the surface toward the light. */
export function surfaceToLight(out: vec3, light: DirectionalLight): vec3 {
  if (light.convention === "fromLight") {
    vec3.negate(out, light.direction);
  } else {
    vec3.copy(out, light.direction);
  }
  return vec3.normalize(out, out);
}

/**
 * Re-expresses a world-space light in view space. Only the rotation part of
 * `view` applies to a direction; the translation column is dropped.
 */
export function lightToViewSpace(light: DirectionalLight, view: ReadonlyMat4): DirectionalLight {
  const rotation = mat3.fromMat4(mat3.create(), view);
  return {
    direction: vec3.transformMat3(vec3.create(), light.direction, rotation),
    convention: light.convention,
  };
}
