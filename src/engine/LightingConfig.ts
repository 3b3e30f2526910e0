// LightingConfig — the engine-wide Blinn-Phong weights, passed by value into
// the lighting stage at dispatch time rather than read from module state.

import { vec3 } from "gl-matrix";
import type { ReadonlyVec3 } from "gl-matrix";

export interface LightingConfig {
  readonly ambientIntensity: ReadonlyVec3;
  readonly diffuseIntensity: ReadonlyVec3;
  readonly specularIntensity: ReadonlyVec3;
  /** Specular exponent, >= 0. Larger values give a tighter highlight. */
  readonly shininess: number;
}

export const DEFAULT_LIGHTING: LightingConfig = Object.freeze({
  ambientIntensity: Object.freeze([0.05, 0.05, 0.05] as const),
  diffuseIntensity: Object.freeze([0.6, 0.6, 0.6] as const),
  specularIntensity: Object.freeze([0.9, 0.9, 0.9] as const),
  shininess: 32.0,
});

/** Defaults plus overrides. Vectors are copied, not shared with the caller. */
export function createLightingConfig(overrides: Partial<LightingConfig> = {}): LightingConfig {
  const shininess = overrides.shininess ?? DEFAULT_LIGHTING.shininess;
  if (!Number.isFinite(shininess) || shininess < 0) {
    throw new Error(`Invalid shininess ${shininess}: expected a finite number >= 0`);
  }

  return {
    ambientIntensity: vec3.clone(overrides.ambientIntensity ?? DEFAULT_LIGHTING.ambientIntensity),
    diffuseIntensity: vec3.clone(overrides.diffuseIntensity ?? DEFAULT_LIGHTING.diffuseIntensity),
    specularIntensity: vec3.clone(overrides.specularIntensity ?? DEFAULT_LIGHTING.specularIntensity),
    shininess,
  };
}
