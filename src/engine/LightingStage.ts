// LightingStage — single directional light, Blinn-Phong.
//
//   ambient  = Ia ⊙ Id ⊙ Kd
//   diffuse  = max(N·L, 0) · Id ⊙ Kd
//   specular = (N·L > 0 ? max(N·H, 0)^shininess : 0) · Is,  H = normalize(L + V)
//   rgb      = ambient + diffuse + specular,  alpha = 1
//
// Everything is in view space: the viewer sits at the origin looking down -Z,
// so V = normalize(-P). The output is not clamped; tone mapping happens later.
//
// Specular is zero whenever N·L <= 0, even if N·H > 0: the half-vector can
// still lean toward N when the light is behind the surface.

import { vec3 } from "gl-matrix";
import type { DirectionalLight } from "./Light";
import { surfaceToLight } from "./Light";
import type { LightingConfig } from "./LightingConfig";
import type { Material } from "./Material";
import type { ViewSpaceVertex } from "./VertexStage";
import { halfVector, viewDirection } from "./math";

export interface Color {
  rgb: vec3;
  /** Always 1.0; opacity is not modeled. */
  alpha: number;
}

/** The individual lighting contributions, before they are summed. */
export interface BlinnPhongTerms {
  ambient: vec3;
  diffuse: vec3;
  specular: vec3;
  diffuseWeight: number;
  specularWeight: number;
}

/** Everything the lighting stage reads that is fixed for a whole draw call. */
export interface LightingUniforms {
  light: DirectionalLight;
  material: Material;
  config: LightingConfig;
}

export type FragmentShader = (fragment: ViewSpaceVertex) => Color;

export function evaluateBlinnPhong(
  fragment: ViewSpaceVertex,
  light: DirectionalLight,
  material: Material,
  config: LightingConfig,
): BlinnPhongTerms {
  const N = vec3.normalize(vec3.create(), fragment.normal);
  const L = surfaceToLight(vec3.create(), light);
  const V = viewDirection(vec3.create(), fragment.position);

  const albedo = vec3.multiply(vec3.create(), config.diffuseIntensity, material.diffuseColor);
  const ambient = vec3.multiply(vec3.create(), config.ambientIntensity, albedo);

  const nDotL = vec3.dot(N, L);
  const diffuseWeight = Math.max(nDotL, 0);
  const diffuse = vec3.scale(vec3.create(), albedo, diffuseWeight);

  const H = halfVector(vec3.create(), L, V);
  const specularWeight = nDotL > 0 ? Math.pow(Math.max(vec3.dot(H, N), 0), config.shininess) : 0;
  const specular = vec3.scale(vec3.create(), config.specularIntensity, specularWeight);

  return { ambient, diffuse, specular, diffuseWeight, specularWeight };
}

export function shadeFragment(
  fragment: ViewSpaceVertex,
  light: DirectionalLight,
  material: Material,
  config: LightingConfig,
): Color {
  const { ambient, diffuse, specular } = evaluateBlinnPhong(fragment, light, material, config);
  const rgb = vec3.add(vec3.create(), ambient, diffuse);
  vec3.add(rgb, rgb, specular);
  return { rgb, alpha: 1.0 };
}

/** Binds the per-draw-call uniforms and returns the per-fragment function. */
export function fragmentStage(uniforms: LightingUniforms): FragmentShader {
  const { light, material, config } = uniforms;
  return (fragment) => shadeFragment(fragment, light, material, config);
}
