// VertexStage — object space → clip space, plus the view-space position and
// normal the lighting stage consumes.
//
//   clip       = P × V × M × (pos, 1)
//   viewPos    = (V × M × (pos, 1)).xyz
//   viewNormal = transpose(inverse(mat3(V × M))) × normal
//
// The view-space normal is left unnormalized; interpolation would break unit
// length anyway, so the fragment side renormalizes.

import { mat3, mat4, vec3, vec4 } from "gl-matrix";
import type { ReadonlyMat4, ReadonlyVec3 } from "gl-matrix";
import { normalMatrix, transformPoint } from "./math";

/** Object-space vertex as stored in the mesh. */
export interface Vertex {
  readonly position: ReadonlyVec3;
  readonly normal: ReadonlyVec3;
}

/** Per-draw-call matrices. `view × model` must be invertible. */
export interface TransformSet {
  readonly model: ReadonlyMat4;
  readonly view: ReadonlyMat4;
  readonly projection: ReadonlyMat4;
}

export interface ViewSpaceVertex {
  readonly position: ReadonlyVec3;
  readonly normal: ReadonlyVec3;
}

export interface VertexOutput {
  clipPosition: vec4;
  viewSpace: ViewSpaceVertex;
}

export type VertexShader = (vertex: Vertex) => VertexOutput;

/** Matrices derived once per draw call and shared by every vertex. */
export interface DrawTransforms {
  modelView: mat4;
  modelViewProjection: mat4;
  normalMatrix: mat3;
}

export function prepareTransforms(transforms: TransformSet): DrawTransforms {
  const modelView = mat4.multiply(mat4.create(), transforms.view, transforms.model);
  const modelViewProjection = mat4.multiply(mat4.create(), transforms.projection, modelView);
  return {
    modelView,
    modelViewProjection,
    normalMatrix: normalMatrix(mat3.create(), modelView),
  };
}

/** Binds a transform set and returns the per-vertex function. */
export function vertexStage(transforms: TransformSet): VertexShader {
  const derived = prepareTransforms(transforms);

  return (vertex) => {
    const clipPosition = transformPoint(vec4.create(), vertex.position, derived.modelViewProjection);
    const viewPosition = transformPoint(vec4.create(), vertex.position, derived.modelView);
    return {
      clipPosition,
      viewSpace: {
        position: vec3.fromValues(viewPosition[0], viewPosition[1], viewPosition[2]),
        normal: vec3.transformMat3(vec3.create(), vertex.normal, derived.normalMatrix),
      },
    };
  };
}

export function transformVertex(vertex: Vertex, transforms: TransformSet): VertexOutput {
  return vertexStage(transforms)(vertex);
}
