// Renderer — what a host programs against to shade a frame. A draw call pairs
// a mesh with its material and model matrix; FrameUniforms carry everything
// that is shared by every draw call in the frame.

import type { ReadonlyMat4 } from "gl-matrix";
import type { Mesh } from "./Mesh";
import type { Material } from "./Material";
import type { DirectionalLight } from "./Light";
import type { LightingConfig } from "./LightingConfig";
import type { VertexBuffers } from "./Dispatch";

export interface DrawCall {
  mesh: Mesh;
  material: Material;
  model: ReadonlyMat4;
}

export interface FrameUniforms {
  view: ReadonlyMat4;
  projection: ReadonlyMat4;
  /** World-space light; the renderer moves it into view space per frame. */
  light: DirectionalLight;
  lighting: LightingConfig;
}

export interface ShadedMesh {
  vertices: VertexBuffers;
  /** RGBA, 4 floats per vertex. */
  colors: Float32Array;
}

export interface Renderer {
  /** Run both stages for one draw call. */
  draw(drawCall: DrawCall, frame: FrameUniforms): ShadedMesh;

  /** Shade every draw call of a frame, in order. */
  renderFrame(drawCalls: readonly DrawCall[], frame: FrameUniforms): ShadedMesh[];
}
