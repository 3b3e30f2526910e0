// Dispatch — runs a stage over every element of a batch. Invocations share
// nothing but the uniforms the stage closed over, so order does not matter;
// this implementation just walks the batch front to back.

import type { Mesh } from "./Mesh";
import type { VertexShader } from "./VertexStage";
import type { FragmentShader } from "./LightingStage";

export function dispatch<I, O>(elements: readonly I[], shader: (element: I) => O): O[] {
  return elements.map((element) => shader(element));
}

/** Packed per-vertex outputs of the vertex stage. */
export interface VertexBuffers {
  clipPositions: Float32Array; // 4 floats per vertex
  viewPositions: Float32Array; // 3 floats per vertex
  viewNormals: Float32Array;   // 3 floats per vertex, not normalized
}

export function dispatchVertices(mesh: Mesh, shader: VertexShader): VertexBuffers {
  const n = mesh.vertexCount;
  const clipPositions = new Float32Array(n * 4);
  const viewPositions = new Float32Array(n * 3);
  const viewNormals = new Float32Array(n * 3);

  for (let i = 0; i < n; i++) {
    const { clipPosition, viewSpace } = shader(mesh.vertex(i));
    clipPositions.set(clipPosition, i * 4);
    viewPositions.set(viewSpace.position, i * 3);
    viewNormals.set(viewSpace.normal, i * 3);
  }

  return { clipPositions, viewPositions, viewNormals };
}

/** Shades packed view-space positions/normals into packed RGBA. */
export function dispatchFragments(
  positions: Float32Array,
  normals: Float32Array,
  shader: FragmentShader,
): Float32Array {
  if (positions.length !== normals.length || positions.length % 3 !== 0) {
    throw new Error(
      `Fragment buffers must be equal-length vec3 arrays (positions=${positions.length}, normals=${normals.length})`,
    );
  }

  const n = positions.length / 3;
  const colors = new Float32Array(n * 4);

  for (let i = 0; i < n; i++) {
    const { rgb, alpha } = shader({
      position: positions.subarray(i * 3, i * 3 + 3),
      normal: normals.subarray(i * 3, i * 3 + 3),
    });
    colors.set(rgb, i * 4);
    colors[i * 4 + 3] = alpha;
  }

  return colors;
}
