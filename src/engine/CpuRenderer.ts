// CpuRenderer — runs the vertex and lighting stages on the CPU.
//
// There is no rasterizer here: each vertex's view-space output is shaded
// directly (per-vertex shading), which is what a fragment would see if the
// triangle were a single point. A real host swaps this loop for its own
// rasterize + interpolate step and keeps the two stages as they are.

import type { DrawCall, FrameUniforms, Renderer, ShadedMesh } from "./Renderer";
import type { DirectionalLight } from "./Light";
import { lightToViewSpace } from "./Light";
import { dispatchFragments, dispatchVertices } from "./Dispatch";
import { vertexStage } from "./VertexStage";
import { fragmentStage } from "./LightingStage";
import { validateTransformSet } from "./validate";

export class CpuRenderer implements Renderer {
  draw(drawCall: DrawCall, frame: FrameUniforms): ShadedMesh {
    return this.drawWithViewLight(drawCall, frame, lightToViewSpace(frame.light, frame.view));
  }

  renderFrame(drawCalls: readonly DrawCall[], frame: FrameUniforms): ShadedMesh[] {
    // The light only depends on the view, so convert it once for the frame.
    const viewLight = lightToViewSpace(frame.light, frame.view);
    return drawCalls.map((dc) => this.drawWithViewLight(dc, frame, viewLight));
  }

  private drawWithViewLight(drawCall: DrawCall, frame: FrameUniforms, light: DirectionalLight): ShadedMesh {
    const transforms = { model: drawCall.model, view: frame.view, projection: frame.projection };
    validateTransformSet(transforms);

    const vertices = dispatchVertices(drawCall.mesh, vertexStage(transforms));
    const colors = dispatchFragments(
      vertices.viewPositions,
      vertices.viewNormals,
      fragmentStage({ light, material: drawCall.material, config: frame.lighting }),
    );
    return { vertices, colors };
  }
}
