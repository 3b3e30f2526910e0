// main.ts — entry point. Builds a small scene, shades it on the CPU and prints
// a summary of the resulting colors.
//
//   sphere      — UV sphere squashed by a non-uniform scale
//   tetrahedron — flat faces, normals computed from the triangles
//
// SHININESS in the environment overrides the specular exponent.

import { mat4, quat } from "gl-matrix";
import type { DrawCall, FrameUniforms, ShadedMesh, VertexAttribute } from "./engine";
import { CpuRenderer, Mesh, directionalLight } from "./engine";
import { loadLighting } from "./config";
import { computeVertexNormals } from "./normals";
import { makeSphere, makeTetrahedron } from "./primitives";

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

// pos + normal only; no uv slot
const POS_NORMAL_LAYOUT: VertexAttribute[] = [
  { location: 0, size: 3 },
  { location: 2, size: 3 },
];

function makeTetrahedronMesh(): Mesh {
  const { positions, indices } = makeTetrahedron([0, 0, 0], [1, 0, 0], [0, 1, 0], [0, 0, 1]);
  const normals = computeVertexNormals(positions, indices);
  const data = new Float32Array(positions.length * 2);
  for (let i = 0; i < positions.length / 3; i++) {
    data.set(positions.subarray(i * 3, i * 3 + 3), i * 6);
    data.set(normals.subarray(i * 3, i * 3 + 3), i * 6 + 3);
  }
  return new Mesh(data, POS_NORMAL_LAYOUT);
}

function summarize(name: string, shaded: ShadedMesh): void {
  const { colors } = shaded;
  let min = Infinity, max = -Infinity;
  for (let i = 0; i < colors.length; i += 4) {
    const luma = 0.2126 * colors[i] + 0.7152 * colors[i + 1] + 0.0722 * colors[i + 2];
    min = Math.min(min, luma);
    max = Math.max(max, luma);
  }
  console.log(`${name}: ${colors.length / 4} vertices, luminance ${min.toFixed(3)} .. ${max.toFixed(3)}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main() {
  const lighting = loadLighting(process.env);

  // Sphere: T × R × S with a non-uniform scale. The tetrahedron sits 1.5
  // units along the sphere's local X, so it inherits the squash.
  const sphereRotation = quat.rotateY(quat.create(), quat.create(), Math.PI / 6);
  const sphereModel = mat4.fromRotationTranslationScale(mat4.create(), sphereRotation, [0, 0, 0], [2.0, 0.5, 1.0]);
  const tetraModel = mat4.translate(mat4.create(), sphereModel, [1.5, 0, 0]);

  const drawCalls: DrawCall[] = [
    {
      mesh: new Mesh(makeSphere(1.0, 16, 24)),
      material: { diffuseColor: [0.8, 0.3, 0.2] },
      model: sphereModel,
    },
    {
      mesh: makeTetrahedronMesh(),
      material: { diffuseColor: [0.2, 0.5, 0.9] },
      model: tetraModel,
    },
  ];

  const frame: FrameUniforms = {
    // Eye on a sphere of radius 4 around the origin; view space looks down -Z.
    view: mat4.lookAt(mat4.create(), [1.62, 2.16, 2.95], [0, 0, 0], [0, 1, 0]),
    projection: mat4.perspective(mat4.create(), Math.PI / 4, 16 / 9, 0.1, 100.0),
    light: directionalLight([1, 1, 1], "toLight"),
    lighting,
  };

  const renderer = new CpuRenderer();
  const [sphere, tetrahedron] = renderer.renderFrame(drawCalls, frame);
  console.log(`Shininess ${lighting.shininess}`);
  summarize("sphere", sphere);
  summarize("tetrahedron", tetrahedron);
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
