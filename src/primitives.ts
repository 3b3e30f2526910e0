// Procedural meshes in the engine's default layout: pos(3) + uv(2) + normal(3).

/** UV sphere, non-indexed, outward normals. */
export function makeSphere(radius: number, stacks: number, slices: number): Float32Array {
  const verts: number[] = [];

  function pushVertex(stack: number, slice: number) {
    const theta = (stack / stacks) * Math.PI;       // 0 (north) → π (south)
    const phi   = (slice / slices) * 2 * Math.PI;   // 0 → 2π around equator
    const sinT = Math.sin(theta), cosT = Math.cos(theta);
    const sinP = Math.sin(phi),   cosP = Math.cos(phi);
    verts.push(radius * sinT * cosP, radius * cosT, radius * sinT * sinP);
    verts.push(slice / slices, stack / stacks);
    // normal = normalised pos
    verts.push(sinT * cosP, cosT, sinT * sinP);
  }

  for (let i = 0; i < stacks; i++) {
    for (let j = 0; j < slices; j++) {
      pushVertex(i,     j);      pushVertex(i + 1, j + 1);  pushVertex(i + 1, j);
      pushVertex(i,     j);      pushVertex(i,     j + 1);  pushVertex(i + 1, j + 1);
    }
  }

  return new Float32Array(verts);
}

/**
 * Flat-shaded tetrahedron from four corners. Faces don't share vertices, so
 * every vertex carries its face normal (computed by computeVertexNormals).
 */
export function makeTetrahedron(
  a: readonly [number, number, number],
  b: readonly [number, number, number],
  c: readonly [number, number, number],
  d: readonly [number, number, number],
): { positions: Float32Array; indices: Uint32Array } {
  // Faces cba, abd, adc, bcd. They face outward when (b - a) × (c - a)
  // points toward d.
  const corners = [c, b, a, a, b, d, a, d, c, b, c, d];
  const positions = new Float32Array(corners.flatMap((p) => [p[0], p[1], p[2]]));
  const indices = Uint32Array.from({ length: corners.length }, (_, i) => i);
  return { positions, indices };
}
