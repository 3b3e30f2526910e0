// Vertex normals — area-weighted average of the faces around each vertex.
//
// For each triangle (a, b, c) the cross product (b - a) × (c - a) is added to
// all three vertices without normalizing it first. Its length is twice the
// triangle's area, so larger neighbours pull the averaged normal harder.
//
// Input:  positions [x,y,z, ...], indices [a,b,c, ...] (counter-clockwise = front)
// Output: one unit normal per position [nx,ny,nz, ...]

export function computeVertexNormals(
  positions: Float32Array,
  indices: ArrayLike<number>,
): Float32Array {
  if (indices.length % 3 !== 0) {
    throw new Error(`Index count ${indices.length} is not a multiple of 3`);
  }

  const normals = new Float32Array(positions.length);

  for (let t = 0; t < indices.length; t += 3) {
    const ia = indices[t] * 3, ib = indices[t + 1] * 3, ic = indices[t + 2] * 3;

    // Edge vectors ab, ac
    const abx = positions[ib] - positions[ia];
    const aby = positions[ib + 1] - positions[ia + 1];
    const abz = positions[ib + 2] - positions[ia + 2];
    const acx = positions[ic] - positions[ia];
    const acy = positions[ic + 1] - positions[ia + 1];
    const acz = positions[ic + 2] - positions[ia + 2];

    const nx = aby * acz - abz * acy;
    const ny = abz * acx - abx * acz;
    const nz = abx * acy - aby * acx;

    for (const i of [ia, ib, ic]) {
      normals[i] += nx;
      normals[i + 1] += ny;
      normals[i + 2] += nz;
    }
  }

  for (let i = 0; i < normals.length; i += 3) {
    const len = Math.hypot(normals[i], normals[i + 1], normals[i + 2]);
    // Unreferenced vertices keep a zero normal.
    if (len > 0) {
      normals[i] /= len;
      normals[i + 1] /= len;
      normals[i + 2] /= len;
    }
  }

  return normals;
}
