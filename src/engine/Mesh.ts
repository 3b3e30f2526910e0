// Mesh — an interleaved Float32Array plus the layout that describes it.
// Attributes are listed in the order they appear in each vertex; the Mesh
// works out stride and per-attribute offsets once, then hands out Vertex
// views for the vertex stage.
//
// The default layout matches the rest of the engine:
//   location 0 = position (3), location 1 = uv (2), location 2 = normal (3)

import type { Vertex } from "./VertexStage";

export interface VertexAttribute {
  location: number; // attribute slot, e.g. POSITION_LOCATION
  size: number;     // number of float components
}

export const POSITION_LOCATION = 0;
export const UV_LOCATION = 1;
export const NORMAL_LOCATION = 2;

export const DEFAULT_LAYOUT: readonly VertexAttribute[] = [
  { location: POSITION_LOCATION, size: 3 },
  { location: UV_LOCATION, size: 2 },
  { location: NORMAL_LOCATION, size: 3 },
];

export class Mesh {
  readonly vertexCount: number;
  /** Floats per vertex. */
  readonly stride: number;

  private readonly positionOffset: number;
  private readonly normalOffset: number;

  constructor(
    readonly data: Float32Array,
    readonly attributes: readonly VertexAttribute[] = DEFAULT_LAYOUT,
  ) {
    this.stride = attributes.reduce((sum, a) => sum + a.size, 0);
    if (this.stride === 0 || data.length % this.stride !== 0) {
      throw new Error(`Vertex data length ${data.length} is not a multiple of stride ${this.stride}`);
    }
    this.vertexCount = data.length / this.stride;

    const offsets = new Map<number, { offset: number; size: number }>();
    let offset = 0;
    for (const attr of attributes) {
      if (offsets.has(attr.location)) {
        throw new Error(`Vertex layout repeats location ${attr.location}`);
      }
      offsets.set(attr.location, { offset, size: attr.size });
      offset += attr.size;
    }

    this.positionOffset = requireVec3(offsets.get(POSITION_LOCATION), "position");
    this.normalOffset = requireVec3(offsets.get(NORMAL_LOCATION), "normal");
  }

  /** Views into the backing buffer; no copy is made. */
  vertex(index: number): Vertex {
    if (!Number.isInteger(index) || index < 0 || index >= this.vertexCount) {
      throw new RangeError(`Vertex index ${index} out of range [0, ${this.vertexCount})`);
    }
    const base = index * this.stride;
    return {
      position: this.data.subarray(base + this.positionOffset, base + this.positionOffset + 3),
      normal: this.data.subarray(base + this.normalOffset, base + this.normalOffset + 3),
    };
  }

  *vertices(): IterableIterator<Vertex> {
    for (let i = 0; i < this.vertexCount; i++) {
      yield this.vertex(i);
    }
  }
}

function requireVec3(entry: { offset: number; size: number } | undefined, name: string): number {
  if (!entry) throw new Error(`Vertex layout has no ${name} attribute`);
  if (entry.size !== 3) throw new Error(`Vertex ${name} attribute must have 3 components, got ${entry.size}`);
  return entry.offset;
}
