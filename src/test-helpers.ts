import { expect } from "vitest";

/** Component-wise toBeCloseTo for gl-matrix vectors and typed arrays. */
export function expectVecClose(actual: ArrayLike<number>, expected: readonly number[], digits = 5): void {
  expect(actual.length).toBe(expected.length);
  for (let i = 0; i < expected.length; i++) {
    expect(actual[i]).toBeCloseTo(expected[i], digits);
  }
}
