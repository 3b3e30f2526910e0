import { describe, it, expect } from "vitest";
import { loadLighting } from "./config";

describe("loadLighting", () => {
  it("uses the default shininess when SHININESS is unset", () => {
    expect(loadLighting({}).shininess).toBe(32);
  });

  it("reads SHININESS as a number", () => {
    expect(loadLighting({ SHININESS: "8" }).shininess).toBe(8);
  });

  it("throws on a value that is not a number", () => {
    expect(() => loadLighting({ SHININESS: "shiny" })).toThrow("Invalid shininess NaN");
  });
});
