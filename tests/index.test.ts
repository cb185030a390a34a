import { describe, it, expect, afterEach } from "vitest";
import { applyColor, force, red, shouldEmitColor } from "../src/index.js";

describe("public surface", () => {
  afterEach(() => {
    force(null);
  });

  it("forcing on then off switches the red sample between escaped and plain", () => {
    force(true);
    expect(shouldEmitColor()).toBe(true);
    expect(applyColor("red", "red").text).toBe("\x1b[1;31mred\x1b[0m");

    force(false);
    expect(shouldEmitColor()).toBe(false);
    expect(applyColor("red", "red").text).toBe("red");
  });

  it("sugar functions match applyColor", () => {
    force(true);
    expect(red("x").text).toBe(applyColor("x", "red").text);
  });
});
