import { describe, expect, it } from "vitest";
import { resolveOptions } from "./config.ts";

describe("resolveOptions", () => {
  it("applies defaults", () => {
    expect(resolveOptions()).toEqual({ representation: "7-bit", visible: false });
  });

  it("keeps explicit values", () => {
    expect(resolveOptions({ representation: "8-bit", visible: true })).toEqual({
      representation: "8-bit",
      visible: true,
    });
  });

  it("rejects an unknown representation", () => {
    expect(() => resolveOptions({ representation: "6-bit" })).toThrow();
  });

  it("rejects a non-object", () => {
    expect(() => resolveOptions("8-bit")).toThrow();
  });
});
