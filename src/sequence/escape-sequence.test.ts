import { describe, expect, it } from "vitest";
import { InvalidSequenceError } from "../errors.ts";
import { escape } from "./escape-sequence.ts";

describe("escape", () => {
  it("renders ESC followed by the final byte", () => {
    expect(String(escape("E"))).toBe("\x1bE");
  });

  it("renders C1 controls as one byte in 8-bit form", () => {
    expect(escape("E").encode("8-bit")).toBe("\x85");
    expect(escape("[").encode("8-bit")).toBe("\x9b");
    expect(escape("\\").encode("8-bit")).toBe("\x9c");
  });

  it("keeps independent functions in ESC form under 8-bit", () => {
    expect(escape("c").encode("8-bit")).toBe("\x1bc");
  });

  it("keeps sequences with intermediates in ESC form", () => {
    const sequence = escape("B", "(");
    expect(sequence.isC1).toBe(false);
    expect(sequence.encode("8-bit")).toBe("\x1b(B");
  });

  it("rejects final bytes below 0x30", () => {
    expect(() => escape("/")).toThrow(InvalidSequenceError);
  });
});
