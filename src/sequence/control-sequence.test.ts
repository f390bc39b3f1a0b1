import { describe, expect, it } from "vitest";
import { InvalidParameterError, InvalidSequenceError } from "../errors.ts";
import { ControlSequence, controlSequence } from "./control-sequence.ts";

describe("controlSequence", () => {
  it("assembles CSI, parameters and final byte", () => {
    expect(String(controlSequence("H", [5, 1]))).toBe("\x1b[5;1H");
  });

  it("omits the parameter block when there are no parameters", () => {
    expect(String(controlSequence("H"))).toBe("\x1b[H");
    expect(String(controlSequence("H", [undefined, undefined]))).toBe("\x1b[H");
  });

  it("places intermediate bytes between parameters and final byte", () => {
    expect(String(controlSequence("@", [3], " "))).toBe("\x1b[3 @");
  });

  it("encodes the 8-bit introducer", () => {
    expect(controlSequence("J", [2]).encode("8-bit")).toBe("\x9b2J");
  });

  it("exposes its parts", () => {
    const sequence = controlSequence("m", [38, 5, 196]);
    expect(sequence).toBeInstanceOf(ControlSequence);
    expect(sequence.parameters).toBe("38;5;196");
    expect(sequence.intermediates).toBe("");
    expect(sequence.final).toBe("m");
  });

  it("renders the same value identically every time", () => {
    const sequence = controlSequence("H", [12, 40]);
    expect(sequence.encode()).toBe(sequence.encode());
    expect(`${sequence}${sequence}`).toBe("\x1b[12;40H\x1b[12;40H");
  });

  it("rejects final bytes outside 0x40-0x7E", () => {
    expect(() => controlSequence("1")).toThrow(InvalidSequenceError);
    expect(() => controlSequence("HH")).toThrow(InvalidSequenceError);
    expect(() => controlSequence("")).toThrow(InvalidSequenceError);
  });

  it("rejects intermediate bytes outside 0x20-0x2F", () => {
    expect(() => controlSequence("m", [], "a")).toThrow(InvalidSequenceError);
  });

  it("rejects invalid parameters", () => {
    expect(() => controlSequence("A", [-2])).toThrow(InvalidParameterError);
  });

  it("writes itself to an output", () => {
    const chunks: string[] = [];
    controlSequence("K", [2]).exec({ write: (chunk: string) => chunks.push(chunk) });
    expect(chunks).toEqual(["\x1b[2K"]);
  });
});
