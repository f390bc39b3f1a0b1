import { describe, expect, it } from "vitest";
import { InvalidParameterError } from "../errors.ts";
import { encodeParameters } from "./parameters.ts";

describe("encodeParameters", () => {
  it("returns an empty string for no parameters", () => {
    expect(encodeParameters([])).toBe("");
  });

  it("keeps interior omitted fields", () => {
    expect(encodeParameters([5, undefined, 1])).toBe("5;;1");
  });

  it("keeps leading omitted fields", () => {
    expect(encodeParameters([undefined, 3])).toBe(";3");
  });

  it("drops trailing omitted fields", () => {
    expect(encodeParameters([2, undefined, undefined])).toBe("2");
    expect(encodeParameters([undefined, undefined])).toBe("");
  });

  it("writes zero when zero is given", () => {
    expect(encodeParameters([0])).toBe("0");
  });

  it("writes decimals without leading zeros", () => {
    expect(encodeParameters([7, 120, 65535])).toBe("7;120;65535");
  });

  it("rejects negative values", () => {
    expect(() => encodeParameters([1, -1])).toThrow(InvalidParameterError);
    expect(() => encodeParameters([1, -1])).toThrow(
      "Parameter 2 must be a non-negative integer, got -1",
    );
  });

  it("rejects fractions and non-finite values", () => {
    expect(() => encodeParameters([1.5])).toThrow(InvalidParameterError);
    expect(() => encodeParameters([Number.NaN])).toThrow(InvalidParameterError);
    expect(() => encodeParameters([Number.POSITIVE_INFINITY])).toThrow(InvalidParameterError);
  });
});
