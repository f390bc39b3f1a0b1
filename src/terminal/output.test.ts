import { describe, expect, it } from "vitest";
import { C1 } from "../codes/c1.ts";
import { OutputClosedError } from "../errors.ts";
import { cursor } from "../functions/cursor.ts";
import { type Output, execute } from "./output.ts";

function memoryOutput(): Output & { chunks: string[] } {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

describe("execute", () => {
  it("writes the encoded sequence", () => {
    const output = memoryOutput();
    execute(cursor.setPosition(5, 1), output);
    expect(output.chunks).toEqual(["\x1b[5;1H"]);
  });

  it("writes escape sequences and strings", () => {
    const output = memoryOutput();
    execute(C1.RI, output);
    execute("\x07", output);
    expect(output.chunks).toEqual(["\x1bM", "\x07"]);
  });

  it("refuses an ended stream", () => {
    const output = { write: () => true, writableEnded: true };
    expect(() => execute(cursor.up(), output)).toThrow(OutputClosedError);
  });

  it("refuses a destroyed stream", () => {
    const output = { write: () => true, destroyed: true };
    expect(() => execute(cursor.up(), output)).toThrow("Output stream is closed");
  });

  it("passes write failures through", () => {
    const output = {
      write: () => {
        throw new Error("EPIPE");
      },
    };
    expect(() => execute(cursor.up(), output)).toThrow("EPIPE");
  });
});
