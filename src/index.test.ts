import { describe, expect, it } from "vitest";
import { clearScreen, cursor, sgr, stripSequences, wrap } from "./index.ts";

describe("package entry", () => {
  it("formats a line the way a caller would", () => {
    const line = `Hello ${sgr().fg("red").bold().underline()}World${sgr().reset()} !`;
    expect(line).toBe("Hello \x1b[31;1;4mWorld\x1b[0m !");
    expect(wrap("World", sgr().fg("red").bold().underline())).toBe("\x1b[31;1;4mWorld\x1b[0m");
    expect(stripSequences(line)).toBe("Hello World !");
  });

  it("emits sequences to an output", () => {
    const chunks: string[] = [];
    const output = { write: (chunk: string) => chunks.push(chunk) };
    clearScreen(output);
    cursor.setPosition(5, 1).exec(output);
    expect(chunks.join("")).toBe("\x1b[2J\x1b[1;1H\x1b[5;1H");
  });
});
