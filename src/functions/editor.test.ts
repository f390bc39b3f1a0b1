import { describe, expect, it } from "vitest";
import { editor } from "./editor.ts";
import type { DisplayErase } from "./types.ts";

describe("editor", () => {
  it("gives each erase-in-display mode its own parameter", () => {
    const modes: DisplayErase[] = ["toEnd", "toStart", "screen", "scrollback"];
    const sequences = modes.map((erase) => String(editor.eraseDisplay(erase)));
    expect(sequences).toEqual(["\x1b[0J", "\x1b[1J", "\x1b[2J", "\x1b[3J"]);
    expect(new Set(sequences).size).toBe(4);
  });

  it("erases in line", () => {
    expect(String(editor.eraseLine("toEnd"))).toBe("\x1b[0K");
    expect(String(editor.eraseLine("toStart"))).toBe("\x1b[1K");
    expect(String(editor.eraseLine("line"))).toBe("\x1b[2K");
  });

  it("erases fields and areas", () => {
    expect(String(editor.eraseField("all"))).toBe("\x1b[2N");
    expect(String(editor.eraseArea("toStart"))).toBe("\x1b[1O");
  });

  it("inserts and deletes", () => {
    expect(String(editor.insertCharacters(4))).toBe("\x1b[4@");
    expect(String(editor.insertLines())).toBe("\x1b[L");
    expect(String(editor.deleteCharacters(2))).toBe("\x1b[2P");
    expect(String(editor.deleteLines(5))).toBe("\x1b[5M");
    expect(String(editor.eraseCharacters(8))).toBe("\x1b[8X");
  });

  it("selects the editing extent", () => {
    expect(String(editor.selectExtent("field"))).toBe("\x1b[2Q");
  });

  it("qualifies an area with several qualifications in order", () => {
    expect(String(editor.qualifyArea("protected", "fillZero", "reversed"))).toBe("\x1b[1;6;11o");
  });
});
