import { describe, expect, it } from "vitest";
import { parseArgs, parseRendition, render, reportError, run } from "./cli.ts";
import { resolveOptions } from "./config.ts";

function capture() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    streams: {
      stdout: { write: (chunk: string) => stdout.push(chunk) },
      stderr: { write: (chunk: string) => stderr.push(chunk) },
    },
  };
}

describe("parseArgs", () => {
  it("separates flags from the function and its arguments", () => {
    expect(parseArgs(["cup", "--visible", "5", "1", "--8bit"])).toEqual({
      name: "cup",
      args: ["5", "1"],
      options: { representation: "8-bit", visible: true },
    });
  });

  it("defaults the options", () => {
    expect(parseArgs([]).options).toEqual({ representation: "7-bit", visible: false });
  });
});

describe("parseRendition", () => {
  it("applies words in order", () => {
    expect(parseRendition(["fg:red", "bold", "underline"]).codes).toEqual([31, 1, 4]);
  });

  it("accepts indexed, RGB and default colours", () => {
    expect(parseRendition(["fg:196", "bg:#0a0b0c", "fg:default"]).codes).toEqual([
      38, 5, 196, 48, 2, 10, 11, 12, 39,
    ]);
  });

  it("rejects unknown words", () => {
    expect(() => parseRendition(["shiny"])).toThrow('Unknown attribute "shiny"');
    expect(() => parseRendition(["toString"])).toThrow('Unknown attribute "toString"');
    expect(() => parseRendition(["fg:mauve"])).toThrow('Unknown colour "mauve"');
  });
});

describe("render", () => {
  const options = resolveOptions();

  it("renders functions by mnemonic", () => {
    expect(render("cup", ["5", "1"], options)).toBe("\x1b[5;1H");
    expect(render("CUU", [], options)).toBe("\x1b[A");
    expect(render("ed", ["scrollback"], options)).toBe("\x1b[3J");
    expect(render("sgr", ["fg:red", "bold"], options)).toBe("\x1b[31;1m");
    expect(render("clear", [], options)).toBe("\x1b[2J\x1b[1;1H");
  });

  it("renders control codes by name", () => {
    expect(render("bel", [], options)).toBe("\x07");
    expect(render("nel", [], resolveOptions({ representation: "8-bit" }))).toBe("\x85");
  });

  it("uses the 8-bit introducer when asked", () => {
    expect(render("el", ["line"], resolveOptions({ representation: "8-bit" }))).toBe("\x9b2K");
  });

  it("treats - as an omitted parameter", () => {
    expect(render("cuf", ["-"], options)).toBe("\x1b[C");
  });

  it("reports bad input", () => {
    expect(() => render("cup", ["5"], options)).toThrow("Missing column");
    expect(() => render("cuu", ["-3"], options)).toThrow(
      'Expected a non-negative integer or "-", got "-3"',
    );
    expect(() => render("ed", ["everything"], options)).toThrow(
      'Unknown erase mode "everything". Expected one of: toEnd, toStart, screen, scrollback',
    );
    expect(() => render("nope", [], options)).toThrow('Unknown function "nope"');
  });

  it("rejects surplus arguments", () => {
    expect(() => render("cup", ["5", "1", "9"], options)).toThrow(
      '"cup" takes at most 2 arguments, got 3',
    );
    expect(() => render("cuu", ["1", "2"], options)).toThrow('"cuu" takes at most 1 argument, got 2');
    expect(() => render("save", ["now"], options)).toThrow('"save" takes no arguments, got 1');
    expect(() => render("bel", ["x"], options)).toThrow('"bel" takes no arguments, got 1');
  });

  it("takes any number of rendition words", () => {
    expect(render("sgr", ["bold", "italic", "underline", "blink"], options)).toBe("\x1b[1;3;4;5m");
  });

  it("saves and restores the cursor with ESC 7 and ESC 8", () => {
    expect(render("save", [], options)).toBe("\x1b7");
    expect(render("restore", [], resolveOptions({ representation: "8-bit" }))).toBe("\x1b8");
  });
});

describe("run", () => {
  it("writes the sequence to stdout", () => {
    const io = capture();
    expect(run(["cup", "5", "1"], io.streams)).toBe(0);
    expect(io.stdout).toEqual(["\x1b[5;1H"]);
    expect(io.stderr).toEqual([]);
  });

  it("prints a visible form with --visible", () => {
    const io = capture();
    expect(run(["sgr", "bold", "--visible"], io.streams)).toBe(0);
    expect(io.stdout).toEqual(["\\x1b[1m\n"]);
  });

  it("reports errors on stderr with exit code 1", () => {
    const io = capture();
    expect(run(["cup"], io.streams)).toBe(1);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual(["\x1b[31merror:\x1b[0m Missing row\n"]);
  });

  it("prints usage for help", () => {
    const io = capture();
    expect(run(["help"], io.streams)).toBe(0);
    expect(io.stdout[0]).toBe("usage: ctlseq <function> [args...] [--visible] [--8bit]\n");
  });

  it("reports surplus arguments as a usage error", () => {
    const io = capture();
    expect(run(["cup", "5", "1", "9"], io.streams)).toBe(1);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual(['\x1b[31merror:\x1b[0m "cup" takes at most 2 arguments, got 3\n']);
  });

  it("exits with 1 when no function is given", () => {
    const io = capture();
    expect(run([], io.streams)).toBe(1);
  });
});

describe("reportError", () => {
  it("reports a failed stdout write in the CLI's error format", () => {
    const io = capture();
    const err = Object.assign(new Error("write EPIPE"), { code: "EPIPE" });
    reportError(err, io.streams.stderr);
    expect(io.stderr).toEqual(["\x1b[31merror:\x1b[0m write EPIPE\n"]);
  });

  it("reports non-Error values by their string form", () => {
    const io = capture();
    reportError("broken", io.streams.stderr);
    expect(io.stderr).toEqual(["\x1b[31merror:\x1b[0m broken\n"]);
  });
});
