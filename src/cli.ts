import { type Options, resolveOptions } from "./config.ts";
import { controlCode, isControlCode } from "./codes/index.ts";
import { cursor } from "./functions/cursor.ts";
import { device } from "./functions/device.ts";
import { display } from "./functions/display.ts";
import { editor } from "./functions/editor.ts";
import { format } from "./functions/format.ts";
import { presentation } from "./functions/presentation.ts";
import type { DisplayErase, LineErase, TabulationClear } from "./functions/types.ts";
import { COLOR_OFFSETS, type ColorName, type GraphicRendition, sgr } from "./rendition.ts";
import type { Sequence } from "./sequence/types.ts";
import { visible, wrap } from "./terminal/format.ts";
import { type Output, execute } from "./terminal/output.ts";

const DISPLAY_ERASES = ["toEnd", "toStart", "screen", "scrollback"] as const satisfies readonly DisplayErase[];
const LINE_ERASES = ["toEnd", "toStart", "line"] as const satisfies readonly LineErase[];
const TABULATION_CLEARS = [
  "characterAtCursor",
  "lineAtCursor",
  "charactersInLine",
  "allCharacters",
  "allLines",
  "all",
] as const satisfies readonly TabulationClear[];

type Builder = (args: readonly string[]) => Sequence | Sequence[];

// `arity` caps the argument count; commands without one take any number.
type Command = { arity?: number; build: Builder };

function takes(arity: number, build: Builder): Command {
  return { arity, build };
}

function parameter(arg: string | undefined): number | undefined {
  if (arg === undefined || arg === "-") return undefined;
  if (!/^\d+$/.test(arg)) {
    throw new Error(`Expected a non-negative integer or "-", got "${arg}"`);
  }
  return Number(arg);
}

function required(arg: string | undefined, what: string): number {
  const value = parameter(arg);
  if (value === undefined) throw new Error(`Missing ${what}`);
  return value;
}

function choice<T extends string>(arg: string | undefined, choices: readonly T[], what: string): T {
  const found = choices.find((c) => c === arg);
  if (found === undefined) {
    throw new Error(`Unknown ${what} "${arg ?? ""}". Expected one of: ${choices.join(", ")}`);
  }
  return found;
}

const ATTRIBUTES: Record<string, (rendition: GraphicRendition) => GraphicRendition> = {
  reset: (r) => r.reset(),
  bold: (r) => r.bold(),
  faint: (r) => r.faint(),
  italic: (r) => r.italic(),
  underline: (r) => r.underline(),
  doubleUnderline: (r) => r.doubleUnderline(),
  blink: (r) => r.blink(),
  rapidBlink: (r) => r.rapidBlink(),
  reverse: (r) => r.reverse(),
  conceal: (r) => r.conceal(),
  strikethrough: (r) => r.strikethrough(),
  overlined: (r) => r.overlined(),
  framed: (r) => r.framed(),
  encircled: (r) => r.encircled(),
};

function isColorName(value: string): value is ColorName {
  return Object.hasOwn(COLOR_OFFSETS, value);
}

function applyColor(rendition: GraphicRendition, layer: "fg" | "bg", value: string): GraphicRendition {
  const foreground = layer === "fg";
  if (value === "default") return foreground ? rendition.fgDefault() : rendition.bgDefault();
  if (isColorName(value)) return foreground ? rendition.fg(value) : rendition.bg(value);
  if (/^\d+$/.test(value)) {
    const index = Number(value);
    return foreground ? rendition.fgIndex(index) : rendition.bgIndex(index);
  }
  const hex = value.match(/^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i);
  if (hex) {
    const [red, green, blue] = hex.slice(1).map((part) => Number.parseInt(part, 16));
    if (red !== undefined && green !== undefined && blue !== undefined) {
      return foreground ? rendition.fgRgb(red, green, blue) : rendition.bgRgb(red, green, blue);
    }
  }
  throw new Error(`Unknown colour "${value}"`);
}

/**
 * Build a rendition from words such as `bold`, `fg:red`, `bg:#102030`
 * or `fg:196`, applied in the order given.
 */
export function parseRendition(words: readonly string[]): GraphicRendition {
  const rendition = sgr();
  for (const word of words) {
    const color = word.match(/^(fg|bg):(.+)$/);
    if (color) {
      applyColor(rendition, color[1] === "fg" ? "fg" : "bg", color[2] ?? "");
      continue;
    }
    const attribute = Object.hasOwn(ATTRIBUTES, word) ? ATTRIBUTES[word] : undefined;
    if (!attribute) throw new Error(`Unknown attribute "${word}"`);
    attribute(rendition);
  }
  return rendition;
}

const COMMANDS = new Map<string, Command>([
  ["cuu", takes(1, ([n]) => cursor.up(parameter(n)))],
  ["cud", takes(1, ([n]) => cursor.down(parameter(n)))],
  ["cuf", takes(1, ([n]) => cursor.forward(parameter(n)))],
  ["cub", takes(1, ([n]) => cursor.backward(parameter(n)))],
  ["cnl", takes(1, ([n]) => cursor.nextLine(parameter(n)))],
  ["cpl", takes(1, ([n]) => cursor.previousLine(parameter(n)))],
  ["cha", takes(1, ([n]) => cursor.toColumn(parameter(n)))],
  [
    "cup",
    takes(2, ([row, column]) => cursor.setPosition(required(row, "row"), required(column, "column"))),
  ],
  ["cht", takes(1, ([n]) => cursor.tabForward(parameter(n)))],
  ["cbt", takes(1, ([n]) => cursor.tabBackward(parameter(n)))],
  ["save", takes(0, () => cursor.save())],
  ["restore", takes(0, () => cursor.restore())],
  ["hpa", takes(1, ([n]) => format.toColumn(parameter(n)))],
  ["vpa", takes(1, ([n]) => format.toLine(parameter(n)))],
  [
    "hvp",
    takes(2, ([row, column]) => format.setPosition(required(row, "row"), required(column, "column"))),
  ],
  [
    "tbc",
    takes(1, ([clear]) =>
      format.clearTabulation(choice(clear, TABULATION_CLEARS, "tabulation clear")),
    ),
  ],
  ["ich", takes(1, ([n]) => editor.insertCharacters(parameter(n)))],
  ["il", takes(1, ([n]) => editor.insertLines(parameter(n)))],
  ["dch", takes(1, ([n]) => editor.deleteCharacters(parameter(n)))],
  ["dl", takes(1, ([n]) => editor.deleteLines(parameter(n)))],
  ["ech", takes(1, ([n]) => editor.eraseCharacters(parameter(n)))],
  [
    "ed",
    takes(1, ([erase]) => editor.eraseDisplay(choice(erase, DISPLAY_ERASES, "erase mode"))),
  ],
  ["el", takes(1, ([erase]) => editor.eraseLine(choice(erase, LINE_ERASES, "erase mode")))],
  ["su", takes(1, ([n]) => display.scrollUp(parameter(n)))],
  ["sd", takes(1, ([n]) => display.scrollDown(parameter(n)))],
  ["sl", takes(1, ([n]) => display.scrollLeft(parameter(n)))],
  ["sr", takes(1, ([n]) => display.scrollRight(parameter(n)))],
  ["da", takes(1, ([n]) => device.attributes(parameter(n)))],
  ["rep", takes(1, ([n]) => presentation.repeat(parameter(n)))],
  ["sgr", { build: (words) => parseRendition(words).render() }],
  ["clear", takes(0, () => [editor.eraseDisplay("screen"), cursor.setPosition(1, 1)])],
]);

export function listCommands(): string[] {
  return Array.from(COMMANDS.keys());
}

export type ParsedArgs = {
  name: string | undefined;
  args: string[];
  options: Options;
};

export function parseArgs(argv: readonly string[]): ParsedArgs {
  let visible = false;
  let representation = "7-bit";
  const rest: string[] = [];

  for (const arg of argv) {
    if (arg === "--visible") {
      visible = true;
    } else if (arg === "--8bit") {
      representation = "8-bit";
    } else {
      rest.push(arg);
    }
  }

  const [name, ...args] = rest;
  return { name, args, options: resolveOptions({ representation, visible }) };
}

function checkArity(name: string, arity: number | undefined, args: readonly string[]): void {
  if (arity === undefined || args.length <= arity) return;
  const limit = arity === 0 ? "no arguments" : `at most ${arity} argument${arity === 1 ? "" : "s"}`;
  throw new Error(`"${name}" takes ${limit}, got ${args.length}`);
}

/** Encode the named function (a command or a control code name). */
export function render(name: string, args: readonly string[], options: Options): string {
  const upper = name.toUpperCase();
  if (isControlCode(upper)) {
    checkArity(name, 0, args);
    return controlCode(upper, options.representation);
  }

  const command = COMMANDS.get(name.toLowerCase());
  if (!command) throw new Error(`Unknown function "${name}". Run "ctlseq help" for the list.`);
  checkArity(name, command.arity, args);
  return [command.build(args)]
    .flat()
    .map((sequence) => sequence.encode(options.representation))
    .join("");
}

export type Streams = { stdout: Output; stderr: Output };

export function run(
  argv: readonly string[],
  streams: Streams = { stdout: process.stdout, stderr: process.stderr },
): number {
  try {
    const { name, args, options } = parseArgs(argv);
    if (name === undefined || name === "help") {
      execute(`usage: ctlseq <function> [args...] [--visible] [--8bit]\n`, streams.stdout);
      execute(`functions: ${listCommands().join(" ")}\n`, streams.stdout);
      execute("control codes: any C0, C1 or independent name (bel, nel, ris, ...)\n", streams.stdout);
      return name === undefined ? 1 : 0;
    }
    const text = render(name, args, options);
    execute(options.visible ? `${visible(text)}\n` : text, streams.stdout);
    return 0;
  } catch (err) {
    reportError(err, streams.stderr);
    return 1;
  }
}

/** Print `error: <message>` with the prefix in red. */
export function reportError(err: unknown, stderr: Output = process.stderr): void {
  const message = err instanceof Error ? err.message : String(err);
  execute(`${wrap("error:", sgr().fg("red"))} ${message}\n`, stderr);
}
