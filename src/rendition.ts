/**
 * SELECT GRAPHIC RENDITION builder.
 *
 * Each call appends its parameter(s) in call order; nothing is sorted or
 * de-duplicated, since later codes of the same kind override earlier ones
 * on the terminal. Extended colours stay one contiguous run
 * (`38;5;n`, `38;2;r;g;b`).
 */

import { z } from "zod/v4";
import { InvalidParameterError } from "./errors.ts";
import { encodeFunction } from "./functions/encode.ts";
import type { ControlSequence } from "./sequence/control-sequence.ts";
import type { Output } from "./terminal/output.ts";

export type ColorName =
  | "black"
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan"
  | "white"
  | "brightBlack"
  | "brightRed"
  | "brightGreen"
  | "brightYellow"
  | "brightBlue"
  | "brightMagenta"
  | "brightCyan"
  | "brightWhite";

// Offsets from 30 (foreground) and 40 (background). The bright range
// (90–97, 100–107) is the aixterm extension most terminals accept.
export const COLOR_OFFSETS: Record<ColorName, number> = {
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
  brightBlack: 60,
  brightRed: 61,
  brightGreen: 62,
  brightYellow: 63,
  brightBlue: 64,
  brightMagenta: 65,
  brightCyan: 66,
  brightWhite: 67,
};

export type AlternativeFont = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type IdeogramMark =
  | "underline"
  | "doubleUnderline"
  | "overline"
  | "doubleOverline"
  | "stress"
  | "cancel";

const IDEOGRAM_MARKS: Record<IdeogramMark, number> = {
  underline: 60,
  doubleUnderline: 61,
  overline: 62,
  doubleOverline: 63,
  stress: 64,
  cancel: 65,
};

const FOREGROUND = 30;
const BACKGROUND = 40;

const componentSchema = z.number().int().min(0).max(255);

function component(value: number, name: string): number {
  const result = componentSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidParameterError(`${name} must be an integer from 0 to 255, got ${value}`);
  }
  return result.data;
}

export class GraphicRendition {
  private readonly list: number[];

  constructor(codes: readonly number[] = []) {
    this.list = [...codes];
  }

  /** The accumulated parameters, in call order. */
  get codes(): number[] {
    return [...this.list];
  }

  reset(): this {
    return this.push(0);
  }
  bold(): this {
    return this.push(1);
  }
  faint(): this {
    return this.push(2);
  }
  italic(): this {
    return this.push(3);
  }
  underline(): this {
    return this.push(4);
  }
  blink(): this {
    return this.push(5);
  }
  rapidBlink(): this {
    return this.push(6);
  }
  reverse(): this {
    return this.push(7);
  }
  conceal(): this {
    return this.push(8);
  }
  strikethrough(): this {
    return this.push(9);
  }
  primaryFont(): this {
    return this.push(10);
  }
  alternativeFont(font: AlternativeFont): this {
    return this.push(10 + font);
  }
  fraktur(): this {
    return this.push(20);
  }
  doubleUnderline(): this {
    return this.push(21);
  }
  normalIntensity(): this {
    return this.push(22);
  }
  notItalic(): this {
    return this.push(23);
  }
  notUnderlined(): this {
    return this.push(24);
  }
  notBlinking(): this {
    return this.push(25);
  }
  notReversed(): this {
    return this.push(27);
  }
  reveal(): this {
    return this.push(28);
  }
  notStrikethrough(): this {
    return this.push(29);
  }

  fg(color: ColorName): this {
    return this.push(FOREGROUND + COLOR_OFFSETS[color]);
  }
  fgIndex(index: number): this {
    return this.push(38, 5, component(index, "Colour index"));
  }
  fgRgb(red: number, green: number, blue: number): this {
    return this.push(38, 2, ...rgb(red, green, blue));
  }
  fgDefault(): this {
    return this.push(39);
  }

  bg(color: ColorName): this {
    return this.push(BACKGROUND + COLOR_OFFSETS[color]);
  }
  bgIndex(index: number): this {
    return this.push(48, 5, component(index, "Colour index"));
  }
  bgRgb(red: number, green: number, blue: number): this {
    return this.push(48, 2, ...rgb(red, green, blue));
  }
  bgDefault(): this {
    return this.push(49);
  }

  framed(): this {
    return this.push(51);
  }
  encircled(): this {
    return this.push(52);
  }
  overlined(): this {
    return this.push(53);
  }
  notFramed(): this {
    return this.push(54);
  }
  notOverlined(): this {
    return this.push(55);
  }
  ideogram(mark: IdeogramMark): this {
    return this.push(IDEOGRAM_MARKS[mark]);
  }

  clone(): GraphicRendition {
    return new GraphicRendition(this.list);
  }

  /**
   * `CSI codes m`. An empty builder renders `CSI m`, whose omitted
   * parameter the terminal reads as 0 (default rendition).
   */
  render(): ControlSequence {
    return encodeFunction({ type: "SGR", codes: this.list });
  }

  toString(): string {
    return this.render().encode();
  }

  exec(output?: Output): void {
    this.render().exec(output);
  }

  private push(...codes: number[]): this {
    this.list.push(...codes);
    return this;
  }
}

function rgb(red: number, green: number, blue: number): number[] {
  return [component(red, "Red"), component(green, "Green"), component(blue, "Blue")];
}

export function sgr(): GraphicRendition {
  return new GraphicRendition();
}

/** `CSI 0 m`: every attribute back to its default. */
export const RESET = sgr().reset().render();
