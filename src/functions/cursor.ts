import type { ControlSequence } from "../sequence/control-sequence.ts";
import { type EscapeSequence, escape } from "../sequence/escape-sequence.ts";
import { encodeFunction } from "./encode.ts";
import type { TabulationControl } from "./types.ts";

export type Direction = "up" | "down" | "forward" | "backward" | "nextLine" | "previousLine";

const DIRECTIONS = {
  up: "CUU",
  down: "CUD",
  forward: "CUF",
  backward: "CUB",
  nextLine: "CNL",
  previousLine: "CPL",
} as const satisfies Record<Direction, string>;

/** Cursor movement. Rows and columns are 1-based and never clamped. */
export const cursor = {
  up: (count?: number): ControlSequence => encodeFunction({ type: "CUU", count }),
  down: (count?: number): ControlSequence => encodeFunction({ type: "CUD", count }),
  forward: (count?: number): ControlSequence => encodeFunction({ type: "CUF", count }),
  backward: (count?: number): ControlSequence => encodeFunction({ type: "CUB", count }),
  nextLine: (count?: number): ControlSequence => encodeFunction({ type: "CNL", count }),
  previousLine: (count?: number): ControlSequence => encodeFunction({ type: "CPL", count }),
  move: (direction: Direction, count?: number): ControlSequence =>
    encodeFunction({ type: DIRECTIONS[direction], count }),
  toColumn: (column?: number): ControlSequence => encodeFunction({ type: "CHA", column }),
  setPosition: (row: number, column: number): ControlSequence =>
    encodeFunction({ type: "CUP", row, column }),
  home: (): ControlSequence => encodeFunction({ type: "CUP" }),
  positionReport: (row: number, column: number): ControlSequence =>
    encodeFunction({ type: "CPR", row, column }),
  tabForward: (count?: number): ControlSequence => encodeFunction({ type: "CHT", count }),
  tabBackward: (count?: number): ControlSequence => encodeFunction({ type: "CBT", count }),
  lineTab: (count?: number): ControlSequence => encodeFunction({ type: "CVT", count }),
  tabulationControl: (...actions: TabulationControl[]): ControlSequence =>
    encodeFunction({ type: "CTC", actions }),
  // DEC save/restore (ESC 7, ESC 8): private-use Fp finals
  save: (): EscapeSequence => escape("7"),
  restore: (): EscapeSequence => escape("8"),
};
