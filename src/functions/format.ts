import type { ControlSequence } from "../sequence/control-sequence.ts";
import { encodeFunction } from "./encode.ts";
import type { TabulationClear } from "./types.ts";

/** Format effectors: data-position moves, page moves and tabulation stops. */
export const format = {
  toColumn: (column?: number): ControlSequence => encodeFunction({ type: "HPA", column }),
  columnForward: (count?: number): ControlSequence => encodeFunction({ type: "HPR", count }),
  columnBackward: (count?: number): ControlSequence => encodeFunction({ type: "HPB", count }),
  toLine: (row?: number): ControlSequence => encodeFunction({ type: "VPA", row }),
  lineForward: (count?: number): ControlSequence => encodeFunction({ type: "VPR", count }),
  lineBackward: (count?: number): ControlSequence => encodeFunction({ type: "VPB", count }),
  setPosition: (row: number, column: number): ControlSequence =>
    encodeFunction({ type: "HVP", row, column }),
  toPage: (page?: number): ControlSequence => encodeFunction({ type: "PPA", page }),
  pageForward: (count?: number): ControlSequence => encodeFunction({ type: "PPR", count }),
  pageBackward: (count?: number): ControlSequence => encodeFunction({ type: "PPB", count }),
  clearTabulation: (clear: TabulationClear = "characterAtCursor"): ControlSequence =>
    encodeFunction({ type: "TBC", clear }),
  removeTabStop: (position?: number): ControlSequence => encodeFunction({ type: "TSR", position }),
  selectTabulation: (selection?: number): ControlSequence =>
    encodeFunction({ type: "STAB", selection }),
  alignCentred: (position?: number): ControlSequence => encodeFunction({ type: "TAC", position }),
  alignLeading: (position?: number): ControlSequence => encodeFunction({ type: "TALE", position }),
  alignTrailing: (position?: number): ControlSequence => encodeFunction({ type: "TATE", position }),
  /** TCC: centre on `character`, a character code (the terminal's default is 46, FULL STOP). */
  centreOnCharacter: (position?: number, character?: number): ControlSequence =>
    encodeFunction({ type: "TCC", position, character }),
};
