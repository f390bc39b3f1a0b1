import type { ControlSequence } from "../sequence/control-sequence.ts";
import { encodeFunction } from "./encode.ts";

/** Scrolling and page display. The active position is not affected. */
export const display = {
  scrollUp: (count?: number): ControlSequence => encodeFunction({ type: "SU", count }),
  scrollDown: (count?: number): ControlSequence => encodeFunction({ type: "SD", count }),
  scrollLeft: (count?: number): ControlSequence => encodeFunction({ type: "SL", count }),
  scrollRight: (count?: number): ControlSequence => encodeFunction({ type: "SR", count }),
  nextPage: (count?: number): ControlSequence => encodeFunction({ type: "NP", count }),
  previousPage: (count?: number): ControlSequence => encodeFunction({ type: "PP", count }),
};
