import type { ControlSequence } from "../sequence/control-sequence.ts";
import { encodeFunction } from "./encode.ts";
import type { Mode } from "./types.ts";

export const mode = {
  set: (...modes: Mode[]): ControlSequence => encodeFunction({ type: "SM", modes }),
  reset: (...modes: Mode[]): ControlSequence => encodeFunction({ type: "RM", modes }),
};
