import type { ControlSequence } from "../sequence/control-sequence.ts";
import { encodeFunction } from "./encode.ts";
import type { ControlString, MediaCopy, StatusReport } from "./types.ts";

export const device = {
  attributes: (value?: number): ControlSequence => encodeFunction({ type: "DA", value }),
  statusReport: (status: StatusReport): ControlSequence => encodeFunction({ type: "DSR", status }),
  mediaCopy: (copy: MediaCopy): ControlSequence => encodeFunction({ type: "MC", copy }),
  functionKey: (key: number): ControlSequence => encodeFunction({ type: "FNK", key }),
  identifyControlString: (kind: ControlString): ControlSequence =>
    encodeFunction({ type: "IDCS", kind }),
  ejectAndFeed: (bin?: number, stacker?: number): ControlSequence =>
    encodeFunction({ type: "SEF", bin, stacker }),
  identifyGraphicSubrepertoire: (repertoire: number): ControlSequence =>
    encodeFunction({ type: "IGS", repertoire }),
};
