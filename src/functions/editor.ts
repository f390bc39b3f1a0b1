import type { ControlSequence } from "../sequence/control-sequence.ts";
import { encodeFunction } from "./encode.ts";
import type { AreaErase, DisplayErase, EditingExtent, LineErase, Qualification } from "./types.ts";

export const editor = {
  insertCharacters: (count?: number): ControlSequence => encodeFunction({ type: "ICH", count }),
  insertLines: (count?: number): ControlSequence => encodeFunction({ type: "IL", count }),
  deleteCharacters: (count?: number): ControlSequence => encodeFunction({ type: "DCH", count }),
  deleteLines: (count?: number): ControlSequence => encodeFunction({ type: "DL", count }),
  eraseCharacters: (count?: number): ControlSequence => encodeFunction({ type: "ECH", count }),
  eraseDisplay: (erase: DisplayErase): ControlSequence => encodeFunction({ type: "ED", erase }),
  eraseLine: (erase: LineErase): ControlSequence => encodeFunction({ type: "EL", erase }),
  eraseField: (erase: AreaErase): ControlSequence => encodeFunction({ type: "EF", erase }),
  eraseArea: (erase: AreaErase): ControlSequence => encodeFunction({ type: "EA", erase }),
  selectExtent: (extent: EditingExtent): ControlSequence => encodeFunction({ type: "SEE", extent }),
  qualifyArea: (...qualifications: Qualification[]): ControlSequence =>
    encodeFunction({ type: "DAQ", qualifications }),
};
