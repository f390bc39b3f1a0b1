export { C0, C1, controlCode, independent, isControlCode } from "./codes/index.ts";
export type { C0Name, C1Name, ControlCode, IndependentName } from "./codes/index.ts";
export { type Options, type Representation, resolveOptions } from "./config.ts";
export { InvalidParameterError, InvalidSequenceError, OutputClosedError } from "./errors.ts";
export { cursor, type Direction } from "./functions/cursor.ts";
export { device } from "./functions/device.ts";
export { display } from "./functions/display.ts";
export { editor } from "./functions/editor.ts";
export { encodeFunction } from "./functions/encode.ts";
export { format } from "./functions/format.ts";
export { mode } from "./functions/mode.ts";
export { presentation } from "./functions/presentation.ts";
export type * from "./functions/types.ts";
export {
  type AlternativeFont,
  type ColorName,
  GraphicRendition,
  type IdeogramMark,
  RESET,
  sgr,
} from "./rendition.ts";
export type { ControlSequence } from "./sequence/control-sequence.ts";
export type { EscapeSequence } from "./sequence/escape-sequence.ts";
export { encodeParameters, type Parameter } from "./sequence/parameters.ts";
export type { Sequence } from "./sequence/types.ts";
export { clearScreen, stripSequences, visible, wrap } from "./terminal/format.ts";
export { execute, type Output } from "./terminal/output.ts";
