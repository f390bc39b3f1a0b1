import type { ControlSequence } from "../sequence/control-sequence.ts";
import { encodeFunction } from "./encode.ts";
import type {
  CharacterPath,
  CharacterSpacing,
  Combination,
  Expansion,
  Font,
  ImplicitMovement,
  Justification,
  Layout,
  LineOrientation,
  LineSpacing,
  Orientation,
  PageFormat,
  PathEffect,
  PresentationVariant,
  PrintQuality,
  SizeUnit,
  StringDirection,
  StringReversion,
  TextDelimiter,
} from "./types.ts";

/** Presentation functions other than SGR, which has its own builder. */
export const presentation = {
  repeat: (count?: number): ControlSequence => encodeFunction({ type: "REP", count }),
  implicitMovement: (movement: ImplicitMovement): ControlSequence =>
    encodeFunction({ type: "SIMD", movement }),
  directed: (direction: StringDirection): ControlSequence =>
    encodeFunction({ type: "SDS", direction }),
  reversed: (reversion: StringReversion): ControlSequence =>
    encodeFunction({ type: "SRS", reversion }),
  selectFont: (font: Font, identifier?: number): ControlSequence =>
    encodeFunction({ type: "FNT", font, identifier }),
  lineHome: (position?: number): ControlSequence => encodeFunction({ type: "SLH", position }),
  lineLimit: (position?: number): ControlSequence => encodeFunction({ type: "SLL", position }),
  pageHome: (position?: number): ControlSequence => encodeFunction({ type: "SPH", position }),
  pageLimit: (position?: number): ControlSequence => encodeFunction({ type: "SPL", position }),
  modifySize: (height?: number, width?: number): ControlSequence =>
    encodeFunction({ type: "GSM", height, width }),
  selectSize: (size?: number): ControlSequence => encodeFunction({ type: "GSS", size }),
  sizeUnit: (unit: SizeUnit): ControlSequence => encodeFunction({ type: "SSU", unit }),
  printQuality: (quality: PrintQuality): ControlSequence =>
    encodeFunction({ type: "SPQR", quality }),
  expandOrCondense: (expansion: Expansion): ControlSequence =>
    encodeFunction({ type: "PEC", expansion }),
  justify: (...modes: Justification[]): ControlSequence => encodeFunction({ type: "JFY", modes }),
  quad: (...layouts: Layout[]): ControlSequence => encodeFunction({ type: "QUAD", layouts }),
  orientation: (orientation: Orientation): ControlSequence =>
    encodeFunction({ type: "SCO", orientation }),
  dimensionText: (lines?: number, columns?: number): ControlSequence =>
    encodeFunction({ type: "DTA", lines, columns }),
  combine: (combination: Combination): ControlSequence =>
    encodeFunction({ type: "GCC", combination }),
  pageFormat: (format: PageFormat): ControlSequence => encodeFunction({ type: "PFS", format }),
  parallelTexts: (delimiter: TextDelimiter): ControlSequence =>
    encodeFunction({ type: "PTX", delimiter }),
  addSeparation: (separation?: number): ControlSequence =>
    encodeFunction({ type: "SACS", separation }),
  reduceSeparation: (separation?: number): ControlSequence =>
    encodeFunction({ type: "SRCS", separation }),
  alternatives: (...variants: PresentationVariant[]): ControlSequence =>
    encodeFunction({ type: "SAPV", variants }),
  characterPath: (path: CharacterPath, effect: PathEffect = "unspecified"): ControlSequence =>
    encodeFunction({ type: "SCP", path, effect }),
  /**
   * SPD. `progression` is the order of lines and `path` the order of
   * characters within a line. Along a vertical axis `leftToRight` stands for
   * top-to-bottom: the progression of horizontal lines, the path of vertical ones.
   */
  directions: (
    orientation: LineOrientation,
    progression: CharacterPath,
    path: CharacterPath,
    effect: PathEffect = "unspecified",
  ): ControlSequence => encodeFunction({ type: "SPD", orientation, progression, path, effect }),
  characterSpacing: (spacing: CharacterSpacing): ControlSequence =>
    encodeFunction({ type: "SHS", spacing }),
  lineSpacing: (spacing: LineSpacing): ControlSequence => encodeFunction({ type: "SVS", spacing }),
  setLineSpacing: (spacing?: number): ControlSequence => encodeFunction({ type: "SLS", spacing }),
  spacingIncrement: (line?: number, character?: number): ControlSequence =>
    encodeFunction({ type: "SPI", line, character }),
  spaceWidth: (width?: number): ControlSequence => encodeFunction({ type: "SSW", width }),
  thinSpace: (width?: number): ControlSequence => encodeFunction({ type: "TSS", width }),
};
