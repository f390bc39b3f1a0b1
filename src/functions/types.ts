/**
 * Every supported ECMA-48 control function as a tagged union keyed by
 * its mnemonic. Each variant carries only the parameters of that function;
 * an omitted count or position leaves the parameter empty.
 */

import type { Parameter } from "../sequence/parameters.ts";

// ED
export type DisplayErase = "toEnd" | "toStart" | "screen" | "scrollback";
// EL
export type LineErase = "toEnd" | "toStart" | "line";
// EF, EA
export type AreaErase = "toEnd" | "toStart" | "all";

export type TabulationControl =
  | "setCharacter"
  | "setLine"
  | "clearCharacter"
  | "clearLine"
  | "clearCharactersInLine"
  | "clearAllCharacters"
  | "clearAllLines";

export type TabulationClear =
  | "characterAtCursor"
  | "lineAtCursor"
  | "charactersInLine"
  | "allCharacters"
  | "allLines"
  | "all";

export type EditingExtent = "page" | "line" | "field" | "qualifiedArea" | "relevant";

export type Qualification =
  | "unprotected"
  | "protected"
  | "graphic"
  | "numeric"
  | "alphabetic"
  | "alignLast"
  | "fillZero"
  | "tabStop"
  | "protectedUnguarded"
  | "fillSpace"
  | "alignFirst"
  | "reversed";

export type Mode =
  | "GATM"
  | "KAM"
  | "CRM"
  | "IRM"
  | "SRTM"
  | "ERM"
  | "VEM"
  | "BDSM"
  | "DCSM"
  | "HEM"
  | "PUM"
  | "SRM"
  | "FEAM"
  | "FETM"
  | "MATM"
  | "TTM"
  | "SATM"
  | "TSM"
  | "GRCM"
  | "ZDM";

export type StatusReport =
  | "ready"
  | "busyRetry"
  | "busyWaiting"
  | "errorRetry"
  | "errorWaiting"
  | "statusRequest"
  | "positionRequest";

export type MediaCopy =
  | "toPrimary"
  | "fromPrimary"
  | "toSecondary"
  | "fromSecondary"
  | "stopPrimary"
  | "startPrimary"
  | "stopSecondary"
  | "startSecondary";

export type ControlString = "diagnostic" | "dynamicCharset";

export type ImplicitMovement = "same" | "opposite";
export type StringDirection = "end" | "leftToRight" | "rightToLeft";
export type StringReversion = "end" | "reversed";

export type SizeUnit =
  | "character"
  | "millimetre"
  | "computerDecipoint"
  | "decidot"
  | "mil"
  | "basicMeasuringUnit"
  | "micrometre"
  | "pixel"
  | "decipoint";

export type PrintQuality = "highest" | "medium" | "draft";
export type Expansion = "normal" | "expanded" | "condensed";

export type Justification =
  | "none"
  | "wordFill"
  | "wordSpace"
  | "letterSpace"
  | "hyphenation"
  | "flushHome"
  | "centre"
  | "flushLimit"
  | "italianHyphenation";

export type Layout =
  | "flushHome"
  | "flushHomeFill"
  | "centre"
  | "centreFill"
  | "flushLimit"
  | "flushLimitFill"
  | "flushBoth";

// GCC
export type Combination = "two" | "start" | "end";

// PFS
export type PageFormat =
  | "tallText"
  | "wideText"
  | "tallA4"
  | "wideA4"
  | "tallLetter"
  | "wideLetter"
  | "tallExtendedA4"
  | "wideExtendedA4"
  | "tallLegal"
  | "wideLegal"
  | "a4ShortLines"
  | "a4LongLines"
  | "b5ShortLines"
  | "b5LongLines"
  | "b4ShortLines"
  | "b4LongLines";

// PTX
export type TextDelimiter =
  | "end"
  | "principal"
  | "supplementary"
  | "phoneticJapanese"
  | "phoneticChinese"
  | "endPhonetic";

// SAPV
export type PresentationVariant =
  | "default"
  | "latinDecimal"
  | "arabicDecimal"
  | "mirrorHorizontal"
  | "mirrorVertical"
  | "isolated"
  | "initial"
  | "medial"
  | "final"
  | "decimalFullStop"
  | "decimalComma"
  | "vowelAboveOrBelow"
  | "vowelAfter"
  | "ligatureAleph"
  | "noLigature"
  | "noMirror"
  | "noVowel"
  | "slantOppositeDirection"
  | "noContextDigits"
  | "noContext"
  | "deviceDigits"
  | "establishForms"
  | "cancelForms";

// SCP, SPD
export type CharacterPath = "leftToRight" | "rightToLeft";
export type PathEffect = "unspecified" | "updatePresentation" | "updateData";
export type LineOrientation = "horizontal" | "vertical";

/** SHS: characters per unit length. */
export type CharacterSpacing =
  | "10/25.4mm"
  | "12/25.4mm"
  | "15/25.4mm"
  | "6/25.4mm"
  | "3/25.4mm"
  | "9/50.8mm"
  | "4/25.4mm";

/** SVS: lines per unit length. */
export type LineSpacing =
  | "6/25.4mm"
  | "4/25.4mm"
  | "3/25.4mm"
  | "12/25.4mm"
  | "8/25.4mm"
  | "6/30mm"
  | "4/30mm"
  | "3/30mm"
  | "12/30mm"
  | "2/25.4mm";

/** Character orientation in degrees, counter-clockwise. */
export type Orientation = 0 | 45 | 90 | 135 | 180 | 225 | 270 | 315;

export type Font = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

type Count<T extends string> = { type: T; count?: number };
type Position<T extends string> = { type: T; position?: number };

export type CursorFunction =
  | Count<"CUU" | "CUD" | "CUF" | "CUB" | "CNL" | "CPL" | "CBT" | "CHT" | "CVT">
  | { type: "CHA"; column?: number }
  | { type: "CUP" | "CPR"; row?: number; column?: number }
  | { type: "CTC"; actions: readonly TabulationControl[] };

export type FormatFunction =
  | Count<"HPR" | "HPB" | "VPR" | "VPB" | "PPR" | "PPB">
  | { type: "HPA"; column?: number }
  | { type: "VPA"; row?: number }
  | { type: "HVP"; row?: number; column?: number }
  | { type: "PPA"; page?: number }
  | { type: "TBC"; clear: TabulationClear }
  | Position<"TSR" | "TAC" | "TALE" | "TATE">
  | { type: "TCC"; position?: number; character?: number }
  | { type: "STAB"; selection?: number };

export type EditorFunction =
  | Count<"ICH" | "IL" | "DCH" | "DL" | "ECH">
  | { type: "ED"; erase: DisplayErase }
  | { type: "EL"; erase: LineErase }
  | { type: "EF" | "EA"; erase: AreaErase }
  | { type: "SEE"; extent: EditingExtent }
  | { type: "DAQ"; qualifications: readonly Qualification[] };

export type DisplayFunction = Count<"SU" | "SD" | "SL" | "SR" | "NP" | "PP">;

export type ModeFunction = { type: "SM" | "RM"; modes: readonly Mode[] };

export type DeviceFunction =
  | { type: "DA"; value?: number }
  | { type: "DSR"; status: StatusReport }
  | { type: "MC"; copy: MediaCopy }
  | { type: "FNK"; key: number }
  | { type: "IDCS"; kind: ControlString }
  | { type: "SEF"; bin?: number; stacker?: number }
  | { type: "IGS"; repertoire: number };

export type PresentationFunction =
  | { type: "SGR"; codes: readonly Parameter[] }
  | Count<"REP">
  | { type: "SIMD"; movement: ImplicitMovement }
  | { type: "SDS"; direction: StringDirection }
  | { type: "SRS"; reversion: StringReversion }
  | { type: "FNT"; font: Font; identifier?: number }
  | Position<"SLH" | "SLL" | "SPH" | "SPL">
  | { type: "GSM"; height?: number; width?: number }
  | { type: "GSS"; size?: number }
  | { type: "SSU"; unit: SizeUnit }
  | { type: "SPQR"; quality: PrintQuality }
  | { type: "PEC"; expansion: Expansion }
  | { type: "JFY"; modes: readonly Justification[] }
  | { type: "QUAD"; layouts: readonly Layout[] }
  | { type: "SCO"; orientation: Orientation }
  | { type: "DTA"; lines?: number; columns?: number }
  | { type: "GCC"; combination: Combination }
  | { type: "PFS"; format: PageFormat }
  | { type: "PTX"; delimiter: TextDelimiter }
  | { type: "SACS" | "SRCS"; separation?: number }
  | { type: "SAPV"; variants: readonly PresentationVariant[] }
  | { type: "SCP"; path: CharacterPath; effect: PathEffect }
  | {
      type: "SPD";
      orientation: LineOrientation;
      progression: CharacterPath;
      path: CharacterPath;
      effect: PathEffect;
    }
  | { type: "SHS"; spacing: CharacterSpacing }
  | { type: "SVS"; spacing: LineSpacing }
  | { type: "SLS"; spacing?: number }
  | { type: "SPI"; line?: number; character?: number }
  | { type: "SSW" | "TSS"; width?: number };

export type ControlFunction =
  | CursorFunction
  | FormatFunction
  | EditorFunction
  | DisplayFunction
  | ModeFunction
  | DeviceFunction
  | PresentationFunction;

export type Mnemonic = ControlFunction["type"];
