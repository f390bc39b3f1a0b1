/**
 * Maps each control function to its parameters, intermediate bytes and
 * final byte. Final bytes are fixed here and nowhere else.
 */

import { type ControlSequence, controlSequence } from "../sequence/control-sequence.ts";
import type { Parameter } from "../sequence/parameters.ts";
import type {
  AreaErase,
  CharacterPath,
  CharacterSpacing,
  Combination,
  ControlFunction,
  ControlString,
  DisplayErase,
  EditingExtent,
  Expansion,
  ImplicitMovement,
  Justification,
  Layout,
  LineErase,
  LineOrientation,
  LineSpacing,
  MediaCopy,
  Mnemonic,
  Mode,
  PageFormat,
  PathEffect,
  PresentationVariant,
  PrintQuality,
  Qualification,
  SizeUnit,
  StatusReport,
  StringDirection,
  StringReversion,
  TabulationClear,
  TabulationControl,
  TextDelimiter,
} from "./types.ts";

type Identity = { final: string; intermediates?: string };

const IDENTITIES: Record<Mnemonic, Identity> = {
  // cursor
  CUU: { final: "A" },
  CUD: { final: "B" },
  CUF: { final: "C" },
  CUB: { final: "D" },
  CNL: { final: "E" },
  CPL: { final: "F" },
  CHA: { final: "G" },
  CUP: { final: "H" },
  CHT: { final: "I" },
  CPR: { final: "R" },
  CTC: { final: "W" },
  CVT: { final: "Y" },
  CBT: { final: "Z" },
  // format
  HPA: { final: "`" },
  HPR: { final: "a" },
  VPA: { final: "d" },
  VPR: { final: "e" },
  HVP: { final: "f" },
  TBC: { final: "g" },
  HPB: { final: "j" },
  VPB: { final: "k" },
  PPA: { final: "P", intermediates: " " },
  PPR: { final: "Q", intermediates: " " },
  PPB: { final: "R", intermediates: " " },
  TSR: { final: "d", intermediates: " " },
  STAB: { final: "^", intermediates: " " },
  TATE: { final: "`", intermediates: " " },
  TALE: { final: "a", intermediates: " " },
  TAC: { final: "b", intermediates: " " },
  TCC: { final: "c", intermediates: " " },
  // editor
  ICH: { final: "@" },
  ED: { final: "J" },
  EL: { final: "K" },
  IL: { final: "L" },
  DL: { final: "M" },
  EF: { final: "N" },
  EA: { final: "O" },
  DCH: { final: "P" },
  SEE: { final: "Q" },
  ECH: { final: "X" },
  DAQ: { final: "o" },
  // display
  SU: { final: "S" },
  SD: { final: "T" },
  NP: { final: "U" },
  PP: { final: "V" },
  SL: { final: "@", intermediates: " " },
  SR: { final: "A", intermediates: " " },
  // modes
  SM: { final: "h" },
  RM: { final: "l" },
  // device
  DA: { final: "c" },
  MC: { final: "i" },
  DSR: { final: "n" },
  IDCS: { final: "O", intermediates: " " },
  FNK: { final: "W", intermediates: " " },
  SEF: { final: "Y", intermediates: " " },
  IGS: { final: "M", intermediates: " " },
  // presentation
  SRS: { final: "[" },
  SDS: { final: "]" },
  SIMD: { final: "^" },
  REP: { final: "b" },
  SGR: { final: "m" },
  GSM: { final: "B", intermediates: " " },
  GSS: { final: "C", intermediates: " " },
  FNT: { final: "D", intermediates: " " },
  JFY: { final: "F", intermediates: " " },
  QUAD: { final: "H", intermediates: " " },
  SSU: { final: "I", intermediates: " " },
  SLH: { final: "U", intermediates: " " },
  SLL: { final: "V", intermediates: " " },
  SPQR: { final: "X", intermediates: " " },
  PEC: { final: "Z", intermediates: " " },
  SCO: { final: "e", intermediates: " " },
  SPH: { final: "i", intermediates: " " },
  SPL: { final: "j", intermediates: " " },
  PTX: { final: "\\" },
  DTA: { final: "T", intermediates: " " },
  TSS: { final: "E", intermediates: " " },
  SPI: { final: "G", intermediates: " " },
  PFS: { final: "J", intermediates: " " },
  SHS: { final: "K", intermediates: " " },
  SVS: { final: "L", intermediates: " " },
  SPD: { final: "S", intermediates: " " },
  SSW: { final: "[", intermediates: " " },
  SACS: { final: "\\", intermediates: " " },
  SAPV: { final: "]", intermediates: " " },
  GCC: { final: "_", intermediates: " " },
  SRCS: { final: "f", intermediates: " " },
  SLS: { final: "h", intermediates: " " },
  SCP: { final: "k", intermediates: " " },
};

const DISPLAY_ERASE: Record<DisplayErase, number> = {
  toEnd: 0,
  toStart: 1,
  screen: 2,
  scrollback: 3,
};

const LINE_ERASE: Record<LineErase, number> = { toEnd: 0, toStart: 1, line: 2 };

const AREA_ERASE: Record<AreaErase, number> = { toEnd: 0, toStart: 1, all: 2 };

const TABULATION_CONTROL: Record<TabulationControl, number> = {
  setCharacter: 0,
  setLine: 1,
  clearCharacter: 2,
  clearLine: 3,
  clearCharactersInLine: 4,
  clearAllCharacters: 5,
  clearAllLines: 6,
};

const TABULATION_CLEAR: Record<TabulationClear, number> = {
  characterAtCursor: 0,
  lineAtCursor: 1,
  charactersInLine: 2,
  allCharacters: 3,
  allLines: 4,
  all: 5,
};

const EDITING_EXTENT: Record<EditingExtent, number> = {
  page: 0,
  line: 1,
  field: 2,
  qualifiedArea: 3,
  relevant: 4,
};

const QUALIFICATION: Record<Qualification, number> = {
  unprotected: 0,
  protected: 1,
  graphic: 2,
  numeric: 3,
  alphabetic: 4,
  alignLast: 5,
  fillZero: 6,
  tabStop: 7,
  protectedUnguarded: 8,
  fillSpace: 9,
  alignFirst: 10,
  reversed: 11,
};

const MODE: Record<Mode, number> = {
  GATM: 1,
  KAM: 2,
  CRM: 3,
  IRM: 4,
  SRTM: 5,
  ERM: 6,
  VEM: 7,
  BDSM: 8,
  DCSM: 9,
  HEM: 10,
  PUM: 11,
  SRM: 12,
  FEAM: 13,
  FETM: 14,
  MATM: 15,
  TTM: 16,
  SATM: 17,
  TSM: 18,
  GRCM: 21,
  ZDM: 22,
};

const STATUS_REPORT: Record<StatusReport, number> = {
  ready: 0,
  busyRetry: 1,
  busyWaiting: 2,
  errorRetry: 3,
  errorWaiting: 4,
  statusRequest: 5,
  positionRequest: 6,
};

const MEDIA_COPY: Record<MediaCopy, number> = {
  toPrimary: 0,
  fromPrimary: 1,
  toSecondary: 2,
  fromSecondary: 3,
  stopPrimary: 4,
  startPrimary: 5,
  stopSecondary: 6,
  startSecondary: 7,
};

const CONTROL_STRING: Record<ControlString, number> = { diagnostic: 1, dynamicCharset: 2 };

const IMPLICIT_MOVEMENT: Record<ImplicitMovement, number> = { same: 0, opposite: 1 };

const STRING_DIRECTION: Record<StringDirection, number> = {
  end: 0,
  leftToRight: 1,
  rightToLeft: 2,
};

const STRING_REVERSION: Record<StringReversion, number> = { end: 0, reversed: 1 };

const SIZE_UNIT: Record<SizeUnit, number> = {
  character: 0,
  millimetre: 1,
  computerDecipoint: 2,
  decidot: 3,
  mil: 4,
  basicMeasuringUnit: 5,
  micrometre: 6,
  pixel: 7,
  decipoint: 8,
};

const PRINT_QUALITY: Record<PrintQuality, number> = { highest: 0, medium: 1, draft: 2 };

const EXPANSION: Record<Expansion, number> = { normal: 0, expanded: 1, condensed: 2 };

const JUSTIFICATION: Record<Justification, number> = {
  none: 0,
  wordFill: 1,
  wordSpace: 2,
  letterSpace: 3,
  hyphenation: 4,
  flushHome: 5,
  centre: 6,
  flushLimit: 7,
  italianHyphenation: 8,
};

const LAYOUT: Record<Layout, number> = {
  flushHome: 0,
  flushHomeFill: 1,
  centre: 2,
  centreFill: 3,
  flushLimit: 4,
  flushLimitFill: 5,
  flushBoth: 6,
};

const COMBINATION: Record<Combination, number> = { two: 0, start: 1, end: 2 };

const PAGE_FORMAT: Record<PageFormat, number> = {
  tallText: 0,
  wideText: 1,
  tallA4: 2,
  wideA4: 3,
  tallLetter: 4,
  wideLetter: 5,
  tallExtendedA4: 6,
  wideExtendedA4: 7,
  tallLegal: 8,
  wideLegal: 9,
  a4ShortLines: 10,
  a4LongLines: 11,
  b5ShortLines: 12,
  b5LongLines: 13,
  b4ShortLines: 14,
  b4LongLines: 15,
};

const TEXT_DELIMITER: Record<TextDelimiter, number> = {
  end: 0,
  principal: 1,
  supplementary: 2,
  phoneticJapanese: 3,
  phoneticChinese: 4,
  endPhonetic: 5,
};

const PRESENTATION_VARIANT: Record<PresentationVariant, number> = {
  default: 0,
  latinDecimal: 1,
  arabicDecimal: 2,
  mirrorHorizontal: 3,
  mirrorVertical: 4,
  isolated: 5,
  initial: 6,
  medial: 7,
  final: 8,
  decimalFullStop: 9,
  decimalComma: 10,
  vowelAboveOrBelow: 11,
  vowelAfter: 12,
  ligatureAleph: 13,
  noLigature: 14,
  noMirror: 15,
  noVowel: 16,
  slantOppositeDirection: 17,
  noContextDigits: 18,
  noContext: 19,
  deviceDigits: 20,
  establishForms: 21,
  cancelForms: 22,
};

const CHARACTER_PATH: Record<CharacterPath, number> = { leftToRight: 1, rightToLeft: 2 };

const PATH_EFFECT: Record<PathEffect, number> = {
  unspecified: 0,
  updatePresentation: 1,
  updateData: 2,
};

// SPD Ps1 by line orientation, line progression, then character path.
const PRESENTATION_DIRECTION: Record<
  LineOrientation,
  Record<CharacterPath, Record<CharacterPath, number>>
> = {
  horizontal: {
    leftToRight: { leftToRight: 0, rightToLeft: 3 },
    rightToLeft: { leftToRight: 6, rightToLeft: 5 },
  },
  vertical: {
    leftToRight: { leftToRight: 2, rightToLeft: 4 },
    rightToLeft: { leftToRight: 1, rightToLeft: 7 },
  },
};

const CHARACTER_SPACING: Record<CharacterSpacing, number> = {
  "10/25.4mm": 0,
  "12/25.4mm": 1,
  "15/25.4mm": 2,
  "6/25.4mm": 3,
  "3/25.4mm": 4,
  "9/50.8mm": 5,
  "4/25.4mm": 6,
};

const LINE_SPACING: Record<LineSpacing, number> = {
  "6/25.4mm": 0,
  "4/25.4mm": 1,
  "3/25.4mm": 2,
  "12/25.4mm": 3,
  "8/25.4mm": 4,
  "6/30mm": 5,
  "4/30mm": 6,
  "3/30mm": 7,
  "12/30mm": 8,
  "2/25.4mm": 9,
};

function parametersOf(fn: ControlFunction): readonly Parameter[] {
  switch (fn.type) {
    case "CUU":
    case "CUD":
    case "CUF":
    case "CUB":
    case "CNL":
    case "CPL":
    case "CBT":
    case "CHT":
    case "CVT":
    case "HPR":
    case "HPB":
    case "VPR":
    case "VPB":
    case "PPR":
    case "PPB":
    case "ICH":
    case "IL":
    case "DCH":
    case "DL":
    case "ECH":
    case "SU":
    case "SD":
    case "SL":
    case "SR":
    case "NP":
    case "PP":
    case "REP":
      return [fn.count];
    case "CHA":
    case "HPA":
      return [fn.column];
    case "VPA":
      return [fn.row];
    case "CUP":
    case "CPR":
    case "HVP":
      return [fn.row, fn.column];
    case "PPA":
      return [fn.page];
    case "TSR":
    case "TAC":
    case "TALE":
    case "TATE":
    case "SLH":
    case "SLL":
    case "SPH":
    case "SPL":
      return [fn.position];
    case "CTC":
      return fn.actions.map((action) => TABULATION_CONTROL[action]);
    case "TBC":
      return [TABULATION_CLEAR[fn.clear]];
    case "ED":
      return [DISPLAY_ERASE[fn.erase]];
    case "EL":
      return [LINE_ERASE[fn.erase]];
    case "EF":
    case "EA":
      return [AREA_ERASE[fn.erase]];
    case "SEE":
      return [EDITING_EXTENT[fn.extent]];
    case "DAQ":
      return fn.qualifications.map((qualification) => QUALIFICATION[qualification]);
    case "SM":
    case "RM":
      return fn.modes.map((mode) => MODE[mode]);
    case "DA":
      return [fn.value];
    case "DSR":
      return [STATUS_REPORT[fn.status]];
    case "MC":
      return [MEDIA_COPY[fn.copy]];
    case "FNK":
      return [fn.key];
    case "IDCS":
      return [CONTROL_STRING[fn.kind]];
    case "SEF":
      return [fn.bin, fn.stacker];
    case "SGR":
      return fn.codes;
    case "SIMD":
      return [IMPLICIT_MOVEMENT[fn.movement]];
    case "SDS":
      return [STRING_DIRECTION[fn.direction]];
    case "SRS":
      return [STRING_REVERSION[fn.reversion]];
    case "FNT":
      return [fn.font, fn.identifier];
    case "GSM":
      return [fn.height, fn.width];
    case "GSS":
      return [fn.size];
    case "SSU":
      return [SIZE_UNIT[fn.unit]];
    case "SPQR":
      return [PRINT_QUALITY[fn.quality]];
    case "PEC":
      return [EXPANSION[fn.expansion]];
    case "JFY":
      return fn.modes.map((mode) => JUSTIFICATION[mode]);
    case "QUAD":
      return fn.layouts.map((layout) => LAYOUT[layout]);
    case "SCO":
      return [fn.orientation / 45];
    case "TCC":
      return [fn.position, fn.character];
    case "STAB":
      return [fn.selection];
    case "IGS":
      return [fn.repertoire];
    case "DTA":
      return [fn.lines, fn.columns];
    case "GCC":
      return [COMBINATION[fn.combination]];
    case "PFS":
      return [PAGE_FORMAT[fn.format]];
    case "PTX":
      return [TEXT_DELIMITER[fn.delimiter]];
    case "SACS":
    case "SRCS":
      return [fn.separation];
    case "SAPV":
      return fn.variants.map((variant) => PRESENTATION_VARIANT[variant]);
    case "SCP":
      return [CHARACTER_PATH[fn.path], PATH_EFFECT[fn.effect]];
    case "SPD":
      return [
        PRESENTATION_DIRECTION[fn.orientation][fn.progression][fn.path],
        PATH_EFFECT[fn.effect],
      ];
    case "SHS":
      return [CHARACTER_SPACING[fn.spacing]];
    case "SVS":
      return [LINE_SPACING[fn.spacing]];
    case "SLS":
      return [fn.spacing];
    case "SPI":
      return [fn.line, fn.character];
    case "SSW":
    case "TSS":
      return [fn.width];
  }
}

export function encodeFunction(fn: ControlFunction): ControlSequence {
  const { final, intermediates = "" } = IDENTITIES[fn.type];
  return controlSequence(final, parametersOf(fn), intermediates);
}
