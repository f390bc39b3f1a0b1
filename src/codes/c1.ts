/**
 * C1 control functions (ECMA-48 5.3) and independent control functions
 * (ECMA-48 5.5), both written as escape sequences.
 */

import { escape } from "../sequence/escape-sequence.ts";

export const C1 = {
  BPH: escape("B"),
  NBH: escape("C"),
  NEL: escape("E"),
  SSA: escape("F"),
  ESA: escape("G"),
  HTS: escape("H"),
  HTJ: escape("I"),
  VTS: escape("J"),
  PLD: escape("K"),
  PLU: escape("L"),
  RI: escape("M"),
  SS2: escape("N"),
  SS3: escape("O"),
  DCS: escape("P"),
  PU1: escape("Q"),
  PU2: escape("R"),
  STS: escape("S"),
  CCH: escape("T"),
  MW: escape("U"),
  SPA: escape("V"),
  EPA: escape("W"),
  SOS: escape("X"),
  SCI: escape("Z"),
  CSI: escape("["),
  ST: escape("\\"),
  OSC: escape("]"),
  PM: escape("^"),
  APC: escape("_"),
} as const;

export type C1Name = keyof typeof C1;

export const independent = {
  DMI: escape("`"),
  INT: escape("a"),
  EMI: escape("b"),
  RIS: escape("c"),
  CMD: escape("d"),
  LS2: escape("n"),
  LS3: escape("o"),
  LS3R: escape("|"),
  LS2R: escape("}"),
  LS1R: escape("~"),
} as const;

export type IndependentName = keyof typeof independent;
