import type { Representation } from "../config.ts";
import { C0, type C0Name } from "./c0.ts";
import { C1, type C1Name, type IndependentName, independent } from "./c1.ts";

export { C0, C1, independent };
export type { C0Name, C1Name, IndependentName };

export type ControlCode = C0Name | C1Name | IndependentName;

function isC0(name: ControlCode): name is C0Name {
  return Object.hasOwn(C0, name);
}

function isC1(name: ControlCode): name is C1Name {
  return Object.hasOwn(C1, name);
}

/** The characters that represent a named control function. */
export function controlCode(name: ControlCode, representation: Representation = "7-bit"): string {
  if (isC0(name)) return C0[name];
  if (isC1(name)) return C1[name].encode(representation);
  return independent[name].encode(representation);
}

export function isControlCode(name: string): name is ControlCode {
  return Object.hasOwn(C0, name) || Object.hasOwn(C1, name) || Object.hasOwn(independent, name);
}
