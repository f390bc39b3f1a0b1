/**
 * Parameter strings for control sequences (ECMA-48 5.4.2).
 */

import { z } from "zod/v4";
import { InvalidParameterError } from "../errors.ts";

/** A numeric parameter; `undefined` leaves the field empty so the device default applies. */
export type Parameter = number | undefined;

const parameterSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export function assertParameter(value: number, position: number): number {
  const result = parameterSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidParameterError(
      `Parameter ${position + 1} must be a non-negative integer, got ${value}`,
    );
  }
  return result.data;
}

/**
 * Join parameters with `;`. Omitted values become empty fields; trailing
 * omitted values are dropped since the receiver fills them with defaults.
 */
export function encodeParameters(values: readonly Parameter[]): string {
  let end = values.length;
  while (end > 0 && values[end - 1] === undefined) end--;

  const fields: string[] = [];
  for (let i = 0; i < end; i++) {
    const value = values[i];
    fields.push(value === undefined ? "" : String(assertParameter(value, i)));
  }
  return fields.join(";");
}
