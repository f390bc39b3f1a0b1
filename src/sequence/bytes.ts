import { InvalidSequenceError } from "../errors.ts";

export const ESC = "\x1b";

function inRange(char: string, low: number, high: number): boolean {
  const code = char.charCodeAt(0);
  return char.length === 1 && code >= low && code <= high;
}

/** Intermediate bytes come from column 02 (SPACE to `/`). */
export function assertIntermediates(intermediates: string): string {
  for (const char of intermediates) {
    if (!inRange(char, 0x20, 0x2f)) {
      throw new InvalidSequenceError(`Invalid intermediate byte ${JSON.stringify(char)}`);
    }
  }
  return intermediates;
}

export function assertFinal(final: string, low: number, high: number): string {
  if (!inRange(final, low, high)) {
    throw new InvalidSequenceError(`Invalid final byte ${JSON.stringify(final)}`);
  }
  return final;
}
