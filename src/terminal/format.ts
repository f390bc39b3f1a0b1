/**
 * Helpers for putting sequences around text and taking them out again.
 */

import { cursor } from "../functions/cursor.ts";
import { editor } from "../functions/editor.ts";
import { type GraphicRendition, RESET } from "../rendition.ts";
import { type Output, execute } from "./output.ts";

/**
 * Surround text with the given renditions and a closing reset, so the
 * styling ends with the span. An empty rendition still renders (`CSI m`).
 */
export function wrap(text: string, ...renditions: GraphicRendition[]): string {
  return `${renditions.map((rendition) => rendition.toString()).join("")}${text}${RESET.encode()}`;
}

const SEQUENCE_PATTERN = new RegExp(
  [
    // control strings: DCS, SOS, OSC, PM, APC ... ST (or BEL, as xterm allows)
    "(?:\\x1b[PX\\]^_]|[\\x90\\x98\\x9d\\x9e\\x9f])[\\s\\S]*?(?:\\x1b\\\\|\\x9c|\\x07)",
    // control sequences
    "(?:\\x1b\\[|\\x9b)[\\x30-\\x3f]*[\\x20-\\x2f]*[\\x40-\\x7e]",
    // escape sequences
    "\\x1b[\\x20-\\x2f]*[\\x30-\\x7e]",
    // remaining 8-bit C1 controls
    "[\\x80-\\x9f]",
  ].join("|"),
  "g",
);

/** Remove every control sequence, escape sequence and control string. */
export function stripSequences(text: string): string {
  return text.replace(SEQUENCE_PATTERN, "");
}

/** Show C0, DEL and C1 characters as `\xNN` escapes. */
export function visible(text: string): string {
  // eslint-disable-next-line no-control-regex -- matching control characters is the point
  return text.replace(/[\x00-\x1f\x7f-\x9f]/g, (char) => {
    return `\\x${char.charCodeAt(0).toString(16).padStart(2, "0")}`;
  });
}

/** Erase the whole screen and put the cursor on the first line and column. */
export function clearScreen(output?: Output): void {
  execute(`${editor.eraseDisplay("screen")}${cursor.setPosition(1, 1)}`, output);
}
