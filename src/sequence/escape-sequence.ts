import type { Representation } from "../config.ts";
import { type Output, execute } from "../terminal/output.ts";
import { ESC, assertFinal, assertIntermediates } from "./bytes.ts";

/**
 * `ESC [intermediates] final`. Without intermediates and with a final in
 * 0x40–0x5F this is a C1 control, which also has a single-byte 8-bit form.
 */
export class EscapeSequence {
  readonly intermediates: string;
  readonly final: string;

  constructor(final: string, intermediates = "") {
    this.final = assertFinal(final, 0x30, 0x7e);
    this.intermediates = assertIntermediates(intermediates);
  }

  get isC1(): boolean {
    const code = this.final.charCodeAt(0);
    return this.intermediates === "" && code >= 0x40 && code <= 0x5f;
  }

  encode(representation: Representation = "7-bit"): string {
    if (representation === "8-bit" && this.isC1) {
      return String.fromCharCode(this.final.charCodeAt(0) + 0x40);
    }
    return `${ESC}${this.intermediates}${this.final}`;
  }

  toString(): string {
    return this.encode();
  }

  exec(output?: Output): void {
    execute(this, output);
  }
}

export function escape(final: string, intermediates = ""): EscapeSequence {
  return new EscapeSequence(final, intermediates);
}
