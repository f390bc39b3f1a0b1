/**
 * Control sequences: CSI, parameters, intermediate bytes, final byte.
 */

import type { Representation } from "../config.ts";
import { type Output, execute } from "../terminal/output.ts";
import { ESC, assertFinal, assertIntermediates } from "./bytes.ts";
import { type Parameter, encodeParameters } from "./parameters.ts";

const CSI_7BIT = `${ESC}[`;
const CSI_8BIT = "\x9b";

export class ControlSequence {
  readonly parameters: string;
  readonly intermediates: string;
  readonly final: string;

  constructor(final: string, intermediates: string, parameters: readonly Parameter[]) {
    this.final = assertFinal(final, 0x40, 0x7e);
    this.intermediates = assertIntermediates(intermediates);
    this.parameters = encodeParameters(parameters);
  }

  encode(representation: Representation = "7-bit"): string {
    const introducer = representation === "8-bit" ? CSI_8BIT : CSI_7BIT;
    return `${introducer}${this.parameters}${this.intermediates}${this.final}`;
  }

  toString(): string {
    return this.encode();
  }

  /** Write the sequence straight to the output (stdout by default). */
  exec(output?: Output): void {
    execute(this, output);
  }
}

export function controlSequence(
  final: string,
  parameters: readonly Parameter[] = [],
  intermediates = "",
): ControlSequence {
  return new ControlSequence(final, intermediates, parameters);
}
