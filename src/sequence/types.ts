import type { Representation } from "../config.ts";

/** A complete, self-delimiting control function ready to be written out. */
export type Sequence = {
  encode(representation?: Representation): string;
  toString(): string;
};
