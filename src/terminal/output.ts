import { OutputClosedError } from "../errors.ts";
import type { Sequence } from "../sequence/types.ts";

/** The part of a writable stream `execute` needs; `process.stdout` fits. */
export type Output = {
  write(chunk: string): unknown;
  readonly writableEnded?: boolean;
  readonly destroyed?: boolean;
};

/**
 * Write a sequence to the output as is. Nothing is buffered or retried:
 * an error thrown by `write` reaches the caller.
 *
 * A stream that fails later (EPIPE once a pipe's reader has gone) reports
 * through its `error` event instead; whoever owns the stream listens for
 * it, as the CLI entry point does for stdout.
 */
export function execute(sequence: Sequence | string, output: Output = process.stdout): void {
  if (output.writableEnded || output.destroyed) {
    throw new OutputClosedError();
  }
  output.write(typeof sequence === "string" ? sequence : sequence.encode());
}
