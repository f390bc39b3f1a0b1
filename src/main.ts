#!/usr/bin/env tsx

import { reportError, run } from "./cli.ts";

// A closed pipe (EPIPE) surfaces here, after `run` has returned.
process.stdout.on("error", (err) => {
  process.exitCode = 1;
  if (!process.stderr.destroyed) reportError(err);
});

process.exitCode = run(process.argv.slice(2));
