#!/usr/bin/env node

import { createLogger } from "@filemirror/core/logger";
import { DEFAULTS } from "@filemirror/core/schemas";
import { createProgram, reportError } from "./program.js";

const program = createProgram({
  env: process.env,
  print: (line) => process.stdout.write(`${line}\n`),
});

try {
  await program.parseAsync(process.argv);
} catch (err: unknown) {
  reportError(createLogger(DEFAULTS.logging), err);
  process.exitCode = 1;
}
