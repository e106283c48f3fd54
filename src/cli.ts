#!/usr/bin/env node

import { CommanderError } from "commander";
import { createProgram } from "./program.js";

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  if (!(err instanceof CommanderError)) {
    throw err;
  }
  // Commander has already printed the message, help or version.
  process.exitCode = err.exitCode;
}
