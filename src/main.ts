#!/usr/bin/env node
import { buildProgram } from "./cli/program/build-program.js";
import { exitCodeFor } from "./errors.js";
import { theme } from "./logger.js";
import { formatErrorMessage } from "./retry.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(theme.error(`✗ ${error instanceof Error ? error.message : formatErrorMessage(error)}`));
    process.exitCode = exitCodeFor(error);
  });
