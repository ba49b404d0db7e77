import { InvalidArgumentError } from "commander";
import { exitCodeFor } from "../errors.js";
import { theme } from "../logger.js";
import { formatErrorMessage } from "../retry.js";
import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command body; a thrown error is printed and mapped to its exit code.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : formatErrorMessage(error);
    runtime.error(theme.error(`✗ ${message}`));
    runtime.exit(exitCodeFor(error));
  }
}

/** Commander option parser for non-negative integers. */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}
