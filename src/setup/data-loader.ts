/**
 * Runs the external step that creates search indexes and uploads the lab
 * data. The artifact is passed to it as environment variables; its output
 * goes to a log file. Failure is reported, never thrown.
 */

import { execFile } from "node:child_process";
import { writeFile } from "node:fs/promises";
import { promisify } from "node:util";
import type { DataLoaderConfig } from "../config.js";
import type { EnvironmentArtifact } from "../env/artifact.js";
import type { Logger } from "../logger.js";
import { formatErrorMessage, readErrorField } from "../retry.js";
import type { StepOutcome } from "../types.js";

const execFileAsync = promisify(execFile);

const STEP = "create indexes and upload data";

function readOutput(error: unknown, key: "stdout" | "stderr"): string {
  const value = readErrorField(error, key);
  return typeof value === "string" ? value : "";
}

function logContent(command: string, stdout: string, stderr: string): string {
  return [`$ ${command}`, "", "--- stdout ---", stdout, "--- stderr ---", stderr, ""].join("\n");
}

export async function runDataLoader(
  loader: DataLoaderConfig,
  artifact: EnvironmentArtifact,
  logger: Logger,
): Promise<StepOutcome> {
  const commandLine = [loader.command, ...loader.args].join(" ");
  logger.info("Creating search indexes and uploading data...");

  try {
    const { stdout, stderr } = await execFileAsync(loader.command, loader.args, {
      timeout: loader.timeoutMs,
      env: { ...process.env, ...artifact },
      maxBuffer: 64 * 1024 * 1024,
    });
    await writeLog(loader.logFile, logContent(commandLine, stdout, stderr), logger);
    logger.info("✓ Indexes created and data uploaded");
    return { step: STEP, status: "succeeded", detail: `log written to ${loader.logFile}` };
  } catch (error) {
    await writeLog(
      loader.logFile,
      logContent(commandLine, readOutput(error, "stdout"), readOutput(error, "stderr") || formatErrorMessage(error)),
      logger,
    );
    logger.warn("Failed to create indexes or upload data");
    logger.warn(`  Check the log file for details: ${loader.logFile}`);
    return {
      step: STEP,
      status: "warning",
      detail: formatErrorMessage(error),
      hint: `Check the log file for details: ${loader.logFile}`,
    };
  }
}

async function writeLog(path: string, content: string, logger: Logger): Promise<void> {
  try {
    await writeFile(path, content, "utf8");
  } catch (error) {
    logger.warn(`Could not write ${path}: ${formatErrorMessage(error)}`);
  }
}
