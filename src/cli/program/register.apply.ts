import type { Command } from "commander";

import { applyCommand } from "../../commands/apply.js";
import { defaultRuntime } from "../../runtime.js";
import { parseNonNegativeInt, runCommandWithRuntime } from "../cli-utils.js";

type ApplyFlags = {
  resourceGroup: string;
  location?: string;
  file?: string;
  prefix?: string;
  concurrency?: number;
  callTimeout?: number;
  timeout?: number;
  dryRun?: boolean;
  subscription?: string;
  config?: string;
  verbose?: boolean;
  json?: boolean;
};

export function registerApplyCommand(program: Command) {
  program
    .command("apply")
    .description("Create or update the declared resources in dependency order")
    .requiredOption("-g, --resource-group <name>", "Target resource group")
    .option("-l, --location <location>", "Location for resources that declare none (default: the group's)")
    .option("-f, --file <path>", "Declaration JSON (default: the built-in lab blueprint)")
    .option("--prefix <prefix>", "Name prefix for the built-in blueprint")
    .option("--concurrency <n>", "Independent resources reconciled at once (1 = sequential, fail fast)", parseNonNegativeInt)
    .option("--call-timeout <ms>", "Deadline for each Azure call", parseNonNegativeInt)
    .option("--timeout <ms>", "Deadline for the whole run", parseNonNegativeInt)
    .option("--dry-run", "Resolve and print the desired state without calling Azure")
    .option("--json", "Print the report as JSON")
    .action(async (opts: ApplyFlags) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await applyCommand(opts, defaultRuntime);
      });
    });
}
