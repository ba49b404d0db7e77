import type { Command } from "commander";

import { planCommand } from "../../commands/plan.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

type PlanFlags = {
  resourceGroup: string;
  location?: string;
  file?: string;
  prefix?: string;
  subscription?: string;
  config?: string;
  verbose?: boolean;
  json?: boolean;
};

export function registerPlanCommand(program: Command) {
  program
    .command("plan")
    .description("Validate a declaration and print its creation order (no Azure calls)")
    .requiredOption("-g, --resource-group <name>", "Target resource group")
    .option("-l, --location <location>", "Location for resources that declare none")
    .option("-f, --file <path>", "Declaration JSON (default: the built-in lab blueprint)")
    .option("--prefix <prefix>", "Name prefix for the built-in blueprint")
    .option("--json", "Print the plan as JSON")
    .action(async (opts: PlanFlags) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await planCommand(opts, defaultRuntime);
      });
    });
}
