import type { Command } from "commander";

import { setupCommand } from "../../commands/setup.js";
import { defaultRuntime } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

type SetupFlags = {
  resourceGroup: string;
  keyless?: boolean;
  envFile?: string;
  principalId?: string;
  strictDiscovery?: boolean;
  searchService?: string;
  openaiAccount?: string;
  aiServicesAccount?: string;
  storageAccount?: string;
  skipDataLoad?: boolean;
  subscription?: string;
  config?: string;
  verbose?: boolean;
  json?: boolean;
};

export function registerSetupCommand(program: Command) {
  program
    .command("setup")
    .description("Discover the lab resources in a resource group and write the .env file")
    .requiredOption("-g, --resource-group <name>", "Resource group that holds the lab resources")
    .option("-k, --keyless", "Use role-based access for the current user instead of keys")
    .option("--env-file <path>", "Where to write the environment file (default: .env)")
    .option("--principal-id <id>", "Object ID to grant access to in keyless mode (default: signed-in user)")
    .option("--strict-discovery", "Fail when a resource kind has more than one match")
    .option("--search-service <name>", "Search service to use")
    .option("--openai-account <name>", "Azure OpenAI account to use")
    .option("--ai-services-account <name>", "AI Services account to use")
    .option("--storage-account <name>", "Storage account to use")
    .option("--skip-data-load", "Do not run the index creation / data upload step")
    .option("--json", "Print a JSON summary")
    .action(async (opts: SetupFlags) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        await setupCommand(opts, defaultRuntime);
      });
    });
}
