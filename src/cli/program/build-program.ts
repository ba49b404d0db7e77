import { Command } from "commander";

import { VERSION } from "../../version.js";
import { registerApplyCommand } from "./register.apply.js";
import { registerPlanCommand } from "./register.plan.js";
import { registerSetupCommand } from "./register.setup.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("azlab")
    .description("Provision the knowledge-base lab on Azure and write its .env file")
    .version(VERSION)
    .option("--subscription <id>", "Azure subscription ID (default: AZURE_SUBSCRIPTION_ID or the az login)")
    .option("-c, --config <path>", "azlab JSON config file")
    .option("-v, --verbose", "Log every Azure call");

  registerSetupCommand(program);
  registerPlanCommand(program);
  registerApplyCommand(program);

  // Global options are copied into the subcommand's options before its action runs.
  program.hook("preAction", (thisCommand, actionCommand) => {
    for (const [key, value] of Object.entries(thisCommand.opts())) {
      if (actionCommand.getOptionValue(key) === undefined) actionCommand.setOptionValue(key, value);
    }
  });
  return program;
}
