/**
 * `azlab setup` — write the lab `.env` file for an already-provisioned
 * resource group.
 */

import { theme } from "../logger.js";
import type { RuntimeEnv } from "../runtime.js";
import { runSetup, type SetupReport } from "../setup/procedure.js";
import { resolveConfigAndLogger, resolvePlatform, type CommandServices, type CommonCommandOptions } from "./shared.js";

export type SetupCommandOptions = CommonCommandOptions & {
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
  json?: boolean;
};

export async function setupCommand(
  opts: SetupCommandOptions,
  runtime: RuntimeEnv,
  services: CommandServices = {},
): Promise<SetupReport> {
  const { config, logger } = await resolveConfigAndLogger(opts, runtime, services);
  const keyless = Boolean(opts.keyless);

  const { platform, context } = await resolvePlatform(opts, config, logger, services, {
    principalId: opts.principalId,
    // The signed-in user is only needed for keyless grants.
    resolvePrincipal: keyless,
  });

  if (!opts.json) {
    logger.info("========================================");
    logger.info("Knowledge-base lab environment setup");
    logger.info("========================================");
  }

  const report = await runSetup(
    { platform, context, config, logger },
    {
      resourceGroup: opts.resourceGroup,
      keyless,
      envFile: opts.envFile,
      strictDiscovery: opts.strictDiscovery,
      skipDataLoad: opts.skipDataLoad,
      names: {
        SearchService: opts.searchService,
        OpenAIAccount: opts.openaiAccount,
        AIServicesAccount: opts.aiServicesAccount,
        StorageAccount: opts.storageAccount,
      },
    },
  );

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          artifactPath: report.artifactPath,
          keyless,
          resources: Object.fromEntries(Object.entries(report.resources).map(([kind, r]) => [kind, r.name])),
          outcomes: report.outcomes,
          warnings: report.warnings,
        },
        null,
        2,
      ),
    );
    return report;
  }

  runtime.log("");
  runtime.log(theme.success("Setup complete!"));
  if (report.warnings.length > 0) {
    runtime.log(theme.warn(`${report.warnings.length} warning(s):`));
    for (const warning of report.warnings) runtime.log(`  - ${warning}`);
    for (const outcome of report.outcomes) {
      if (outcome.status === "warning" && outcome.hint) runtime.log(theme.muted(`    ${outcome.hint}`));
    }
  }
  runtime.log(`Environment file: ${report.artifactPath}`);
  return report;
}
