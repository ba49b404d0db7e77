/**
 * `azlab plan` — validate a declaration and print the creation order with
 * the normalized physical names. Makes no platform call.
 */

import { createCredentialsManager } from "../credentials/manager.js";
import { theme } from "../logger.js";
import { createAzurePlatform } from "../platform/azure.js";
import { reconcile } from "../reconciler/engine.js";
import type { ReconcileReport } from "../reconciler/types.js";
import type { RuntimeEnv } from "../runtime.js";
import { loadDeclarationSource, resolveLocation, type DeclarationSourceOptions } from "./declaration-source.js";
import { resolveConfigAndLogger, type CommandServices, type CommonCommandOptions } from "./shared.js";

/** Stands in for the subscription when none is configured; names then differ from apply. */
export const PLACEHOLDER_SUBSCRIPTION = "00000000-0000-0000-0000-000000000000";

export type PlanCommandOptions = CommonCommandOptions &
  DeclarationSourceOptions & {
    resourceGroup: string;
    json?: boolean;
  };

export async function planCommand(
  opts: PlanCommandOptions,
  runtime: RuntimeEnv,
  services: CommandServices = {},
): Promise<ReconcileReport> {
  const { config, logger } = await resolveConfigAndLogger(opts, runtime, services);
  const subscriptionId = opts.subscription ?? services.context?.subscriptionId ?? config.subscriptionId ?? PLACEHOLDER_SUBSCRIPTION;
  const declaration = await loadDeclarationSource(opts, config, { subscriptionId, resourceGroup: opts.resourceGroup });

  // Dry-run never reaches the platform; the Azure one is only a type-correct stand-in.
  const platform = services.platform ?? createAzurePlatform(createCredentialsManager({ subscriptionId }), subscriptionId);
  const report = await reconcile(
    platform,
    declaration,
    { subscriptionId, resourceGroup: opts.resourceGroup, location: resolveLocation(opts, config) },
    { dryRun: true, timeoutMs: 0 },
  );

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          order: report.order,
          resources: report.resources.map((r) => ({ logicalName: r.logicalName, kind: r.kind, name: r.name, desired: r.desired })),
          warnings: report.warnings,
        },
        null,
        2,
      ),
    );
    return report;
  }

  for (const warning of report.warnings) logger.warn(warning);
  if (subscriptionId === PLACEHOLDER_SUBSCRIPTION) {
    logger.warn("No subscription configured; generated names will differ from those used by apply");
  }

  runtime.log(`\nCreation order for ${opts.resourceGroup}:\n`);
  report.resources.forEach((r, i) => {
    runtime.log(`  ${i + 1}. ${r.logicalName} ${theme.muted(`(${r.kind})`)} → ${r.name ?? "?"}`);
  });
  runtime.log("");
  return report;
}
