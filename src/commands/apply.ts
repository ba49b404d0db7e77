/**
 * `azlab apply` — reconcile a declaration (by default the lab blueprint)
 * against a resource group.
 */

import { EXIT_CODES } from "../errors.js";
import { theme } from "../logger.js";
import { Reconciler } from "../reconciler/engine.js";
import type { ReconcileReport } from "../reconciler/types.js";
import type { RuntimeEnv } from "../runtime.js";
import { loadDeclarationSource, resolveLocation, type DeclarationSourceOptions } from "./declaration-source.js";
import { resolveConfigAndLogger, resolvePlatform, type CommandServices, type CommonCommandOptions } from "./shared.js";

export type ApplyCommandOptions = CommonCommandOptions &
  DeclarationSourceOptions & {
    resourceGroup: string;
    concurrency?: number;
    callTimeout?: number;
    timeout?: number;
    dryRun?: boolean;
    json?: boolean;
  };

export async function applyCommand(
  opts: ApplyCommandOptions,
  runtime: RuntimeEnv,
  services: CommandServices = {},
): Promise<ReconcileReport> {
  const { config, logger } = await resolveConfigAndLogger(opts, runtime, services);
  const { platform, context } = await resolvePlatform(opts, config, logger, services);
  const declaration = await loadDeclarationSource(opts, config, {
    subscriptionId: context.subscriptionId,
    resourceGroup: opts.resourceGroup,
  });

  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);

  let report: ReconcileReport;
  try {
    const reconciler = new Reconciler(
      platform,
      {
        maxConcurrency: opts.concurrency ?? 1,
        callTimeoutMs: opts.callTimeout ?? config.timeouts.callTimeoutMs,
        timeoutMs: opts.timeout ?? config.timeouts.overallTimeoutMs,
        dryRun: Boolean(opts.dryRun),
        signal: controller.signal,
      },
      logger,
    );
    reconciler.on((event) => {
      if (event.type === "resource:start") logger.debug(event.message);
    });
    report = await reconciler.reconcile(declaration, {
      subscriptionId: context.subscriptionId,
      resourceGroup: opts.resourceGroup,
      location: resolveLocation(opts, config),
    });
  } finally {
    process.removeListener("SIGINT", onSignal);
  }

  if (opts.json) {
    runtime.log(JSON.stringify(report, null, 2));
  } else {
    const { summary } = report;
    const line = `${summary.created} created, ${summary.updated} updated, ${summary.unchanged} unchanged, ${summary.failed} failed, ${summary.skipped} skipped`;
    runtime.log(report.status === "succeeded" ? theme.success(line) : theme.error(line));
    for (const error of report.errors) runtime.error(theme.error(`  ${error}`));
  }

  if (report.status === "timed-out") runtime.exit(EXIT_CODES.timeout);
  else if (report.status === "failed") runtime.exit(EXIT_CODES.platformCall);
  else if (report.status === "cancelled") runtime.exit(EXIT_CODES.generic);
  return report;
}
