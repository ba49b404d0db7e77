/**
 * Wiring shared by the commands: configuration, logging, diagnostics and
 * the Azure-backed platform.
 */

import { createCLIWrapper } from "../cli/wrapper.js";
import { loadConfig, type AzlabConfig } from "../config.js";
import { createContextManager, type ContextResolveOptions } from "../context/manager.js";
import { createCredentialsManager } from "../credentials/manager.js";
import { formatAzureCallEvent, traceAzureCalls } from "../diagnostics.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import { createAzurePlatform } from "../platform/azure.js";
import type { ResourcePlatform } from "../platform/types.js";
import type { RuntimeEnv } from "../runtime.js";
import type { AmbientContext } from "../types.js";

export type CommonCommandOptions = {
  config?: string;
  subscription?: string;
  verbose?: boolean;
};

/** Pre-built collaborators; anything omitted is created from configuration. */
export type CommandServices = {
  config?: AzlabConfig;
  logger?: Logger;
  platform?: ResourcePlatform;
  context?: AmbientContext;
};

export async function resolveConfigAndLogger(
  opts: CommonCommandOptions,
  runtime: RuntimeEnv,
  services: CommandServices,
): Promise<{ config: AzlabConfig; logger: Logger }> {
  const config = services.config ?? (await loadConfig({ file: opts.config }));
  const verbose = Boolean(opts.verbose) || config.diagnostics.verbose;
  const logger = services.logger ?? createConsoleLogger({ verbose, sink: runtime });

  // diagnostics.enabled prints every Azure call; --verbose alone adds them to the debug output
  if (config.diagnostics.enabled) {
    traceAzureCalls((event) => logger.info(formatAzureCallEvent(event)));
  } else if (verbose) {
    traceAzureCalls((event) => logger.debug(formatAzureCallEvent(event)));
  }
  return { config, logger };
}

/**
 * Resolve the ambient context and an Azure platform for it, unless the
 * caller supplied them.
 */
export async function resolvePlatform(
  opts: CommonCommandOptions,
  config: AzlabConfig,
  logger: Logger,
  services: CommandServices,
  contextOptions: ContextResolveOptions = {},
): Promise<{ platform: ResourcePlatform; context: AmbientContext }> {
  const credentialsManager = createCredentialsManager({
    subscriptionId: opts.subscription ?? config.subscriptionId,
    tenantId: config.tenantId,
    credentialMethod: config.credentialMethod,
  });

  const context =
    services.context ??
    (await createContextManager(credentialsManager, createCLIWrapper(), logger).resolve({
      subscriptionId: opts.subscription,
      ...contextOptions,
    }));

  const platform =
    services.platform ??
    createAzurePlatform(credentialsManager, context.subscriptionId, {
      maxAttempts: config.retry.maxAttempts,
      minDelayMs: config.retry.minDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    });

  return { platform, context };
}
