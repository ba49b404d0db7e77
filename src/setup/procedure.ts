/**
 * Post-provision setup: verify the resource group, discover the lab
 * resources, collect keys (or grant the current user access in keyless
 * mode), write the `.env` artifact, then run the data loader.
 *
 * Fatal: missing resource group, missing resource, key retrieval failure,
 * artifact write failure. Grants and the data loader only add warnings.
 */

import type { AzlabConfig } from "../config.js";
import { withDiagnosticStep } from "../diagnostics.js";
import {
  assertSecretPolicy,
  buildArtifact,
  renderArtifact,
  writeArtifactAtomic,
  type EnvironmentArtifact,
} from "../env/artifact.js";
import {
  AmbiguousResourceError,
  MissingResourceError,
  PlatformCallFailedError,
  ReconciliationTimeoutError,
  ScopeNotFoundError,
} from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import { searchEndpoint } from "../platform/ids.js";
import type { DiscoveredResource, DiscoveryKind, ResourcePlatform } from "../platform/types.js";
import { formatErrorMessage, withDeadline } from "../retry.js";
import type { AmbientContext, StepOutcome } from "../types.js";
import { runDataLoader } from "./data-loader.js";
import { discoverResource, discoveryLabel } from "./discovery.js";
import { grantAccess, keylessGrantTargets } from "./grants.js";

export type SetupOptions = {
  resourceGroup: string;
  keyless?: boolean;
  /** Overrides `config.envFile`. */
  envFile?: string;
  /** Overrides `config.discovery.strict`. */
  strictDiscovery?: boolean;
  names?: Partial<Record<DiscoveryKind, string>>;
  skipDataLoad?: boolean;
};

export type SetupReport = {
  artifactPath: string;
  artifact: EnvironmentArtifact;
  resources: Record<DiscoveryKind, DiscoveredResource>;
  outcomes: StepOutcome[];
  warnings: string[];
};

export type SetupDependencies = {
  platform: ResourcePlatform;
  context: AmbientContext;
  config: AzlabConfig;
  logger?: Logger;
};

/**
 * Run the whole procedure under `config.timeouts.overallTimeoutMs`; expiry
 * raises ReconciliationTimeoutError. The data loader keeps its own timeout.
 */
export async function runSetup(deps: SetupDependencies, options: SetupOptions): Promise<SetupReport> {
  const overallTimeoutMs = deps.config.timeouts.overallTimeoutMs;
  const deadline = new AbortController();
  const timer = overallTimeoutMs > 0 ? setTimeout(() => deadline.abort(), overallTimeoutMs) : undefined;
  try {
    return await runSetupSteps(deps, options, deadline.signal);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

async function runSetupSteps(deps: SetupDependencies, options: SetupOptions, signal: AbortSignal): Promise<SetupReport> {
  const { platform, context, config } = deps;
  const logger = deps.logger ?? createSilentLogger();
  const { resourceGroup } = options;
  const keyless = options.keyless ?? false;
  const artifactPath = options.envFile ?? config.envFile;
  const callTimeoutMs = config.timeouts.callTimeoutMs;
  const outcomes: StepOutcome[] = [];
  const warnings: string[] = [];

  const timedOut = () => new ReconciliationTimeoutError(config.timeouts.overallTimeoutMs, "Setup");

  const call = async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    if (signal.aborted) throw timedOut();
    try {
      return await withDeadline(withDiagnosticStep(operation, fn), callTimeoutMs, operation, signal);
    } catch (error) {
      if (signal.aborted) throw timedOut();
      if (
        error instanceof PlatformCallFailedError ||
        error instanceof ScopeNotFoundError ||
        error instanceof MissingResourceError ||
        error instanceof AmbiguousResourceError
      ) {
        throw error;
      }
      throw new PlatformCallFailedError(operation, formatErrorMessage(error), error);
    }
  };

  if (keyless) logger.info("Using keyless authentication: role-based access instead of keys.");

  // 1. Resource group
  logger.info(`Checking resource group: ${resourceGroup}`);
  const exists = await call(`check resource group ${resourceGroup}`, () => platform.scopeExists(resourceGroup));
  if (!exists) throw new ScopeNotFoundError(resourceGroup);
  logger.info("✓ Resource group found");

  // 2. Discovery
  logger.info("Retrieving Azure resources...");
  const strict = options.strictDiscovery ?? config.discovery.strict;
  const discover = async (kind: DiscoveryKind): Promise<DiscoveredResource> => {
    const result = await call(`list ${discoveryLabel(kind)}s in ${resourceGroup}`, () =>
      discoverResource(platform, resourceGroup, kind, { name: options.names?.[kind], strict }),
    );
    if (result.warning) {
      logger.warn(result.warning);
      warnings.push(result.warning);
    }
    logger.info(`✓ ${discoveryLabel(kind)}: ${result.resource.name}`);
    return result.resource;
  };

  const search = await discover("SearchService");
  const openai = await discover("OpenAIAccount");
  const aiServices = await discover("AIServicesAccount");
  const storage = await discover("StorageAccount");

  const openaiEndpoint = requireEndpoint(openai);
  const aiServicesEndpoint = requireEndpoint(aiServices);

  // 3. Keys, or grants for the current user
  let searchAdminKey: string | undefined;
  let openaiKey: string | undefined;
  let aiServicesKey: string | undefined;
  let blobConnectionString: string | undefined;
  let blobResourceId: string | undefined;

  if (keyless) {
    blobResourceId = storage.id;
    const grantOutcomes = await grantAccess(
      platform,
      { subscriptionId: context.subscriptionId, resourceGroup, principal: context.principal, callTimeoutMs, signal },
      keylessGrantTargets({ search, openai, aiServices, storage }),
      logger,
    );
    outcomes.push(...grantOutcomes);
    for (const outcome of grantOutcomes) {
      if (outcome.status === "warning") warnings.push(`${outcome.step}: ${outcome.detail}`);
    }
  } else {
    searchAdminKey = await call(`retrieve admin key of ${search.name}`, () => platform.getAccessKey(search));
    openaiKey = await call(`retrieve key of ${openai.name}`, () => platform.getAccessKey(openai));
    aiServicesKey = await call(`retrieve key of ${aiServices.name}`, () => platform.getAccessKey(aiServices));
    blobConnectionString = await call(`retrieve connection string of ${storage.name}`, () =>
      platform.getConnectionString(storage),
    );
    if (!blobConnectionString) {
      throw new PlatformCallFailedError(`retrieve connection string of ${storage.name}`, "the platform returned an empty value");
    }
  }

  // 4. Artifact
  if (signal.aborted) throw timedOut();
  const artifact = buildArtifact({
    keyless,
    searchEndpoint: searchEndpoint(search.name),
    searchAdminKey,
    blobConnectionString,
    blobContainerName: config.blobContainerName,
    blobResourceId,
    openaiEndpoint,
    openaiKey,
    embedding: config.models.embedding,
    chat: config.models.chat,
    aiServicesEndpoint,
    aiServicesKey,
    knowledgeAgentName: config.knowledgeAgentName,
    useVerbalization: config.useVerbalization,
  });
  assertSecretPolicy(artifact, keyless);

  logger.info("Creating .env file...");
  await writeArtifactAtomic(artifactPath, renderArtifact(artifact));
  logger.info(`✓ Created .env file at: ${artifactPath}`);
  logger.warn("SECURITY: Never commit this file to source control!");
  outcomes.push({ step: "write environment file", status: "succeeded", detail: artifactPath });

  // 5. Data loader
  if (config.dataLoader && !options.skipDataLoad) {
    const outcome = await runDataLoader(config.dataLoader, artifact, logger);
    outcomes.push(outcome);
    if (outcome.status === "warning") warnings.push(`${outcome.step}: ${outcome.detail}`);
  } else {
    const detail = options.skipDataLoad ? "skipped on request" : "no data loader configured";
    outcomes.push({ step: "create indexes and upload data", status: "skipped", detail });
  }

  return {
    artifactPath,
    artifact,
    resources: {
      SearchService: search,
      OpenAIAccount: openai,
      AIServicesAccount: aiServices,
      StorageAccount: storage,
    },
    outcomes,
    warnings,
  };
}

function requireEndpoint(resource: DiscoveredResource): string {
  if (!resource.endpoint) {
    throw new PlatformCallFailedError(`read endpoint of ${resource.name}`, "the platform returned no endpoint");
  }
  return resource.endpoint;
}
