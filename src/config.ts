/**
 * azlab configuration schema (TypeBox), defaults and loading.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InvalidConfigurationError } from "./errors.js";
import type { AzureCredentialMethod } from "./types.js";

const modelSchema = Type.Object({
  deployment: Type.String({ minLength: 1, description: "Deployment name in the OpenAI account" }),
  model: Type.String({ minLength: 1, description: "Model name served by the deployment" }),
});

export const configSchema = Type.Object(
  {
    subscriptionId: Type.Optional(Type.String({ description: "Azure subscription ID" })),
    tenantId: Type.Optional(Type.String({ description: "Azure AD tenant ID" })),
    credentialMethod: Type.Optional(
      Type.Union([
        Type.Literal("default"),
        Type.Literal("cli"),
        Type.Literal("service-principal"),
        Type.Literal("managed-identity"),
      ]),
    ),
    defaultRegion: Type.Optional(Type.String({ description: "Region for resources that declare none (default: the resource group's location)" })),
    envFile: Type.Optional(Type.String({ minLength: 1, description: "Path of the generated environment file" })),
    blobContainerName: Type.Optional(Type.String({ minLength: 3, maxLength: 63 })),
    models: Type.Optional(
      Type.Object({
        embedding: Type.Optional(modelSchema),
        chat: Type.Optional(modelSchema),
      }),
    ),
    knowledgeAgentName: Type.Optional(Type.String({ minLength: 1 })),
    useVerbalization: Type.Optional(Type.Boolean()),
    dataLoader: Type.Optional(
      Type.Object({
        command: Type.String({ minLength: 1, description: "Executable that creates indexes and uploads data" }),
        args: Type.Optional(Type.Array(Type.String())),
        logFile: Type.Optional(Type.String({ minLength: 1 })),
        timeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
      }),
    ),
    retry: Type.Optional(
      Type.Object({
        maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
        minDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
        maxDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
      }),
    ),
    timeouts: Type.Optional(
      Type.Object({
        callTimeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
        overallTimeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
      }),
    ),
    discovery: Type.Optional(
      Type.Object({
        strict: Type.Optional(Type.Boolean({ description: "Fail when a resource kind has more than one match" })),
      }),
    ),
    diagnostics: Type.Optional(
      Type.Object({
        enabled: Type.Optional(Type.Boolean()),
        verbose: Type.Optional(Type.Boolean()),
      }),
    ),
  },
  { additionalProperties: false },
);

export type AzlabConfigInput = Static<typeof configSchema>;

export type ModelConfig = Static<typeof modelSchema>;

export type DataLoaderConfig = {
  command: string;
  args: string[];
  logFile: string;
  timeoutMs: number;
};

/** Configuration with every default applied. */
export type AzlabConfig = {
  subscriptionId?: string;
  tenantId?: string;
  credentialMethod: AzureCredentialMethod;
  defaultRegion?: string;
  envFile: string;
  blobContainerName: string;
  models: { embedding: ModelConfig; chat: ModelConfig };
  knowledgeAgentName: string;
  useVerbalization: boolean;
  dataLoader?: DataLoaderConfig;
  retry: { maxAttempts: number; minDelayMs: number; maxDelayMs: number };
  timeouts: { callTimeoutMs: number; overallTimeoutMs: number };
  discovery: { strict: boolean };
  diagnostics: { enabled: boolean; verbose: boolean };
};

export function getDefaultConfig(): AzlabConfig {
  return {
    credentialMethod: "default",
    envFile: ".env",
    blobContainerName: "documents",
    models: {
      embedding: { deployment: "text-embedding-3-large", model: "text-embedding-3-large" },
      chat: { deployment: "gpt-4.1", model: "gpt-4.1" },
    },
    knowledgeAgentName: "knowledge-base",
    useVerbalization: false,
    retry: { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30_000 },
    timeouts: { callTimeoutMs: 120_000, overallTimeoutMs: 600_000 },
    discovery: { strict: false },
    diagnostics: { enabled: false, verbose: false },
  };
}

/**
 * Apply defaults, then environment overrides, to a validated config input.
 */
export function resolveConfig(input: AzlabConfigInput, env: NodeJS.ProcessEnv = {}): AzlabConfig {
  const defaults = getDefaultConfig();
  return {
    subscriptionId: env.AZURE_SUBSCRIPTION_ID || input.subscriptionId,
    tenantId: env.AZURE_TENANT_ID || input.tenantId,
    credentialMethod: input.credentialMethod ?? defaults.credentialMethod,
    defaultRegion: input.defaultRegion,
    envFile: env.AZLAB_ENV_FILE || input.envFile || defaults.envFile,
    blobContainerName: input.blobContainerName ?? defaults.blobContainerName,
    models: {
      embedding: input.models?.embedding ?? defaults.models.embedding,
      chat: input.models?.chat ?? defaults.models.chat,
    },
    knowledgeAgentName: input.knowledgeAgentName ?? defaults.knowledgeAgentName,
    useVerbalization: input.useVerbalization ?? defaults.useVerbalization,
    dataLoader: input.dataLoader
      ? {
          command: input.dataLoader.command,
          args: input.dataLoader.args ?? [],
          logFile: input.dataLoader.logFile ?? "index-creation.log",
          timeoutMs: input.dataLoader.timeoutMs ?? 600_000,
        }
      : undefined,
    retry: { ...defaults.retry, ...input.retry },
    timeouts: { ...defaults.timeouts, ...input.timeouts },
    discovery: { strict: input.discovery?.strict ?? defaults.discovery.strict },
    diagnostics: {
      enabled: input.diagnostics?.enabled ?? defaults.diagnostics.enabled,
      verbose: input.diagnostics?.verbose ?? defaults.diagnostics.verbose,
    },
  };
}

/** Validate an already-parsed value against the config schema. */
export function parseConfig(value: unknown): AzlabConfigInput {
  if (Value.Check(configSchema, value)) return value;
  const issues = [...Value.Errors(configSchema, value)].map((e) => ({
    path: e.path || "/",
    message: e.message,
  }));
  throw new InvalidConfigurationError("Invalid configuration", issues);
}

export type LoadConfigOptions = {
  /** JSON config file; omitted means defaults plus environment. */
  file?: string;
  env?: NodeJS.ProcessEnv;
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AzlabConfig> {
  const env = options.env ?? process.env;
  if (!options.file) return resolveConfig({}, env);

  let raw: string;
  try {
    raw = await readFile(options.file, "utf8");
  } catch (error) {
    throw new InvalidConfigurationError(`Cannot read config file ${options.file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigurationError(`Config file ${options.file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return resolveConfig(parseConfig(parsed), env);
}
