/**
 * The `.env` file consumed by the lab notebooks.
 *
 * Key names and order are an external contract. The file is regenerated
 * from scratch on every setup run; nothing is merged.
 */

import { randomBytes } from "node:crypto";
import { chmod, rename, rm, writeFile } from "node:fs/promises";
import { ArtifactWriteError, PlatformCallFailedError } from "../errors.js";
import { formatErrorMessage } from "../retry.js";

export const ENV_KEYS = [
  "AZURE_SEARCH_SERVICE_ENDPOINT",
  "AZURE_SEARCH_ADMIN_KEY",
  "BLOB_CONNECTION_STRING",
  "BLOB_CONTAINER_NAME",
  "SEARCH_BLOB_DATASOURCE_CONNECTION_STRING",
  "BLOB_RESOURCE_ID",
  "SEARCH_BLOB_DATASOURCE_RESOURCE_ID",
  "AZURE_OPENAI_ENDPOINT",
  "AZURE_OPENAI_KEY",
  "AZURE_OPENAI_EMBEDDING_DEPLOYMENT",
  "AZURE_OPENAI_EMBEDDING_MODEL_NAME",
  "AZURE_OPENAI_CHATGPT_DEPLOYMENT",
  "AZURE_OPENAI_CHATGPT_MODEL_NAME",
  "AI_SERVICES_ENDPOINT",
  "AI_SERVICES_KEY",
  "AZURE_SEARCH_KNOWLEDGE_AGENT",
  "USE_VERBALIZATION",
  "KEYLESS",
] as const;

export type EnvKey = (typeof ENV_KEYS)[number];

export type EnvironmentArtifact = Record<EnvKey, string>;

export const SECRET_KEYS: readonly EnvKey[] = ENV_KEYS.filter((k) => k.endsWith("_KEY"));

const SECTIONS: ReadonlyArray<{ heading: string; keys: readonly EnvKey[] }> = [
  { heading: "Azure AI Search Configuration", keys: ["AZURE_SEARCH_SERVICE_ENDPOINT", "AZURE_SEARCH_ADMIN_KEY"] },
  {
    heading: "Azure Blob Storage Configuration",
    keys: [
      "BLOB_CONNECTION_STRING",
      "BLOB_CONTAINER_NAME",
      "SEARCH_BLOB_DATASOURCE_CONNECTION_STRING",
      "BLOB_RESOURCE_ID",
      "SEARCH_BLOB_DATASOURCE_RESOURCE_ID",
    ],
  },
  {
    heading: "Azure OpenAI Configuration",
    keys: [
      "AZURE_OPENAI_ENDPOINT",
      "AZURE_OPENAI_KEY",
      "AZURE_OPENAI_EMBEDDING_DEPLOYMENT",
      "AZURE_OPENAI_EMBEDDING_MODEL_NAME",
      "AZURE_OPENAI_CHATGPT_DEPLOYMENT",
      "AZURE_OPENAI_CHATGPT_MODEL_NAME",
    ],
  },
  { heading: "Azure AI Services Configuration", keys: ["AI_SERVICES_ENDPOINT", "AI_SERVICES_KEY"] },
  { heading: "Knowledge Base Configuration", keys: ["AZURE_SEARCH_KNOWLEDGE_AGENT", "USE_VERBALIZATION"] },
  { heading: "Authentication", keys: ["KEYLESS"] },
];

export type ArtifactInput = {
  keyless: boolean;
  searchEndpoint: string;
  searchAdminKey?: string;
  blobConnectionString?: string;
  blobContainerName: string;
  blobResourceId?: string;
  openaiEndpoint: string;
  openaiKey?: string;
  embedding: { deployment: string; model: string };
  chat: { deployment: string; model: string };
  aiServicesEndpoint: string;
  aiServicesKey?: string;
  knowledgeAgentName: string;
  useVerbalization: boolean;
};

export function buildArtifact(input: ArtifactInput): EnvironmentArtifact {
  const connectionString = input.blobConnectionString ?? "";
  const resourceId = input.blobResourceId ?? "";
  return {
    AZURE_SEARCH_SERVICE_ENDPOINT: input.searchEndpoint,
    AZURE_SEARCH_ADMIN_KEY: input.searchAdminKey ?? "",
    BLOB_CONNECTION_STRING: connectionString,
    BLOB_CONTAINER_NAME: input.blobContainerName,
    SEARCH_BLOB_DATASOURCE_CONNECTION_STRING: connectionString,
    BLOB_RESOURCE_ID: resourceId,
    SEARCH_BLOB_DATASOURCE_RESOURCE_ID: resourceId,
    AZURE_OPENAI_ENDPOINT: input.openaiEndpoint,
    AZURE_OPENAI_KEY: input.openaiKey ?? "",
    AZURE_OPENAI_EMBEDDING_DEPLOYMENT: input.embedding.deployment,
    AZURE_OPENAI_EMBEDDING_MODEL_NAME: input.embedding.model,
    AZURE_OPENAI_CHATGPT_DEPLOYMENT: input.chat.deployment,
    AZURE_OPENAI_CHATGPT_MODEL_NAME: input.chat.model,
    AI_SERVICES_ENDPOINT: input.aiServicesEndpoint,
    AI_SERVICES_KEY: input.aiServicesKey ?? "",
    AZURE_SEARCH_KNOWLEDGE_AGENT: input.knowledgeAgentName,
    USE_VERBALIZATION: input.useVerbalization ? "true" : "false",
    KEYLESS: input.keyless ? "True" : "",
  };
}

export function renderArtifact(artifact: EnvironmentArtifact): string {
  const blocks = SECTIONS.map(({ heading, keys }) =>
    [`# ${heading}`, ...keys.map((key) => `${key}=${artifact[key]}`)].join("\n"),
  );
  return `${blocks.join("\n\n")}\n`;
}

function isEnvKey(key: string): key is EnvKey {
  return ENV_KEYS.some((k) => k === key);
}

/** Inverse of renderArtifact. Unknown keys are ignored; missing keys are empty. */
export function parseArtifact(text: string): EnvironmentArtifact {
  const values = new Map<EnvKey, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    if (isEnvKey(key)) values.set(key, line.slice(eq + 1));
  }
  const artifact = emptyArtifact();
  for (const [key, value] of values) artifact[key] = value;
  return artifact;
}

function emptyArtifact(): EnvironmentArtifact {
  const artifact = buildArtifact({
    keyless: false,
    searchEndpoint: "",
    blobContainerName: "",
    openaiEndpoint: "",
    embedding: { deployment: "", model: "" },
    chat: { deployment: "", model: "" },
    aiServicesEndpoint: "",
    knowledgeAgentName: "",
    useVerbalization: false,
  });
  artifact.USE_VERBALIZATION = "";
  return artifact;
}

/**
 * Keyless artifacts carry no secrets; keyed artifacts must carry every one.
 */
export function assertSecretPolicy(artifact: EnvironmentArtifact, keyless: boolean): void {
  for (const key of SECRET_KEYS) {
    const value = artifact[key];
    if (keyless && value !== "") {
      throw new PlatformCallFailedError("build environment artifact", `${key} must be empty in keyless mode`);
    }
    if (!keyless && value === "") {
      throw new PlatformCallFailedError(`retrieve ${key}`, "the platform returned an empty value");
    }
  }
}

/**
 * Write via a temp file in the same directory and rename over the target,
 * so readers never see a partial file.
 */
export async function writeArtifactAtomic(path: string, content: string): Promise<void> {
  const tmp = `${path}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await writeFile(tmp, content, { encoding: "utf8", mode: 0o600 });
    await chmod(tmp, 0o600);
    await rename(tmp, path);
  } catch (error) {
    await rm(tmp, { force: true }).catch(() => undefined);
    throw new ArtifactWriteError(path, formatErrorMessage(error), error);
  }
}
