/**
 * Built-in blueprint: the knowledge-base lab environment.
 *
 * Generates a declaration for one scope. Physical names are derived from a
 * prefix plus a suffix hashed from subscription and resource group, so the
 * same inputs always produce the same declaration.
 */

import { uniqueSuffix } from "./naming.js";
import { outputRef } from "./refs.js";
import type { Declaration, ResourceSpec } from "./types.js";

export type BlueprintModel = {
  deployment: string;
  model: string;
  version: string;
  capacity?: number;
};

export type KnowledgeLabOptions = {
  subscriptionId: string;
  resourceGroup: string;
  prefix?: string;
  /** Omitted means the resource group's location, filled in at reconcile time. */
  location?: string;
  containerName?: string;
  embedding?: BlueprintModel;
  chat?: BlueprintModel;
};

export const DEFAULT_EMBEDDING_MODEL: BlueprintModel = {
  deployment: "text-embedding-3-large",
  model: "text-embedding-3-large",
  version: "1",
  capacity: 50,
};

export const DEFAULT_CHAT_MODEL: BlueprintModel = {
  deployment: "gpt-4.1",
  model: "gpt-4.1",
  version: "2025-04-14",
  capacity: 50,
};

export function knowledgeLabBlueprint(options: KnowledgeLabOptions): Declaration {
  const prefix = options.prefix ?? "kb";
  const suffix = uniqueSuffix(options.subscriptionId, options.resourceGroup);
  const location = options.location;
  const embedding = options.embedding ?? DEFAULT_EMBEDDING_MODEL;
  const chat = options.chat ?? DEFAULT_CHAT_MODEL;

  const resources: ResourceSpec[] = [
    {
      logicalName: "storage",
      kind: "StorageAccount",
      name: `st${prefix}${suffix}`,
      location,
      sku: { name: "Standard_LRS" },
      properties: { accessTier: "Hot" },
    },
    {
      logicalName: "container",
      kind: "BlobContainer",
      name: options.containerName ?? "documents",
      properties: { account: outputRef("storage", "name"), publicAccess: "None" },
    },
    {
      logicalName: "search",
      kind: "SearchService",
      name: `srch-${prefix}-${suffix}`,
      location,
      sku: { name: "basic" },
      properties: { replicaCount: 1, partitionCount: 1, identity: "SystemAssigned" },
    },
    {
      logicalName: "openai",
      kind: "CognitiveAccount",
      name: `oai-${prefix}-${suffix}`,
      location,
      sku: { name: "S0" },
      properties: { variant: "OpenAI", customSubDomainName: `oai-${prefix}-${suffix}`, identity: "SystemAssigned" },
    },
    {
      logicalName: "aiServices",
      kind: "CognitiveAccount",
      name: `ais-${prefix}-${suffix}`,
      location,
      sku: { name: "S0" },
      properties: { variant: "AIServices", customSubDomainName: `ais-${prefix}-${suffix}`, identity: "SystemAssigned" },
    },
    deployment("embeddingDeployment", embedding, []),
    // Deployments in one account are created one at a time
    deployment("chatDeployment", chat, ["embeddingDeployment"]),
    searchGrant("searchReadsStorage", "Storage Blob Data Reader", "storage"),
    searchGrant("searchUsesOpenAI", "Cognitive Services OpenAI User", "openai"),
    searchGrant("searchUsesAiServices", "Cognitive Services User", "aiServices"),
  ];

  return {
    description: `Knowledge-base lab environment for ${options.resourceGroup}`,
    resources,
  };
}

function deployment(logicalName: string, model: BlueprintModel, dependsOn: string[]): ResourceSpec {
  return {
    logicalName,
    kind: "ModelDeployment",
    name: model.deployment,
    dependsOn: dependsOn.length > 0 ? dependsOn : undefined,
    sku: { name: "GlobalStandard", capacity: model.capacity ?? 50 },
    properties: {
      account: outputRef("openai", "name"),
      model: { format: "OpenAI", name: model.model, version: model.version },
    },
  };
}

function searchGrant(logicalName: string, role: string, target: string): ResourceSpec {
  return {
    logicalName,
    kind: "RoleAssignment",
    properties: {
      principalId: outputRef("search", "principalId"),
      principalType: "ServicePrincipal",
      role,
      scope: outputRef(target, "id"),
    },
  };
}
