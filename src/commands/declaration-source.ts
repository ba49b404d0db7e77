import type { AzlabConfig } from "../config.js";
import { DEFAULT_CHAT_MODEL, DEFAULT_EMBEDDING_MODEL, knowledgeLabBlueprint } from "../declaration/blueprint.js";
import { loadDeclarationFile } from "../declaration/loader.js";
import type { Declaration } from "../declaration/types.js";

export type DeclarationSourceOptions = {
  /** Declaration JSON file; omitted means the built-in lab blueprint. */
  file?: string;
  prefix?: string;
  location?: string;
};

/** `--location`, then `defaultRegion`; undefined leaves the resource group's location. */
export function resolveLocation(opts: DeclarationSourceOptions, config: AzlabConfig): string | undefined {
  return opts.location ?? config.defaultRegion;
}

export async function loadDeclarationSource(
  opts: DeclarationSourceOptions,
  config: AzlabConfig,
  scope: { subscriptionId: string; resourceGroup: string },
): Promise<Declaration> {
  if (opts.file) return loadDeclarationFile(opts.file);
  return knowledgeLabBlueprint({
    subscriptionId: scope.subscriptionId,
    resourceGroup: scope.resourceGroup,
    prefix: opts.prefix,
    location: resolveLocation(opts, config),
    containerName: config.blobContainerName,
    embedding: { ...DEFAULT_EMBEDDING_MODEL, ...config.models.embedding },
    chat: { ...DEFAULT_CHAT_MODEL, ...config.models.chat },
  });
}
