/**
 * Discovery of the lab resources already present in a resource group.
 */

import { AmbiguousResourceError, MissingResourceError } from "../errors.js";
import type { DiscoveredResource, DiscoveryKind, ResourcePlatform } from "../platform/types.js";

export type DiscoveryOptions = {
  /** Select this resource by name instead of picking among matches. */
  name?: string;
  /** Raise AmbiguousResourceError instead of picking the first match. */
  strict?: boolean;
};

export type DiscoveryResult = {
  resource: DiscoveredResource;
  /** Set when more than one match was found and one was picked. */
  warning?: string;
};

const KIND_LABELS: Record<DiscoveryKind, string> = {
  SearchService: "Azure AI Search service",
  OpenAIAccount: "Azure OpenAI account",
  AIServicesAccount: "AI Services account",
  StorageAccount: "Storage Account",
};

export function discoveryLabel(kind: DiscoveryKind): string {
  return KIND_LABELS[kind];
}

/**
 * Find exactly one resource of a kind. Several matches resolve to the
 * lexicographically first name so repeated runs produce the same artifact.
 */
export async function discoverResource(
  platform: ResourcePlatform,
  resourceGroup: string,
  kind: DiscoveryKind,
  options: DiscoveryOptions = {},
): Promise<DiscoveryResult> {
  const found = await platform.list(resourceGroup, kind);
  const label = KIND_LABELS[kind];

  if (options.name) {
    const wanted = options.name.toLowerCase();
    const match = found.find((r) => r.name.toLowerCase() === wanted);
    if (!match) throw new MissingResourceError(`${label} "${options.name}"`, resourceGroup);
    return { resource: match };
  }

  if (found.length === 0) throw new MissingResourceError(label, resourceGroup);

  const sorted = [...found].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  if (sorted.length === 1) return { resource: sorted[0] };

  const names = sorted.map((r) => r.name);
  if (options.strict) throw new AmbiguousResourceError(label, names);
  return {
    resource: sorted[0],
    warning: `Found ${names.length} ${label}s (${names.join(", ")}); using ${names[0]}`,
  };
}
