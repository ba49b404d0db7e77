/**
 * Azure AI Search Manager
 *
 * Search services and admin keys via @azure/arm-search.
 */

import type { SearchService } from "@azure/arm-search";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import { instrumentedAzureCall } from "../diagnostics.js";
import { collectAll, resourceGroupFromId } from "../pagination.js";
import { normalizeLocation, searchEndpoint } from "../platform/ids.js";
import type { DesiredSearchService, DiscoveredResource, ObservedResource } from "../platform/types.js";
import { isNotFoundError, withAzureRetry } from "../retry.js";
import type { AzureRetryOptions } from "../types.js";

export class AzureSearchManager {
  constructor(
    private credentialsManager: AzureCredentialsManager,
    private subscriptionId: string,
    private retryOptions?: AzureRetryOptions,
  ) {}

  private async getClient() {
    const { SearchManagementClient } = await import("@azure/arm-search");
    const { credential } = await this.credentialsManager.getCredential();
    return new SearchManagementClient(credential, this.subscriptionId);
  }

  private run<T>(operation: string, resourceGroup: string, fn: () => Promise<T>): Promise<T> {
    return withAzureRetry(() => instrumentedAzureCall("search", operation, fn, resourceGroup), this.retryOptions);
  }

  async listServices(resourceGroup: string): Promise<DiscoveredResource[]> {
    const client = await this.getClient();
    return this.run("services.listByResourceGroup", resourceGroup, () =>
      collectAll(client.services.listByResourceGroup(resourceGroup), (s: SearchService): DiscoveredResource => ({
        kind: "SearchService",
        id: s.id ?? "",
        name: s.name ?? "",
        resourceGroup: resourceGroupFromId(s.id) || resourceGroup,
        location: s.location,
        endpoint: searchEndpoint(s.name ?? ""),
      })),
    );
  }

  async getService(resourceGroup: string, name: string): Promise<ObservedResource | null> {
    const client = await this.getClient();
    return this.run("services.get", resourceGroup, async () => {
      try {
        return toObserved(await client.services.get(resourceGroup, name), resourceGroup);
      } catch (e) {
        if (isNotFoundError(e)) return null;
        throw e;
      }
    });
  }

  /** Create or update; services.createOrUpdate is a full PUT. */
  async putService(desired: DesiredSearchService): Promise<ObservedResource> {
    const client = await this.getClient();
    return this.run("services.beginCreateOrUpdateAndWait", desired.resourceGroup, async () =>
      toObserved(
        await client.services.beginCreateOrUpdateAndWait(desired.resourceGroup, desired.name, {
          location: desired.location,
          sku: { name: desired.sku },
          replicaCount: desired.replicaCount,
          partitionCount: desired.partitionCount,
          identity: desired.identity ? { type: desired.identity } : undefined,
          tags: desired.tags,
        }),
        desired.resourceGroup,
      ),
    );
  }

  async getAdminKey(resourceGroup: string, name: string): Promise<string> {
    const client = await this.getClient();
    return this.run("adminKeys.get", resourceGroup, async () => {
      const keys = await client.adminKeys.get(resourceGroup, name);
      return keys.primaryKey ?? "";
    });
  }
}

function toObserved(s: SearchService, resourceGroup: string): ObservedResource {
  const identityType = s.identity?.type;
  const name = s.name ?? "";
  return {
    id: s.id ?? "",
    endpoint: searchEndpoint(name),
    principalId: s.identity?.principalId,
    state: {
      kind: "SearchService",
      resourceGroup,
      name,
      location: normalizeLocation(s.location ?? ""),
      sku: s.sku?.name ?? "",
      replicaCount: s.replicaCount,
      partitionCount: s.partitionCount,
      identity: identityType === "SystemAssigned" ? "SystemAssigned" : identityType === undefined ? undefined : "None",
      tags: s.tags,
    },
  };
}
