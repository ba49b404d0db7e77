/**
 * Azure Storage Manager
 *
 * Storage accounts, blob containers and account keys via @azure/arm-storage.
 */

import type { BlobContainer, StorageAccount } from "@azure/arm-storage";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import { instrumentedAzureCall } from "../diagnostics.js";
import { collectAll, resourceGroupFromId } from "../pagination.js";
import { normalizeLocation } from "../platform/ids.js";
import type { DesiredBlobContainer, DesiredStorageAccount, DiscoveredResource, ObservedResource } from "../platform/types.js";
import { isNotFoundError, withAzureRetry } from "../retry.js";
import type { AzureRetryOptions } from "../types.js";

export class AzureStorageManager {
  private retryOptions: AzureRetryOptions;

  constructor(
    private credentialsManager: AzureCredentialsManager,
    private subscriptionId: string,
    retryOptions?: AzureRetryOptions,
  ) {
    this.retryOptions = retryOptions ?? {};
  }

  private async getStorageClient() {
    const { credential } = await this.credentialsManager.getCredential();
    const { StorageManagementClient } = await import("@azure/arm-storage");
    return new StorageManagementClient(credential, this.subscriptionId);
  }

  private run<T>(operation: string, resourceGroup: string, fn: () => Promise<T>): Promise<T> {
    return withAzureRetry(() => instrumentedAzureCall("storage", operation, fn, resourceGroup), this.retryOptions);
  }

  async listStorageAccounts(resourceGroup: string): Promise<DiscoveredResource[]> {
    const client = await this.getStorageClient();
    return this.run("storageAccounts.listByResourceGroup", resourceGroup, () =>
      collectAll(client.storageAccounts.listByResourceGroup(resourceGroup), (a: StorageAccount): DiscoveredResource => ({
        kind: "StorageAccount",
        id: a.id ?? "",
        name: a.name ?? "",
        resourceGroup: resourceGroupFromId(a.id) || resourceGroup,
        location: a.location,
        endpoint: a.primaryEndpoints?.blob,
      })),
    );
  }

  async getStorageAccount(resourceGroup: string, name: string): Promise<ObservedResource | null> {
    const client = await this.getStorageClient();
    return this.run("storageAccounts.getProperties", resourceGroup, async () => {
      try {
        return toObservedAccount(await client.storageAccounts.getProperties(resourceGroup, name), resourceGroup);
      } catch (e) {
        if (isNotFoundError(e)) return null;
        throw e;
      }
    });
  }

  /** Create the account, or update SKU, access tier, shared-key access and tags in place. */
  async putStorageAccount(desired: DesiredStorageAccount, exists: boolean): Promise<ObservedResource> {
    const client = await this.getStorageClient();
    const { resourceGroup, name } = desired;

    if (exists) {
      return this.run("storageAccounts.update", resourceGroup, async () =>
        toObservedAccount(
          await client.storageAccounts.update(resourceGroup, name, {
            sku: { name: desired.sku },
            accessTier: desired.accessTier,
            allowSharedKeyAccess: desired.allowSharedKeyAccess,
            tags: desired.tags,
          }),
          resourceGroup,
        ),
      );
    }

    return this.run("storageAccounts.beginCreateAndWait", resourceGroup, async () =>
      toObservedAccount(
        await client.storageAccounts.beginCreateAndWait(resourceGroup, name, {
          location: desired.location,
          kind: "StorageV2",
          sku: { name: desired.sku },
          accessTier: desired.accessTier,
          allowSharedKeyAccess: desired.allowSharedKeyAccess,
          enableHttpsTrafficOnly: true,
          minimumTlsVersion: "TLS1_2",
          tags: desired.tags,
        }),
        resourceGroup,
      ),
    );
  }

  /** First account key; empty when the account returns none. */
  async getAccountKey(resourceGroup: string, name: string): Promise<string> {
    const client = await this.getStorageClient();
    return this.run("storageAccounts.listKeys", resourceGroup, async () => {
      const result = await client.storageAccounts.listKeys(resourceGroup, name);
      return result.keys?.[0]?.value ?? "";
    });
  }

  async getContainer(resourceGroup: string, accountName: string, name: string): Promise<ObservedResource | null> {
    const client = await this.getStorageClient();
    return this.run("blobContainers.get", resourceGroup, async () => {
      try {
        return toObservedContainer(await client.blobContainers.get(resourceGroup, accountName, name), resourceGroup, accountName);
      } catch (e) {
        if (isNotFoundError(e)) return null;
        throw e;
      }
    });
  }

  /** blobContainers.create is a PUT: it also updates an existing container. */
  async putContainer(desired: DesiredBlobContainer): Promise<ObservedResource> {
    const client = await this.getStorageClient();
    return this.run("blobContainers.create", desired.resourceGroup, async () =>
      toObservedContainer(
        await client.blobContainers.create(desired.resourceGroup, desired.account, desired.name, {
          publicAccess: desired.publicAccess ?? "None",
        }),
        desired.resourceGroup,
        desired.account,
      ),
    );
  }
}

// =============================================================================
// Mapping
// =============================================================================

function toObservedAccount(a: StorageAccount, resourceGroup: string): ObservedResource {
  const accessTier = a.accessTier === "Hot" || a.accessTier === "Cool" ? a.accessTier : undefined;
  return {
    id: a.id ?? "",
    blobEndpoint: a.primaryEndpoints?.blob,
    state: {
      kind: "StorageAccount",
      resourceGroup,
      name: a.name ?? "",
      location: normalizeLocation(a.location ?? ""),
      sku: a.sku?.name ?? "",
      accessTier,
      allowSharedKeyAccess: a.allowSharedKeyAccess,
      tags: a.tags,
    },
  };
}

function toObservedContainer(c: BlobContainer, resourceGroup: string, accountName: string): ObservedResource {
  const publicAccess = c.publicAccess === "Blob" || c.publicAccess === "Container" ? c.publicAccess : "None";
  return {
    id: c.id ?? "",
    state: {
      kind: "BlobContainer",
      resourceGroup,
      name: c.name ?? "",
      account: accountName,
      publicAccess,
    },
  };
}
