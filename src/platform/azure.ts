/**
 * ResourcePlatform over the Azure service managers.
 */

import { AzureAIManager } from "../ai/manager.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import { ScopeNotFoundError } from "../errors.js";
import { AzureIAMManager } from "../iam/manager.js";
import { AzureResourceManager } from "../resources/manager.js";
import { isNotFoundError } from "../retry.js";
import { AzureSearchManager } from "../search/manager.js";
import { AzureStorageManager } from "../storage/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { resourceGroupId, storageConnectionString } from "./ids.js";
import type {
  DesiredResource,
  DesiredRoleAssignment,
  DiscoveredResource,
  DiscoveryKind,
  GrantResult,
  ObservedResource,
  ResourcePlatform,
} from "./types.js";

export type AzurePlatformManagers = {
  resources: AzureResourceManager;
  storage: AzureStorageManager;
  search: AzureSearchManager;
  ai: AzureAIManager;
  iam: AzureIAMManager;
};

export class AzurePlatform implements ResourcePlatform {
  constructor(
    readonly subscriptionId: string,
    private managers: AzurePlatformManagers,
  ) {}

  scopeExists(resourceGroup: string): Promise<boolean> {
    return this.managers.resources.resourceGroupExists(resourceGroup);
  }

  scopeId(resourceGroup: string): string {
    return resourceGroupId(this.subscriptionId, resourceGroup);
  }

  async scopeLocation(resourceGroup: string): Promise<string> {
    try {
      const rg = await this.managers.resources.getResourceGroup(resourceGroup);
      return rg.location;
    } catch (error) {
      if (isNotFoundError(error)) throw new ScopeNotFoundError(resourceGroup);
      throw error;
    }
  }

  async get(desired: DesiredResource): Promise<ObservedResource | undefined> {
    const observed = await this.read(desired);
    return observed ?? undefined;
  }

  private read(desired: DesiredResource): Promise<ObservedResource | null> {
    const { storage, search, ai, iam } = this.managers;
    switch (desired.kind) {
      case "StorageAccount":
        return storage.getStorageAccount(desired.resourceGroup, desired.name);
      case "BlobContainer":
        return storage.getContainer(desired.resourceGroup, desired.account, desired.name);
      case "SearchService":
        return search.getService(desired.resourceGroup, desired.name);
      case "CognitiveAccount":
        return ai.getAccount(desired.resourceGroup, desired.name);
      case "ModelDeployment":
        return ai.getDeployment(desired.resourceGroup, desired.account, desired.name);
      case "RoleAssignment":
        return iam.getRoleAssignment(desired.scope, desired.name);
    }
  }

  async put(desired: DesiredResource): Promise<ObservedResource> {
    const { storage, search, ai, iam } = this.managers;
    switch (desired.kind) {
      case "StorageAccount": {
        // Creation and update are different calls for storage accounts.
        const existing = await storage.getStorageAccount(desired.resourceGroup, desired.name);
        return storage.putStorageAccount(desired, existing !== null);
      }
      case "BlobContainer":
        return storage.putContainer(desired);
      case "SearchService":
        return search.putService(desired);
      case "CognitiveAccount":
        return ai.putAccount(desired);
      case "ModelDeployment":
        return ai.putDeployment(desired);
      case "RoleAssignment": {
        const result = await iam.createRoleAssignment(desired);
        return result.observed;
      }
    }
  }

  list(resourceGroup: string, kind: DiscoveryKind): Promise<DiscoveredResource[]> {
    switch (kind) {
      case "SearchService":
        return this.managers.search.listServices(resourceGroup);
      case "OpenAIAccount":
        return this.managers.ai.listAccounts(resourceGroup, "OpenAI");
      case "AIServicesAccount":
        return this.managers.ai.listAccounts(resourceGroup, "AIServices");
      case "StorageAccount":
        return this.managers.storage.listStorageAccounts(resourceGroup);
    }
  }

  getAccessKey(resource: DiscoveredResource): Promise<string> {
    switch (resource.kind) {
      case "SearchService":
        return this.managers.search.getAdminKey(resource.resourceGroup, resource.name);
      case "OpenAIAccount":
      case "AIServicesAccount":
        return this.managers.ai.getAccountKey(resource.resourceGroup, resource.name);
      case "StorageAccount":
        return this.managers.storage.getAccountKey(resource.resourceGroup, resource.name);
    }
  }

  async getConnectionString(storageAccount: DiscoveredResource): Promise<string> {
    const key = await this.managers.storage.getAccountKey(storageAccount.resourceGroup, storageAccount.name);
    return key ? storageConnectionString(storageAccount.name, key) : "";
  }

  async grantRole(grant: DesiredRoleAssignment): Promise<GrantResult> {
    const existing = await this.managers.iam.getRoleAssignment(grant.scope, grant.name);
    if (existing) return { id: existing.id, created: false };
    const result = await this.managers.iam.createRoleAssignment(grant);
    return { id: result.observed.id, created: result.created };
  }
}

export function createAzurePlatform(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
): AzurePlatform {
  return new AzurePlatform(subscriptionId, {
    resources: new AzureResourceManager(credentialsManager, subscriptionId, retryOptions),
    storage: new AzureStorageManager(credentialsManager, subscriptionId, retryOptions),
    search: new AzureSearchManager(credentialsManager, subscriptionId, retryOptions),
    ai: new AzureAIManager(credentialsManager, subscriptionId, retryOptions),
    iam: new AzureIAMManager(credentialsManager, subscriptionId, retryOptions),
  });
}
