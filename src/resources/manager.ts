/**
 * Azure Resource Manager
 *
 * Resource group lookups via @azure/arm-resources.
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";
import { instrumentedAzureCall } from "../diagnostics.js";
import { normalizeLocation } from "../platform/ids.js";
import { withAzureRetry } from "../retry.js";
import type { AzureRetryOptions } from "../types.js";

export type ResourceGroupInfo = {
  id: string;
  name: string;
  location: string;
  tags?: Record<string, string>;
  provisioningState?: string;
};

export class AzureResourceManager {
  constructor(
    private credentialsManager: AzureCredentialsManager,
    private subscriptionId: string,
    private retryOptions?: AzureRetryOptions,
  ) {}

  private async getClient() {
    const { ResourceManagementClient } = await import("@azure/arm-resources");
    const { credential } = await this.credentialsManager.getCredential();
    return new ResourceManagementClient(credential, this.subscriptionId);
  }

  async resourceGroupExists(name: string): Promise<boolean> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      const result = await instrumentedAzureCall(
        "resources",
        "resourceGroups.checkExistence",
        () => client.resourceGroups.checkExistence(name),
        name,
      );
      return result.body;
    }, this.retryOptions);
  }

  async getResourceGroup(name: string): Promise<ResourceGroupInfo> {
    return withAzureRetry(async () => {
      const client = await this.getClient();
      const rg = await instrumentedAzureCall("resources", "resourceGroups.get", () => client.resourceGroups.get(name), name);
      return {
        id: rg.id ?? "",
        name: rg.name ?? name,
        location: normalizeLocation(rg.location),
        tags: rg.tags,
        provisioningState: rg.properties?.provisioningState,
      };
    }, this.retryOptions);
  }
}
