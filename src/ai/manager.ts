/**
 * Azure AI / Cognitive Services Manager
 *
 * Manages Cognitive Services accounts (OpenAI, AIServices) and model
 * deployments via @azure/arm-cognitiveservices.
 */

import type { Account, Deployment } from "@azure/arm-cognitiveservices";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { CognitiveVariant } from "../declaration/types.js";
import { instrumentedAzureCall } from "../diagnostics.js";
import { collectAll, resourceGroupFromId } from "../pagination.js";
import { normalizeLocation } from "../platform/ids.js";
import type {
  DesiredCognitiveAccount,
  DesiredModelDeployment,
  DiscoveredResource,
  ObservedResource,
} from "../platform/types.js";
import { isNotFoundError, withAzureRetry } from "../retry.js";
import type { AzureRetryOptions } from "../types.js";

export class AzureAIManager {
  constructor(
    private credentialsManager: AzureCredentialsManager,
    private subscriptionId: string,
    private retryOptions?: AzureRetryOptions,
  ) {}

  private async getClient() {
    const { CognitiveServicesManagementClient } = await import("@azure/arm-cognitiveservices");
    const { credential } = await this.credentialsManager.getCredential();
    return new CognitiveServicesManagementClient(credential, this.subscriptionId);
  }

  private run<T>(operation: string, resourceGroup: string, fn: () => Promise<T>): Promise<T> {
    return withAzureRetry(() => instrumentedAzureCall("cognitiveservices", operation, fn, resourceGroup), this.retryOptions);
  }

  /** Accounts of one kind ("OpenAI", "AIServices") in a resource group. */
  async listAccounts(resourceGroup: string, variant: CognitiveVariant): Promise<DiscoveredResource[]> {
    const client = await this.getClient();
    const discoveryKind = variant === "OpenAI" ? "OpenAIAccount" : "AIServicesAccount";
    return this.run("accounts.listByResourceGroup", resourceGroup, async () => {
      const accounts = await collectAll(
        client.accounts.listByResourceGroup(resourceGroup),
        (a: Account) => a,
        (a) => a.kind === variant,
      );
      return accounts.map((a): DiscoveredResource => ({
        kind: discoveryKind,
        id: a.id ?? "",
        name: a.name ?? "",
        resourceGroup: resourceGroupFromId(a.id) || resourceGroup,
        location: a.location,
        endpoint: a.properties?.endpoint,
      }));
    });
  }

  async getAccount(resourceGroup: string, name: string): Promise<ObservedResource | null> {
    const client = await this.getClient();
    return this.run("accounts.get", resourceGroup, async () => {
      try {
        return toObservedAccount(await client.accounts.get(resourceGroup, name), resourceGroup);
      } catch (e) {
        if (isNotFoundError(e)) return null;
        throw e;
      }
    });
  }

  async putAccount(desired: DesiredCognitiveAccount): Promise<ObservedResource> {
    const client = await this.getClient();
    return this.run("accounts.beginCreateAndWait", desired.resourceGroup, async () =>
      toObservedAccount(
        await client.accounts.beginCreateAndWait(desired.resourceGroup, desired.name, {
          kind: desired.variant,
          location: desired.location,
          sku: { name: desired.sku },
          identity: desired.identity ? { type: desired.identity } : undefined,
          properties: {
            customSubDomainName: desired.customSubDomainName,
            disableLocalAuth: desired.disableLocalAuth,
            publicNetworkAccess: "Enabled",
          },
          tags: desired.tags,
        }),
        desired.resourceGroup,
      ),
    );
  }

  /** `key1` of the account; empty when local auth is disabled. */
  async getAccountKey(resourceGroup: string, name: string): Promise<string> {
    const client = await this.getClient();
    return this.run("accounts.listKeys", resourceGroup, async () => {
      const keys = await client.accounts.listKeys(resourceGroup, name);
      return keys.key1 ?? "";
    });
  }

  async getDeployment(resourceGroup: string, accountName: string, name: string): Promise<ObservedResource | null> {
    const client = await this.getClient();
    return this.run("deployments.get", resourceGroup, async () => {
      try {
        return toObservedDeployment(await client.deployments.get(resourceGroup, accountName, name), resourceGroup, accountName);
      } catch (e) {
        if (isNotFoundError(e)) return null;
        throw e;
      }
    });
  }

  async putDeployment(desired: DesiredModelDeployment): Promise<ObservedResource> {
    const client = await this.getClient();
    return this.run("deployments.beginCreateOrUpdateAndWait", desired.resourceGroup, async () =>
      toObservedDeployment(
        await client.deployments.beginCreateOrUpdateAndWait(desired.resourceGroup, desired.account, desired.name, {
          sku: { name: desired.sku, capacity: desired.capacity },
          properties: { model: { ...desired.model } },
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

function toVariant(kind: string | undefined): CognitiveVariant {
  if (kind === "OpenAI" || kind === "AIServices") return kind;
  return "CognitiveServices";
}

function toObservedAccount(a: Account, resourceGroup: string): ObservedResource {
  const identityType = a.identity?.type;
  return {
    id: a.id ?? "",
    endpoint: a.properties?.endpoint,
    principalId: a.identity?.principalId,
    state: {
      kind: "CognitiveAccount",
      resourceGroup,
      name: a.name ?? "",
      variant: toVariant(a.kind),
      location: normalizeLocation(a.location ?? ""),
      sku: a.sku?.name ?? "",
      customSubDomainName: a.properties?.customSubDomainName,
      identity: identityType === "SystemAssigned" ? "SystemAssigned" : identityType === undefined ? undefined : "None",
      disableLocalAuth: a.properties?.disableLocalAuth,
      tags: a.tags,
    },
  };
}

function toObservedDeployment(d: Deployment, resourceGroup: string, accountName: string): ObservedResource {
  const model = d.properties?.model;
  return {
    id: d.id ?? "",
    state: {
      kind: "ModelDeployment",
      resourceGroup,
      name: d.name ?? "",
      account: accountName,
      sku: d.sku?.name ?? "",
      capacity: d.sku?.capacity,
      model: { format: model?.format ?? "", name: model?.name ?? "", version: model?.version ?? "" },
    },
  };
}
