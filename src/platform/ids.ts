/**
 * ARM resource IDs, endpoints and connection strings.
 */

import type { DesiredResource } from "./types.js";

export function resourceGroupId(subscriptionId: string, resourceGroup: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}`;
}

export function resourceIdFor(subscriptionId: string, desired: DesiredResource): string {
  const rg = resourceGroupId(subscriptionId, desired.resourceGroup);
  switch (desired.kind) {
    case "StorageAccount":
      return `${rg}/providers/Microsoft.Storage/storageAccounts/${desired.name}`;
    case "BlobContainer":
      return `${rg}/providers/Microsoft.Storage/storageAccounts/${desired.account}/blobServices/default/containers/${desired.name}`;
    case "SearchService":
      return `${rg}/providers/Microsoft.Search/searchServices/${desired.name}`;
    case "CognitiveAccount":
      return `${rg}/providers/Microsoft.CognitiveServices/accounts/${desired.name}`;
    case "ModelDeployment":
      return `${rg}/providers/Microsoft.CognitiveServices/accounts/${desired.account}/deployments/${desired.name}`;
    case "RoleAssignment":
      return `${desired.scope}/providers/Microsoft.Authorization/roleAssignments/${desired.name}`;
  }
}

/** ARM returns locations lowercase without spaces ("West Central US" → "westcentralus"). */
export function normalizeLocation(location: string): string {
  return location.toLowerCase().replace(/\s+/g, "");
}

export function searchEndpoint(serviceName: string): string {
  return `https://${serviceName}.search.windows.net`;
}

export function blobEndpoint(accountName: string): string {
  return `https://${accountName}.blob.core.windows.net/`;
}

export function storageConnectionString(accountName: string, accountKey: string): string {
  return `DefaultEndpointsProtocol=https;AccountName=${accountName};AccountKey=${accountKey};EndpointSuffix=core.windows.net`;
}
