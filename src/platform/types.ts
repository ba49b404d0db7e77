/**
 * Platform seam — everything the reconciler and setup need from Azure.
 *
 * Desired resources are fully resolved: OutputRefs substituted, names
 * normalized, locations filled in, role definitions expanded to IDs.
 */

import type { CognitiveVariant, IdentityMode, PrincipalType } from "../declaration/types.js";

// =============================================================================
// Desired state
// =============================================================================

type DesiredBase = {
  name: string;
  resourceGroup: string;
};

export type Tags = Record<string, string>;

export type DesiredStorageAccount = DesiredBase & {
  kind: "StorageAccount";
  location: string;
  sku: string;
  accessTier?: "Hot" | "Cool";
  allowSharedKeyAccess?: boolean;
  tags?: Tags;
};

export type DesiredBlobContainer = DesiredBase & {
  kind: "BlobContainer";
  account: string;
  publicAccess?: "None" | "Blob" | "Container";
};

export type DesiredSearchService = DesiredBase & {
  kind: "SearchService";
  location: string;
  sku: string;
  replicaCount?: number;
  partitionCount?: number;
  identity?: IdentityMode;
  tags?: Tags;
};

export type DesiredCognitiveAccount = DesiredBase & {
  kind: "CognitiveAccount";
  variant: CognitiveVariant;
  location: string;
  sku: string;
  customSubDomainName?: string;
  identity?: IdentityMode;
  disableLocalAuth?: boolean;
  tags?: Tags;
};

export type DesiredModelDeployment = DesiredBase & {
  kind: "ModelDeployment";
  account: string;
  sku: string;
  capacity?: number;
  model: { format: string; name: string; version: string };
};

export type DesiredRoleAssignment = DesiredBase & {
  kind: "RoleAssignment";
  /** Deterministic GUID from scope, principal and role definition. */
  name: string;
  scope: string;
  principalId: string;
  principalType: PrincipalType;
  roleDefinitionId: string;
};

export type DesiredResource =
  | DesiredStorageAccount
  | DesiredBlobContainer
  | DesiredSearchService
  | DesiredCognitiveAccount
  | DesiredModelDeployment
  | DesiredRoleAssignment;

// =============================================================================
// Observed state
// =============================================================================

/** A resource as read back from the platform. */
export type ObservedResource = {
  id: string;
  endpoint?: string;
  principalId?: string;
  blobEndpoint?: string;
  /** Current configuration, in the same shape as the desired state. */
  state: DesiredResource;
};

/** Resource kinds the setup procedure looks for in a scope. */
export type DiscoveryKind = "SearchService" | "OpenAIAccount" | "AIServicesAccount" | "StorageAccount";

export type DiscoveredResource = {
  kind: DiscoveryKind;
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  endpoint?: string;
};

export type GrantResult = {
  id: string;
  /** False when an identical assignment already existed. */
  created: boolean;
};

// =============================================================================
// Interface
// =============================================================================

export interface ResourcePlatform {
  scopeExists(resourceGroup: string): Promise<boolean>;
  scopeId(resourceGroup: string): string;
  scopeLocation(resourceGroup: string): Promise<string>;

  /** Current state, or undefined when the resource does not exist. */
  get(desired: DesiredResource): Promise<ObservedResource | undefined>;
  /** Create or update in place; resolves with the realized state. */
  put(desired: DesiredResource): Promise<ObservedResource>;

  list(resourceGroup: string, kind: DiscoveryKind): Promise<DiscoveredResource[]>;
  /** Search admin key, cognitive `key1`, or the first storage account key. */
  getAccessKey(resource: DiscoveredResource): Promise<string>;
  getConnectionString(storageAccount: DiscoveredResource): Promise<string>;

  /** Idempotent grant; an existing identical assignment is not an error. */
  grantRole(grant: DesiredRoleAssignment): Promise<GrantResult>;
}
