/**
 * azlab — Shared Types
 *
 * Core type definitions used across the Azure service managers,
 * the reconciler and the setup procedure.
 */

// =============================================================================
// Azure Resource Types
// =============================================================================

export type AzureResourceType =
  | "Microsoft.Storage/storageAccounts"
  | "Microsoft.Storage/storageAccounts/blobServices/containers"
  | "Microsoft.Search/searchServices"
  | "Microsoft.CognitiveServices/accounts"
  | "Microsoft.CognitiveServices/accounts/deployments"
  | "Microsoft.Authorization/roleAssignments"
  | "Microsoft.Resources/resourceGroups";

// =============================================================================
// Common Configuration
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type AzureCredentialMethod =
  | "default"
  | "cli"
  | "service-principal"
  | "managed-identity";

// =============================================================================
// Ambient Context
// =============================================================================

/** The signed-in identity that setup grants access to in keyless mode. */
export type AzurePrincipal = {
  /** Object ID of the principal. */
  id: string;
  /** Display handle used in remediation hints (UPN for users). */
  displayName?: string;
  type: "User" | "ServicePrincipal";
};

/**
 * Subscription and identity the tool acts on behalf of. Resolved once at
 * startup and passed explicitly to everything that needs it.
 */
export type AmbientContext = {
  subscriptionId: string;
  tenantId?: string;
  principal?: AzurePrincipal;
};

// =============================================================================
// Outcomes
// =============================================================================

export type StepOutcomeStatus = "succeeded" | "warning" | "failed" | "skipped";

/** Result of a best-effort sub-step, accumulated into a run report. */
export type StepOutcome = {
  step: string;
  status: StepOutcomeStatus;
  detail: string;
  /** Manual remediation for the operator, when one exists. */
  hint?: string;
};
