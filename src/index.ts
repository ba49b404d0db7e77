/**
 * azlab — Barrel Exports
 */

// Core utilities
export type { AzureResourceType, AzureRetryOptions, AzureCredentialMethod, AmbientContext, AzurePrincipal, StepOutcome } from "./types.js";
export * from "./errors.js";
export { withAzureRetry, withDeadline, shouldRetryAzureError, formatErrorMessage, isNotFoundError } from "./retry.js";
export {
  traceAzureCalls,
  withDiagnosticStep,
  instrumentedAzureCall,
  formatAzureCallEvent,
  type AzureCallEvent,
} from "./diagnostics.js";
export { createConsoleLogger, createSilentLogger, type Logger } from "./logger.js";
export { loadConfig, parseConfig, resolveConfig, getDefaultConfig, configSchema, type AzlabConfig, type AzlabConfigInput } from "./config.js";

// Declarations and the dependency graph
export * from "./declaration/types.js";
export { parseDeclaration, loadDeclarationFile } from "./declaration/loader.js";
export { normalizeName, uniqueSuffix, NAME_RULES } from "./declaration/naming.js";
export { outputRef, isOutputRef, findOutputRefs } from "./declaration/refs.js";
export {
  STORAGE_SKUS,
  SEARCH_SKUS,
  COGNITIVE_SKUS,
  DEPLOYMENT_SKUS,
  isStorageSku,
  isSearchSku,
  isCognitiveSku,
  isDeploymentSku,
} from "./declaration/skus.js";
export { knowledgeLabBlueprint, DEFAULT_CHAT_MODEL, DEFAULT_EMBEDDING_MODEL } from "./declaration/blueprint.js";
export {
  collectDependencies,
  validateDeclaration,
  assertValidDeclaration,
  topologicalOrder,
  findCycle,
  executionLayers,
  type DeclarationIssue,
} from "./graph/planner.js";

// Reconciliation
export { Reconciler, reconcile, DEFAULT_RECONCILE_OPTIONS } from "./reconciler/engine.js";
export type * from "./reconciler/types.js";

// Platform
export type * from "./platform/types.js";
export { AzurePlatform, createAzurePlatform } from "./platform/azure.js";
export { InMemoryPlatform } from "./platform/memory.js";

// Azure access
export { AzureCredentialsManager, createCredentialsManager } from "./credentials/manager.js";
export { AzureCLIWrapper, createCLIWrapper } from "./cli/wrapper.js";
export { AzureContextManager, createContextManager } from "./context/manager.js";
export { AzureResourceManager } from "./resources/manager.js";
export { AzureStorageManager } from "./storage/manager.js";
export { AzureSearchManager } from "./search/manager.js";
export { AzureAIManager } from "./ai/manager.js";
export { AzureIAMManager } from "./iam/manager.js";
export { BUILTIN_ROLES, resolveRoleDefinitionId, roleAssignmentName } from "./iam/roles.js";

// Setup and the environment artifact
export { runSetup, type SetupOptions, type SetupReport } from "./setup/procedure.js";
export { discoverResource } from "./setup/discovery.js";
export { grantAccess, keylessGrantTargets } from "./setup/grants.js";
export { runDataLoader } from "./setup/data-loader.js";
export * from "./env/artifact.js";
