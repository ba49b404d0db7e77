/**
 * azlab — Error Types
 *
 * Fatal conditions are thrown as the classes below. Best-effort steps
 * (role grants, the data loader) never throw; they report a StepOutcome.
 */

import type { ResourceKind } from "./declaration/types.js";

export class ScopeNotFoundError extends Error {
  constructor(public scope: string) {
    super(`Resource group "${scope}" does not exist`);
    this.name = "ScopeNotFoundError";
  }
}

export class MissingResourceError extends Error {
  constructor(public kind: string, public scope: string) {
    super(`No ${kind} found in resource group "${scope}"`);
    this.name = "MissingResourceError";
  }
}

export class AmbiguousResourceError extends Error {
  constructor(public kind: string, public candidates: string[]) {
    super(`Found ${candidates.length} ${kind} resources (${candidates.join(", ")}); pass an explicit name`);
    this.name = "AmbiguousResourceError";
  }
}

export class CyclicDependencyError extends Error {
  constructor(public members: string[]) {
    super(`Circular dependency detected: ${members.join(" → ")}`);
    this.name = "CyclicDependencyError";
  }
}

export type ConfigurationIssue = {
  path: string;
  message: string;
  code?: string;
  resource?: string;
  kind?: ResourceKind;
};

export class InvalidConfigurationError extends Error {
  constructor(message: string, public issues: ConfigurationIssue[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}` : message);
    this.name = "InvalidConfigurationError";
  }
}

export class PlatformCallFailedError extends Error {
  constructor(public operation: string, message: string, public cause?: unknown) {
    super(`${operation} failed: ${redactSecrets(message)}`);
    this.name = "PlatformCallFailedError";
  }
}

export class ArtifactWriteError extends Error {
  constructor(public path: string, message: string, public cause?: unknown) {
    super(`Could not write ${path}: ${message}`);
    this.name = "ArtifactWriteError";
  }
}

export class ReconciliationTimeoutError extends Error {
  constructor(public timeoutMs: number, what = "Reconciliation") {
    super(`${what} did not finish within ${timeoutMs}ms`);
    this.name = "ReconciliationTimeoutError";
  }
}

// =============================================================================
// Exit codes
// =============================================================================

export const EXIT_CODES = {
  ok: 0,
  generic: 1,
  scopeNotFound: 2,
  missingResource: 3,
  artifactWrite: 4,
  invalidConfiguration: 5,
  platformCall: 6,
  timeout: 7,
} as const;

export function exitCodeFor(error: unknown): number {
  if (error instanceof ScopeNotFoundError) return EXIT_CODES.scopeNotFound;
  if (error instanceof MissingResourceError || error instanceof AmbiguousResourceError) return EXIT_CODES.missingResource;
  if (error instanceof ArtifactWriteError) return EXIT_CODES.artifactWrite;
  if (error instanceof InvalidConfigurationError || error instanceof CyclicDependencyError) return EXIT_CODES.invalidConfiguration;
  if (error instanceof PlatformCallFailedError) return EXIT_CODES.platformCall;
  if (error instanceof ReconciliationTimeoutError) return EXIT_CODES.timeout;
  return EXIT_CODES.generic;
}

// =============================================================================
// Secret redaction
// =============================================================================

const SECRET_PATTERNS: RegExp[] = [
  /(AccountKey=)[^;"\s]+/gi,
  /(SharedAccessSignature=)[^;"\s]+/gi,
  /([?&]sig=)[^&"\s]+/gi,
  /("?(?:primaryKey|secondaryKey|key1|key2|value)"?\s*[:=]\s*"?)[A-Za-z0-9+/=]{20,}/g,
];

const REDACTED = "***";

/**
 * Mask account keys, SAS signatures and any explicitly known secret values.
 */
export function redactSecrets(text: string, knownSecrets: Iterable<string> = []): string {
  let result = text;
  for (const secret of knownSecrets) {
    if (secret.length >= 8) result = result.split(secret).join(REDACTED);
  }
  for (const pattern of SECRET_PATTERNS) {
    result = result.replace(pattern, `$1${REDACTED}`);
  }
  return result;
}
