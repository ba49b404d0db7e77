/**
 * azlab — Platform Call Utilities
 *
 * Retry with exponential backoff and jitter, per-call deadlines, and
 * error formatting for Azure SDK failures.
 */

import type { AzureRetryOptions } from "./types.js";
import { PlatformCallFailedError, redactSecrets } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "RetryableError",
  "AnotherOperationInProgress",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error fields
// =============================================================================

/** Read a property off an unknown thrown value. */
export function readErrorField(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null || !(key in error)) return undefined;
  return Reflect.get(error, key);
}

function readString(error: unknown, key: string): string {
  const value = readErrorField(error, key);
  return typeof value === "string" ? value : "";
}

/** HTTP status of an SDK error (RestError uses statusCode, fetch-style errors use status). */
export function getStatusCode(error: unknown): number | undefined {
  const value = readErrorField(error, "statusCode") ?? readErrorField(error, "status");
  return typeof value === "number" ? value : undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getStatusCode(error) === 404 || readString(error, "code") === "ResourceNotFound";
}

// =============================================================================
// Error Checking
// =============================================================================

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  const code = readString(error, "code") || readString(error, "Code");
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = getStatusCode(error) ?? 0;
  if (statusCode === 429) return true;
  if (statusCode >= 500 && statusCode < 600) return true;

  const message = readString(error, "message").toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Extract the Retry-After delay from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown): number | null {
  const headers = readErrorField(error, "headers");
  if (typeof headers !== "object" || headers === null) return null;

  const retryAfter = headerValue(headers, "retry-after") ?? headerValue(headers, "Retry-After");
  if (!retryAfter) return null;

  // Either delta-seconds or an HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

function headerValue(headers: object, name: string): string | undefined {
  // HttpHeaders from @azure/core-rest-pipeline exposes get(); plain objects are indexed
  const getter = readErrorField(headers, "get");
  if (typeof getter === "function") {
    const value: unknown = Reflect.apply(getter, headers, [name]);
    return typeof value === "string" ? value : undefined;
  }
  const value = readErrorField(headers, name);
  return typeof value === "string" ? value : undefined;
}

// =============================================================================
// Retry Execution
// =============================================================================

/**
 * Execute a function with Azure-specific retry logic.
 */
export async function withAzureRetry<T>(
  fn: () => Promise<T>,
  options?: AzureRetryOptions,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAzureError(error)) break;

      const retryAfterMs = getAzureRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Deadlines
// =============================================================================

/**
 * Race a platform call against a deadline and an optional abort signal.
 * Expiry rejects with PlatformCallFailedError; the underlying call is not
 * cancelled, its eventual result is ignored.
 */
export function withDeadline<T>(
  promise: Promise<T>,
  ms: number,
  operation: string,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new PlatformCallFailedError(operation, "cancelled before start"));
  }
  if (ms <= 0 && !signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = ms > 0
      ? setTimeout(() => finish(() => reject(new PlatformCallFailedError(operation, `no response within ${ms}ms`))), ms)
      : undefined;
    const onAbort = () => finish(() => reject(new PlatformCallFailedError(operation, "cancelled")));
    signal?.addEventListener("abort", onAbort, { once: true });

    let settled = false;
    function finish(action: () => void) {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      action();
    }

    promise.then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error)),
    );
  });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a single line: `[code] (HTTP status) message`.
 * Platform text is kept verbatim apart from secret redaction.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return redactSecrets(error);

  const code = readString(error, "code");
  const message = readString(error, "message") || (error instanceof Error ? "" : String(error)) || "Unknown error";
  const statusCode = getStatusCode(error);

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return redactSecrets(parts.join(" "));
}
