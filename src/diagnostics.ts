/**
 * azlab — Diagnostics
 *
 * Traces Azure management calls and attributes each one to the resource or
 * setup step it was made for. Tracing is off until something subscribes;
 * `--verbose` subscribes the logger.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { formatErrorMessage, getStatusCode } from "./retry.js";

export type AzureCallEvent = {
  seq: number;
  timestamp: number;
  outcome: "ok" | "error";
  /** Management client, e.g. `search`. */
  service: string;
  /** SDK operation, e.g. `services.get`. */
  operation: string;
  /** Logical resource name or setup step that issued the call. */
  step?: string;
  resourceGroup?: string;
  durationMs: number;
  statusCode?: number;
  error?: string;
};

export type AzureCallSubscriber = (event: AzureCallEvent) => void;

const subscribers = new Set<AzureCallSubscriber>();
const steps = new AsyncLocalStorage<string>();
let seq = 0;

/** Start delivering call events. Returns an unsubscribe function. */
export function traceAzureCalls(subscriber: AzureCallSubscriber): () => void {
  subscribers.add(subscriber);
  return () => {
    subscribers.delete(subscriber);
  };
}

export function isTracingAzureCalls(): boolean {
  return subscribers.size > 0;
}

/** Attribute every Azure call made while `fn` runs to `step`. */
export function withDiagnosticStep<T>(step: string, fn: () => Promise<T>): Promise<T> {
  return steps.run(step, fn);
}

export function currentDiagnosticStep(): string | undefined {
  return steps.getStore();
}

/**
 * Run one SDK call, publishing its duration and outcome to subscribers.
 */
export async function instrumentedAzureCall<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
  resourceGroup?: string,
): Promise<T> {
  if (subscribers.size === 0) return fn();

  const start = Date.now();
  const publish = (fields: Pick<AzureCallEvent, "outcome" | "statusCode" | "error">) => {
    const event: AzureCallEvent = {
      seq: ++seq,
      timestamp: Date.now(),
      service,
      operation,
      step: steps.getStore(),
      resourceGroup,
      durationMs: Date.now() - start,
      ...fields,
    };
    for (const subscriber of subscribers) subscriber(event);
  };

  try {
    const result = await fn();
    publish({ outcome: "ok" });
    return result;
  } catch (error) {
    publish({ outcome: "error", statusCode: getStatusCode(error), error: formatErrorMessage(error) });
    throw error;
  }
}

/** One log line per call: `[search] search.services.get 84ms`. */
export function formatAzureCallEvent(event: AzureCallEvent): string {
  const step = event.step ? `[${event.step}] ` : "";
  const failure = event.outcome === "error" ? ` failed: ${event.error ?? "unknown error"}` : "";
  return `${step}${event.service}.${event.operation} ${event.durationMs}ms${failure}`;
}

export function resetDiagnosticsForTest(): void {
  seq = 0;
  subscribers.clear();
}
