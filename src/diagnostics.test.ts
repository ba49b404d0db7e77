/**
 * azlab — Diagnostics Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  currentDiagnosticStep,
  formatAzureCallEvent,
  instrumentedAzureCall,
  isTracingAzureCalls,
  resetDiagnosticsForTest,
  traceAzureCalls,
  withDiagnosticStep,
  type AzureCallEvent,
} from "./diagnostics.js";

beforeEach(() => {
  resetDiagnosticsForTest();
});

describe("traceAzureCalls", () => {
  it("is on only while someone subscribes", () => {
    expect(isTracingAzureCalls()).toBe(false);
    const unsubscribe = traceAzureCalls(vi.fn());
    expect(isTracingAzureCalls()).toBe(true);
    unsubscribe();
    expect(isTracingAzureCalls()).toBe(false);
  });
});

describe("instrumentedAzureCall", () => {
  it("publishes a numbered event for a successful call", async () => {
    const subscriber = vi.fn();
    traceAzureCalls(subscriber);

    const result = await instrumentedAzureCall("storage", "storageAccounts.listKeys", async () => "data", "rg-lab");

    expect(result).toBe("data");
    expect(subscriber).toHaveBeenCalledTimes(1);
    expect(subscriber.mock.calls[0][0]).toMatchObject({
      seq: 1,
      outcome: "ok",
      service: "storage",
      operation: "storageAccounts.listKeys",
      resourceGroup: "rg-lab",
      step: undefined,
    });
  });

  it("publishes the status and redacted message of a failed call", async () => {
    const subscriber = vi.fn();
    traceAzureCalls(subscriber);

    await expect(
      instrumentedAzureCall("storage", "storageAccounts.listKeys", async () => {
        throw Object.assign(new Error("denied"), { statusCode: 403 });
      }),
    ).rejects.toThrow("denied");

    expect(subscriber.mock.calls[0][0]).toMatchObject({ outcome: "error", statusCode: 403, error: "(HTTP 403) denied" });
  });

  it("passes through untraced without subscribers", async () => {
    expect(await instrumentedAzureCall("storage", "storageAccounts.listKeys", async () => "data")).toBe("data");
  });
});

describe("withDiagnosticStep", () => {
  it("attributes calls to the step they run under", async () => {
    const events: AzureCallEvent[] = [];
    traceAzureCalls((e) => events.push(e));

    await Promise.all([
      withDiagnosticStep("storage", () => instrumentedAzureCall("storage", "storageAccounts.get", async () => 1)),
      withDiagnosticStep("search", () => instrumentedAzureCall("search", "services.get", async () => 2)),
    ]);

    expect(events.map((e) => [e.step, e.service])).toEqual(
      expect.arrayContaining([
        ["storage", "storage"],
        ["search", "search"],
      ]),
    );
    expect(currentDiagnosticStep()).toBeUndefined();
  });
});

describe("formatAzureCallEvent", () => {
  const base: AzureCallEvent = {
    seq: 1,
    timestamp: 0,
    outcome: "ok",
    service: "search",
    operation: "services.get",
    durationMs: 84,
  };

  it("formats a successful call with its step", () => {
    expect(formatAzureCallEvent({ ...base, step: "search" })).toBe("[search] search.services.get 84ms");
  });

  it("formats a failure without a step", () => {
    expect(formatAzureCallEvent({ ...base, outcome: "error", error: "(HTTP 403) denied" })).toBe(
      "search.services.get 84ms failed: (HTTP 403) denied",
    );
  });
});
