/**
 * Resource reconciler.
 *
 * - Validates the declaration and rejects cycles before any platform call
 * - Realizes specs in dependency order, resolving OutputRefs just before
 *   each spec is submitted
 * - Put-or-update: read current state, diff, and only write on a difference
 * - Sequential and fail-fast by default; bounded concurrency per layer on request
 * - Per-call deadline, overall timeout, cancellation (AbortSignal)
 * - Emits lifecycle events
 * - Dry-run mode
 *
 * Nothing is rolled back: resources realized before a failure stay, and a
 * re-run converges.
 */

import { withDiagnosticStep } from "../diagnostics.js";
import { PlatformCallFailedError, ReconciliationTimeoutError, ScopeNotFoundError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import { formatErrorMessage, withDeadline } from "../retry.js";
import { OUTPUTS_BY_KIND, type Declaration, type DeploymentOutput, type ResourceSpec } from "../declaration/types.js";
import { assertValidDeclaration, collectDependencies, executionLayers, topologicalOrder } from "../graph/planner.js";
import type { DesiredResource, ResourcePlatform } from "../platform/types.js";
import { diffResource, outputFromObserved, resolveDesired } from "./handlers.js";
import type {
  ReconcileContext,
  ReconcileEvent,
  ReconcileEventListener,
  ReconcileOptions,
  ReconcileReport,
  ReconcileStatus,
  ResourceResult,
} from "./types.js";

// =============================================================================
// Default Options
// =============================================================================

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
  maxConcurrency: 1,
  callTimeoutMs: 120_000, // 2 min per call
  timeoutMs: 600_000, // 10 min total
  dryRun: false,
};

const DRY_RUN_LOCATION = "<resource-group-location>";

type PassState = {
  context: ReconcileContext;
  location: string;
  outputs: Map<string, DeploymentOutput>;
  results: Map<string, ResourceResult>;
  signal: AbortSignal;
};

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  private options: ReconcileOptions;
  private listeners: ReconcileEventListener[] = [];

  constructor(
    private platform: ResourcePlatform,
    options: Partial<ReconcileOptions> = {},
    private logger: Logger = createSilentLogger(),
  ) {
    this.options = { ...DEFAULT_RECONCILE_OPTIONS, ...options };
  }

  /** Subscribe to lifecycle events. */
  on(listener: ReconcileEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: Omit<ReconcileEvent, "timestamp">): void {
    const full: ReconcileEvent = { ...event, timestamp: new Date().toISOString() };
    for (const listener of this.listeners) {
      try {
        listener(full);
      } catch (err) {
        this.logger.debug(`Event listener threw: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /**
   * Realize a declaration in the given scope.
   *
   * @throws InvalidConfigurationError or CyclicDependencyError before any platform call
   * @throws ScopeNotFoundError when the resource group does not exist
   */
  async reconcile(declaration: Declaration, context: ReconcileContext): Promise<ReconcileReport> {
    const started = Date.now();
    const opts = this.options;

    // 1. Structural checks: nothing below runs on an invalid declaration
    const warnings = assertValidDeclaration(declaration).map((w) => w.message);
    const specs = declaration.resources;
    const order = topologicalOrder(specs);
    for (const warning of warnings) this.logger.warn(warning);

    // 2. Overall timeout combined with the caller's signal
    const timeoutController = new AbortController();
    const globalTimer = opts.timeoutMs > 0 ? setTimeout(() => timeoutController.abort(), opts.timeoutMs) : undefined;
    const combined = opts.signal ? anySignal([opts.signal, timeoutController.signal]) : undefined;
    const signal = combined?.signal ?? timeoutController.signal;

    const results = new Map<string, ResourceResult>();
    const outputs = new Map<string, DeploymentOutput>();

    this.emit({
      type: "reconcile:start",
      message: `Reconciling ${specs.length} resources in ${context.resourceGroup}${opts.dryRun ? " (dry-run)" : ""}`,
    });

    let failed = false;
    try {
      // 3. Scope
      let location = context.location ?? DRY_RUN_LOCATION;
      if (!opts.dryRun) {
        try {
          const exists = await this.call(`check resource group ${context.resourceGroup}`, () => this.platform.scopeExists(context.resourceGroup), signal);
          if (!exists) throw new ScopeNotFoundError(context.resourceGroup);
          location = context.location ?? (await this.call(`read location of ${context.resourceGroup}`, () => this.platform.scopeLocation(context.resourceGroup), signal));
        } catch (err) {
          // Timeout or cancellation during the scope check: every spec is reported skipped below
          if (!signal.aborted) throw err;
        }
      }

      const pass: PassState = { context, location, outputs, results, signal };

      // 4. Batches: one spec at a time, or chunks of each dependency layer
      const concurrent = opts.maxConcurrency > 1;
      const batches = concurrent
        ? executionLayers(specs).flatMap((layer) => chunkArray(layer, opts.maxConcurrency))
        : order.map((spec) => [spec]);

      for (const batch of batches) {
        if (failed && !concurrent) break;
        if (signal.aborted) break;

        const runnable = batch.filter((spec) => {
          const blocker = collectDependencies(spec).find((dep) => {
            const action = results.get(dep)?.action;
            return action === "failed" || action === "skipped";
          });
          if (blocker) this.markSkipped(spec, results, `dependency "${blocker}" did not complete`);
          return !blocker;
        });

        const settled = await Promise.allSettled(runnable.map((spec) => withDiagnosticStep(spec.logicalName, () => this.reconcileOne(spec, pass))));
        for (let i = 0; i < settled.length; i++) {
          const outcome = settled[i];
          if (outcome.status === "fulfilled") {
            if (outcome.value.action === "failed") failed = true;
            continue;
          }
          // reconcileOne reports its own failures; a rejection here is unexpected
          const spec = runnable[i];
          const message = formatErrorMessage(outcome.reason);
          results.set(spec.logicalName, { logicalName: spec.logicalName, kind: spec.kind, action: "failed", durationMs: 0, error: message });
          failed = true;
        }
      }
    } finally {
      if (globalTimer) clearTimeout(globalTimer);
      combined?.dispose();
    }

    // 5. Whatever never ran is skipped
    const timedOut = timeoutController.signal.aborted;
    const cancelled = !timedOut && signal.aborted;
    for (const spec of order) {
      if (results.has(spec.logicalName)) continue;
      const reason = timedOut ? "not reached before the timeout" : cancelled ? "cancelled" : "skipped due to earlier failure";
      this.markSkipped(spec, results, reason);
    }

    const status: ReconcileStatus = timedOut ? "timed-out" : cancelled ? "cancelled" : failed ? "failed" : "succeeded";
    const resources = order.flatMap((spec) => results.get(spec.logicalName) ?? []);
    const summary = { created: 0, updated: 0, unchanged: 0, planned: 0, failed: 0, skipped: 0 };
    for (const r of resources) summary[r.action]++;

    const errors = resources.filter((r) => r.error).map((r) => `${r.logicalName}: ${r.error}`);
    if (timedOut) errors.push(new ReconciliationTimeoutError(opts.timeoutMs).message);

    const message =
      `${summary.created} created, ${summary.updated} updated, ${summary.unchanged} unchanged` +
      (summary.planned ? `, ${summary.planned} planned` : "") +
      (summary.failed ? `, ${summary.failed} failed` : "") +
      (summary.skipped ? `, ${summary.skipped} skipped` : "");
    this.emit({ type: status === "succeeded" ? "reconcile:complete" : "reconcile:failed", message });
    if (status === "succeeded") this.logger.info(message);
    else this.logger.error(`Reconciliation ${status}: ${message}`);

    return {
      status,
      order: order.map((s) => s.logicalName),
      resources,
      outputs: Object.fromEntries(outputs),
      summary,
      errors,
      warnings,
      startedAt: new Date(started).toISOString(),
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
    };
  }

  // ---------------------------------------------------------------------------
  // Single resource
  // ---------------------------------------------------------------------------

  private async reconcileOne(spec: ResourceSpec, pass: PassState): Promise<ResourceResult> {
    const begun = Date.now();
    this.emit({ type: "resource:start", resource: spec.logicalName, message: `Reconciling ${spec.kind} "${spec.logicalName}"` });
    this.logger.debug(`[${spec.logicalName}] reconciling ${spec.kind}`);

    let desired: DesiredResource | undefined;
    try {
      desired = resolveDesired(spec, {
        subscriptionId: pass.context.subscriptionId,
        resourceGroup: pass.context.resourceGroup,
        location: pass.location,
        outputs: pass.outputs,
      });

      if (this.options.dryRun) {
        pass.outputs.set(spec.logicalName, pendingOutputs(spec, desired.name));
        return this.complete(spec, pass, { action: "planned", name: desired.name, desired, durationMs: Date.now() - begun });
      }

      const target = desired;
      const label = `${spec.kind} ${target.name}`;

      // Role assignments are get-or-create on the platform, which also recognizes
      // the same grant held under another assignment name.
      if (target.kind === "RoleAssignment") {
        const grant = await this.call(`create ${label}`, () => this.platform.grantRole(target), pass.signal);
        pass.outputs.set(spec.logicalName, { id: grant.id, name: target.name });
        return this.complete(spec, pass, {
          action: grant.created ? "created" : "unchanged",
          name: target.name,
          id: grant.id,
          desired: target,
          durationMs: Date.now() - begun,
        });
      }

      const current = await this.call(`get ${label}`, () => this.platform.get(target), pass.signal);

      if (!current) {
        const created = await this.call(`create ${label}`, () => this.platform.put(target), pass.signal);
        pass.outputs.set(spec.logicalName, outputFromObserved(created));
        return this.complete(spec, pass, { action: "created", name: target.name, id: created.id, desired: target, durationMs: Date.now() - begun });
      }

      const changes = diffResource(target, current.state);
      if (changes.length === 0) {
        pass.outputs.set(spec.logicalName, outputFromObserved(current));
        return this.complete(spec, pass, { action: "unchanged", name: target.name, id: current.id, desired: target, durationMs: Date.now() - begun });
      }

      const updated = await this.call(`update ${label}`, () => this.platform.put(target), pass.signal);
      pass.outputs.set(spec.logicalName, outputFromObserved(updated));
      return this.complete(spec, pass, { action: "updated", name: target.name, id: updated.id, changes, desired: target, durationMs: Date.now() - begun });
    } catch (err) {
      const message = err instanceof Error ? err.message : formatErrorMessage(err);
      const result: ResourceResult = {
        logicalName: spec.logicalName,
        kind: spec.kind,
        action: "failed",
        name: desired?.name,
        desired,
        durationMs: Date.now() - begun,
        error: message,
      };
      pass.results.set(spec.logicalName, result);
      this.emit({ type: "resource:failed", resource: spec.logicalName, action: "failed", message: `${spec.kind} "${spec.logicalName}" failed: ${message}`, error: message });
      this.logger.error(`[${spec.logicalName}] ${message}`);
      return result;
    }
  }

  private complete(
    spec: ResourceSpec,
    pass: PassState,
    fields: Omit<ResourceResult, "logicalName" | "kind">,
  ): ResourceResult {
    const result: ResourceResult = { logicalName: spec.logicalName, kind: spec.kind, ...fields };
    pass.results.set(spec.logicalName, result);
    const detail = result.changes?.length ? ` (${result.changes.map((c) => c.property).join(", ")})` : "";
    this.emit({ type: "resource:complete", resource: spec.logicalName, action: result.action, message: `${spec.kind} ${result.name ?? spec.logicalName} ${result.action}${detail}` });
    this.logger.info(`[${spec.logicalName}] ${spec.kind} ${result.name ?? ""} ${result.action}${detail}`);
    return result;
  }

  private markSkipped(spec: ResourceSpec, results: Map<string, ResourceResult>, reason: string): void {
    results.set(spec.logicalName, { logicalName: spec.logicalName, kind: spec.kind, action: "skipped", durationMs: 0 });
    this.emit({ type: "resource:skipped", resource: spec.logicalName, action: "skipped", message: `${spec.kind} "${spec.logicalName}" skipped: ${reason}` });
    this.logger.warn(`[${spec.logicalName}] skipped: ${reason}`);
  }

  /** One platform call under the per-call deadline; failures become PlatformCallFailedError. */
  private async call<T>(operation: string, fn: () => Promise<T>, signal: AbortSignal): Promise<T> {
    try {
      return await withDeadline(fn(), this.options.callTimeoutMs, operation, signal);
    } catch (err) {
      if (err instanceof PlatformCallFailedError || err instanceof ScopeNotFoundError) throw err;
      throw new PlatformCallFailedError(operation, formatErrorMessage(err), err);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function pendingOutputs(spec: ResourceSpec, name: string): DeploymentOutput {
  const output: DeploymentOutput = { id: `<pending:${spec.logicalName}.id>`, name };
  for (const key of OUTPUTS_BY_KIND[spec.kind]) {
    if (key !== "id" && key !== "name") output[key] = `<pending:${spec.logicalName}.${key}>`;
  }
  return output;
}

function chunkArray<T>(array: T[], chunkSize: number): T[][] {
  if (chunkSize <= 0) return [array];
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

export type CombinedSignal = {
  signal: AbortSignal;
  /** Detach from the input signals. */
  dispose: () => void;
};

/**
 * Combine multiple AbortSignals — aborts when ANY signal fires.
 */
export function anySignal(signals: AbortSignal[]): CombinedSignal {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];
  const dispose = () => {
    for (const detach of detachers.splice(0)) detach();
  };

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      dispose();
      return { signal: controller.signal, dispose };
    }
    const onAbort = () => {
      controller.abort(signal.reason);
      dispose();
    };
    signal.addEventListener("abort", onAbort, { once: true });
    detachers.push(() => signal.removeEventListener("abort", onAbort));
  }
  return { signal: controller.signal, dispose };
}

// =============================================================================
// Convenience
// =============================================================================

/**
 * Create a reconciler and run one pass.
 */
export async function reconcile(
  platform: ResourcePlatform,
  declaration: Declaration,
  context: ReconcileContext,
  options?: Partial<ReconcileOptions>,
  listener?: ReconcileEventListener,
): Promise<ReconcileReport> {
  const reconciler = new Reconciler(platform, options);
  if (listener) reconciler.on(listener);
  return reconciler.reconcile(declaration, context);
}

