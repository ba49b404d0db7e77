/**
 * Resource reconciler — type definitions.
 */

import type { DeploymentOutput, ResourceKind } from "../declaration/types.js";
import type { DesiredResource } from "../platform/types.js";

/** Where a declaration is realized. */
export type ReconcileContext = {
  subscriptionId: string;
  resourceGroup: string;
  /** Location for specs that declare none; defaults to the resource group's. */
  location?: string;
};

export type ReconcileOptions = {
  /** 1 = strictly sequential, stop at the first failure. */
  maxConcurrency: number;
  /** Deadline for each platform call (0 = none). */
  callTimeoutMs: number;
  /** Deadline for the whole pass (0 = none). */
  timeoutMs: number;
  /** Resolve and report desired state without calling the platform. */
  dryRun: boolean;
  signal?: AbortSignal;
};

export type ResourceAction = "created" | "updated" | "unchanged" | "planned" | "failed" | "skipped";

export interface PropertyChange {
  property: string;
  expectedValue: unknown;
  actualValue: unknown;
  changeType: "modified" | "added" | "removed";
}

export type ResourceResult = {
  logicalName: string;
  kind: ResourceKind;
  action: ResourceAction;
  /** Physical name after normalization, once resolved. */
  name?: string;
  id?: string;
  durationMs: number;
  /** What an update changed. */
  changes?: PropertyChange[];
  desired?: DesiredResource;
  /** Platform message, secrets redacted. */
  error?: string;
};

export type ReconcileStatus = "succeeded" | "failed" | "timed-out" | "cancelled";

export type ReconcileSummary = Record<ResourceAction, number>;

export type ReconcileReport = {
  status: ReconcileStatus;
  /** Logical names in creation order. */
  order: string[];
  /** One entry per spec, in creation order. */
  resources: ResourceResult[];
  outputs: Record<string, DeploymentOutput>;
  summary: ReconcileSummary;
  errors: string[];
  warnings: string[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
};

// =============================================================================
// Events
// =============================================================================

export type ReconcileEventType =
  | "reconcile:start"
  | "resource:start"
  | "resource:complete"
  | "resource:failed"
  | "resource:skipped"
  | "reconcile:complete"
  | "reconcile:failed";

export type ReconcileEvent = {
  type: ReconcileEventType;
  timestamp: string;
  message: string;
  resource?: string;
  action?: ResourceAction;
  error?: string;
};

export type ReconcileEventListener = (event: ReconcileEvent) => void;
