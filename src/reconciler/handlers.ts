/**
 * Per-kind resolution of specs into desired platform state, and diffing of
 * desired against observed state.
 */

import { isDeepStrictEqual } from "node:util";
import { InvalidConfigurationError } from "../errors.js";
import { normalizeName } from "../declaration/naming.js";
import { formatOutputRef, isOutputRef } from "../declaration/refs.js";
import { isOutputName, type DeploymentOutput, type OutputRef, type ResourceSpec } from "../declaration/types.js";
import { resolveRoleDefinitionId, roleAssignmentName } from "../iam/roles.js";
import { normalizeLocation } from "../platform/ids.js";
import type { DesiredResource, ObservedResource } from "../platform/types.js";
import type { PropertyChange } from "./types.js";

export type ResolveContext = {
  subscriptionId: string;
  resourceGroup: string;
  location: string;
  outputs: ReadonlyMap<string, DeploymentOutput>;
};

// =============================================================================
// Resolution
// =============================================================================

/** Substitute an OutputRef with the referenced resource's realized output. */
export function resolveValue(value: string | OutputRef, outputs: ReadonlyMap<string, DeploymentOutput>): string {
  if (!isOutputRef(value)) return value;

  const source = outputs.get(value.ref);
  const resolved = source && isOutputName(value.output) ? source[value.output] : undefined;
  if (resolved === undefined || resolved === "") {
    throw new InvalidConfigurationError(`Cannot resolve ${formatOutputRef(value)}: output not available`, [
      { path: `/resources/${value.ref}`, message: `has no ${value.output} output`, code: "UNRESOLVED_REF", resource: value.ref },
    ]);
  }
  return resolved;
}

/**
 * Resolve a spec into the exact state to submit. All dependencies of the
 * spec must already have outputs in `ctx.outputs`.
 */
export function resolveDesired(spec: ResourceSpec, ctx: ResolveContext): DesiredResource {
  const resourceGroup = ctx.resourceGroup;
  const location = (declared: string | undefined) => normalizeLocation(declared ?? ctx.location);

  switch (spec.kind) {
    case "StorageAccount":
      return {
        kind: spec.kind,
        resourceGroup,
        name: normalizeName(spec.kind, spec.name),
        location: location(spec.location),
        sku: spec.sku.name,
        accessTier: spec.properties.accessTier,
        allowSharedKeyAccess: spec.properties.allowSharedKeyAccess,
        tags: spec.properties.tags,
      };

    case "BlobContainer":
      return {
        kind: spec.kind,
        resourceGroup,
        name: normalizeName(spec.kind, spec.name),
        account: resolveValue(spec.properties.account, ctx.outputs),
        publicAccess: spec.properties.publicAccess,
      };

    case "SearchService":
      return {
        kind: spec.kind,
        resourceGroup,
        name: normalizeName(spec.kind, spec.name),
        location: location(spec.location),
        sku: spec.sku.name,
        replicaCount: spec.properties.replicaCount,
        partitionCount: spec.properties.partitionCount,
        identity: spec.properties.identity,
        tags: spec.properties.tags,
      };

    case "CognitiveAccount": {
      const subdomain = spec.properties.customSubDomainName;
      return {
        kind: spec.kind,
        resourceGroup,
        name: normalizeName(spec.kind, spec.name),
        variant: spec.properties.variant,
        location: location(spec.location),
        sku: spec.sku.name,
        customSubDomainName:
          subdomain === undefined ? undefined : normalizeName("CustomSubDomain", resolveValue(subdomain, ctx.outputs)),
        identity: spec.properties.identity,
        disableLocalAuth: spec.properties.disableLocalAuth,
        tags: spec.properties.tags,
      };
    }

    case "ModelDeployment":
      return {
        kind: spec.kind,
        resourceGroup,
        name: normalizeName(spec.kind, spec.name),
        account: resolveValue(spec.properties.account, ctx.outputs),
        sku: spec.sku.name,
        capacity: spec.sku.capacity,
        model: { ...spec.properties.model },
      };

    case "RoleAssignment": {
      const scope = resolveValue(spec.properties.scope, ctx.outputs);
      const principalId = resolveValue(spec.properties.principalId, ctx.outputs);
      const roleDefinitionId = resolveRoleDefinitionId(spec.properties.role, ctx.subscriptionId);
      return {
        kind: spec.kind,
        resourceGroup,
        name: roleAssignmentName(scope, principalId, roleDefinitionId),
        scope,
        principalId,
        principalType: spec.properties.principalType,
        roleDefinitionId,
      };
    }
  }
}

/** Outputs a realized resource exposes to its dependents. */
export function outputFromObserved(observed: ObservedResource): DeploymentOutput {
  const output: DeploymentOutput = { id: observed.id, name: observed.state.name };
  if (observed.endpoint) output.endpoint = observed.endpoint;
  if (observed.principalId) output.principalId = observed.principalId;
  if (observed.blobEndpoint) output.blobEndpoint = observed.blobEndpoint;
  return output;
}

// =============================================================================
// Diff
// =============================================================================

/**
 * Differences between desired and observed state. Properties left unset in
 * the desired state are not compared, and tags present only on the platform
 * are tolerated.
 */
export function diffResource(desired: DesiredResource, actual: DesiredResource): PropertyChange[] {
  if (desired.kind !== actual.kind) {
    return [{ property: "kind", expectedValue: desired.kind, actualValue: actual.kind, changeType: "modified" }];
  }
  // A role assignment's name is derived from all of its properties
  if (desired.kind === "RoleAssignment") return [];
  return diffProperties(desired, actual);
}

function diffProperties(desired: object, actual: object, prefix = ""): PropertyChange[] {
  const changes: PropertyChange[] = [];
  const entries: Array<[string, unknown]> = Object.entries(desired);

  for (const [key, expectedValue] of entries) {
    if (expectedValue === undefined) continue;
    const path = prefix ? `${prefix}.${key}` : key;
    const actualValue: unknown = Reflect.get(actual, key);

    if (actualValue === undefined) {
      changes.push({ property: path, expectedValue, actualValue: undefined, changeType: "removed" });
    } else if (isRecord(expectedValue) && isRecord(actualValue)) {
      changes.push(...diffProperties(expectedValue, actualValue, path));
    } else if (!isDeepStrictEqual(expectedValue, actualValue)) {
      changes.push({ property: path, expectedValue, actualValue, changeType: "modified" });
    }
  }

  return changes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
