/**
 * Dependency graph evaluator.
 *
 * Validates declarations, derives dependency edges (explicit `dependsOn`
 * plus every OutputRef in a spec's properties), and computes a
 * deterministic creation order. Pure: nothing here touches the platform.
 */

import { CyclicDependencyError, InvalidConfigurationError, type ConfigurationIssue } from "../errors.js";
import { isKnownRole } from "../iam/roles.js";
import { normalizeName, type NamedKind } from "../declaration/naming.js";
import { findOutputRefs, formatOutputRef, isOutputRef } from "../declaration/refs.js";
import { SKUS_BY_KIND } from "../declaration/skus.js";
import { OUTPUTS_BY_KIND, isOutputName, type Declaration, type ResourceKind, type ResourceSpec } from "../declaration/types.js";

// =============================================================================
// Types
// =============================================================================

export type DeclarationIssueCode =
  | "DUPLICATE_NAME"
  | "UNKNOWN_DEP"
  | "SELF_DEP"
  | "UNKNOWN_REF"
  | "INVALID_OUTPUT_NAME"
  | "INVALID_SKU"
  | "INVALID_NAME"
  | "INVALID_ROLE"
  | "NAME_NORMALIZED"
  | "CYCLE";

export type DeclarationIssue = {
  severity: "error" | "warning";
  code: DeclarationIssueCode;
  message: string;
  resource?: string;
  kind?: ResourceKind;
  /** Cycle members, first name repeated at the end. */
  members?: string[];
};

export type DeclarationValidation = {
  valid: boolean;
  issues: DeclarationIssue[];
};

// =============================================================================
// Edges
// =============================================================================

/**
 * Logical names a spec depends on: explicit `dependsOn` first, then the
 * targets of OutputRefs in property order, without duplicates.
 */
export function collectDependencies(spec: ResourceSpec): string[] {
  const deps = new Set<string>(spec.dependsOn ?? []);
  for (const ref of findOutputRefs(spec.properties)) deps.add(ref.ref);
  return [...deps];
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check a declaration for:
 * - duplicate logical names
 * - unknown or self dependencies
 * - OutputRefs to unknown resources or outputs the source kind never produces
 * - SKUs outside the per-kind enumeration
 * - names that cannot be normalized, or that normalization changes (warning)
 * - unknown roles
 * - cycles
 */
export function validateDeclaration(declaration: Declaration): DeclarationValidation {
  const issues: DeclarationIssue[] = [];
  const specs = declaration.resources;
  const byName = new Map<string, ResourceSpec>();

  for (const spec of specs) {
    if (byName.has(spec.logicalName)) {
      issues.push(error(spec, "DUPLICATE_NAME", `Duplicate logical name "${spec.logicalName}"`));
      continue;
    }
    byName.set(spec.logicalName, spec);
  }

  for (const spec of specs) {
    for (const dep of spec.dependsOn ?? []) {
      if (dep === spec.logicalName) {
        issues.push(error(spec, "SELF_DEP", "Resource depends on itself"));
      } else if (!byName.has(dep)) {
        issues.push(error(spec, "UNKNOWN_DEP", `dependsOn refers to unknown resource "${dep}"`));
      }
    }

    for (const ref of findOutputRefs(spec.properties)) {
      const source = byName.get(ref.ref);
      if (ref.ref === spec.logicalName) {
        issues.push(error(spec, "SELF_DEP", `Reference ${formatOutputRef(ref)} points at the resource itself`));
      } else if (!source) {
        issues.push(error(spec, "UNKNOWN_REF", `Reference ${formatOutputRef(ref)} refers to unknown resource "${ref.ref}"`));
      } else if (!isOutputName(ref.output) || !OUTPUTS_BY_KIND[source.kind].includes(ref.output)) {
        issues.push(error(spec, "INVALID_OUTPUT_NAME", `Reference ${formatOutputRef(ref)}: ${source.kind} has no output "${ref.output}"`));
      }
    }

    checkSku(spec, issues);
    checkNames(spec, issues);

    if (spec.kind === "RoleAssignment" && !isKnownRole(spec.properties.role)) {
      issues.push(error(spec, "INVALID_ROLE", `Unknown role "${spec.properties.role}"`));
    }
  }

  const cycle = findCycle(specs);
  if (cycle) {
    issues.push({
      severity: "error",
      code: "CYCLE",
      message: `Circular dependency detected: ${cycle.join(" → ")}`,
      members: cycle,
    });
  }

  return {
    valid: issues.every((i) => i.severity !== "error"),
    issues,
  };
}

/**
 * Throw when a declaration is not safe to reconcile. A cycle raises
 * CyclicDependencyError; any other error raises InvalidConfigurationError.
 * Returns the warnings.
 */
export function assertValidDeclaration(declaration: Declaration): DeclarationIssue[] {
  const { issues } = validateDeclaration(declaration);
  const errors = issues.filter((i) => i.severity === "error");

  const cycle = errors.find((i) => i.code === "CYCLE");
  if (cycle?.members) throw new CyclicDependencyError(cycle.members);

  if (errors.length > 0) {
    const details: ConfigurationIssue[] = errors.map((i) => ({
      path: i.resource ? `/resources/${i.resource}` : "/resources",
      message: i.message,
      code: i.code,
      resource: i.resource,
      kind: i.kind,
    }));
    throw new InvalidConfigurationError("Invalid declaration", details);
  }

  return issues.filter((i) => i.severity === "warning");
}

function checkSku(spec: ResourceSpec, issues: DeclarationIssue[]): void {
  if (!("sku" in spec)) return;
  const allowed = SKUS_BY_KIND[spec.kind];
  if (allowed && !allowed.includes(spec.sku.name)) {
    issues.push(error(spec, "INVALID_SKU", `SKU "${spec.sku.name}" is not valid for ${spec.kind} (expected one of: ${allowed.join(", ")})`));
  }
}

function checkNames(spec: ResourceSpec, issues: DeclarationIssue[]): void {
  if (spec.kind === "RoleAssignment") return;

  checkName(spec, spec.kind, spec.name, issues);
  if (spec.kind === "CognitiveAccount") {
    const subdomain = spec.properties.customSubDomainName;
    if (subdomain !== undefined && !isOutputRef(subdomain)) {
      checkName(spec, "CustomSubDomain", subdomain, issues);
    }
  }
}

function checkName(spec: ResourceSpec, kind: NamedKind, raw: string, issues: DeclarationIssue[]): void {
  let normalized: string;
  try {
    normalized = normalizeName(kind, raw);
  } catch (err) {
    if (!(err instanceof InvalidConfigurationError)) throw err;
    issues.push(error(spec, "INVALID_NAME", err.message));
    return;
  }
  if (normalized !== raw) {
    issues.push({
      severity: "warning",
      code: "NAME_NORMALIZED",
      resource: spec.logicalName,
      kind: spec.kind,
      message: `${kind} name "${raw}" will be submitted as "${normalized}"`,
    });
  }
}

function error(spec: ResourceSpec, code: DeclarationIssueCode, message: string): DeclarationIssue {
  return { severity: "error", code, message, resource: spec.logicalName, kind: spec.kind };
}

// =============================================================================
// Ordering
// =============================================================================

type Frame = { spec: ResourceSpec; deps: string[]; next: number };

/**
 * Topological order by iterative depth-first search with a visiting/done
 * state per node. Roots and each node's dependencies are visited in
 * declaration order, so the same input always yields the same order.
 * Dependencies on unknown names are ignored here; validation reports them.
 *
 * @throws CyclicDependencyError naming the members of the first cycle found.
 */
export function topologicalOrder(specs: readonly ResourceSpec[]): ResourceSpec[] {
  const byName = new Map<string, ResourceSpec>();
  for (const spec of specs) {
    if (!byName.has(spec.logicalName)) byName.set(spec.logicalName, spec);
  }

  const state = new Map<string, "visiting" | "done">();
  const order: ResourceSpec[] = [];

  for (const root of byName.values()) {
    if (state.has(root.logicalName)) continue;

    const stack: Frame[] = [];
    const enter = (spec: ResourceSpec) => {
      state.set(spec.logicalName, "visiting");
      stack.push({ spec, deps: collectDependencies(spec).filter((d) => byName.has(d)), next: 0 });
    };
    enter(root);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.deps.length) {
        stack.pop();
        state.set(frame.spec.logicalName, "done");
        order.push(frame.spec);
        continue;
      }

      const dep = frame.deps[frame.next++];
      const depState = state.get(dep);
      if (depState === "done") continue;
      if (depState === "visiting") {
        const start = stack.findIndex((f) => f.spec.logicalName === dep);
        throw new CyclicDependencyError([...stack.slice(start).map((f) => f.spec.logicalName), dep]);
      }

      const depSpec = byName.get(dep);
      if (depSpec) enter(depSpec);
    }
  }

  return order;
}

/** Cycle members, or null when the graph is acyclic. */
export function findCycle(specs: readonly ResourceSpec[]): string[] | null {
  try {
    topologicalOrder(specs);
    return null;
  } catch (err) {
    if (err instanceof CyclicDependencyError) return err.members;
    throw err;
  }
}

/**
 * Group specs by dependency depth. Everything in a layer depends only on
 * earlier layers, so a layer's members may be reconciled concurrently.
 * Each layer keeps declaration order.
 */
export function executionLayers(specs: readonly ResourceSpec[]): ResourceSpec[][] {
  const order = topologicalOrder(specs);
  const position = new Map(specs.map((s, i) => [s.logicalName, i]));
  const depth = new Map<string, number>();

  for (const spec of order) {
    let d = 0;
    for (const dep of collectDependencies(spec)) {
      const depDepth = depth.get(dep);
      if (depDepth !== undefined) d = Math.max(d, depDepth + 1);
    }
    depth.set(spec.logicalName, d);
  }

  const layers: ResourceSpec[][] = [];
  for (const spec of order) {
    const d = depth.get(spec.logicalName) ?? 0;
    (layers[d] ??= []).push(spec);
  }
  for (const layer of layers) {
    layer.sort((a, b) => (position.get(a.logicalName) ?? 0) - (position.get(b.logicalName) ?? 0));
  }
  return layers;
}
