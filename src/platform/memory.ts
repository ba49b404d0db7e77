/**
 * In-process ResourcePlatform.
 *
 * Holds resources in a map, records every call, and can be told to fail or
 * stall specific operations. Endpoints, principal IDs and keys are derived
 * from resource names so results are predictable.
 */

import { ScopeNotFoundError } from "../errors.js";
import { blobEndpoint, resourceGroupId, resourceIdFor, searchEndpoint, storageConnectionString } from "./ids.js";
import type {
  DesiredResource,
  DesiredRoleAssignment,
  DiscoveredResource,
  DiscoveryKind,
  GrantResult,
  ObservedResource,
  ResourcePlatform,
} from "./types.js";

export type PlatformOperation =
  | "scopeExists"
  | "scopeLocation"
  | "get"
  | "put"
  | "list"
  | "getAccessKey"
  | "getConnectionString"
  | "grantRole";

export type PlatformCall = {
  operation: PlatformOperation;
  /** Resource name, role assignment scope, or discovery kind. */
  target: string;
};

export type SeedExtras = {
  endpoint?: string;
  principalId?: string;
  /** Access key; pass "" to simulate a resource that returns none. */
  key?: string;
};

type Entry = {
  observed: ObservedResource;
  key: string;
};

type Rule = {
  operation: PlatformOperation;
  target?: string;
};

export class InMemoryPlatform implements ResourcePlatform {
  readonly calls: PlatformCall[] = [];
  /** Highest number of calls that were in progress at the same time. */
  maxInFlight = 0;

  private inFlight = 0;
  private scopes = new Map<string, string>();
  private entries = new Map<string, Entry>();
  private failures: Array<Rule & { error: Error }> = [];
  private delays: Array<Rule & { ms: number }> = [];

  constructor(readonly subscriptionId = "00000000-0000-0000-0000-000000000000") {}

  // ---------------------------------------------------------------------------
  // Test setup
  // ---------------------------------------------------------------------------

  addScope(resourceGroup: string, location = "westcentralus"): this {
    this.scopes.set(resourceGroup, location);
    return this;
  }

  /** Store a resource as if it had been created out of band. */
  seed(desired: DesiredResource, extras: SeedExtras = {}): ObservedResource {
    const entry = this.realize(desired, undefined, extras);
    this.entries.set(entryKey(desired), entry);
    return entry.observed;
  }

  /** Make matching calls reject. A target matches exactly or as the last path segment. */
  failOn(operation: PlatformOperation, target?: string, error: Error = new Error(`${operation} rejected by platform`)): this {
    this.failures.push({ operation, target, error });
    return this;
  }

  /** Make matching calls take `ms` before they run. */
  delay(operation: PlatformOperation, ms: number, target?: string): this {
    this.delays.push({ operation, target, ms });
    return this;
  }

  resources(): ObservedResource[] {
    return [...this.entries.values()].map((e) => e.observed);
  }

  callsTo(operation: PlatformOperation): PlatformCall[] {
    return this.calls.filter((c) => c.operation === operation);
  }

  // ---------------------------------------------------------------------------
  // ResourcePlatform
  // ---------------------------------------------------------------------------

  scopeExists(resourceGroup: string): Promise<boolean> {
    return this.call("scopeExists", resourceGroup, () => this.scopes.has(resourceGroup));
  }

  scopeId(resourceGroup: string): string {
    return resourceGroupId(this.subscriptionId, resourceGroup);
  }

  scopeLocation(resourceGroup: string): Promise<string> {
    return this.call("scopeLocation", resourceGroup, () => {
      const location = this.scopes.get(resourceGroup);
      if (!location) throw new ScopeNotFoundError(resourceGroup);
      return location;
    });
  }

  get(desired: DesiredResource): Promise<ObservedResource | undefined> {
    return this.call("get", desired.name, () => this.entries.get(entryKey(desired))?.observed);
  }

  put(desired: DesiredResource): Promise<ObservedResource> {
    return this.call("put", desired.name, () => {
      this.assertParentExists(desired);
      const key = entryKey(desired);
      const entry = this.realize(desired, this.entries.get(key));
      this.entries.set(key, entry);
      return entry.observed;
    });
  }

  list(resourceGroup: string, kind: DiscoveryKind): Promise<DiscoveredResource[]> {
    return this.call("list", kind, () => {
      const found: DiscoveredResource[] = [];
      for (const { observed } of this.entries.values()) {
        const state = observed.state;
        if (state.resourceGroup !== resourceGroup || discoveryKindOf(state) !== kind) continue;
        found.push({
          kind,
          id: observed.id,
          name: state.name,
          resourceGroup,
          location: "location" in state ? state.location : undefined,
          endpoint: observed.endpoint ?? observed.blobEndpoint,
        });
      }
      return found;
    });
  }

  getAccessKey(resource: DiscoveredResource): Promise<string> {
    return this.call("getAccessKey", resource.name, () => this.entryById(resource.id).key);
  }

  getConnectionString(storageAccount: DiscoveredResource): Promise<string> {
    return this.call("getConnectionString", storageAccount.name, () => {
      const { key } = this.entryById(storageAccount.id);
      return key ? storageConnectionString(storageAccount.name, key) : "";
    });
  }

  grantRole(grant: DesiredRoleAssignment): Promise<GrantResult> {
    return this.call("grantRole", grant.scope, () => {
      const key = entryKey(grant);
      const existing = this.entries.get(key);
      if (existing) return { id: existing.observed.id, created: false };
      const entry = this.realize(grant, undefined);
      this.entries.set(key, entry);
      return { id: entry.observed.id, created: true };
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async call<T>(operation: PlatformOperation, target: string, fn: () => T): Promise<T> {
    this.calls.push({ operation, target });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const delay = this.delays.find((d) => matches(d, operation, target));
      if (delay) await new Promise((resolve) => setTimeout(resolve, delay.ms));

      const failure = this.failures.find((f) => matches(f, operation, target));
      if (failure) throw failure.error;

      return fn();
    } finally {
      this.inFlight--;
    }
  }

  private realize(desired: DesiredResource, previous: Entry | undefined, extras: SeedExtras = {}): Entry {
    const observed: ObservedResource = {
      id: resourceIdFor(this.subscriptionId, desired),
      state: structuredClone(desired),
    };

    switch (desired.kind) {
      case "StorageAccount":
        observed.blobEndpoint = blobEndpoint(desired.name);
        break;
      case "SearchService":
        observed.endpoint = extras.endpoint ?? searchEndpoint(desired.name);
        if (desired.identity === "SystemAssigned") {
          observed.principalId = extras.principalId ?? previous?.observed.principalId ?? `principal-${desired.name}`;
        }
        break;
      case "CognitiveAccount": {
        const host = desired.variant === "OpenAI" ? "openai.azure.com" : "cognitiveservices.azure.com";
        observed.endpoint =
          extras.endpoint ??
          previous?.observed.endpoint ??
          `https://${desired.customSubDomainName ?? desired.name.toLowerCase()}.${host}/`;
        if (desired.identity === "SystemAssigned") {
          observed.principalId = extras.principalId ?? previous?.observed.principalId ?? `principal-${desired.name}`;
        }
        break;
      }
      default:
        break;
    }

    return { observed, key: extras.key ?? previous?.key ?? `test-key-${desired.name}` };
  }

  private assertParentExists(desired: DesiredResource): void {
    if (desired.kind !== "BlobContainer" && desired.kind !== "ModelDeployment") return;
    const parentKind = desired.kind === "BlobContainer" ? "storageaccount" : "cognitiveaccount";
    const parentKey = `${parentKind}/${desired.resourceGroup}/${desired.account}`.toLowerCase();
    if (!this.entries.has(parentKey)) {
      throw Object.assign(new Error(`Parent resource ${desired.account} not found`), {
        statusCode: 404,
        code: "ParentResourceNotFound",
      });
    }
  }

  private entryById(id: string): Entry {
    for (const entry of this.entries.values()) {
      if (entry.observed.id.toLowerCase() === id.toLowerCase()) return entry;
    }
    throw Object.assign(new Error(`Resource ${id} not found`), { statusCode: 404, code: "ResourceNotFound" });
  }
}

function entryKey(desired: DesiredResource): string {
  switch (desired.kind) {
    case "RoleAssignment":
      return `roleassignment/${desired.name}`.toLowerCase();
    case "BlobContainer":
    case "ModelDeployment":
      return `${desired.kind}/${desired.resourceGroup}/${desired.account}/${desired.name}`.toLowerCase();
    default:
      return `${desired.kind}/${desired.resourceGroup}/${desired.name}`.toLowerCase();
  }
}

function discoveryKindOf(state: DesiredResource): DiscoveryKind | undefined {
  switch (state.kind) {
    case "SearchService":
      return "SearchService";
    case "StorageAccount":
      return "StorageAccount";
    case "CognitiveAccount":
      if (state.variant === "OpenAI") return "OpenAIAccount";
      if (state.variant === "AIServices") return "AIServicesAccount";
      return undefined;
    default:
      return undefined;
  }
}

function matches(rule: Rule, operation: PlatformOperation, target: string): boolean {
  if (rule.operation !== operation) return false;
  if (rule.target === undefined) return true;
  return target === rule.target || target.endsWith(`/${rule.target}`);
}
