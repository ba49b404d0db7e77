/**
 * Credentials Manager
 *
 * Resolves an Azure TokenCredential through @azure/identity: the
 * DefaultAzureCredential chain, the Azure CLI login, a service principal or
 * a managed identity.
 */

import type { TokenCredential } from "@azure/identity";
import { InvalidConfigurationError } from "../errors.js";
import type { AzureCredentialMethod } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  subscriptionId?: string;
  tenantId?: string;
  credentialMethod?: AzureCredentialMethod;
  /** Source of AZURE_CLIENT_ID / AZURE_CLIENT_SECRET. */
  env?: NodeJS.ProcessEnv;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<string, { credential: TokenCredential; expiresAt: number }>();

  constructor(private ttlMs = 3_600_000) {}

  get(key: string): TokenCredential | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.credential;
  }

  set(key: string, credential: TokenCredential): void {
    this.cache.set(key, { credential, expiresAt: Date.now() + this.ttlMs });
  }

  clear(): void {
    this.cache.clear();
  }
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private method: AzureCredentialMethod;
  private cache = new CredentialCache();

  constructor(private options: CredentialsManagerOptions = {}) {
    this.method = options.credentialMethod ?? "default";
  }

  /**
   * Get a TokenCredential for the configured (or given) method. Credentials
   * are cached per method and tenant for an hour.
   */
  async getCredential(method?: AzureCredentialMethod): Promise<CredentialResolutionResult> {
    const resolvedMethod = method ?? this.method;
    const cacheKey = `${resolvedMethod}:${this.options.tenantId ?? ""}`;

    let credential = this.cache.get(cacheKey);
    if (!credential) {
      credential = await this.createCredential(resolvedMethod);
      this.cache.set(cacheKey, credential);
    }

    return {
      credential,
      method: resolvedMethod,
      subscriptionId: this.options.subscriptionId,
      tenantId: this.options.tenantId,
    };
  }

  getSubscriptionId(): string | undefined {
    return this.options.subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.options.tenantId;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * @azure/identity is imported on first use so commands that never reach
   * Azure (plan, dry-run) do not load it.
   */
  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");
    const env = this.options.env ?? process.env;

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential(this.options.tenantId ? { tenantId: this.options.tenantId } : undefined);

      case "service-principal": {
        const tenantId = this.options.tenantId ?? env.AZURE_TENANT_ID;
        const clientId = env.AZURE_CLIENT_ID;
        const clientSecret = env.AZURE_CLIENT_SECRET;
        if (!tenantId || !clientId || !clientSecret) {
          throw new InvalidConfigurationError(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }
        return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = env.AZURE_CLIENT_ID;
        return clientId ? new identity.ManagedIdentityCredential({ clientId }) : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}
