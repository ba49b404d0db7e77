/**
 * Azure Credentials Manager Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InvalidConfigurationError } from "../errors.js";
import { AzureCredentialsManager, createCredentialsManager } from "./manager.js";

vi.mock("@azure/identity", () => {
  const mockGetToken = vi.fn().mockResolvedValue({
    token: "mock-token",
    expiresOnTimestamp: Date.now() + 3600000,
  });

  return {
    DefaultAzureCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    AzureCliCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    ClientSecretCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    ManagedIdentityCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
  };
});

describe("AzureCredentialsManager", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("creates with default options", () => {
    const mgr = createCredentialsManager();
    expect(mgr).toBeInstanceOf(AzureCredentialsManager);
  });

  it("getCredential uses the default chain", async () => {
    const identity = await import("@azure/identity");
    const mgr = createCredentialsManager();
    const result = await mgr.getCredential();

    expect(result.method).toBe("default");
    expect(identity.DefaultAzureCredential).toHaveBeenCalledTimes(1);
  });

  it("getCredential passes the tenant to the CLI credential", async () => {
    const identity = await import("@azure/identity");
    const mgr = createCredentialsManager({ credentialMethod: "cli", tenantId: "tenant-1" });
    const result = await mgr.getCredential();

    expect(result.method).toBe("cli");
    expect(result.tenantId).toBe("tenant-1");
    expect(identity.AzureCliCredential).toHaveBeenCalledWith({ tenantId: "tenant-1" });
  });

  it("getCredential caches credentials", async () => {
    const mgr = createCredentialsManager();
    const r1 = await mgr.getCredential();
    const r2 = await mgr.getCredential();
    expect(r1.credential).toBe(r2.credential);
  });

  it("clearCache forces a new credential", async () => {
    const mgr = createCredentialsManager();
    const r1 = await mgr.getCredential();
    mgr.clearCache();
    const r2 = await mgr.getCredential();
    expect(r2.credential).not.toBe(r1.credential);
  });

  it("returns the configured subscription and tenant", () => {
    const mgr = createCredentialsManager({ subscriptionId: "sub-123", tenantId: "tenant-456" });
    expect(mgr.getSubscriptionId()).toBe("sub-123");
    expect(mgr.getTenantId()).toBe("tenant-456");
  });

  it("service-principal method requires client credentials", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "service-principal", env: {} });
    const attempt = mgr.getCredential();
    await expect(attempt).rejects.toBeInstanceOf(InvalidConfigurationError);
    await expect(attempt).rejects.toThrow("Service principal auth requires");
  });

  it("service-principal method reads the environment it is given", async () => {
    const identity = await import("@azure/identity");
    const mgr = createCredentialsManager({
      credentialMethod: "service-principal",
      env: { AZURE_TENANT_ID: "tenant-1", AZURE_CLIENT_ID: "client-1", AZURE_CLIENT_SECRET: "test-secret" },
    });
    await mgr.getCredential();
    expect(identity.ClientSecretCredential).toHaveBeenCalledWith("tenant-1", "client-1", "test-secret");
  });

  it("managed-identity method uses a user-assigned client id when set", async () => {
    const identity = await import("@azure/identity");
    const mgr = createCredentialsManager({ credentialMethod: "managed-identity", env: { AZURE_CLIENT_ID: "client-1" } });
    await mgr.getCredential();
    expect(identity.ManagedIdentityCredential).toHaveBeenCalledWith({ clientId: "client-1" });
  });
});
