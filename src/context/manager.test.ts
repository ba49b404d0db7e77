/**
 * Azure Context Manager — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { AzureCLIResult, AzureCLIWrapper } from "../cli/wrapper.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import { InvalidConfigurationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { AzureContextManager } from "./manager.js";

function ok(parsed: unknown): AzureCLIResult {
  return { success: true, stdout: JSON.stringify(parsed), stderr: "", exitCode: 0, parsed };
}

function failed(stderr: string): AzureCLIResult {
  return { success: false, stdout: "", stderr, exitCode: 1 };
}

describe("AzureContextManager", () => {
  const credentials = { getSubscriptionId: vi.fn(), getTenantId: vi.fn() };
  const cli = { getAccount: vi.fn(), getSignedInUser: vi.fn() };
  const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  let manager: AzureContextManager;

  beforeEach(() => {
    vi.clearAllMocks();
    credentials.getSubscriptionId.mockReturnValue(undefined);
    credentials.getTenantId.mockReturnValue(undefined);
    manager = new AzureContextManager(
      credentials as unknown as AzureCredentialsManager,
      cli as unknown as AzureCLIWrapper,
      logger,
    );
  });

  it("prefers an explicit subscription over the az login", async () => {
    const context = await manager.resolve({ subscriptionId: "sub-explicit", tenantId: "tenant-1" });

    expect(context).toEqual({ subscriptionId: "sub-explicit", tenantId: "tenant-1", principal: undefined });
    expect(cli.getAccount).not.toHaveBeenCalled();
  });

  it("uses the configured subscription", async () => {
    credentials.getSubscriptionId.mockReturnValue("sub-config");

    expect((await manager.resolve()).subscriptionId).toBe("sub-config");
  });

  it("falls back to the az login", async () => {
    cli.getAccount.mockResolvedValue(ok({ id: "sub-login", tenantId: "tenant-login" }));

    const context = await manager.resolve();
    expect(context.subscriptionId).toBe("sub-login");
    expect(context.tenantId).toBe("tenant-login");
    expect(manager.getContext()).toBe(context);
  });

  it("fails without any subscription", async () => {
    cli.getAccount.mockResolvedValue(failed("Please run 'az login'"));

    await expect(manager.resolve()).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(manager.getContext()).toBeNull();
  });

  it("uses an explicit principal without a lookup", async () => {
    const context = await manager.resolve({
      subscriptionId: "sub-1",
      principalId: "pid-1",
      resolvePrincipal: true,
    });

    expect(context.principal).toEqual({ id: "pid-1", displayName: undefined, type: "User" });
    expect(cli.getSignedInUser).not.toHaveBeenCalled();
  });

  it("looks up the signed-in user on request", async () => {
    cli.getSignedInUser.mockResolvedValue(ok({ id: "user-1", userPrincipalName: "dev@example.com" }));

    const context = await manager.resolve({ subscriptionId: "sub-1", resolvePrincipal: true });
    expect(context.principal).toEqual({ id: "user-1", displayName: "dev@example.com", type: "User" });
  });

  it("warns and continues when the signed-in user is unknown", async () => {
    cli.getSignedInUser.mockResolvedValue(failed("insufficient privileges\n"));

    const context = await manager.resolve({ subscriptionId: "sub-1", resolvePrincipal: true });
    expect(context.principal).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("Could not determine the signed-in user: insufficient privileges");
  });

  it("skips the principal unless asked", async () => {
    await manager.resolve({ subscriptionId: "sub-1" });
    expect(cli.getSignedInUser).not.toHaveBeenCalled();
  });
});
