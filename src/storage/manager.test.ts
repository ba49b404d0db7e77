/**
 * Azure Storage Manager — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureStorageManager } from "./manager.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* asyncIter<T>(items: T[]): AsyncIterable<T> {
  for (const item of items) yield item;
}

const ACCOUNT_ID = "/subscriptions/sub-1/resourceGroups/rg-1/providers/Microsoft.Storage/storageAccounts/sa1";

function makeSdkStorageAccount(overrides: Record<string, unknown> = {}) {
  return {
    id: ACCOUNT_ID,
    name: "sa1",
    location: "East US",
    kind: "StorageV2",
    sku: { name: "Standard_LRS" },
    accessTier: "Hot",
    allowSharedKeyAccess: true,
    primaryEndpoints: { blob: "https://sa1.blob.core.windows.net/" },
    tags: { env: "test" },
    ...overrides,
  };
}

function notFound() {
  return Object.assign(new Error("not found"), { statusCode: 404 });
}

// ---------------------------------------------------------------------------
// Mock SDK
// ---------------------------------------------------------------------------

const mockStorageAccounts = {
  listByResourceGroup: vi.fn(),
  getProperties: vi.fn(),
  beginCreateAndWait: vi.fn(),
  update: vi.fn(),
  listKeys: vi.fn(),
};

const mockBlobContainers = {
  get: vi.fn(),
  create: vi.fn(),
};

vi.mock("@azure/arm-storage", () => ({
  StorageManagementClient: vi.fn().mockImplementation(() => ({
    storageAccounts: mockStorageAccounts,
    blobContainers: mockBlobContainers,
  })),
}));

const mockCredential = { getToken: vi.fn().mockResolvedValue({ token: "t", expiresOnTimestamp: Date.now() + 3600000 }) };
const mockCredentialsManager = {
  getCredential: vi.fn().mockResolvedValue({ credential: mockCredential, method: "default" }),
} as unknown as AzureCredentialsManager;

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("AzureStorageManager", () => {
  let mgr: AzureStorageManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AzureStorageManager(mockCredentialsManager, "sub-1", { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 });
  });

  describe("listStorageAccounts", () => {
    it("maps accounts to discovered resources", async () => {
      mockStorageAccounts.listByResourceGroup.mockReturnValue(asyncIter([makeSdkStorageAccount()]));

      const accounts = await mgr.listStorageAccounts("rg-1");

      expect(mockStorageAccounts.listByResourceGroup).toHaveBeenCalledWith("rg-1");
      expect(accounts).toEqual([
        {
          kind: "StorageAccount",
          id: ACCOUNT_ID,
          name: "sa1",
          resourceGroup: "rg-1",
          location: "East US",
          endpoint: "https://sa1.blob.core.windows.net/",
        },
      ]);
    });
  });

  describe("getStorageAccount", () => {
    it("returns the observed state with a normalized location", async () => {
      mockStorageAccounts.getProperties.mockResolvedValue(makeSdkStorageAccount());

      const observed = await mgr.getStorageAccount("rg-1", "sa1");

      expect(observed).toEqual({
        id: ACCOUNT_ID,
        blobEndpoint: "https://sa1.blob.core.windows.net/",
        state: {
          kind: "StorageAccount",
          resourceGroup: "rg-1",
          name: "sa1",
          location: "eastus",
          sku: "Standard_LRS",
          accessTier: "Hot",
          allowSharedKeyAccess: true,
          tags: { env: "test" },
        },
      });
    });

    it("returns null when the account does not exist", async () => {
      mockStorageAccounts.getProperties.mockRejectedValue(notFound());
      expect(await mgr.getStorageAccount("rg-1", "missing")).toBeNull();
    });

    it("propagates other errors", async () => {
      mockStorageAccounts.getProperties.mockRejectedValue(Object.assign(new Error("denied"), { statusCode: 403 }));
      await expect(mgr.getStorageAccount("rg-1", "sa1")).rejects.toThrow("denied");
    });
  });

  describe("putStorageAccount", () => {
    const desired = {
      kind: "StorageAccount" as const,
      resourceGroup: "rg-1",
      name: "sa1",
      location: "eastus",
      sku: "Standard_GRS",
      tags: { env: "lab" },
    };

    it("creates a new account with secure defaults", async () => {
      mockStorageAccounts.beginCreateAndWait.mockResolvedValue(makeSdkStorageAccount({ sku: { name: "Standard_GRS" } }));

      const observed = await mgr.putStorageAccount(desired, false);

      expect(mockStorageAccounts.beginCreateAndWait).toHaveBeenCalledWith(
        "rg-1",
        "sa1",
        expect.objectContaining({
          location: "eastus",
          kind: "StorageV2",
          sku: { name: "Standard_GRS" },
          enableHttpsTrafficOnly: true,
          minimumTlsVersion: "TLS1_2",
          tags: { env: "lab" },
        }),
      );
      expect(mockStorageAccounts.update).not.toHaveBeenCalled();
      expect(observed.state.kind === "StorageAccount" ? observed.state.sku : undefined).toBe("Standard_GRS");
    });

    it("updates an existing account in place", async () => {
      mockStorageAccounts.update.mockResolvedValue(makeSdkStorageAccount());

      await mgr.putStorageAccount(desired, true);

      expect(mockStorageAccounts.update).toHaveBeenCalledWith("rg-1", "sa1", {
        sku: { name: "Standard_GRS" },
        accessTier: undefined,
        allowSharedKeyAccess: undefined,
        tags: { env: "lab" },
      });
      expect(mockStorageAccounts.beginCreateAndWait).not.toHaveBeenCalled();
    });
  });

  describe("getAccountKey", () => {
    it("returns the first key", async () => {
      mockStorageAccounts.listKeys.mockResolvedValue({ keys: [{ keyName: "key1", value: "test-secret" }, { keyName: "key2", value: "other" }] });
      expect(await mgr.getAccountKey("rg-1", "sa1")).toBe("test-secret");
    });

    it("returns an empty string when no key is returned", async () => {
      mockStorageAccounts.listKeys.mockResolvedValue({ keys: [] });
      expect(await mgr.getAccountKey("rg-1", "sa1")).toBe("");
    });
  });

  describe("containers", () => {
    it("reads a container", async () => {
      mockBlobContainers.get.mockResolvedValue({ id: `${ACCOUNT_ID}/blobServices/default/containers/documents`, name: "documents", publicAccess: "None" });

      const observed = await mgr.getContainer("rg-1", "sa1", "documents");

      expect(observed?.state).toEqual({ kind: "BlobContainer", resourceGroup: "rg-1", name: "documents", account: "sa1", publicAccess: "None" });
    });

    it("returns null for a missing container", async () => {
      mockBlobContainers.get.mockRejectedValue(notFound());
      expect(await mgr.getContainer("rg-1", "sa1", "documents")).toBeNull();
    });

    it("creates a private container by default", async () => {
      mockBlobContainers.create.mockResolvedValue({ id: "c-id", name: "documents" });

      const observed = await mgr.putContainer({ kind: "BlobContainer", resourceGroup: "rg-1", name: "documents", account: "sa1" });

      expect(mockBlobContainers.create).toHaveBeenCalledWith("rg-1", "sa1", "documents", { publicAccess: "None" });
      expect(observed.id).toBe("c-id");
    });
  });
});
