/**
 * Azure AI Manager — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureAIManager } from "./manager.js";
import type { AzureCredentialsManager } from "../credentials/manager.js";

async function* asyncIter<T>(items: T[]): AsyncIterable<T> {
  for (const item of items) yield item;
}

const RG_ID = "/subscriptions/sub-1/resourceGroups/rg-1";

function makeSdkAccount(name: string, kind: string, overrides: Record<string, unknown> = {}) {
  return {
    id: `${RG_ID}/providers/Microsoft.CognitiveServices/accounts/${name}`,
    name,
    kind,
    location: "eastus",
    sku: { name: "S0" },
    properties: { endpoint: `https://${name}.example/`, customSubDomainName: name },
    ...overrides,
  };
}

const mockAccounts = {
  listByResourceGroup: vi.fn(),
  get: vi.fn(),
  beginCreateAndWait: vi.fn(),
  listKeys: vi.fn(),
};
const mockDeployments = {
  get: vi.fn(),
  beginCreateOrUpdateAndWait: vi.fn(),
};

vi.mock("@azure/arm-cognitiveservices", () => ({
  CognitiveServicesManagementClient: vi.fn().mockImplementation(() => ({
    accounts: mockAccounts,
    deployments: mockDeployments,
  })),
}));

const mockCredentialsManager = {
  getCredential: vi.fn().mockResolvedValue({ credential: { getToken: vi.fn() }, method: "default" }),
} as unknown as AzureCredentialsManager;

describe("AzureAIManager", () => {
  let mgr: AzureAIManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new AzureAIManager(mockCredentialsManager, "sub-1", { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 });
  });

  describe("listAccounts", () => {
    it("keeps only accounts of the requested kind", async () => {
      mockAccounts.listByResourceGroup.mockImplementation(() =>
        asyncIter([makeSdkAccount("oai1", "OpenAI"), makeSdkAccount("ais1", "AIServices"), makeSdkAccount("fr1", "FormRecognizer")]),
      );

      const openai = await mgr.listAccounts("rg-1", "OpenAI");
      const aiServices = await mgr.listAccounts("rg-1", "AIServices");

      expect(openai).toEqual([
        {
          kind: "OpenAIAccount",
          id: `${RG_ID}/providers/Microsoft.CognitiveServices/accounts/oai1`,
          name: "oai1",
          resourceGroup: "rg-1",
          location: "eastus",
          endpoint: "https://oai1.example/",
        },
      ]);
      expect(aiServices.map((a) => [a.kind, a.name])).toEqual([["AIServicesAccount", "ais1"]]);
    });
  });

  describe("accounts", () => {
    it("maps an account to its observed state", async () => {
      mockAccounts.get.mockResolvedValue(
        makeSdkAccount("oai1", "OpenAI", { identity: { type: "SystemAssigned", principalId: "pid-2" } }),
      );

      const observed = await mgr.getAccount("rg-1", "oai1");

      expect(observed?.principalId).toBe("pid-2");
      expect(observed?.endpoint).toBe("https://oai1.example/");
      expect(observed?.state).toEqual({
        kind: "CognitiveAccount",
        resourceGroup: "rg-1",
        name: "oai1",
        variant: "OpenAI",
        location: "eastus",
        sku: "S0",
        customSubDomainName: "oai1",
        identity: "SystemAssigned",
        disableLocalAuth: undefined,
        tags: undefined,
      });
    });

    it("returns null for a missing account", async () => {
      mockAccounts.get.mockRejectedValue({ statusCode: 404 });
      expect(await mgr.getAccount("rg-1", "nope")).toBeNull();
    });

    it("creates an account with its kind and subdomain", async () => {
      mockAccounts.beginCreateAndWait.mockResolvedValue(makeSdkAccount("oai1", "OpenAI"));

      await mgr.putAccount({
        kind: "CognitiveAccount",
        resourceGroup: "rg-1",
        name: "oai1",
        variant: "OpenAI",
        location: "eastus",
        sku: "S0",
        customSubDomainName: "oai1",
      });

      expect(mockAccounts.beginCreateAndWait).toHaveBeenCalledWith(
        "rg-1",
        "oai1",
        expect.objectContaining({
          kind: "OpenAI",
          sku: { name: "S0" },
          properties: expect.objectContaining({ customSubDomainName: "oai1" }),
        }),
      );
    });

    it("returns key1", async () => {
      mockAccounts.listKeys.mockResolvedValue({ key1: "test-secret", key2: "other" });
      expect(await mgr.getAccountKey("rg-1", "oai1")).toBe("test-secret");
    });
  });

  describe("deployments", () => {
    it("maps a deployment to its observed state", async () => {
      mockDeployments.get.mockResolvedValue({
        id: "dep-id",
        name: "text-embedding-3-large",
        sku: { name: "Standard", capacity: 30 },
        properties: { model: { format: "OpenAI", name: "text-embedding-3-large", version: "1" } },
      });

      const observed = await mgr.getDeployment("rg-1", "oai1", "text-embedding-3-large");

      expect(observed?.state).toEqual({
        kind: "ModelDeployment",
        resourceGroup: "rg-1",
        name: "text-embedding-3-large",
        account: "oai1",
        sku: "Standard",
        capacity: 30,
        model: { format: "OpenAI", name: "text-embedding-3-large", version: "1" },
      });
    });

    it("submits the model and capacity", async () => {
      mockDeployments.beginCreateOrUpdateAndWait.mockResolvedValue({ id: "dep-id", name: "gpt-4.1" });

      await mgr.putDeployment({
        kind: "ModelDeployment",
        resourceGroup: "rg-1",
        name: "gpt-4.1",
        account: "oai1",
        sku: "GlobalStandard",
        capacity: 10,
        model: { format: "OpenAI", name: "gpt-4.1", version: "2025-04-14" },
      });

      expect(mockDeployments.beginCreateOrUpdateAndWait).toHaveBeenCalledWith("rg-1", "oai1", "gpt-4.1", {
        sku: { name: "GlobalStandard", capacity: 10 },
        properties: { model: { format: "OpenAI", name: "gpt-4.1", version: "2025-04-14" } },
      });
    });
  });
});
