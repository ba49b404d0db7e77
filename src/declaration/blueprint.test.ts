import { describe, it, expect } from "vitest";
import { validateDeclaration, topologicalOrder } from "../graph/planner.js";
import { knowledgeLabBlueprint } from "./blueprint.js";
import { uniqueSuffix } from "./naming.js";

describe("knowledgeLabBlueprint", () => {
  const decl = knowledgeLabBlueprint({ subscriptionId: "sub-1", resourceGroup: "rg-lab511" });
  const suffix = uniqueSuffix("sub-1", "rg-lab511");

  it("declares the lab resources", () => {
    expect(decl.resources.map((r) => r.logicalName)).toEqual([
      "storage",
      "container",
      "search",
      "openai",
      "aiServices",
      "embeddingDeployment",
      "chatDeployment",
      "searchReadsStorage",
      "searchUsesOpenAI",
      "searchUsesAiServices",
    ]);
    expect(decl.description).toBe("Knowledge-base lab environment for rg-lab511");
  });

  it("derives names from the prefix and scope", () => {
    const names = decl.resources.flatMap((r) => (r.kind === "RoleAssignment" ? [] : [r.name]));
    expect(names).toEqual([
      `stkb${suffix}`,
      "documents",
      `srch-kb-${suffix}`,
      `oai-kb-${suffix}`,
      `ais-kb-${suffix}`,
      "text-embedding-3-large",
      "gpt-4.1",
    ]);
  });

  it("is valid and free of normalization warnings", () => {
    const result = validateDeclaration(decl);
    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it("grants the search identity access to storage and both AI accounts", () => {
    const grants = decl.resources.filter((r) => r.kind === "RoleAssignment");
    expect(grants.map((g) => (g.kind === "RoleAssignment" ? [g.properties.role, g.properties.scope] : []))).toEqual([
      ["Storage Blob Data Reader", { ref: "storage", output: "id" }],
      ["Cognitive Services OpenAI User", { ref: "openai", output: "id" }],
      ["Cognitive Services User", { ref: "aiServices", output: "id" }],
    ]);
  });

  it("orders deployments after their account and grants after the search service", () => {
    const order = topologicalOrder(decl.resources).map((r) => r.logicalName);
    expect(order.indexOf("openai")).toBeLessThan(order.indexOf("embeddingDeployment"));
    expect(order.indexOf("embeddingDeployment")).toBeLessThan(order.indexOf("chatDeployment"));
    expect(order.indexOf("search")).toBeLessThan(order.indexOf("searchReadsStorage"));
  });

  it("honours a custom container name and model", () => {
    const custom = knowledgeLabBlueprint({
      subscriptionId: "sub-1",
      resourceGroup: "rg-lab511",
      prefix: "demo",
      containerName: "papers",
      chat: { deployment: "chat", model: "gpt-4o", version: "2024-11-20", capacity: 10 },
    });
    const container = custom.resources.find((r) => r.logicalName === "container");
    const chat = custom.resources.find((r) => r.logicalName === "chatDeployment");
    expect(container?.kind === "BlobContainer" ? container.name : undefined).toBe("papers");
    expect(chat?.kind === "ModelDeployment" ? [chat.name, chat.sku.capacity, chat.properties.model.name] : []).toEqual([
      "chat",
      10,
      "gpt-4o",
    ]);
  });
});
