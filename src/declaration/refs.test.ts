import { describe, it, expect } from "vitest";
import { findOutputRefs, formatOutputRef, isOutputRef, outputRef } from "./refs.js";
import { isCognitiveSku, isDeploymentSku, isSearchSku, isStorageSku } from "./skus.js";

describe("isOutputRef", () => {
  it("recognizes exactly { ref, output }", () => {
    expect(isOutputRef({ ref: "search", output: "principalId" })).toBe(true);
    expect(isOutputRef({ ref: "search", output: "principalId", extra: 1 })).toBe(false);
    expect(isOutputRef({ ref: "search" })).toBe(false);
    expect(isOutputRef("search.principalId")).toBe(false);
    expect(isOutputRef(null)).toBe(false);
    expect(isOutputRef([{ ref: "a", output: "id" }])).toBe(false);
  });
});

describe("findOutputRefs", () => {
  it("walks nested objects and arrays in property order", () => {
    const refs = findOutputRefs({
      account: outputRef("storage", "name"),
      nested: { list: [outputRef("search", "id"), "plain"], deeper: { x: outputRef("openai", "endpoint") } },
      count: 3,
    });
    expect(refs.map(formatOutputRef)).toEqual(["storage.name", "search.id", "openai.endpoint"]);
  });

  it("returns nothing for scalars", () => {
    expect(findOutputRefs("x")).toEqual([]);
    expect(findOutputRefs(undefined)).toEqual([]);
  });
});

describe("SKU guards", () => {
  it("accept only enumerated values", () => {
    expect(isStorageSku("Standard_LRS")).toBe(true);
    expect(isStorageSku("standard_lrs")).toBe(false);
    expect(isSearchSku("basic")).toBe(true);
    expect(isSearchSku("Basic")).toBe(false);
    expect(isCognitiveSku("S0")).toBe(true);
    expect(isCognitiveSku("S1")).toBe(false);
    expect(isDeploymentSku("GlobalStandard")).toBe(true);
    expect(isDeploymentSku("Global")).toBe(false);
  });
});
