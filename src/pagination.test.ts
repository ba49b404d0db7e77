/**
 * Azure Pagination Utilities — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { collectAll, resourceGroupFromId } from "./pagination.js";

/** Creates an async iterable from an array (mimics Azure SDK paging). */
async function* asyncIter<T>(items: T[]): AsyncIterable<T> {
  for (const item of items) yield item;
}

const identity = <T>(x: T): T => x;

describe("collectAll", () => {
  it("returns a flat array of all items", async () => {
    expect(await collectAll(asyncIter([1, 2, 3]), identity)).toEqual([1, 2, 3]);
  });

  it("applies map and filter", async () => {
    const items = await collectAll(asyncIter([1, 2, 3, 4]), (x) => x * 2, (x) => x > 4);
    expect(items).toEqual([6, 8]);
  });

  it("returns empty array for empty iterator", async () => {
    expect(await collectAll(asyncIter<number>([]), identity)).toEqual([]);
  });
});

describe("resourceGroupFromId", () => {
  it("extracts the resource group segment", () => {
    expect(resourceGroupFromId("/subscriptions/s/resourceGroups/rg-lab/providers/Microsoft.Search/searchServices/s1")).toBe("rg-lab");
    expect(resourceGroupFromId("/subscriptions/s/resourcegroups/RG2/providers/x")).toBe("RG2");
  });

  it("returns an empty string when absent", () => {
    expect(resourceGroupFromId(undefined)).toBe("");
    expect(resourceGroupFromId("/subscriptions/s")).toBe("");
  });
});
