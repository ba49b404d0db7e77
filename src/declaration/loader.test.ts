/**
 * Declaration loading — Unit Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { InvalidConfigurationError } from "../errors.js";
import { loadDeclarationFile, parseDeclaration } from "./loader.js";

describe("parseDeclaration", () => {
  it("accepts a valid declaration", () => {
    const decl = parseDeclaration({
      resources: [
        { logicalName: "storage", kind: "StorageAccount", name: "stlab", sku: { name: "Standard_LRS" }, properties: {} },
        {
          logicalName: "container",
          kind: "BlobContainer",
          name: "documents",
          properties: { account: { ref: "storage", output: "name" } },
        },
      ],
    });
    expect(decl.resources.map((r) => r.logicalName)).toEqual(["storage", "container"]);
  });

  it("rejects an unknown kind with schema issues", () => {
    let caught: unknown;
    try {
      parseDeclaration({ resources: [{ logicalName: "vm", kind: "VirtualMachine", name: "vm1", properties: {} }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidConfigurationError);
    if (caught instanceof InvalidConfigurationError) {
      expect(caught.issues.length).toBeGreaterThan(0);
      expect(caught.issues.length).toBeLessThanOrEqual(10);
      expect(caught.issues.every((i) => i.code === "SCHEMA")).toBe(true);
    }
  });

  it("rejects a document without resources", () => {
    expect(() => parseDeclaration({ description: "empty" })).toThrow(InvalidConfigurationError);
  });
});

describe("loadDeclarationFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "azlab-decl-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a JSON file", async () => {
    const path = join(dir, "decl.json");
    await writeFile(path, JSON.stringify({ resources: [] }));
    await expect(loadDeclarationFile(path)).resolves.toEqual({ resources: [] });
  });

  it("reports invalid JSON as a configuration error", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ resources: ");
    await expect(loadDeclarationFile(path)).rejects.toThrow(/is not valid JSON/);
  });

  it("reports a missing file as a configuration error", async () => {
    await expect(loadDeclarationFile(join(dir, "missing.json"))).rejects.toBeInstanceOf(InvalidConfigurationError);
  });

  it("loads the bundled example declaration", async () => {
    const decl = await loadDeclarationFile(new URL("../../declarations/knowledge-lab.json", import.meta.url).pathname);
    expect(decl.resources).toHaveLength(7);
  });
});
