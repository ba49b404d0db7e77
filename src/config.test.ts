/**
 * azlab — Configuration Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { InvalidConfigurationError } from "./errors.js";
import { getDefaultConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";

describe("resolveConfig", () => {
  it("applies defaults to an empty input", () => {
    expect(resolveConfig({})).toEqual(getDefaultConfig());
  });

  it("fills in data loader defaults", () => {
    const config = resolveConfig({ dataLoader: { command: "python3" } });
    expect(config.dataLoader).toEqual({ command: "python3", args: [], logFile: "index-creation.log", timeoutMs: 600_000 });
  });

  it("merges partial retry and timeout settings", () => {
    const config = resolveConfig({ retry: { maxAttempts: 5 }, timeouts: { callTimeoutMs: 0 } });
    expect(config.retry).toEqual({ maxAttempts: 5, minDelayMs: 100, maxDelayMs: 30_000 });
    expect(config.timeouts).toEqual({ callTimeoutMs: 0, overallTimeoutMs: 600_000 });
  });

  it("lets the environment override the file", () => {
    const config = resolveConfig(
      { subscriptionId: "from-file", envFile: "lab.env" },
      { AZURE_SUBSCRIPTION_ID: "from-env", AZLAB_ENV_FILE: "other.env" },
    );
    expect(config.subscriptionId).toBe("from-env");
    expect(config.envFile).toBe("other.env");
  });

  it("ignores empty environment values", () => {
    expect(resolveConfig({ subscriptionId: "from-file" }, { AZURE_SUBSCRIPTION_ID: "" }).subscriptionId).toBe("from-file");
  });
});

describe("parseConfig", () => {
  it("accepts a valid document", () => {
    const input = { subscriptionId: "sub-1", models: { chat: { deployment: "chat", model: "gpt-4.1" } } };
    expect(parseConfig(input)).toEqual(input);
  });

  it("rejects unknown keys and wrong types with the offending paths", () => {
    let caught: unknown;
    try {
      parseConfig({ retry: { maxAttempts: 0 }, unknownKey: true });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidConfigurationError);
    if (caught instanceof InvalidConfigurationError) {
      const paths = caught.issues.map((i) => i.path);
      expect(paths).toContain("/retry/maxAttempts");
      expect(paths).toContain("/unknownKey");
    }
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "azlab-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns defaults plus environment without a file", async () => {
    const config = await loadConfig({ env: { AZURE_TENANT_ID: "tenant-1" } });
    expect(config.tenantId).toBe("tenant-1");
    expect(config.envFile).toBe(".env");
  });

  it("reads a JSON file", async () => {
    const file = join(dir, "azlab.config.json");
    await writeFile(file, JSON.stringify({ blobContainerName: "lab-docs", discovery: { strict: true } }));

    const config = await loadConfig({ file, env: {} });
    expect(config.blobContainerName).toBe("lab-docs");
    expect(config.discovery.strict).toBe(true);
  });

  it("fails on a missing file", async () => {
    await expect(loadConfig({ file: join(dir, "nope.json"), env: {} })).rejects.toThrow(InvalidConfigurationError);
  });

  it("fails on invalid JSON", async () => {
    const file = join(dir, "broken.json");
    await writeFile(file, "{ not json");
    await expect(loadConfig({ file, env: {} })).rejects.toThrow(`Config file ${file} is not valid JSON`);
  });
});
