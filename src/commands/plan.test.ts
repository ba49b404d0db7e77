/**
 * `azlab plan` command — Unit Tests
 */

import { describe, expect, it, vi } from "vitest";
import { getDefaultConfig } from "../config.js";
import { uniqueSuffix } from "../declaration/naming.js";
import type { Logger } from "../logger.js";
import { InMemoryPlatform } from "../platform/memory.js";
import { PLACEHOLDER_SUBSCRIPTION, planCommand } from "./plan.js";

const BLUEPRINT_ORDER = [
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
];

function createLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("planCommand", () => {
  it("plans the lab blueprint without touching the platform", async () => {
    const platform = new InMemoryPlatform("sub-1");
    const runtime = { log: vi.fn(), error: vi.fn(), exit: vi.fn() };

    const report = await planCommand({ resourceGroup: "rg-lab", subscription: "sub-1" }, runtime, {
      config: getDefaultConfig(),
      logger: createLogger(),
      platform,
    });

    expect(report.order).toEqual(BLUEPRINT_ORDER);
    expect(report.resources.every((r) => r.action === "planned")).toBe(true);
    expect(report.resources[0].name).toBe(`stkb${uniqueSuffix("sub-1", "rg-lab")}`);
    expect(platform.calls).toEqual([]);
    expect(runtime.log).toHaveBeenCalledWith("\nCreation order for rg-lab:\n");
  });

  it("prints the plan as JSON", async () => {
    const runtime = { log: vi.fn(), error: vi.fn(), exit: vi.fn() };

    await planCommand({ resourceGroup: "rg-lab", subscription: "sub-1", prefix: "demo", json: true }, runtime, {
      config: getDefaultConfig(),
      logger: createLogger(),
      platform: new InMemoryPlatform("sub-1"),
    });

    const output: unknown = JSON.parse(String(runtime.log.mock.calls[0][0]));
    expect(output).toMatchObject({
      order: BLUEPRINT_ORDER,
      resources: expect.arrayContaining([
        expect.objectContaining({ logicalName: "search", name: `srch-demo-${uniqueSuffix("sub-1", "rg-lab")}` }),
      ]),
      warnings: [],
    });
  });

  it("warns when no subscription is configured", async () => {
    const logger = createLogger();

    const report = await planCommand({ resourceGroup: "rg-lab" }, { log: vi.fn(), error: vi.fn(), exit: vi.fn() }, {
      config: getDefaultConfig(),
      logger,
      platform: new InMemoryPlatform(PLACEHOLDER_SUBSCRIPTION),
    });

    expect(report.resources[0].name).toBe(`stkb${uniqueSuffix(PLACEHOLDER_SUBSCRIPTION, "rg-lab")}`);
    expect(logger.warn).toHaveBeenCalledWith(
      "No subscription configured; generated names will differ from those used by apply",
    );
  });
});
