import { InvalidArgumentError } from "commander";
import { describe, expect, it, vi } from "vitest";
import { EXIT_CODES, ScopeNotFoundError } from "../errors.js";
import { theme } from "../logger.js";
import { parseNonNegativeInt, runCommandWithRuntime } from "./cli-utils.js";

describe("runCommandWithRuntime", () => {
  it("leaves the exit code alone on success", async () => {
    const runtime = { log: vi.fn(), error: vi.fn(), exit: vi.fn() };
    await runCommandWithRuntime(runtime, async () => {});
    expect(runtime.exit).not.toHaveBeenCalled();
  });

  it("prints the error and exits with its code", async () => {
    const runtime = { log: vi.fn(), error: vi.fn(), exit: vi.fn() };
    await runCommandWithRuntime(runtime, async () => {
      throw new ScopeNotFoundError("rg-missing");
    });

    expect(runtime.error).toHaveBeenCalledWith(theme.error(`✗ ${new ScopeNotFoundError("rg-missing").message}`));
    expect(runtime.exit).toHaveBeenCalledWith(EXIT_CODES.scopeNotFound);
  });
});

describe("parseNonNegativeInt", () => {
  it("parses plain integers", () => {
    expect(parseNonNegativeInt("0")).toBe(0);
    expect(parseNonNegativeInt("42")).toBe(42);
  });

  it.each(["-1", "1.5", "abc", "007"])("rejects %s", (value) => {
    expect(() => parseNonNegativeInt(value)).toThrow(InvalidArgumentError);
  });
});
