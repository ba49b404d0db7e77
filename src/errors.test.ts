/**
 * azlab — Error Tests
 */

import { describe, it, expect } from "vitest";
import {
  AmbiguousResourceError,
  ArtifactWriteError,
  CyclicDependencyError,
  EXIT_CODES,
  InvalidConfigurationError,
  MissingResourceError,
  PlatformCallFailedError,
  ReconciliationTimeoutError,
  ScopeNotFoundError,
  exitCodeFor,
  redactSecrets,
} from "./errors.js";

describe("exitCodeFor", () => {
  it("maps each error class to its exit code", () => {
    expect(exitCodeFor(new ScopeNotFoundError("rg"))).toBe(EXIT_CODES.scopeNotFound);
    expect(exitCodeFor(new MissingResourceError("Storage Account", "rg"))).toBe(EXIT_CODES.missingResource);
    expect(exitCodeFor(new AmbiguousResourceError("Storage Account", ["a", "b"]))).toBe(EXIT_CODES.missingResource);
    expect(exitCodeFor(new ArtifactWriteError(".env", "EACCES"))).toBe(EXIT_CODES.artifactWrite);
    expect(exitCodeFor(new InvalidConfigurationError("bad"))).toBe(EXIT_CODES.invalidConfiguration);
    expect(exitCodeFor(new CyclicDependencyError(["a", "b", "a"]))).toBe(EXIT_CODES.invalidConfiguration);
    expect(exitCodeFor(new PlatformCallFailedError("get", "boom"))).toBe(EXIT_CODES.platformCall);
    expect(exitCodeFor(new ReconciliationTimeoutError(1000))).toBe(EXIT_CODES.timeout);
    expect(exitCodeFor(new Error("other"))).toBe(EXIT_CODES.generic);
  });
});

describe("error messages", () => {
  it("name the resource group and the candidates", () => {
    expect(new ScopeNotFoundError("rg-lab").message).toBe('Resource group "rg-lab" does not exist');
    expect(new AmbiguousResourceError("Storage Account", ["a", "b"]).message).toBe(
      "Found 2 Storage Account resources (a, b); pass an explicit name",
    );
  });

  it("list configuration issues", () => {
    const error = new InvalidConfigurationError("Invalid configuration", [
      { path: "/retry/maxAttempts", message: "Expected integer" },
      { path: "/envFile", message: "Expected string" },
    ]);
    expect(error.message).toBe("Invalid configuration: /retry/maxAttempts Expected integer; /envFile Expected string");
  });

  it("redact secrets from platform messages", () => {
    const error = new PlatformCallFailedError("list keys", "got AccountKey=test-secret;EndpointSuffix=x");
    expect(error.message).toBe("list keys failed: got AccountKey=***;EndpointSuffix=x");
  });
});

describe("redactSecrets", () => {
  it("masks known secret values", () => {
    expect(redactSecrets("token is test-secret-value", ["test-secret-value"])).toBe("token is ***");
  });

  it("ignores short known values", () => {
    expect(redactSecrets("id abc", ["abc"])).toBe("id abc");
  });

  it("masks SAS signatures and key-like JSON values", () => {
    expect(redactSecrets("https://x/c?sv=1&sig=abcdef")).toBe("https://x/c?sv=1&sig=***");
    expect(redactSecrets('{"key1":"AAAAAAAAAAAAAAAAAAAAAAAA"}')).toBe('{"key1":"***"}');
  });
});
