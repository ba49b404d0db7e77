/**
 * Load and schema-check declaration documents.
 */

import { readFile } from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import { InvalidConfigurationError } from "../errors.js";
import { DeclarationSchema, type Declaration } from "./types.js";

export function parseDeclaration(value: unknown): Declaration {
  if (Value.Check(DeclarationSchema, value)) return value;

  const issues = [...Value.Errors(DeclarationSchema, value)].map((e) => ({
    path: e.path || "/",
    message: e.message,
    code: "SCHEMA",
  }));
  throw new InvalidConfigurationError("Invalid declaration", issues.slice(0, 10));
}

export async function loadDeclarationFile(path: string): Promise<Declaration> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new InvalidConfigurationError(`Cannot read declaration ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigurationError(`Declaration ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseDeclaration(parsed);
}
