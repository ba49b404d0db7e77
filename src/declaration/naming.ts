/**
 * Per-kind physical name rules. Names are normalized before submission so a
 * declaration never reaches the platform with a name it would reject.
 */

import { createHash } from "node:crypto";
import { InvalidConfigurationError } from "../errors.js";
import type { ResourceKind } from "./types.js";

export type NamedKind = Exclude<ResourceKind, "RoleAssignment"> | "CustomSubDomain";

export type NameRule = {
  minLength: number;
  maxLength: number;
  lowercase: boolean;
  /** Characters that survive; everything else is dropped. */
  invalid: RegExp;
  /** Hyphens are collapsed and may not lead or trail. */
  hyphens: boolean;
};

export const NAME_RULES: Record<NamedKind, NameRule> = {
  StorageAccount: { minLength: 3, maxLength: 24, lowercase: true, invalid: /[^a-z0-9]/g, hyphens: false },
  BlobContainer: { minLength: 3, maxLength: 63, lowercase: true, invalid: /[^a-z0-9-]/g, hyphens: true },
  SearchService: { minLength: 2, maxLength: 60, lowercase: true, invalid: /[^a-z0-9-]/g, hyphens: true },
  CognitiveAccount: { minLength: 2, maxLength: 64, lowercase: false, invalid: /[^A-Za-z0-9-]/g, hyphens: true },
  CustomSubDomain: { minLength: 2, maxLength: 64, lowercase: true, invalid: /[^a-z0-9-]/g, hyphens: true },
  ModelDeployment: { minLength: 1, maxLength: 64, lowercase: false, invalid: /[^A-Za-z0-9._-]/g, hyphens: false },
};

/**
 * Normalize a raw name for the given kind: case, charset, then truncation to
 * the first `maxLength` characters. Throws when fewer than `minLength`
 * characters remain.
 */
export function normalizeName(kind: NamedKind, raw: string): string {
  const rule = NAME_RULES[kind];
  let name = rule.lowercase ? raw.toLowerCase() : raw;
  name = name.replace(rule.invalid, "");

  if (rule.hyphens) {
    name = trimHyphens(name.replace(/-{2,}/g, "-"));
  }

  name = name.slice(0, rule.maxLength);
  if (rule.hyphens) name = trimHyphens(name);

  if (name.length < rule.minLength) {
    throw new InvalidConfigurationError(
      `Name "${raw}" is not valid for ${kind}`,
      [{ path: "/name", message: `must keep at least ${rule.minLength} valid characters after normalization`, code: "INVALID_NAME" }],
    );
  }
  return name;
}

function trimHyphens(value: string): string {
  return value.replace(/^-+/, "").replace(/-+$/, "");
}

const SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz234567";

/**
 * Deterministic 13-character lowercase suffix for globally unique names,
 * e.g. `uniqueSuffix(subscriptionId, resourceGroup)`.
 */
export function uniqueSuffix(...parts: string[]): string {
  const digest = createHash("sha256").update(parts.map((p) => p.toLowerCase()).join("|")).digest();
  let suffix = "";
  for (let i = 0; i < 13; i++) {
    suffix += SUFFIX_ALPHABET[digest[i] % 32];
  }
  return suffix;
}
