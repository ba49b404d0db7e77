/**
 * Output reference helpers.
 */

import type { OutputName, OutputRef } from "./types.js";

/** Build a reference to another resource's output. */
export function outputRef(ref: string, output: OutputName): OutputRef {
  return { ref, output };
}

export function isOutputRef(value: unknown): value is OutputRef {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const keys = Object.keys(value);
  return (
    keys.length === 2 &&
    "ref" in value &&
    "output" in value &&
    typeof value.ref === "string" &&
    typeof value.output === "string"
  );
}

/**
 * Every OutputRef inside a property bag, depth-first in property order.
 */
export function findOutputRefs(value: unknown): OutputRef[] {
  if (isOutputRef(value)) return [value];
  if (Array.isArray(value)) return value.flatMap((item) => findOutputRefs(item));
  if (typeof value === "object" && value !== null) {
    return Object.values(value).flatMap((item) => findOutputRefs(item));
  }
  return [];
}

export function formatOutputRef(ref: OutputRef): string {
  return `${ref.ref}.${ref.output}`;
}
