/**
 * Built-in role definitions and deterministic role assignment names.
 */

import { createHash } from "node:crypto";
import { InvalidConfigurationError } from "../errors.js";

/** Built-in role names → role definition GUIDs. */
export const BUILTIN_ROLES = {
  "Cognitive Services User": "a97b65f3-24c7-4388-baec-2e87135dc908",
  "Cognitive Services OpenAI User": "5e0bd9bd-7b93-4f28-af87-19fc36ad61bd",
  "Storage Blob Data Contributor": "ba92f5b4-2d11-453d-a403-e96b0029c9fe",
  "Storage Blob Data Reader": "2a2b9908-6ea1-4ae2-8e65-a410df84e7d1",
  "Search Index Data Contributor": "8ebe5a00-799e-43f5-93ac-243d3dce84a7",
  "Search Service Contributor": "7ca78c08-252a-4471-8644-bb5ff32d4ba0",
} as const;

export type BuiltinRoleName = keyof typeof BUILTIN_ROLES;

const ROLE_IDS = new Map<string, string>(Object.entries(BUILTIN_ROLES));

const GUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const ROLE_DEFINITION_ID = /\/providers\/Microsoft\.Authorization\/roleDefinitions\/[0-9a-f-]{36}$/i;

/** Role given as a built-in name, a definition GUID or a full definition ID. */
export function isKnownRole(role: string): boolean {
  return ROLE_IDS.has(role) || GUID.test(role) || ROLE_DEFINITION_ID.test(role);
}

export function resolveRoleDefinitionId(role: string, subscriptionId: string): string {
  if (ROLE_DEFINITION_ID.test(role)) return role;
  const guid = ROLE_IDS.get(role) ?? (GUID.test(role) ? role.toLowerCase() : undefined);
  if (!guid) {
    throw new InvalidConfigurationError(`Unknown role "${role}"`, [
      { path: "/properties/role", message: "must be a built-in role name or a role definition GUID", code: "INVALID_ROLE" },
    ]);
  }
  return `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${guid}`;
}

/**
 * Name-based UUID (version 5 layout, SHA-1) of a grant. The same
 * scope, principal and role always produce the same name, so resubmitting
 * a grant updates it in place.
 */
export function roleAssignmentName(scope: string, principalId: string, roleDefinitionId: string): string {
  const bytes = createHash("sha1")
    .update(`${scope.toLowerCase()}|${principalId.toLowerCase()}|${roleDefinitionId.toLowerCase()}`)
    .digest()
    .subarray(0, 16);

  bytes[6] = (bytes[6] & 0x0f) | 0x50;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}
