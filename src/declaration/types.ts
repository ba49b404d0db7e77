/**
 * Declaration model — resource specs as TypeBox schemas.
 *
 * The schemas are the single source of the spec types (`Static<…>`) and
 * validate declaration documents loaded from JSON.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// =============================================================================
// Output references
// =============================================================================

/**
 * A value that is only known once another resource has been realized,
 * e.g. `{ ref: "search", output: "principalId" }`. Any property holding one
 * implies a dependency edge on the referenced resource.
 */
export const OutputRefSchema = Type.Object(
  {
    ref: Type.String({ minLength: 1 }),
    output: Type.String({ minLength: 1 }),
  },
  { additionalProperties: false },
);

export type OutputRef = Static<typeof OutputRefSchema>;

const Resolvable = <T extends TSchema>(schema: T) => Type.Union([schema, OutputRefSchema]);

// =============================================================================
// Shared fragments
// =============================================================================

const Tags = Type.Record(Type.String(), Type.String());

const Sku = Type.Object({
  name: Type.String({ minLength: 1 }),
  capacity: Type.Optional(Type.Integer({ minimum: 1 })),
});

const IdentityMode = Type.Union([Type.Literal("SystemAssigned"), Type.Literal("None")]);

const Common = {
  logicalName: Type.String({ minLength: 1, pattern: "^[A-Za-z][A-Za-z0-9_-]*$" }),
  dependsOn: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
};

// =============================================================================
// Resource specs
// =============================================================================

export const StorageAccountSpecSchema = Type.Object({
  ...Common,
  kind: Type.Literal("StorageAccount"),
  name: Type.String({ minLength: 1 }),
  location: Type.Optional(Type.String({ minLength: 1 })),
  sku: Sku,
  properties: Type.Object({
    accessTier: Type.Optional(Type.Union([Type.Literal("Hot"), Type.Literal("Cool")])),
    allowSharedKeyAccess: Type.Optional(Type.Boolean()),
    tags: Type.Optional(Tags),
  }),
});

export const BlobContainerSpecSchema = Type.Object({
  ...Common,
  kind: Type.Literal("BlobContainer"),
  name: Type.String({ minLength: 1 }),
  properties: Type.Object({
    account: Resolvable(Type.String({ minLength: 1 })),
    publicAccess: Type.Optional(Type.Union([Type.Literal("None"), Type.Literal("Blob"), Type.Literal("Container")])),
  }),
});

export const SearchServiceSpecSchema = Type.Object({
  ...Common,
  kind: Type.Literal("SearchService"),
  name: Type.String({ minLength: 1 }),
  location: Type.Optional(Type.String({ minLength: 1 })),
  sku: Sku,
  properties: Type.Object({
    replicaCount: Type.Optional(Type.Integer({ minimum: 1, maximum: 12 })),
    partitionCount: Type.Optional(Type.Integer({ minimum: 1, maximum: 12 })),
    identity: Type.Optional(IdentityMode),
    tags: Type.Optional(Tags),
  }),
});

export const CognitiveAccountSpecSchema = Type.Object({
  ...Common,
  kind: Type.Literal("CognitiveAccount"),
  name: Type.String({ minLength: 1 }),
  location: Type.Optional(Type.String({ minLength: 1 })),
  sku: Sku,
  properties: Type.Object({
    variant: Type.Union([Type.Literal("OpenAI"), Type.Literal("AIServices"), Type.Literal("CognitiveServices")]),
    customSubDomainName: Type.Optional(Resolvable(Type.String({ minLength: 1 }))),
    identity: Type.Optional(IdentityMode),
    disableLocalAuth: Type.Optional(Type.Boolean()),
    tags: Type.Optional(Tags),
  }),
});

export const ModelDeploymentSpecSchema = Type.Object({
  ...Common,
  kind: Type.Literal("ModelDeployment"),
  name: Type.String({ minLength: 1 }),
  sku: Sku,
  properties: Type.Object({
    account: Resolvable(Type.String({ minLength: 1 })),
    model: Type.Object({
      format: Type.String({ minLength: 1 }),
      name: Type.String({ minLength: 1 }),
      version: Type.String({ minLength: 1 }),
    }),
  }),
});

export const RoleAssignmentSpecSchema = Type.Object({
  ...Common,
  kind: Type.Literal("RoleAssignment"),
  properties: Type.Object({
    principalId: Resolvable(Type.String({ minLength: 1 })),
    principalType: Type.Union([Type.Literal("User"), Type.Literal("ServicePrincipal"), Type.Literal("Group")]),
    /** Built-in role name, role definition GUID, or full role definition ID. */
    role: Type.String({ minLength: 1 }),
    /** Resource ID the grant applies to. */
    scope: Resolvable(Type.String({ minLength: 1 })),
  }),
});

export const ResourceSpecSchema = Type.Union([
  StorageAccountSpecSchema,
  BlobContainerSpecSchema,
  SearchServiceSpecSchema,
  CognitiveAccountSpecSchema,
  ModelDeploymentSpecSchema,
  RoleAssignmentSpecSchema,
]);

export const DeclarationSchema = Type.Object({
  description: Type.Optional(Type.String()),
  resources: Type.Array(ResourceSpecSchema),
});

export type StorageAccountSpec = Static<typeof StorageAccountSpecSchema>;
export type BlobContainerSpec = Static<typeof BlobContainerSpecSchema>;
export type SearchServiceSpec = Static<typeof SearchServiceSpecSchema>;
export type CognitiveAccountSpec = Static<typeof CognitiveAccountSpecSchema>;
export type ModelDeploymentSpec = Static<typeof ModelDeploymentSpecSchema>;
export type RoleAssignmentSpec = Static<typeof RoleAssignmentSpecSchema>;
export type ResourceSpec = Static<typeof ResourceSpecSchema>;
export type Declaration = Static<typeof DeclarationSchema>;

export type ResourceKind = ResourceSpec["kind"];
export type CognitiveVariant = CognitiveAccountSpec["properties"]["variant"];
export type IdentityMode = Static<typeof IdentityMode>;
export type PrincipalType = RoleAssignmentSpec["properties"]["principalType"];

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "StorageAccount",
  "BlobContainer",
  "SearchService",
  "CognitiveAccount",
  "ModelDeployment",
  "RoleAssignment",
];

// =============================================================================
// Deployment outputs
// =============================================================================

/** Realized state of a resource, consumed by dependents and by setup. */
export type DeploymentOutput = {
  id: string;
  name: string;
  endpoint?: string;
  principalId?: string;
  blobEndpoint?: string;
};

export type OutputName = keyof DeploymentOutput;

export const OUTPUTS_BY_KIND: Record<ResourceKind, readonly OutputName[]> = {
  StorageAccount: ["id", "name", "blobEndpoint"],
  BlobContainer: ["id", "name"],
  SearchService: ["id", "name", "endpoint", "principalId"],
  CognitiveAccount: ["id", "name", "endpoint", "principalId"],
  ModelDeployment: ["id", "name"],
  RoleAssignment: ["id", "name"],
};

const OUTPUT_NAMES: readonly OutputName[] = ["id", "name", "endpoint", "principalId", "blobEndpoint"];

export function isOutputName(value: string): value is OutputName {
  return OUTPUT_NAMES.some((name) => name === value);
}
