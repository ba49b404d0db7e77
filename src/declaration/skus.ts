/**
 * SKU values accepted per resource kind. Declarations naming anything else
 * are rejected before a request is sent.
 */

import type { ResourceKind } from "./types.js";

export const STORAGE_SKUS = [
  "Standard_LRS",
  "Standard_GRS",
  "Standard_RAGRS",
  "Standard_ZRS",
  "Standard_GZRS",
  "Standard_RAGZRS",
  "Premium_LRS",
  "Premium_ZRS",
] as const;

export const SEARCH_SKUS = [
  "free",
  "basic",
  "standard",
  "standard2",
  "standard3",
  "storage_optimized_l1",
  "storage_optimized_l2",
] as const;

export const COGNITIVE_SKUS = ["F0", "S0"] as const;

export const DEPLOYMENT_SKUS = [
  "Standard",
  "GlobalStandard",
  "DataZoneStandard",
  "GlobalBatch",
  "ProvisionedManaged",
  "GlobalProvisionedManaged",
] as const;

export type StorageSku = (typeof STORAGE_SKUS)[number];
export type SearchSku = (typeof SEARCH_SKUS)[number];
export type CognitiveSku = (typeof COGNITIVE_SKUS)[number];
export type DeploymentSku = (typeof DEPLOYMENT_SKUS)[number];

export function isStorageSku(value: string): value is StorageSku {
  return STORAGE_SKUS.some((sku) => sku === value);
}

export function isSearchSku(value: string): value is SearchSku {
  return SEARCH_SKUS.some((sku) => sku === value);
}

export function isCognitiveSku(value: string): value is CognitiveSku {
  return COGNITIVE_SKUS.some((sku) => sku === value);
}

export function isDeploymentSku(value: string): value is DeploymentSku {
  return DEPLOYMENT_SKUS.some((sku) => sku === value);
}

/** Allowed SKUs for kinds that carry one; role assignments and containers have none. */
export const SKUS_BY_KIND: Partial<Record<ResourceKind, readonly string[]>> = {
  StorageAccount: STORAGE_SKUS,
  SearchService: SEARCH_SKUS,
  CognitiveAccount: COGNITIVE_SKUS,
  ModelDeployment: DEPLOYMENT_SKUS,
};
