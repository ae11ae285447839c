import type { ServiceSelector } from "../config/services.js";

/** One JSON object returned by an inventory backend. */
export type InventoryRecord = Readonly<Record<string, unknown>>;

/** Records in upstream response order, fully materialized. */
export type CollectionResult = readonly InventoryRecord[];

export interface EntityDescriptor {
  mainCollection?: string;
  subCollection?: string;
  foreignKey?: string;
  /** Backend serving the collections (defaults to TOPOLOGICAL) */
  service?: ServiceSelector | string;
}

export interface ServiceLocation {
  host: string;
  path: string;
}

export interface TenantContext {
  accountId: number | string | null;
  /** base64 of {"identity":{"account_number": accountId}} */
  identityBlob: string;
}

export interface Job {
  /** Data source location (download worker) */
  sourceRef?: string;
  sourceId: string;
  destination: string;
  identityBlob?: string;
  accountId?: number | string | null;
}

// Envelope POSTed to the next service
export interface ForwardEnvelope {
  id: string;
  account?: number | string | null;
  data: unknown;
}

export type CollectOutcome =
  | { complete: true; data: Record<string, CollectionResult> }
  | { complete: false; reason: "no-collections" | "empty-collection"; collection?: string };

export interface HostCollection {
  results: InventoryRecord[];
  total: number;
}
