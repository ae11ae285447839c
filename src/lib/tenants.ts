import { TENANTS_ENTITY } from "../config/entities.js";
import type { EntityJoinEngine } from "./entity-join.js";
import { encodeIdentity, type AccountId } from "./identity.js";
import type { ProcessedCache } from "./processed-cache.js";
import type { InventoryRecord, Job, TenantContext } from "./types.js";

export const IDENTITY_HEADER = "x-rh-identity";

export function createTenant(accountId: AccountId): TenantContext {
  return { accountId, identityBlob: encodeIdentity(accountId) };
}

export function identityHeaders(identityBlob?: string | null): Record<string, string> {
  return identityBlob ? { [IDENTITY_HEADER]: identityBlob } : {};
}

function externalTenant(record: InventoryRecord): string | number | null {
  const tenant = record.external_tenant ?? record.externalTenant;
  return typeof tenant === "string" || typeof tenant === "number" ? tenant : null;
}

export interface TenantIteratorOptions {
  engine: EntityJoinEngine;
  cache: ProcessedCache;
  allTenants: boolean;
}

/**
 * Expands a job into the tenants it collects for.
 *
 * In single-tenant mode that is the job's own account; a job without any
 * identity yields one `null` slot, meaning "collect without an identity
 * header". In all-tenants mode every tenant known to the internal API is
 * returned and marked processed right away, before its data is collected.
 */
export class TenantIterator {
  constructor(private readonly options: TenantIteratorOptions) {}

  get allTenants(): boolean {
    return this.options.allTenants;
  }

  async resolveTenants(job: Job): Promise<Array<TenantContext | null>> {
    const { engine, cache } = this.options;

    if (!this.options.allTenants) {
      const accountId = job.accountId ?? null;
      if (accountId !== null) await cache.markProcessed(accountId);

      if (job.identityBlob) return [{ accountId, identityBlob: job.identityBlob }];
      if (accountId !== null) return [createTenant(accountId)];
      return [null];
    }

    const records = await engine.resolve(TENANTS_ENTITY, identityHeaders(job.identityBlob));
    const tenants: TenantContext[] = [];

    for (const record of records) {
      const accountId = externalTenant(record);
      if (accountId === null) {
        console.warn("Skipping tenant record without 'external_tenant'");
        continue;
      }
      tenants.push(createTenant(accountId));
      await cache.markProcessed(accountId);
    }

    return tenants;
  }
}
