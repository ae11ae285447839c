import { activeEntityNames } from "../../config/entities.js";
import { identityHeaders } from "../tenants.js";
import type { CollectOutcome, Job, TenantContext } from "../types.js";
import { isFetchFailure } from "./fetch-errors.js";
import type { Worker, WorkerContext } from "./types.js";

async function collectForTenant(
  job: Job,
  ctx: WorkerContext,
  names: string[],
  tenant: TenantContext | null,
): Promise<boolean> {
  const identityBlob = tenant?.identityBlob;
  const account = tenant?.accountId ?? "anonymous";

  let outcome: CollectOutcome;
  try {
    outcome = await ctx.engine.collectJob(names, identityHeaders(identityBlob));
  } catch (error) {
    if (!isFetchFailure(error)) throw error;
    console.error(`${job.sourceId}: Unable to fetch source data for account ${account}: ${error.message}`);
    return false;
  }

  if (!outcome.complete) {
    const detail = outcome.collection ? `'${outcome.collection}' is empty` : "no collections configured";
    console.log(`${job.sourceId}: Nothing forwarded for account ${account}, ${detail}`);
    return false;
  }

  return ctx.sink.forward(job.destination, { id: job.sourceId, data: outcome.data }, identityBlob);
}

/**
 * Collect every active catalog entry for each tenant of the job and forward
 * one payload per tenant. Tenants are handled one after another.
 */
export const topologicalWorker: Worker = async (job, ctx) => {
  const names = activeEntityNames(ctx.settings.activeEntities);

  let tenants: Array<TenantContext | null>;
  try {
    tenants = await ctx.tenants.resolveTenants(job);
  } catch (error) {
    if (!isFetchFailure(error)) throw error;
    console.error(`${job.sourceId}: Unable to list tenants: ${error.message}`);
    ctx.metrics.inc("get_errors");
    return;
  }

  console.log(`${job.sourceId}: Collecting ${names.length} collections for ${tenants.length} tenant(s)`);

  let forwarded = 0;
  for (const tenant of tenants) {
    if (await collectForTenant(job, ctx, names, tenant)) forwarded++;
  }

  console.log(`${job.sourceId}: Forwarded ${forwarded}/${tenants.length} tenant payload(s)`);
};
