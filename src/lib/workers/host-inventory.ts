import type { HostCollection } from "../types.js";
import { fetchCountPaged, joinUrl } from "../paginate.js";
import { identityHeaders } from "../tenants.js";
import { isFetchFailure } from "./fetch-errors.js";
import type { Worker } from "./types.js";

/**
 * Collect every host of the job's account from the host inventory
 * (count-based pages) and forward them with the account number.
 */
export const hostInventoryWorker: Worker = async (job, ctx) => {
  if (!job.identityBlob) {
    console.error(`${job.sourceId}: Host inventory needs an identity, skipping`);
    return;
  }

  const { host, path } = ctx.settings.hostInventory;
  const headers = identityHeaders(job.identityBlob);

  ctx.metrics.inc("gets");
  let out: HostCollection;
  try {
    out = await fetchCountPaged(ctx.transport, joinUrl(host, path), headers);
  } catch (error) {
    if (!isFetchFailure(error)) throw error;
    console.error(`${job.sourceId}: Unable to fetch hosts: ${error.message}`);
    ctx.metrics.inc("get_errors");
    return;
  }
  ctx.metrics.inc("get_successes");

  console.log(`${job.sourceId}: Received data for account_id=${job.accountId ?? "unknown"} has total=${out.total}`);

  await ctx.sink.forward(
    job.destination,
    { id: job.sourceId, account: job.accountId ?? null, data: out },
    job.identityBlob,
  );
};
