import { fetchLinkPaged } from "../paginate.js";
import { identityHeaders } from "../tenants.js";
import type { CollectionResult, ServiceLocation } from "../types.js";
import { isFetchFailure } from "./fetch-errors.js";
import type { Worker } from "./types.js";

function sourceLocation(sourceRef: string): ServiceLocation | null {
  let url: URL;
  try {
    url = new URL(sourceRef);
  } catch (error) {
    if (error instanceof TypeError) return null;
    throw error;
  }
  return { host: url.origin, path: `${url.pathname}${url.search}` };
}

/**
 * Download the document at the job's source URL (following `links.next`
 * when it is paginated) and forward its records as one collection.
 */
export const downloadWorker: Worker = async (job, ctx) => {
  if (!job.sourceRef) {
    console.error(`${job.sourceId}: No source URL given, nothing to download`);
    return;
  }

  ctx.metrics.inc("gets");
  const source = sourceLocation(job.sourceRef);
  if (!source) {
    console.error(`${job.sourceId}: Invalid source URL '${job.sourceRef}'`);
    ctx.metrics.inc("get_errors");
    return;
  }

  let data: CollectionResult;
  try {
    data = await fetchLinkPaged(ctx.transport, source, "", identityHeaders(job.identityBlob));
  } catch (error) {
    if (!isFetchFailure(error)) throw error;
    console.error(`${job.sourceId}: Unable to fetch source data: ${error.message}`);
    ctx.metrics.inc("get_errors");
    return;
  }
  ctx.metrics.inc("get_successes");

  await ctx.sink.forward(job.destination, { id: job.sourceId, data }, job.identityBlob);
};
