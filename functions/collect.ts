import { v4 as uuidv4 } from "uuid";
import type { AppContext } from "../src/lib/app.js";
import { describeError } from "../src/lib/errors.js";
import { API_VERSION, reply, type Handler, type RouteConfig } from "../src/lib/http.js";
import { MalformedIdentity, decodeIdentity, type AccountId } from "../src/lib/identity.js";
import { isRecord } from "../src/lib/paginate.js";
import { IDENTITY_HEADER } from "../src/lib/tenants.js";
import type { Job } from "../src/lib/types.js";

async function readBody(req: Request): Promise<Record<string, unknown> | null> {
  const text = await req.text();
  if (!text.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "string" && value !== "") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * POST /v1.0/collect
 * Starts a collection job for the caller's account unless the account was
 * already processed within the window. Answers before the job runs.
 *
 * Body: { url?, payload_id? }   Header: x-rh-identity (required)
 */
export default function collect(ctx: AppContext): Handler {
  return async (req) => {
    ctx.metrics.inc("jobs_total");

    const identityBlob = req.headers.get(IDENTITY_HEADER);
    if (!identityBlob) {
      ctx.metrics.inc("jobs_denied");
      return reply(401, "Unauthorized", `Missing '${IDENTITY_HEADER}' header`);
    }

    let accountId: AccountId;
    try {
      accountId = decodeIdentity(identityBlob);
    } catch (error) {
      if (!(error instanceof MalformedIdentity)) throw error;
      ctx.metrics.inc("jobs_denied");
      return reply(400, "Bad Request", `Malformed '${IDENTITY_HEADER}' header`);
    }

    const body = await readBody(req);
    if (!body) {
      ctx.metrics.inc("jobs_denied");
      return reply(400, "Bad Request", "Request body must be a JSON object");
    }

    if (!ctx.dispatcher) {
      return reply(500, "Error", "No worker set");
    }

    if (accountId !== null) {
      try {
        if (await ctx.cache.processed(accountId)) {
          console.log(`Account ${accountId} processed before, skipping`);
          return reply(200, "OK", "Account processed before");
        }
      } catch (error) {
        console.error(`Processed check failed for account ${accountId}: ${describeError(error)}`);
        return reply(503, "Error", "Cache unavailable");
      }
    }

    const job: Job = {
      sourceRef: optionalString(body.url),
      sourceId: optionalString(body.payload_id) ?? uuidv4(),
      destination: ctx.settings.nextServiceUrl,
      identityBlob,
      accountId,
    };

    if (ctx.dispatcher.dispatch(job) === "rejected") {
      return reply(503, "Error", "Job queue full");
    }

    console.log(`${job.sourceId}: Job started for account ${accountId ?? "unknown"}`);
    ctx.metrics.inc("jobs_initiated");
    return reply(200, "OK", "Job initiated");
  };
}

export const config: RouteConfig = {
  path: `/v${API_VERSION}/collect`,
  method: ["POST"],
};
