import type { AppContext } from "../src/lib/app.js";
import { TransportExhausted } from "../src/lib/errors.js";
import { destinationUrl } from "../src/lib/forwarder.js";
import { reply, type Handler, type RouteConfig } from "../src/lib/http.js";
import { discardBody } from "../src/lib/transport.js";

async function pingNextService(ctx: AppContext): Promise<boolean> {
  const next = ctx.settings.nextServiceUrl;
  if (!next) return false;
  try {
    await discardBody(await ctx.transport.execute("GET", `${destinationUrl(next)}/ping`));
    return true;
  } catch (error) {
    if (!(error instanceof TransportExhausted)) throw error;
    console.warn(`Next service not available: ${error.message}`);
    return false;
  }
}

/**
 * GET /
 * Health of the collector: a worker must be configured and both the next
 * service and Redis must answer.
 */
export default function root(ctx: AppContext): Handler {
  return async () => {
    if (!ctx.worker) {
      return reply(500, "Error", "No worker set");
    }

    const operational = (await pingNextService(ctx)) && (await ctx.cache.ping());
    if (!operational) {
      return reply(500, "Error", "Required service not operational");
    }

    return reply(200, "OK", "Up and Running");
  };
}

export const config: RouteConfig = {
  path: "/",
  method: ["GET"],
};
