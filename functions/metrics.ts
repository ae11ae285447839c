import type { AppContext } from "../src/lib/app.js";
import type { Handler, RouteConfig } from "../src/lib/http.js";

/**
 * GET /metrics
 * Prometheus exposition of the collector counters.
 */
export default function metrics(ctx: AppContext): Handler {
  return async () =>
    new Response(await ctx.metrics.render(), {
      status: 200,
      headers: { "Content-Type": ctx.metrics.contentType },
    });
}

export const config: RouteConfig = {
  path: "/metrics",
  method: ["GET"],
  prefixed: false,
};
