import { API_VERSION, reply, type Handler, type RouteConfig } from "../src/lib/http.js";

/**
 * GET /v1.0/version
 */
export default function version(): Handler {
  return async () => reply(200, "OK", `Inventory Collector Version v${API_VERSION}`);
}

export const config: RouteConfig = {
  path: `/v${API_VERSION}/version`,
  method: ["GET"],
};
