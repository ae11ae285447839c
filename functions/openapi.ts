import type { AppContext } from "../src/lib/app.js";
import { API_VERSION, json, type Handler, type RouteConfig } from "../src/lib/http.js";

const statusResponse = {
  description: "Status message",
  content: { "application/json": { schema: { $ref: "#/components/schemas/Status" } } },
};

function buildSpec(routePrefix: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Inventory Collector",
      version: API_VERSION,
      description: "Collects inventory collections for an account and forwards them to the next service.",
    },
    servers: [{ url: routePrefix || "/" }],
    paths: {
      "/": {
        get: {
          summary: "Health check",
          responses: { "200": statusResponse, "500": statusResponse },
        },
      },
      [`/v${API_VERSION}/version`]: {
        get: {
          summary: "Service version",
          responses: { "200": statusResponse },
        },
      },
      [`/v${API_VERSION}/collect`]: {
        post: {
          summary: "Start a collection job",
          parameters: [
            {
              name: "x-rh-identity",
              in: "header",
              required: true,
              schema: { type: "string" },
              description: "base64 encoded identity JSON",
            },
          ],
          requestBody: {
            required: false,
            content: { "application/json": { schema: { $ref: "#/components/schemas/CollectRequest" } } },
          },
          responses: {
            "200": statusResponse,
            "400": statusResponse,
            "401": statusResponse,
            "503": statusResponse,
          },
        },
      },
    },
    components: {
      schemas: {
        Status: {
          type: "object",
          required: ["status", "version", "message"],
          properties: {
            status: { type: "string" },
            version: { type: "string" },
            message: { type: "string" },
          },
        },
        CollectRequest: {
          type: "object",
          properties: {
            url: { type: "string", description: "Source location (download worker)" },
            payload_id: { type: "string", description: "Job identifier, generated when missing" },
          },
        },
      },
    },
  };
}

/**
 * GET /v1.0/openapi.json
 */
export default function openapi(ctx: AppContext): Handler {
  const spec = buildSpec(ctx.settings.routePrefix);
  return async () => json(spec);
}

export const config: RouteConfig = {
  path: `/v${API_VERSION}/openapi.json`,
  method: ["GET"],
};
