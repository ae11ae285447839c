import type { AppContext } from "./app.js";

export const API_VERSION = "1.0";

export type Handler = (req: Request) => Promise<Response>;

export interface RouteConfig {
  path: string;
  method: Array<"GET" | "POST">;
  /** Mount under the deployment's route prefix (default true) */
  prefixed?: boolean;
}

export interface RouteModule {
  config: RouteConfig;
  create: (ctx: AppContext) => Handler;
}

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Standard `{ status, version, message }` body */
export function reply(code: number, status: string, message: string): Response {
  return json({ status, version: API_VERSION, message }, code);
}
