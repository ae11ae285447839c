import { fastify, type FastifyInstance, type FastifyRequest } from "fastify";
import { routes as defaultRoutes } from "../functions/index.js";
import type { AppContext } from "./lib/app.js";
import { API_VERSION, type RouteModule } from "./lib/http.js";

function toWebRequest(request: FastifyRequest): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(request.headers)) {
    if (Array.isArray(value)) value.forEach((v) => headers.append(name, v));
    else if (value !== undefined) headers.set(name, value);
  }

  const hasBody = request.method !== "GET" && request.method !== "HEAD";
  const body = hasBody && typeof request.body === "string" ? request.body : undefined;

  return new Request(`http://${request.hostname || "localhost"}${request.url}`, {
    method: request.method,
    headers,
    body,
  });
}

/**
 * Mount the route modules on a Fastify instance. Bodies reach the handlers
 * unparsed; each handler reads its own.
 */
export function createServer(ctx: AppContext, routes: RouteModule[] = defaultRoutes): FastifyInstance {
  const server = fastify({
    logger: process.env.NODE_ENV === "development",
    ignoreTrailingSlash: true,
  });

  server.removeAllContentTypeParsers();
  server.addContentTypeParser("*", { parseAs: "string" }, (_req, body, done) => {
    done(null, body);
  });

  for (const { config, create } of routes) {
    const handler = create(ctx);
    const url = config.prefixed === false ? config.path : `${ctx.settings.routePrefix}${config.path}`;

    server.route({
      method: config.method,
      url,
      handler: async (request, fastifyReply) => {
        const response = await handler(toWebRequest(request));
        fastifyReply.code(response.status);
        response.headers.forEach((value, name) => {
          fastifyReply.header(name, value);
        });
        return fastifyReply.send(await response.text());
      },
    });
  }

  server.setErrorHandler((error, request, fastifyReply) => {
    console.error(`${request.method} ${request.url} failed:`, error);
    return fastifyReply.code(500).send({
      status: "Error",
      version: API_VERSION,
      message: error.message || "Internal server error",
    });
  });

  return server;
}
