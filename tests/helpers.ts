import { createServer, type Server } from "node:http";
import { vi } from "vitest";
import { loadSettings, type Settings } from "../src/config/settings.js";
import type { CacheStore } from "../src/lib/processed-cache.js";
import type { FetchFn, FetchInit, HttpResponse } from "../src/lib/transport.js";

const responses = new WeakSet<object>();

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  const response: HttpResponse = {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
  responses.add(response);
  return response;
}

function isResponse(value: unknown): value is HttpResponse {
  return typeof value === "object" && value !== null && responses.has(value);
}

/**
 * Fetch stand-in answering from a table keyed by "METHOD url" or by url
 * alone. Values are JSON bodies or responses built with `jsonResponse`.
 * Unknown URLs answer 404; POSTs nobody listed answer 200.
 */
export function fetchStub(routes: Record<string, unknown> = {}) {
  return vi.fn<FetchFn>(async (url: string, init: FetchInit) => {
    const key = `${init.method} ${url}`;
    const value = key in routes ? routes[key] : routes[url];
    if (value === undefined) {
      return init.method === "POST" ? jsonResponse({}) : jsonResponse({ error: "not found" }, 404);
    }
    return isResponse(value) ? value : jsonResponse(value);
  });
}

/** Bodies POSTed through a fetch stub, parsed */
export function postedBodies(fetch: ReturnType<typeof fetchStub>): unknown[] {
  return fetch.mock.calls
    .filter(([, init]) => init.method === "POST")
    .map(([, init]) => JSON.parse(init.body ?? "null"));
}

export function getUrls(fetch: ReturnType<typeof fetchStub>): string[] {
  return fetch.mock.calls.filter(([, init]) => init.method === "GET").map(([url]) => url);
}

/**
 * In-memory Redis stand-in honouring SET ... EX expiry against Date.now(),
 * so fake timers can age entries.
 */
export class MemoryStore implements CacheStore {
  readonly entries = new Map<string, { value: string; expiresAt: number }>();
  failing = false;

  async set(key: string, value: string, _mode: "EX", seconds: number): Promise<unknown> {
    this.check();
    this.entries.set(key, { value, expiresAt: Date.now() + seconds * 1000 });
    return "OK";
  }

  async exists(key: string): Promise<number> {
    this.check();
    const entry = this.entries.get(key);
    if (!entry) return 0;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return 0;
    }
    return 1;
  }

  async ping(): Promise<string> {
    this.check();
    return "PONG";
  }

  private check(): void {
    if (this.failing) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
  }
}

export const TEST_ENV: NodeJS.ProcessEnv = {
  NEXT_SERVICE_URL: "next.test/ingest",
  WORKER: "topological",
  SOURCES_HOST: "http://sources.test",
  SOURCES_PATH: "api/sources",
  TOPOLOGICAL_INVENTORY_HOST: "http://topo.test",
  TOPOLOGICAL_INVENTORY_PATH: "api/v1",
  TOPOLOGICAL_INVENTORY_INTERNAL_HOST: "http://topo.test",
  TOPOLOGICAL_INVENTORY_INTERNAL_PATH: "internal",
  HOST_INVENTORY_HOST: "http://hosts.test",
  HOST_INVENTORY_PATH: "api/hosts?per_page=10",
  PROCESS_WINDOW: "60",
};

export function testSettings(env: NodeJS.ProcessEnv = {}): Settings {
  return loadSettings({ ...TEST_ENV, ...env });
}

/** base64 identity for an account, as a client would send it */
export function identityFor(accountId: number | string): string {
  return Buffer.from(JSON.stringify({ identity: { account_number: accountId } })).toString("base64");
}

/**
 * HTTP server on a loopback port answering with the queued statuses (200 once
 * they run out) and a large JSON body. Counts the TCP connections it accepts.
 */
export class LocalServer {
  connections = 0;
  requests = 0;
  readonly statuses: number[] = [];
  private readonly server: Server;
  private port = 0;

  constructor(private readonly bodySize = 512 * 1024) {
    this.server = createServer((_req, res) => {
      this.requests++;
      res.writeHead(this.statuses.shift() ?? 200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ padding: "x".repeat(this.bodySize) }));
    });
    this.server.on("connection", () => {
      this.connections++;
    });
  }

  get url(): string {
    return `http://127.0.0.1:${this.port}`;
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.server.listen(0, "127.0.0.1", resolve);
    });
    const address = this.server.address();
    if (address === null || typeof address === "string") throw new Error("server has no TCP address");
    this.port = address.port;
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
