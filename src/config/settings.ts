import type { ServiceLocation } from "../lib/types.js";
import type { ServiceSelector } from "./services.js";

export type WorkerName = "download" | "topological" | "host_inventory";

export interface Settings {
  port: number;
  appName: string;
  /** "" or "/{PATH_PREFIX}/{APP_NAME}" */
  routePrefix: string;
  nextServiceUrl: string;
  worker: WorkerName | null;
  redis: { host: string; port: number; password: string };
  /** Seconds an account stays marked as processed */
  processWindow: number;
  maxRetries: number;
  httpTimeoutMs: number;
  sslVerify: boolean;
  allTenants: boolean;
  /** Active catalog entries, in collection order */
  activeEntities: string[] | null;
  services: Record<ServiceSelector, ServiceLocation>;
  hostInventory: ServiceLocation;
  maxConcurrentJobs: number;
  maxQueuedJobs: number;
}

const WORKERS: readonly WorkerName[] = ["download", "topological", "host_inventory"];

function int(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function bool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function list(raw: string | undefined): string[] | null {
  if (!raw) return null;
  const entries = raw.split(",").map((s) => s.trim()).filter(Boolean);
  return entries.length > 0 ? entries : null;
}

function location(env: NodeJS.ProcessEnv, prefix: string): ServiceLocation {
  return {
    host: env[`${prefix}_HOST`] || "",
    path: env[`${prefix}_PATH`] || "",
  };
}

function parseWorker(raw: string | undefined): WorkerName | null {
  const name = (raw || "").trim().toLowerCase();
  return WORKERS.find((w) => w === name) ?? null;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const appName = env.APP_NAME || "";
  const pathPrefix = env.PATH_PREFIX || "";

  return {
    port: int(env.PORT, 8004),
    appName,
    routePrefix: pathPrefix ? `/${pathPrefix}/${appName}` : "",
    nextServiceUrl: env.NEXT_SERVICE_URL || "",
    worker: parseWorker(env.WORKER),
    redis: {
      host: env.REDIS_HOST || "localhost",
      port: int(env.REDIS_PORT, 6379),
      password: env.REDIS_PASSWORD || "",
    },
    processWindow: Math.max(1, int(env.PROCESS_WINDOW, 3600)),
    // at least one retry after the first attempt
    maxRetries: Math.max(2, int(env.MAX_RETRIES, 3)),
    httpTimeoutMs: int(env.HTTP_TIMEOUT_MS, 15000),
    sslVerify: bool(env.SSL_VERIFY, true),
    allTenants: bool(env.ALL_TENANTS, false),
    activeEntities: list(env.APP_CONFIG),
    services: {
      SOURCES: location(env, "SOURCES"),
      TOPOLOGICAL: location(env, "TOPOLOGICAL_INVENTORY"),
      TOPOLOGICAL_INTERNAL: location(env, "TOPOLOGICAL_INVENTORY_INTERNAL"),
    },
    hostInventory: location(env, "HOST_INVENTORY"),
    maxConcurrentJobs: Math.max(1, int(env.MAX_CONCURRENT_JOBS, 10)),
    maxQueuedJobs: Math.max(0, int(env.MAX_QUEUED_JOBS, 100)),
  };
}
