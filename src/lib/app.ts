import type { Redis } from "ioredis";
import type { Settings } from "../config/settings.js";
import { JobDispatcher } from "./dispatcher.js";
import { EntityJoinEngine } from "./entity-join.js";
import { ForwardingSink } from "./forwarder.js";
import { CollectorMetrics } from "./metrics.js";
import { ProcessedCache, type CacheStore } from "./processed-cache.js";
import { createRedisClient, disconnectRedis } from "./redis.js";
import { TenantIterator } from "./tenants.js";
import { Transport, type FetchFn } from "./transport.js";
import { getWorker, type Worker, type WorkerContext } from "./workers/index.js";

export interface AppDependencies {
  /** Replaces the Redis connection */
  store?: CacheStore;
  /** Replaces the HTTP client used by the transport */
  fetch?: FetchFn;
  defaultMetrics?: boolean;
}

export interface AppContext {
  settings: Settings;
  cache: ProcessedCache;
  transport: Transport;
  metrics: CollectorMetrics;
  engine: EntityJoinEngine;
  tenants: TenantIterator;
  sink: ForwardingSink;
  worker: Worker | null;
  /** null when no worker is configured */
  dispatcher: JobDispatcher | null;
  close(): Promise<void>;
}

/**
 * Build every client the collector needs. The caller owns the result and
 * must `close()` it on shutdown.
 */
export function createApp(settings: Settings, deps: AppDependencies = {}): AppContext {
  let redis: Redis | null = null;
  let store: CacheStore;
  if (deps.store) {
    store = deps.store;
  } else {
    redis = createRedisClient(settings.redis);
    store = redis;
  }

  const metrics = new CollectorMetrics({ defaultMetrics: deps.defaultMetrics });
  const cache = new ProcessedCache(store, settings.processWindow);
  const transport = new Transport({
    maxRetries: settings.maxRetries,
    sslVerify: settings.sslVerify,
    timeoutMs: settings.httpTimeoutMs,
    fetch: deps.fetch,
  });
  const engine = new EntityJoinEngine({ transport, services: settings.services, metrics });
  const tenants = new TenantIterator({ engine, cache, allTenants: settings.allTenants });
  const sink = new ForwardingSink(transport, metrics);

  const worker = getWorker(settings.worker);
  const workerContext: WorkerContext = { transport, engine, tenants, sink, metrics, settings };
  const dispatcher = worker
    ? new JobDispatcher((job) => worker(job, workerContext), {
        concurrency: settings.maxConcurrentJobs,
        maxQueued: settings.maxQueuedJobs,
      })
    : null;

  return {
    settings,
    cache,
    transport,
    metrics,
    engine,
    tenants,
    sink,
    worker,
    dispatcher,
    async close() {
      await dispatcher?.drain();
      await transport.close();
      if (redis) await disconnectRedis(redis);
    },
  };
}
