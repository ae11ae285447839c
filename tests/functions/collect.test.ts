import { afterEach, describe, expect, it, vi } from "vitest";
import collect from "../../functions/collect.js";
import { createApp, type AppContext } from "../../src/lib/app.js";
import type { FetchFn, HttpResponse } from "../../src/lib/transport.js";
import { MemoryStore, fetchStub, identityFor, jsonResponse, postedBodies, testSettings } from "../helpers.js";

const COLLECT_URL = "http://localhost/v1.0/collect";

function post(body?: string, identity?: string): Request {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (identity) headers["x-rh-identity"] = identity;
  return new Request(COLLECT_URL, { method: "POST", headers, body });
}

describe("POST /v1.0/collect", () => {
  let ctx: AppContext;
  let store: MemoryStore;

  afterEach(async () => {
    await ctx.close();
  });

  function setup(
    env: NodeJS.ProcessEnv = {},
    fetch: FetchFn = fetchStub({ "http://topo.test/api/v1/volumes": [{ id: 1 }] }),
    cacheStore: MemoryStore = new MemoryStore(),
  ) {
    store = cacheStore;
    ctx = createApp(testSettings({ APP_CONFIG: "volumes", ...env }), { store, fetch });
    return collect(ctx);
  }

  it("requires an identity", async () => {
    const handler = setup();

    const res = await handler(post("{}"));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      status: "Unauthorized",
      version: "1.0",
      message: "Missing 'x-rh-identity' header",
    });
    expect(await ctx.metrics.value("jobs_total")).toBe(1);
    expect(await ctx.metrics.value("jobs_denied")).toBe(1);
  });

  it("rejects a malformed identity", async () => {
    const handler = setup();

    const res = await handler(post("{}", "garbage"));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ message: "Malformed 'x-rh-identity' header" });
    expect(await ctx.metrics.value("jobs_denied")).toBe(1);
  });

  it.each(["[1]", "{not json"])("rejects the body %s", async (body) => {
    const handler = setup();

    const res = await handler(post(body, identityFor(7)));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ message: "Request body must be a JSON object" });
  });

  it("refuses jobs when no worker is configured", async () => {
    const handler = setup({ WORKER: "" });

    const res = await handler(post("{}", identityFor(7)));

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ status: "Error", message: "No worker set" });
  });

  it("skips an account processed within the window", async () => {
    const handler = setup();
    await ctx.cache.markProcessed(7);

    const res = await handler(post("{}", identityFor(7)));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "OK", version: "1.0", message: "Account processed before" });
    expect(ctx.dispatcher?.size).toBe(0);
    expect(await ctx.metrics.value("jobs_initiated")).toBe(0);
  });

  it("answers 503 when the cache is unreachable", async () => {
    const handler = setup();
    store.failing = true;

    const res = await handler(post("{}", identityFor(7)));

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ message: "Cache unavailable" });
  });

  it("starts a job and forwards its payload", async () => {
    const fetch = fetchStub({ "http://topo.test/api/v1/volumes": [{ id: 1 }] });
    const handler = setup({}, fetch);

    const res = await handler(post(JSON.stringify({ payload_id: "abc" }), identityFor(7)));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "OK", version: "1.0", message: "Job initiated" });
    expect(await ctx.metrics.value("jobs_initiated")).toBe(1);

    await ctx.dispatcher?.drain();
    expect(postedBodies(fetch)).toEqual([{ id: "abc", data: { volumes: [{ id: 1 }] } }]);
    expect(await ctx.cache.processed(7)).toBe(true);
  });

  it("names a job without a payload id", async () => {
    const fetch = fetchStub({ "http://topo.test/api/v1/volumes": [{ id: 1 }] });
    const handler = setup({}, fetch);

    await handler(post(undefined, identityFor(7)));
    await ctx.dispatcher?.drain();

    const [body] = postedBodies(fetch);
    expect(body).toMatchObject({ id: expect.stringMatching(/^[0-9a-f-]{36}$/) });
  });

  it("answers 503 while the job queue is full", async () => {
    let release: (response: HttpResponse) => void = () => {};
    const pending = new Promise<HttpResponse>((resolve) => {
      release = resolve;
    });
    const fetch = vi.fn<FetchFn>(() => pending);
    const handler = setup({ MAX_CONCURRENT_JOBS: "1", MAX_QUEUED_JOBS: "0" }, fetch);

    expect((await handler(post("{}", identityFor(7)))).status).toBe(200);
    const res = await handler(post("{}", identityFor(8)));

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ message: "Job queue full" });
    expect(await ctx.metrics.value("jobs_initiated")).toBe(1);

    release(jsonResponse([]));
  });

  // Deduplication is best effort: both checks run before either job marks the account.
  it("dispatches both of two concurrent requests for one account", async () => {
    let open: () => void = () => {};
    const bothChecked = new Promise<void>((resolve) => {
      open = resolve;
    });
    class RacingStore extends MemoryStore {
      private checks = 0;

      async exists(key: string): Promise<number> {
        if (++this.checks === 2) open();
        await bothChecked;
        return super.exists(key);
      }
    }
    const fetch = fetchStub({ "http://topo.test/api/v1/volumes": [{ id: 1 }] });
    const handler = setup({}, fetch, new RacingStore());

    const responses = await Promise.all([
      handler(post(JSON.stringify({ payload_id: "first" }), identityFor(7))),
      handler(post(JSON.stringify({ payload_id: "second" }), identityFor(7))),
    ]);
    await ctx.dispatcher?.drain();

    expect(responses.map((res) => res.status)).toEqual([200, 200]);
    expect(await ctx.metrics.value("jobs_initiated")).toBe(2);
    expect(postedBodies(fetch)).toHaveLength(2);
  });
});
