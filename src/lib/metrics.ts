import { Counter, Registry, collectDefaultMetrics } from "prom-client";

const COUNTERS = {
  jobs_total: "Total number of collect requests received",
  jobs_initiated: "Collect requests that started a job",
  jobs_denied: "Collect requests rejected at ingress",
  gets: "Collection downloads attempted",
  get_successes: "Collection downloads that succeeded",
  get_errors: "Collection downloads that failed",
  posts: "Forward attempts to the next service",
  post_successes: "Forwards accepted by the next service",
  post_errors: "Forwards dropped after exhausting retries",
} as const;

export type CounterName = keyof typeof COUNTERS;

/**
 * Process-wide collector counters, registered on their own registry so each
 * app instance (and each test) starts from zero.
 */
export class CollectorMetrics {
  readonly registry: Registry;
  private readonly counters: Record<CounterName, Counter<string>>;

  constructor(options: { defaultMetrics?: boolean; prefix?: string } = {}) {
    this.registry = new Registry();
    const prefix = options.prefix ?? "";

    const counter = (name: CounterName): Counter<string> =>
      new Counter({ name: `${prefix}${name}`, help: COUNTERS[name], registers: [this.registry] });

    this.counters = {
      jobs_total: counter("jobs_total"),
      jobs_initiated: counter("jobs_initiated"),
      jobs_denied: counter("jobs_denied"),
      gets: counter("gets"),
      get_successes: counter("get_successes"),
      get_errors: counter("get_errors"),
      posts: counter("posts"),
      post_successes: counter("post_successes"),
      post_errors: counter("post_errors"),
    };

    if (options.defaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix });
    }
  }

  inc(name: CounterName): void {
    this.counters[name].inc();
  }

  async value(name: CounterName): Promise<number> {
    const metric = await this.counters[name].get();
    return metric.values[0]?.value ?? 0;
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
