import { Agent, fetch as undiciFetch } from "undici";
import type { Dispatcher } from "undici";
import { TransportExhausted, describeError } from "./errors.js";

export type HttpMethod = "GET" | "POST";

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

/** Read and drop a response body so its connection goes back to the pool */
export async function discardBody(response: HttpResponse): Promise<void> {
  try {
    await response.text();
  } catch (error) {
    console.warn(`Could not read response body: ${describeError(error)}`);
  }
}

export type FetchFn = (url: string, init: FetchInit) => Promise<HttpResponse>;

export interface TransportOptions {
  /** Attempts per call, including the first one */
  maxRetries: number;
  sslVerify: boolean;
  timeoutMs?: number;
  fetch?: FetchFn;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Serialized as JSON */
  body?: unknown;
}

/**
 * Retrying HTTP client shared by every collector and the forwarder.
 * A call fails on connection errors, timeouts and non-2xx statuses and is
 * retried immediately until the budget is spent.
 */
export class Transport {
  readonly maxRetries: number;
  readonly sslVerify: boolean;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly dispatcher: Agent;

  constructor(options: TransportOptions) {
    this.maxRetries = options.maxRetries;
    this.sslVerify = options.sslVerify;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchFn = options.fetch ?? undiciFetch;
    this.dispatcher = new Agent({ connect: { rejectUnauthorized: options.sslVerify } });
  }

  async execute(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const headers: Record<string, string> = { Accept: "application/json", ...options.headers };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    let lastFailure = "";
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.fetchFn(url, {
          method,
          headers,
          body,
          dispatcher: this.dispatcher,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (response.ok) return response;
        lastFailure = `HTTP ${response.status}`;
        await discardBody(response);
      } catch (error) {
        lastFailure = describeError(error);
      }
      console.warn(`${method} ${url} failed (attempt ${attempt}/${this.maxRetries}): ${lastFailure}`);
    }

    throw new TransportExhausted(method, url, this.maxRetries, lastFailure);
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
