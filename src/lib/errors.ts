/**
 * A descriptor or catalog entry cannot be resolved as configured.
 * Raised before any network call is made.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Every attempt of a single HTTP call failed.
 */
export class TransportExhausted extends Error {
  readonly method: string;
  readonly url: string;
  readonly attempts: number;

  constructor(method: string, url: string, attempts: number, lastFailure: string) {
    super(`${method} ${url} failed after ${attempts} attempts: ${lastFailure}`);
    this.name = "TransportExhausted";
    this.method = method;
    this.url = url;
    this.attempts = attempts;
  }
}

/**
 * An upstream page body does not follow the pagination contract.
 */
export class UpstreamResponseError extends Error {
  readonly url: string;

  constructor(url: string, detail: string) {
    super(`Unexpected response from ${url}: ${detail}`);
    this.name = "UpstreamResponseError";
    this.url = url;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
