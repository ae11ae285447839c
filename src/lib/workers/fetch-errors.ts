import { TransportExhausted, UpstreamResponseError } from "../errors.js";

/**
 * Failures that abort a collection without being a bug:
 * the upstream was unreachable or answered something unusable.
 */
export function isFetchFailure(error: unknown): error is TransportExhausted | UpstreamResponseError {
  return error instanceof TransportExhausted || error instanceof UpstreamResponseError;
}
