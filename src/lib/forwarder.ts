import { TransportExhausted } from "./errors.js";
import type { CollectorMetrics } from "./metrics.js";
import { identityHeaders } from "./tenants.js";
import { discardBody, type Transport } from "./transport.js";
import type { ForwardEnvelope } from "./types.js";

export function destinationUrl(destination: string): string {
  return /^https?:\/\//.test(destination) ? destination : `http://${destination}`;
}

/**
 * Posts collected payloads to the next service. Delivery is best effort:
 * once the transport gives up the payload is dropped.
 */
export class ForwardingSink {
  constructor(
    private readonly transport: Transport,
    private readonly metrics: CollectorMetrics,
  ) {}

  async forward(destination: string, envelope: ForwardEnvelope, identityBlob?: string | null): Promise<boolean> {
    const url = destinationUrl(destination);
    this.metrics.inc("posts");

    try {
      const response = await this.transport.execute("POST", url, {
        headers: identityHeaders(identityBlob),
        body: envelope,
      });
      await discardBody(response);
    } catch (error) {
      if (!(error instanceof TransportExhausted)) throw error;
      console.error(`${envelope.id}: Failed to pass data to ${url}: ${error.message}`);
      this.metrics.inc("post_errors");
      return false;
    }

    this.metrics.inc("post_successes");
    return true;
  }
}
