/**
 * Minimal slice of the Redis client used for deduplication.
 * ioredis' `Redis` satisfies it.
 */
export interface CacheStore {
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  exists(key: string): Promise<number>;
  ping(): Promise<string>;
}

const key = (accountId: number | string) => `processed:${accountId}`;

/**
 * Remembers which accounts were forwarded recently. Entries expire on their
 * own after the process window; there is no explicit invalidation.
 *
 * Deduplication is best effort: `processed` and `markProcessed` are separate
 * commands, so two concurrent jobs for one account can both see "not
 * processed".
 */
export class ProcessedCache {
  constructor(
    private readonly store: CacheStore,
    readonly windowSeconds: number,
  ) {}

  async processed(accountId: number | string): Promise<boolean> {
    return (await this.store.exists(key(accountId))) > 0;
  }

  async markProcessed(accountId: number | string): Promise<void> {
    await this.store.set(key(accountId), "1", "EX", this.windowSeconds);
  }

  /** Health probe; never throws */
  async ping(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (error) {
      console.warn("Redis not available:", error);
      return false;
    }
  }
}
