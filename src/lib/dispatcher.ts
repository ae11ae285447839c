import pLimit from "p-limit";
import { describeError } from "./errors.js";
import type { Job } from "./types.js";

export type DispatchResult = "accepted" | "rejected";

export interface DispatcherOptions {
  /** Jobs running at the same time */
  concurrency: number;
  /** Accepted jobs allowed to wait for a free slot */
  maxQueued: number;
}

/**
 * Runs every accepted job in the background on a bounded pool.
 * `dispatch` never waits for the job; failures only show up in the logs.
 * When every slot and the backlog are taken the job is rejected.
 */
export class JobDispatcher {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly running = new Set<Promise<void>>();
  private inFlight = 0;

  constructor(
    private readonly run: (job: Job) => Promise<void>,
    private readonly options: DispatcherOptions,
  ) {
    this.limit = pLimit(options.concurrency);
  }

  get capacity(): number {
    return this.options.concurrency + this.options.maxQueued;
  }

  get size(): number {
    return this.inFlight;
  }

  dispatch(job: Job): DispatchResult {
    if (this.inFlight >= this.capacity) {
      console.warn(`${job.sourceId}: Job rejected, ${this.inFlight} jobs already in flight`);
      return "rejected";
    }

    this.inFlight++;
    const task: Promise<void> = this.limit(async () => {
      console.log(`${job.sourceId}: Worker started`);
      await this.run(job);
      console.log(`${job.sourceId}: Done`);
    })
      .catch((error: unknown) => {
        console.error(`${job.sourceId}: Job failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.inFlight--;
        this.running.delete(task);
      });

    this.running.add(task);
    return "accepted";
  }

  /** Resolves once every accepted job has finished */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }
}
