/**
 * One background task computing recursive directory sizes.
 *
 * The controller and the task share nothing but two bounded channels:
 *
 *   request (capacity 100)  controller ──path──────────▶ task
 *   result  (capacity 100)  controller ◀──{path,bytes}── task
 *
 * The controller side never waits: request() drops silently when the
 * request channel is full, drain() takes whatever results are ready. The
 * task handles one directory at a time and keeps running until close().
 * There is no cancellation; a late result is still delivered.
 */

import type { SizeEntry } from "../types";
import { errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";
import { Channel } from "./channel";
import { computeDirSize } from "./computeDirSize";

const log = getLogger("size-worker");

export const QUEUE_CAPACITY = 100;

// ─── Types ──────────────────────────────────────────────────────────────────

export interface SizeResult {
  readonly path: string;
  readonly bytes: number;
}

/** Controller-facing side of a size worker */
export interface SizeService {
  /** Try to enqueue a computation; false when it was dropped. */
  request(path: string): boolean;
  /** Move every available result into `cache`; returns how many arrived. */
  drain(cache: Map<string, SizeEntry>): number;
  /** Stop accepting requests; queued ones still run. */
  close(): void;
}

export interface SizeWorkerOptions {
  capacity?: number;
  compute?: (path: string) => Promise<number>;
}

// ─── Worker ─────────────────────────────────────────────────────────────────

export class SizeWorker implements SizeService {
  private readonly requests: Channel<string>;
  private readonly results: Channel<SizeResult>;
  private readonly compute: (path: string) => Promise<number>;

  /** Settles once the task has exited after close(). */
  readonly done: Promise<void>;

  constructor(options: SizeWorkerOptions = {}) {
    const capacity = options.capacity ?? QUEUE_CAPACITY;
    this.requests = new Channel<string>(capacity);
    this.results = new Channel<SizeResult>(capacity);
    this.compute = options.compute ?? computeDirSize;
    this.done = this.run().catch((err: unknown) => {
      log.error("size task stopped unexpectedly", { reason: errorMessage(err) });
    });
  }

  request(path: string): boolean {
    const accepted = this.requests.trySend(path);
    if (!accepted) {
      log.debug("size request dropped", { path });
    }
    return accepted;
  }

  drain(cache: Map<string, SizeEntry>): number {
    let count = 0;
    for (let result = this.results.tryReceive(); result !== undefined; result = this.results.tryReceive()) {
      cache.set(result.path, { status: "resolved", bytes: result.bytes });
      count += 1;
    }
    return count;
  }

  close(): void {
    this.requests.close();
  }

  /** Close, then wait for the queued requests to finish. */
  async shutdown(): Promise<void> {
    this.close();
    await this.done;
  }

  private async run(): Promise<void> {
    for (let path = await this.requests.receive(); path !== undefined; path = await this.requests.receive()) {
      let bytes: number;
      try {
        bytes = await this.compute(path);
      } catch (err) {
        log.warn("size computation failed", { path, reason: errorMessage(err) });
        bytes = 0;
      }
      await this.results.send({ path, bytes });
    }
  }
}
