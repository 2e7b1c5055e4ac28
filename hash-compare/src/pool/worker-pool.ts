import os from 'node:os';
import { Channel } from './channel.js';
import { hashFile } from '../hashing/hasher.js';
import type { HashFn } from '../hashing/hasher.js';
import type { FileEntry } from '../scanner/types.js';
import type { HashOutcome, PoolRun, PoolStats } from './types.js';
import { HashIoError, classifyIoError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_QUEUE_CAPACITY = 1024;

export interface WorkerPoolOptions {
  /** Number of concurrent hashing workers (default: available parallelism) */
  workers?: number;

  /** Maximum entries waiting in the work queue before the feeder blocks */
  queueCapacity?: number;

  /** Hash function applied to each entry */
  hash?: HashFn;

  /** Label used in debug logs */
  name?: string;
}

/**
 * Fixed-size pool of hashing workers draining a shared work queue.
 *
 * Entries are fed into the queue as the source produces them, so traversal
 * and hashing overlap. Every entry yields exactly one outcome on the
 * completion channel, in completion order. A file that fails to hash
 * becomes a `failure` outcome and the pool carries on.
 */
export class HashWorkerPool {
  readonly workerCount: number;
  private readonly queueCapacity: number;
  private readonly hash: HashFn;
  private readonly name: string;

  constructor(options: WorkerPoolOptions = {}) {
    this.workerCount = options.workers ?? os.availableParallelism();
    this.queueCapacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    this.hash = options.hash ?? ((filePath) => hashFile(filePath));
    this.name = options.name ?? 'pool';

    if (!Number.isInteger(this.workerCount) || this.workerCount < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${this.workerCount}`);
    }
  }

  /**
   * Starts the workers and begins feeding them from `entries`
   * @param entries - Lazily produced file entries
   * @returns The completion channel and a promise that settles when all workers have joined
   */
  run(entries: AsyncIterable<FileEntry>): PoolRun {
    const workQueue = new Channel<FileEntry>(this.queueCapacity);
    const completions = new Channel<HashOutcome>();

    logger.debug(`[${this.name}] starting ${this.workerCount} workers`);

    const workers = Array.from({ length: this.workerCount }, (_, id) =>
      this.work(id, workQueue, completions)
    );
    const feeder = this.feed(entries, workQueue);

    const finished = Promise.all([feeder, ...workers]).then(
      ([, ...processedPerWorker]): PoolStats => {
        completions.close();
        logger.debug(`[${this.name}] all workers joined (${processedPerWorker.join('/')} files)`);
        return { workerCount: this.workerCount, processedPerWorker };
      },
      (error: unknown) => {
        workQueue.close();
        completions.close(error);
        throw error;
      }
    );

    return { outcomes: completions, finished };
  }

  private async feed(entries: AsyncIterable<FileEntry>, queue: Channel<FileEntry>): Promise<void> {
    try {
      for await (const entry of entries) {
        await queue.send(entry);
      }
    } finally {
      queue.close();
    }
  }

  private async work(
    id: number,
    queue: Channel<FileEntry>,
    completions: Channel<HashOutcome>
  ): Promise<number> {
    let processed = 0;
    for await (const entry of queue) {
      await completions.send(await this.hashEntry(entry));
      processed++;
    }
    logger.debug(`[${this.name}] worker ${id} exiting after ${processed} files`);
    return processed;
  }

  private async hashEntry(entry: FileEntry): Promise<HashOutcome> {
    try {
      const digest = await this.hash(entry.path);
      return { status: 'success', path: entry.path, digest };
    } catch (error) {
      const kind = error instanceof HashIoError ? error.kind : classifyIoError(error);
      return { status: 'failure', path: entry.path, kind, message: errorMessage(error) };
    }
  }
}
