import type { Digest } from '../hashing/hasher.js';
import type { HashFailureKind } from '../utils/errors.js';

/**
 * A file that could not be hashed
 */
export interface HashFailure {
  path: string;
  kind: HashFailureKind;
  message: string;
}

/**
 * Exactly one outcome is produced for every entry submitted to the pool
 */
export type HashOutcome =
  | { status: 'success'; path: string; digest: Digest }
  | ({ status: 'failure' } & HashFailure);

export interface PoolStats {
  workerCount: number;

  /** Files handled by each worker, indexed by worker id */
  processedPerWorker: number[];
}

export interface PoolRun {
  /** Completion channel. Closes once every worker has exited. */
  outcomes: AsyncIterable<HashOutcome>;

  /** Settles when feeding has finished and all workers have joined */
  finished: Promise<PoolStats>;
}
