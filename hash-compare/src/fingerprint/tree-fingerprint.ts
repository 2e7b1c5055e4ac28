import { walkFiles } from '../scanner/traverser.js';
import type { FileEntry, TraversalIssue, WalkOptions } from '../scanner/types.js';
import { HashWorkerPool } from '../pool/worker-pool.js';
import type { HashFn } from '../hashing/hasher.js';
import type { HashFailure } from '../pool/types.js';
import { buildFingerprintTable } from './table-builder.js';
import type { FingerprintTable } from './fingerprint-table.js';
import { logger } from '../utils/logger.js';

export interface TreeOptions {
  walk?: WalkOptions;
  workers?: number;
  queueCapacity?: number;
  hash?: HashFn;
}

/**
 * Everything learned about one root
 */
export interface TreeFingerprint {
  root: string;
  table: FingerprintTable;
  failures: HashFailure[];
  traversalIssues: TraversalIssue[];

  /** Regular files found by the traversal, hashed or not */
  filesDiscovered: number;
}

/**
 * Runs one root through traversal, the worker pool and the table builder
 * @param root - Absolute path of an already validated root
 */
export async function fingerprintTree(
  root: string,
  options: TreeOptions = {}
): Promise<TreeFingerprint> {
  const traversalIssues: TraversalIssue[] = [];
  let filesDiscovered = 0;

  async function* files(): AsyncGenerator<FileEntry> {
    for await (const event of walkFiles(root, options.walk)) {
      if (event.type === 'file') {
        filesDiscovered++;
        yield event.entry;
      } else {
        traversalIssues.push(event.issue);
      }
    }
  }

  logger.debug(`Scanning ${root}`);

  const pool = new HashWorkerPool({
    workers: options.workers,
    queueCapacity: options.queueCapacity,
    hash: options.hash,
    name: root
  });
  const run = pool.run(files());

  const [{ table, failures }] = await Promise.all([
    buildFingerprintTable(root, run.outcomes),
    run.finished
  ]);

  logger.debug(
    `Finished ${root}: ${table.fileCount} of ${filesDiscovered} files hashed into ${table.digestCount} digests, ${failures.length} failures`
  );

  return { root, table, failures, traversalIssues, filesDiscovered };
}
