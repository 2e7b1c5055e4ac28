import fs from 'node:fs/promises';
import { applyOverrides, loadConfig } from './config/config.js';
import type { ConfigOverrides, HashCompareConfig } from './config/types.js';
import { compareDirectories } from './comparator/compare-directories.js';
import type { ComparisonResult, RunStatus } from './comparator/types.js';
import { createHasher } from './hashing/hasher.js';
import { formatOutput } from './output/formatter.js';
import { logger } from './utils/logger.js';

export { compareDirectories } from './comparator/compare-directories.js';
export { fingerprintTree } from './fingerprint/tree-fingerprint.js';
export { FingerprintTable } from './fingerprint/fingerprint-table.js';
export { reconcile } from './comparator/reconciler.js';
export { projectIntersection, projectUnique } from './comparator/projector.js';
export { HashWorkerPool } from './pool/worker-pool.js';
export { walkFiles } from './scanner/traverser.js';
export { hashFile } from './hashing/hasher.js';
export { InvalidRootError, HashIoError } from './utils/errors.js';
export type * from './comparator/types.js';

export interface HashCompareOptions extends ConfigOverrides {
  dir1: string;
  dir2: string;
  configPath?: string;
  debug?: boolean;
}

/**
 * Main entry point: loads configuration, compares both roots and writes the report
 * @returns `partial` when some files or subtrees could not be read
 */
export async function hashCompare(options: HashCompareOptions): Promise<RunStatus> {
  try {
    if (options.debug) {
      logger.enableDebug();
    }

    const config = applyOverrides(await loadConfig(options.configPath), options);

    const result = await performComparison(options.dir1, options.dir2, config);

    await outputResults(result, config);

    if (result.status === 'partial') {
      logger.warn(
        `Comparison finished with ${result.stats.hashFailures} unreadable files and ${result.stats.traversalIssues} unreadable paths`
      );
    } else {
      logger.success('Comparison complete!');
    }
    return result.status;
  } catch (error) {
    logger.error('Comparison failed:', error instanceof Error ? error.message : error);
    throw error;
  }
}

/**
 * Performs the actual directory comparison
 */
async function performComparison(
  dir1: string,
  dir2: string,
  config: HashCompareConfig
): Promise<ComparisonResult> {
  logger.info(`Comparing '${dir1}' with '${dir2}'...`);

  const result = await compareDirectories(dir1, dir2, {
    walk: config.traversal,
    workers: config.workers ?? undefined,
    queueCapacity: config.queueCapacity,
    hash: createHasher({ algorithm: config.algorithm, chunkSizeBytes: config.chunkSizeBytes })
  });

  logger.info(
    `Hashed ${result.stats.dir1Files} + ${result.stats.dir2Files} files: ` +
      `${result.stats.intersectionDigests} shared, ${result.stats.dir1OnlyDigests} only in dir1, ${result.stats.dir2OnlyDigests} only in dir2`
  );

  return result;
}

/**
 * Outputs the comparison results
 */
async function outputResults(result: ComparisonResult, config: HashCompareConfig): Promise<void> {
  const { outputFile } = config.output;
  const output = formatOutput(result, config.output.format, {
    sections: config.output.sections,
    sort: config.output.sort,
    relative: config.output.relative,
    color: outputFile === null ? undefined : false
  });

  if (outputFile) {
    logger.info(`Writing results to: ${outputFile}`);
    await fs.writeFile(outputFile, output + '\n', 'utf-8');
  } else {
    console.log(output);
  }
}
