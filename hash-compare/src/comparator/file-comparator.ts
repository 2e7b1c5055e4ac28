import type { TreeFingerprint } from '../fingerprint/tree-fingerprint.js';
import { reconcile } from './reconciler.js';
import { groupPartitions } from './projector.js';
import type { ComparisonResult, ComparisonStats, Partitions, RunStatus } from './types.js';

/**
 * Reconciles two fingerprinted trees into a comparison result
 * @param tree1 - Fingerprint of the first root
 * @param tree2 - Fingerprint of the second root
 * @returns Frozen result with grouped partitions and collected errors
 */
export function compareFingerprints(tree1: TreeFingerprint, tree2: TreeFingerprint): ComparisonResult {
  const partitions = reconcile(tree1.table, tree2.table);
  const groups = groupPartitions(partitions, tree1.table, tree2.table);
  const failures = [...tree1.failures, ...tree2.failures];
  const traversalIssues = [...tree1.traversalIssues, ...tree2.traversalIssues];
  const status: RunStatus = failures.length > 0 || traversalIssues.length > 0 ? 'partial' : 'complete';

  return Object.freeze({
    dir1: tree1.root,
    dir2: tree2.root,
    ...groups,
    failures,
    traversalIssues,
    stats: getComparisonStats(tree1, tree2, partitions),
    status
  });
}

/**
 * Generates statistics from two fingerprinted trees and their partitions
 */
export function getComparisonStats(
  tree1: TreeFingerprint,
  tree2: TreeFingerprint,
  partitions: Partitions
): ComparisonStats {
  return {
    dir1Files: tree1.table.fileCount,
    dir2Files: tree2.table.fileCount,
    dir1Digests: tree1.table.digestCount,
    dir2Digests: tree2.table.digestCount,
    intersectionDigests: partitions.intersection.length,
    dir1OnlyDigests: partitions.dir1Only.length,
    dir2OnlyDigests: partitions.dir2Only.length,
    hashFailures: tree1.failures.length + tree2.failures.length,
    traversalIssues: tree1.traversalIssues.length + tree2.traversalIssues.length
  };
}
