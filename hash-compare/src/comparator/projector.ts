import type { FingerprintTable } from '../fingerprint/fingerprint-table.js';
import type { Digest } from '../hashing/hasher.js';
import type { DigestGroup, PathPair, Partitions, UniquePath } from './types.js';

/**
 * Groups each digest of a partition with its paths under both roots
 */
export function groupPartition(
  digests: readonly Digest[],
  table1: FingerprintTable,
  table2: FingerprintTable
): DigestGroup[] {
  return digests.map((digest) => ({
    digest,
    dir1: table1.paths(digest),
    dir2: table2.paths(digest)
  }));
}

export function groupPartitions(
  partitions: Partitions,
  table1: FingerprintTable,
  table2: FingerprintTable
): { intersection: DigestGroup[]; dir1Only: DigestGroup[]; dir2Only: DigestGroup[] } {
  return {
    intersection: groupPartition(partitions.intersection, table1, table2),
    dir1Only: groupPartition(partitions.dir1Only, table1, table2),
    dir2Only: groupPartition(partitions.dir2Only, table1, table2)
  };
}

/**
 * Expands shared digests into one record per pair of paths.
 * A digest with m paths under the first root and n under the second yields m * n pairs.
 */
export function projectIntersection(groups: readonly DigestGroup[]): PathPair[] {
  const pairs: PathPair[] = [];
  for (const group of groups) {
    for (const dir1Path of group.dir1) {
      for (const dir2Path of group.dir2) {
        pairs.push({ digest: group.digest, dir1Path, dir2Path });
      }
    }
  }
  return pairs;
}

/**
 * Expands one-sided digests into one record per path
 */
export function projectUnique(groups: readonly DigestGroup[], side: 'dir1' | 'dir2'): UniquePath[] {
  return groups.flatMap((group) => group[side].map((path) => ({ digest: group.digest, path })));
}
