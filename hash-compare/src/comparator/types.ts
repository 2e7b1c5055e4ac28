import type { Digest } from '../hashing/hasher.js';
import type { HashFailure } from '../pool/types.js';
import type { TraversalIssue } from '../scanner/types.js';

/**
 * Digests of both tables split into three disjoint sets
 */
export interface Partitions {
  /** Digests present under both roots */
  intersection: Digest[];

  /** Digests present only under the first root */
  dir1Only: Digest[];

  /** Digests present only under the second root */
  dir2Only: Digest[];
}

/**
 * One digest with the paths producing it under each root
 */
export interface DigestGroup {
  readonly digest: Digest;
  readonly dir1: readonly string[];
  readonly dir2: readonly string[];
}

/** Two files, one per root, with the same content */
export interface PathPair {
  readonly digest: Digest;
  readonly dir1Path: string;
  readonly dir2Path: string;
}

/** A file whose content exists under one root only */
export interface UniquePath {
  readonly digest: Digest;
  readonly path: string;
}

export type RunStatus = 'complete' | 'partial';

/**
 * Statistics about the comparison
 */
export interface ComparisonStats {
  dir1Files: number;
  dir2Files: number;
  dir1Digests: number;
  dir2Digests: number;
  intersectionDigests: number;
  dir1OnlyDigests: number;
  dir2OnlyDigests: number;
  hashFailures: number;
  traversalIssues: number;
}

/**
 * Outcome of comparing two roots
 */
export interface ComparisonResult {
  readonly dir1: string;
  readonly dir2: string;
  readonly intersection: readonly DigestGroup[];
  readonly dir1Only: readonly DigestGroup[];
  readonly dir2Only: readonly DigestGroup[];
  readonly failures: readonly HashFailure[];
  readonly traversalIssues: readonly TraversalIssue[];
  readonly stats: ComparisonStats;

  /** `partial` when any file or subtree could not be read */
  readonly status: RunStatus;
}
