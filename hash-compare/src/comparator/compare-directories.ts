import { fingerprintTree } from '../fingerprint/tree-fingerprint.js';
import type { TreeOptions } from '../fingerprint/tree-fingerprint.js';
import { validateRoot } from '../utils/fs-utils.js';
import { compareFingerprints } from './file-comparator.js';
import type { ComparisonResult } from './types.js';

/**
 * Compares two directory trees by content.
 *
 * Both roots are validated before anything is traversed. The two pipelines
 * run concurrently and reconciliation starts only after both have drained.
 *
 * @throws InvalidRootError if either root is not a readable directory
 */
export async function compareDirectories(
  dir1: string,
  dir2: string,
  options: TreeOptions = {}
): Promise<ComparisonResult> {
  const [root1, root2] = await Promise.all([validateRoot(dir1), validateRoot(dir2)]);

  const [tree1, tree2] = await Promise.all([
    fingerprintTree(root1, options),
    fingerprintTree(root2, options)
  ]);

  return compareFingerprints(tree1, tree2);
}
