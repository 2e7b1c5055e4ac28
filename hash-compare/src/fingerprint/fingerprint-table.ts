import type { Digest } from '../hashing/hasher.js';

/**
 * Digest to path-set mapping for one root.
 *
 * A path is recorded under at most one digest, and a digest is only
 * present once a path has been added for it.
 */
export class FingerprintTable {
  private readonly byDigest = new Map<Digest, Set<string>>();
  private readonly byPath = new Map<string, Digest>();

  constructor(readonly root: string) {}

  /**
   * Records that `filePath` has content `digest`
   * @throws Error if the path was already recorded with a different digest
   */
  add(digest: Digest, filePath: string): void {
    const existing = this.byPath.get(filePath);
    if (existing !== undefined) {
      if (existing !== digest) {
        throw new Error(`Path ${filePath} already recorded with digest ${existing}`);
      }
      return;
    }

    this.byPath.set(filePath, digest);
    const paths = this.byDigest.get(digest);
    if (paths) {
      paths.add(filePath);
    } else {
      this.byDigest.set(digest, new Set([filePath]));
    }
  }

  has(digest: Digest): boolean {
    return this.byDigest.has(digest);
  }

  /** Paths sharing a digest, in insertion order. Empty for an unknown digest. */
  paths(digest: Digest): string[] {
    return [...(this.byDigest.get(digest) ?? [])];
  }

  digestOf(filePath: string): Digest | undefined {
    return this.byPath.get(filePath);
  }

  /** Digests in insertion order */
  digests(): Digest[] {
    return [...this.byDigest.keys()];
  }

  get digestCount(): number {
    return this.byDigest.size;
  }

  get fileCount(): number {
    return this.byPath.size;
  }

  /**
   * Entries sorted by digest with sorted path lists, independent of the
   * order in which paths were added
   */
  toSortedEntries(): Array<[Digest, string[]]> {
    return this.digests()
      .sort()
      .map((digest) => [digest, this.paths(digest).sort()]);
  }
}
