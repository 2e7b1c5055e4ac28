import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { fingerprintTree } from './tree-fingerprint.js';

const isRoot = process.getuid?.() === 0;

describe('fingerprintTree', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hash-compare-tree-test-'));
    await fs.mkdir(path.join(tempDir, 'docs', 'old'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'a.txt'), 'alpha');
    await fs.writeFile(path.join(tempDir, 'b.txt'), 'beta');
    await fs.writeFile(path.join(tempDir, 'docs', 'a-copy.txt'), 'alpha');
    await fs.writeFile(path.join(tempDir, 'docs', 'old', 'c.txt'), 'gamma');
    for (let i = 0; i < 25; i++) {
      await fs.writeFile(path.join(tempDir, 'docs', `note-${i}.md`), `note ${i % 5}`);
    }
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should hash every discovered file', async () => {
    const tree = await fingerprintTree(tempDir, { workers: 3 });

    expect(tree.root).toBe(tempDir);
    expect(tree.filesDiscovered).toBe(29);
    expect(tree.table.fileCount).toBe(29);
    expect(tree.table.digestCount).toBe(8);
    expect(tree.failures).toEqual([]);
    expect(tree.traversalIssues).toEqual([]);

    const digest = tree.table.digestOf(path.join(tempDir, 'a.txt'));
    expect(digest).toBeDefined();
    expect(tree.table.paths(digest ?? '').sort()).toEqual([
      path.join(tempDir, 'a.txt'),
      path.join(tempDir, 'docs', 'a-copy.txt')
    ]);
  });

  it('should build the same table with one worker and with many', async () => {
    const single = await fingerprintTree(tempDir, { workers: 1 });
    const many = await fingerprintTree(tempDir, { workers: 8, queueCapacity: 2 });

    expect(many.table.toSortedEntries()).toEqual(single.table.toSortedEntries());
  });

  it('should respect skipHidden', async () => {
    await fs.writeFile(path.join(tempDir, '.secret'), 'hidden');
    await fs.mkdir(path.join(tempDir, '.cache'));
    await fs.writeFile(path.join(tempDir, '.cache', 'blob'), 'hidden too');

    const tree = await fingerprintTree(tempDir, { walk: { skipHidden: true } });

    expect(tree.table.fileCount).toBe(29);
  });

  it.skipIf(isRoot)('should record an unreadable file as a failure and hash the rest', async () => {
    const locked = path.join(tempDir, 'locked.bin');
    await fs.writeFile(locked, 'no access');
    await fs.chmod(locked, 0o000);

    try {
      const tree = await fingerprintTree(tempDir, { workers: 2 });

      expect(tree.filesDiscovered).toBe(30);
      expect(tree.table.fileCount).toBe(29);
      expect(tree.failures).toHaveLength(1);
      expect(tree.failures[0]).toMatchObject({ path: locked, kind: 'permission-denied' });
    } finally {
      await fs.chmod(locked, 0o644);
    }
  });
});
