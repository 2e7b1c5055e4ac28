import { describe, it, expect } from 'vitest';
import { reconcile } from './reconciler.js';
import { FingerprintTable } from '../fingerprint/fingerprint-table.js';

function tableOf(root: string, entries: Array<[string, string]>): FingerprintTable {
  const table = new FingerprintTable(root);
  for (const [digest, filePath] of entries) {
    table.add(digest, filePath);
  }
  return table;
}

describe('reconcile', () => {
  it('should split digests into intersection and one-sided partitions', () => {
    const t1 = tableOf('/a', [['x', '/a/1'], ['y', '/a/2'], ['w', '/a/3']]);
    const t2 = tableOf('/b', [['x', '/b/1'], ['z', '/b/2'], ['w', '/b/3']]);

    expect(reconcile(t1, t2)).toEqual({
      intersection: ['x', 'w'],
      dir1Only: ['y'],
      dir2Only: ['z']
    });
  });

  it('should handle an empty first table', () => {
    const t1 = tableOf('/a', []);
    const t2 = tableOf('/b', [['x', '/b/1'], ['y', '/b/2']]);

    expect(reconcile(t1, t2)).toEqual({ intersection: [], dir1Only: [], dir2Only: ['x', 'y'] });
  });

  it('should handle an empty second table', () => {
    const t1 = tableOf('/a', [['x', '/a/1']]);
    const t2 = tableOf('/b', []);

    expect(reconcile(t1, t2)).toEqual({ intersection: [], dir1Only: ['x'], dir2Only: [] });
  });

  it('should handle identical tables', () => {
    const t1 = tableOf('/a', [['x', '/a/1'], ['y', '/a/2']]);
    const t2 = tableOf('/b', [['y', '/b/2'], ['x', '/b/1']]);

    expect(reconcile(t1, t2)).toEqual({ intersection: ['x', 'y'], dir1Only: [], dir2Only: [] });
  });

  it('should count a digest once however many paths share it', () => {
    const t1 = tableOf('/a', [['x', '/a/1'], ['x', '/a/2']]);
    const t2 = tableOf('/b', [['x', '/b/1']]);

    expect(reconcile(t1, t2).intersection).toEqual(['x']);
  });

  it('should produce disjoint partitions covering every digest', () => {
    const t1 = tableOf('/a', Array.from({ length: 30 }, (_, i): [string, string] => [`d${i % 17}`, `/a/${i}`]));
    const t2 = tableOf('/b', Array.from({ length: 30 }, (_, i): [string, string] => [`d${(i * 7) % 23}`, `/b/${i}`]));

    const { intersection, dir1Only, dir2Only } = reconcile(t1, t2);
    const all = [...intersection, ...dir1Only, ...dir2Only];

    expect(new Set(all).size).toBe(all.length);
    expect(new Set(all)).toEqual(new Set([...t1.digests(), ...t2.digests()]));
  });
});
