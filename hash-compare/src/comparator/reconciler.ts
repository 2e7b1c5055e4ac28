import type { FingerprintTable } from '../fingerprint/fingerprint-table.js';
import type { Partitions } from './types.js';

/**
 * Splits the digests of two completed tables into intersection and
 * one-sided partitions. Digests keep each table's insertion order.
 */
export function reconcile(table1: FingerprintTable, table2: FingerprintTable): Partitions {
  const intersection: string[] = [];
  const dir1Only: string[] = [];
  const dir2Only: string[] = [];

  for (const digest of table1.digests()) {
    if (table2.has(digest)) {
      intersection.push(digest);
    } else {
      dir1Only.push(digest);
    }
  }

  for (const digest of table2.digests()) {
    if (!table1.has(digest)) {
      dir2Only.push(digest);
    }
  }

  return { intersection, dir1Only, dir2Only };
}
