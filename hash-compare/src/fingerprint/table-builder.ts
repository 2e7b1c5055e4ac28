import { FingerprintTable } from './fingerprint-table.js';
import type { HashFailure, HashOutcome } from '../pool/types.js';
import { logger } from '../utils/logger.js';

export interface BuiltTable {
  table: FingerprintTable;
  failures: HashFailure[];
}

/**
 * Drains a completion channel into a fingerprint table.
 *
 * Successes are inserted by digest; failures are collected for the report.
 * Only this function touches the table while it is being built.
 */
export async function buildFingerprintTable(
  root: string,
  outcomes: AsyncIterable<HashOutcome>
): Promise<BuiltTable> {
  const table = new FingerprintTable(root);
  const failures: HashFailure[] = [];

  for await (const outcome of outcomes) {
    if (outcome.status === 'success') {
      table.add(outcome.digest, outcome.path);
    } else {
      logger.warn(`Could not hash ${outcome.path} (${outcome.kind})`);
      failures.push({ path: outcome.path, kind: outcome.kind, message: outcome.message });
    }
  }

  return { table, failures };
}
