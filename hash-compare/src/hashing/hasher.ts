import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { HashIoError, classifyIoError } from '../utils/errors.js';

/** Hex-encoded content digest */
export type Digest = string;

/** Digest algorithms with a 256-bit output */
export type DigestAlgorithm = 'sha256' | 'sha3-256';

export const DIGEST_ALGORITHMS: readonly DigestAlgorithm[] = ['sha256', 'sha3-256'];

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface HashOptions {
  algorithm?: DigestAlgorithm;
  chunkSizeBytes?: number;
}

export type HashFn = (filePath: string) => Promise<Digest>;

/**
 * Computes the digest of a file's full content, streaming it in fixed-size chunks
 * @param filePath - File to hash
 * @param options - Algorithm and chunk size
 * @returns Hex digest
 * @throws HashIoError if the file cannot be opened or a read fails
 */
export async function hashFile(filePath: string, options: HashOptions = {}): Promise<Digest> {
  const hash = createHash(options.algorithm ?? 'sha256');
  const stream = createReadStream(filePath, {
    highWaterMark: options.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE
  });

  try {
    for await (const chunk of stream) {
      hash.update(chunk);
    }
  } catch (error) {
    stream.destroy();
    throw new HashIoError(filePath, classifyIoError(error), { cause: error });
  }

  return hash.digest('hex');
}

/**
 * Binds hash options into a single-argument hash function for the worker pool
 */
export function createHasher(options: HashOptions = {}): HashFn {
  return (filePath) => hashFile(filePath, options);
}
