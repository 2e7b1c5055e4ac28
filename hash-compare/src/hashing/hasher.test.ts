import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { hashFile, createHasher } from './hasher.js';
import { HashIoError } from '../utils/errors.js';

const SHA256_ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const SHA256_EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const SHA3_256_ABC = '3a985da74fe225b2045c172d6bd390bd855f086e3e9d525b46bfe24511431532';

describe('hashFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hash-compare-hasher-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should compute the sha256 digest of a file', async () => {
    const filePath = path.join(tempDir, 'abc.txt');
    await fs.writeFile(filePath, 'abc');

    expect(await hashFile(filePath)).toBe(SHA256_ABC);
  });

  it('should hash an empty file', async () => {
    const filePath = path.join(tempDir, 'empty');
    await fs.writeFile(filePath, '');

    expect(await hashFile(filePath)).toBe(SHA256_EMPTY);
  });

  it('should give the same digest whatever the chunk size', async () => {
    const filePath = path.join(tempDir, 'large.bin');
    const content = Buffer.alloc(300 * 1024);
    for (let i = 0; i < content.length; i++) {
      content[i] = (i * 31) % 251;
    }
    await fs.writeFile(filePath, content);

    const small = await hashFile(filePath, { chunkSizeBytes: 7 * 1024 });
    const large = await hashFile(filePath, { chunkSizeBytes: 1024 * 1024 });

    expect(small).toBe(large);
    expect(small).toHaveLength(64);
  });

  it('should support sha3-256', async () => {
    const filePath = path.join(tempDir, 'abc.txt');
    await fs.writeFile(filePath, 'abc');

    expect(await hashFile(filePath, { algorithm: 'sha3-256' })).toBe(SHA3_256_ABC);
  });

  it('should fail with not-found for a missing file', async () => {
    const missing = path.join(tempDir, 'missing.txt');

    const error = await hashFile(missing).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HashIoError);
    expect(error).toMatchObject({ path: missing, kind: 'not-found' });
  });

  it('should fail with is-directory for a directory', async () => {
    const error = await hashFile(tempDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HashIoError);
    expect(error).toMatchObject({ kind: 'is-directory' });
  });
});

describe('createHasher', () => {
  it('should bind the algorithm into a hash function', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hash-compare-hasher-test-'));
    try {
      const filePath = path.join(tempDir, 'abc.txt');
      await fs.writeFile(filePath, 'abc');

      const hash = createHasher({ algorithm: 'sha3-256', chunkSizeBytes: 1 });

      expect(await hash(filePath)).toBe(SHA3_256_ABC);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });
});
