import type { DigestAlgorithm } from '../hashing/hasher.js';

export type OutputFormat = 'text' | 'json';

/**
 * Which partitions to render
 */
export interface SectionSelection {
  intersection: boolean;
  dir1: boolean;
  dir2: boolean;
}

/**
 * Configuration for a comparison run
 */
export interface HashCompareConfig {
  /** Hashing workers per root (null = available parallelism) */
  workers: number | null;

  /** Bytes read per chunk while hashing */
  chunkSizeBytes: number;

  /** Maximum discovered files waiting for a worker */
  queueCapacity: number;

  /** Digest algorithm */
  algorithm: DigestAlgorithm;

  traversal: {
    /** Skip files and directories whose name starts with '.' */
    skipHidden: boolean;

    /** Follow symbolic links, with cycle detection */
    followSymlinks: boolean;
  };

  output: {
    /** Output format: 'text' or 'json' */
    format: OutputFormat;

    /** Sort path lists lexicographically */
    sort: boolean;

    /** Show paths relative to their root */
    relative: boolean;

    sections: SectionSelection;

    /** Optional file path to write output to (null = stdout) */
    outputFile: string | null;
  };
}

/**
 * Values taken from the command line, applied over the loaded configuration
 */
export interface ConfigOverrides {
  workers?: number;
  skipHidden?: boolean;
  followSymlinks?: boolean;
  format?: OutputFormat;
  sort?: boolean;
  relative?: boolean;
  intersection?: boolean;
  uniqueDir1?: boolean;
  uniqueDir2?: boolean;
  outputFile?: string;
}
