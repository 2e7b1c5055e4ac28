import type { HashCompareConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'hash-compare.json';

/**
 * Default configuration values
 */
export const defaultConfig: HashCompareConfig = {
  workers: null,
  chunkSizeBytes: 64 * 1024,
  queueCapacity: 1024,
  algorithm: 'sha256',
  traversal: {
    skipHidden: false,
    followSymlinks: false
  },
  output: {
    format: 'text',
    sort: false,
    relative: false,
    sections: {
      intersection: true,
      dir1: true,
      dir2: true
    },
    outputFile: null
  }
};
