#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { hashCompare } from './hash-compare.js';

interface CompareFlags {
  config?: string;
  output?: string;
  workers?: number;
  sort: boolean;
  'skip-hidden': boolean;
  'follow-symlinks': boolean;
  relative: boolean;
  json: boolean;
  intersection: boolean;
  dir1: boolean;
  dir2: boolean;
  debug: boolean;
}

/** Exit code when some files or directories could not be read */
const EXIT_PARTIAL = 2;

function parseWorkerCount(input: string): number {
  const value = Number(input);
  if (!Number.isInteger(value) || value < 1) {
    throw new SyntaxError(`Expected a positive integer, got '${input}'`);
  }
  return value;
}

const compareCommand = buildCommand({
  docs: {
    brief: 'Compare the files of two directories by content hash',
    fullDescription:
      'Hashes every file under both directories and lists contents found in both, only in the first and only in the second. ' +
      'If none of --intersection, --dir1 or --dir2 are set, all three are shown.'
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'The first directory to compare',
          parse: String,
          placeholder: 'directory1'
        },
        {
          brief: 'The second directory to compare',
          parse: String,
          placeholder: 'directory2'
        }
      ]
    },
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      output: {
        kind: 'parsed',
        brief: 'Write results to a file instead of stdout',
        parse: String,
        optional: true
      },
      workers: {
        kind: 'parsed',
        brief: 'Hashing workers per directory (default: available CPUs)',
        parse: parseWorkerCount,
        optional: true
      },
      sort: {
        kind: 'boolean',
        brief: 'Sort output paths',
        default: false
      },
      'skip-hidden': {
        kind: 'boolean',
        brief: 'Skip hidden files and directories',
        default: false
      },
      'follow-symlinks': {
        kind: 'boolean',
        brief: 'Follow symbolic links',
        default: false
      },
      relative: {
        kind: 'boolean',
        brief: 'Display paths relative to their directory',
        default: false
      },
      json: {
        kind: 'boolean',
        brief: 'Display as JSON',
        default: false
      },
      intersection: {
        kind: 'boolean',
        brief: 'Display files both in directory1 and directory2',
        default: false
      },
      dir1: {
        kind: 'boolean',
        brief: 'Display files unique to directory1',
        default: false
      },
      dir2: {
        kind: 'boolean',
        brief: 'Display files unique to directory2',
        default: false
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      o: 'output',
      w: 'workers',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: CompareFlags, directory1: string, directory2: string): Promise<void> {
    try {
      const status = await hashCompare({
        dir1: directory1,
        dir2: directory2,
        configPath: flags.config,
        outputFile: flags.output,
        workers: flags.workers,
        sort: flags.sort,
        skipHidden: flags['skip-hidden'],
        followSymlinks: flags['follow-symlinks'],
        relative: flags.relative,
        format: flags.json ? 'json' : undefined,
        intersection: flags.intersection,
        uniqueDir1: flags.dir1,
        uniqueDir2: flags.dir2,
        debug: flags.debug
      });
      if (status === 'partial') {
        process.exitCode = EXIT_PARTIAL;
      }
    } catch {
      // already reported by hashCompare
      process.exitCode = 1;
    }
  }
});

const app = buildApplication(compareCommand, {
  name: 'hash-compare',
  versionInfo: {
    currentVersion: '0.1.0'
  }
});

await run(app, process.argv.slice(2), { process });
