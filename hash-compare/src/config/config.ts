import fs from 'node:fs/promises';
import path from 'node:path';
import type { ConfigOverrides, HashCompareConfig, OutputFormat, SectionSelection } from './types.js';
import { DEFAULT_CONFIG_FILE, defaultConfig } from './defaults.js';
import { DIGEST_ALGORITHMS } from '../hashing/hasher.js';
import type { DigestAlgorithm } from '../hashing/hasher.js';
import { errorCode } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type Fields = Record<string, unknown>;

/**
 * Loads configuration from a JSON file, merged over the defaults.
 *
 * Without an explicit path, a missing `hash-compare.json` in the current
 * directory just means the defaults apply.
 *
 * @param configPath - Path given by the user, if any
 * @returns Validated configuration
 */
export async function loadConfig(configPath?: string): Promise<HashCompareConfig> {
  const resolved = resolveConfigPath(configPath);

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      if (configPath === undefined) {
        logger.debug(`No configuration file at ${resolved}, using defaults`);
        return parseConfig({});
      }
      throw new Error(`Configuration file not found: ${resolved}`);
    }
    throw error;
  }

  logger.debug(`Loading configuration from: ${resolved}`);
  const userConfig: unknown = JSON.parse(content);
  return parseConfig(userConfig);
}

/**
 * Validates a parsed JSON value and fills in defaults for missing fields
 * @throws Error describing the first invalid field
 */
export function parseConfig(raw: unknown): HashCompareConfig {
  const root = section(raw, 'configuration');
  const traversal = section(root.traversal, 'traversal');
  const output = section(root.output, 'output');
  const sections = section(output.sections, 'output sections');
  const defaults = defaultConfig;

  const selection: SectionSelection = {
    intersection: pick(sections, 'intersection', 'sections.intersection', defaults.output.sections.intersection, isBoolean, 'a boolean'),
    dir1: pick(sections, 'dir1', 'sections.dir1', defaults.output.sections.dir1, isBoolean, 'a boolean'),
    dir2: pick(sections, 'dir2', 'sections.dir2', defaults.output.sections.dir2, isBoolean, 'a boolean')
  };

  if (!selection.intersection && !selection.dir1 && !selection.dir2) {
    throw new Error('Configuration error: at least one output section must be enabled');
  }

  return {
    workers: pick(root, 'workers', 'workers', defaults.workers, isNullablePositiveInteger, 'a positive integer or null'),
    chunkSizeBytes: pick(root, 'chunkSizeBytes', 'chunkSizeBytes', defaults.chunkSizeBytes, isPositiveInteger, 'a positive integer'),
    queueCapacity: pick(root, 'queueCapacity', 'queueCapacity', defaults.queueCapacity, isPositiveInteger, 'a positive integer'),
    algorithm: pick(root, 'algorithm', 'algorithm', defaults.algorithm, isDigestAlgorithm, `one of ${DIGEST_ALGORITHMS.join(', ')}`),
    traversal: {
      skipHidden: pick(traversal, 'skipHidden', 'traversal.skipHidden', defaults.traversal.skipHidden, isBoolean, 'a boolean'),
      followSymlinks: pick(traversal, 'followSymlinks', 'traversal.followSymlinks', defaults.traversal.followSymlinks, isBoolean, 'a boolean')
    },
    output: {
      format: pick(output, 'format', 'output format', defaults.output.format, isOutputFormat, '"text" or "json"'),
      sort: pick(output, 'sort', 'output.sort', defaults.output.sort, isBoolean, 'a boolean'),
      relative: pick(output, 'relative', 'output.relative', defaults.output.relative, isBoolean, 'a boolean'),
      sections: selection,
      outputFile: pick(output, 'outputFile', 'output.outputFile', defaults.output.outputFile, isNullableString, 'a string or null')
    }
  };
}

/**
 * Applies command line values over a loaded configuration.
 * Boolean flags only ever switch a setting on. Selecting any section
 * replaces the configured selection.
 */
export function applyOverrides(config: HashCompareConfig, overrides: ConfigOverrides): HashCompareConfig {
  const anySection = overrides.intersection === true || overrides.uniqueDir1 === true || overrides.uniqueDir2 === true;

  return {
    ...config,
    workers: overrides.workers ?? config.workers,
    traversal: {
      skipHidden: config.traversal.skipHidden || overrides.skipHidden === true,
      followSymlinks: config.traversal.followSymlinks || overrides.followSymlinks === true
    },
    output: {
      format: overrides.format ?? config.output.format,
      sort: config.output.sort || overrides.sort === true,
      relative: config.output.relative || overrides.relative === true,
      sections: anySection
        ? {
            intersection: overrides.intersection === true,
            dir1: overrides.uniqueDir1 === true,
            dir2: overrides.uniqueDir2 === true
          }
        : config.output.sections,
      outputFile: overrides.outputFile ?? config.output.outputFile
    }
  };
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 * @returns Path to configuration file
 */
export function resolveConfigPath(providedPath?: string): string {
  if (providedPath) {
    return path.resolve(providedPath);
  }

  return path.resolve(DEFAULT_CONFIG_FILE);
}

function section(value: unknown, name: string): Fields {
  if (value === undefined) {
    return {};
  }
  if (!isFields(value)) {
    throw new Error(`Configuration error: ${name} must be an object`);
  }
  return value;
}

function pick<T>(
  fields: Fields,
  key: string,
  label: string,
  fallback: T,
  guard: (value: unknown) => value is T,
  expectation: string
): T {
  const value = fields[key];
  if (value === undefined) {
    return fallback;
  }
  if (!guard(value)) {
    throw new Error(`Configuration error: ${label} must be ${expectation}`);
  }
  return value;
}

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isNullablePositiveInteger(value: unknown): value is number | null {
  return value === null || isPositiveInteger(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function isDigestAlgorithm(value: unknown): value is DigestAlgorithm {
  return DIGEST_ALGORITHMS.some((algorithm) => algorithm === value);
}
