import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { errorCode, errorMessage } from '../utils/errors.js';
import type { TraversalEvent, TraversalIssue, WalkOptions } from './types.js';

/**
 * Recursively walks a root directory and yields every regular file under it.
 *
 * Directories are never yielded. A directory that cannot be read, a broken
 * symlink or a symlink cycle is yielded as an `error` event and the walk
 * carries on with its siblings.
 *
 * Symbolic links are skipped unless `followSymlinks` is set.
 */
export async function* walkFiles(
  root: string,
  options: WalkOptions = {}
): AsyncGenerator<TraversalEvent> {
  yield* walkRecursive(root, root, options, new Set<string>());
}

/**
 * Hidden entries follow the dot-prefix convention
 */
export function isHidden(name: string): boolean {
  return name.startsWith('.');
}

/**
 * With `followSymlinks`, `ancestors` holds the real paths of the directories
 * on the current branch only. A directory reached twice through different
 * links is walked under each path; only a link back to an ancestor is a cycle.
 */
async function* walkRecursive(
  root: string,
  dirPath: string,
  options: WalkOptions,
  ancestors: Set<string>
): AsyncGenerator<TraversalEvent> {
  if (!options.followSymlinks) {
    yield* walkEntries(root, dirPath, options, ancestors);
    return;
  }

  let realPath: string;
  try {
    realPath = await fs.realpath(dirPath);
  } catch (error) {
    yield issueEvent(dirPath, error);
    return;
  }
  if (ancestors.has(realPath)) {
    logger.warn(`Symlink cycle detected, skipping: ${dirPath}`);
    yield {
      type: 'error',
      issue: { path: dirPath, code: 'ELOOP', message: `Links back to ancestor ${realPath}` }
    };
    return;
  }

  ancestors.add(realPath);
  try {
    yield* walkEntries(root, dirPath, options, ancestors);
  } finally {
    ancestors.delete(realPath);
  }
}

async function* walkEntries(
  root: string,
  dirPath: string,
  options: WalkOptions,
  ancestors: Set<string>
): AsyncGenerator<TraversalEvent> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === 'EACCES') {
      logger.warn(`Permission denied: ${dirPath}`);
    } else {
      logger.warn(`Error reading directory ${dirPath}: ${errorMessage(error)}`);
    }
    yield issueEvent(dirPath, error);
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    if (options.skipHidden && isHidden(entry.name)) {
      logger.debug(`Skipping hidden entry: ${fullPath}`);
      continue;
    }

    if (entry.isDirectory()) {
      yield* walkRecursive(root, fullPath, options, ancestors);
    } else if (entry.isFile()) {
      yield { type: 'file', entry: { path: fullPath, root } };
    } else if (entry.isSymbolicLink()) {
      if (!options.followSymlinks) {
        logger.debug(`Skipping symlink: ${fullPath}`);
        continue;
      }
      yield* followLink(root, fullPath, options, ancestors);
    }
    // sockets, fifos and devices are not content
  }
}

async function* followLink(
  root: string,
  linkPath: string,
  options: WalkOptions,
  ancestors: Set<string>
): AsyncGenerator<TraversalEvent> {
  let stats;
  try {
    stats = await fs.stat(linkPath);
  } catch (error) {
    logger.warn(`Broken symlink: ${linkPath}`);
    yield issueEvent(linkPath, error);
    return;
  }

  if (stats.isDirectory()) {
    yield* walkRecursive(root, linkPath, options, ancestors);
  } else if (stats.isFile()) {
    yield { type: 'file', entry: { path: linkPath, root } };
  }
}

function issueEvent(entryPath: string, error: unknown): TraversalEvent {
  const issue: TraversalIssue = {
    path: entryPath,
    code: errorCode(error) ?? 'UNKNOWN',
    message: errorMessage(error)
  };
  return { type: 'error', issue };
}
