import fs from 'node:fs/promises';
import { constants } from 'node:fs';
import path from 'node:path';
import { InvalidRootError, errorCode } from './errors.js';

/**
 * Resolves a root to an absolute path, checking that it is a readable directory
 * @throws InvalidRootError if the path is missing, not a directory or unreadable
 */
export async function validateRoot(root: string): Promise<string> {
  const absolute = path.resolve(root);

  let stats;
  try {
    stats = await fs.stat(absolute);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new InvalidRootError(root, 'does not exist');
    }
    throw new InvalidRootError(root, 'cannot be accessed');
  }

  if (!stats.isDirectory()) {
    throw new InvalidRootError(root, 'is not a directory');
  }

  try {
    await fs.access(absolute, constants.R_OK | constants.X_OK);
  } catch {
    throw new InvalidRootError(root, 'is not readable');
  }

  return absolute;
}
