/**
 * A regular file discovered under a root
 */
export interface FileEntry {
  /** Absolute path to the file */
  path: string;

  /** Root directory the file was found under */
  root: string;
}

/**
 * A subtree or entry that could not be traversed. Collected, never thrown.
 */
export interface TraversalIssue {
  path: string;
  code: string;
  message: string;
}

export type TraversalEvent =
  | { type: 'file'; entry: FileEntry }
  | { type: 'error'; issue: TraversalIssue };

export interface WalkOptions {
  /** Skip entries whose name starts with '.', along with their subtrees */
  skipHidden?: boolean;

  /** Follow symbolic links. A link back to a directory on its own branch is reported as a cycle. */
  followSymlinks?: boolean;
}
