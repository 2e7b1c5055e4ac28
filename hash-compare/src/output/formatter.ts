import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { OutputFormat, SectionSelection } from '../config/types.js';
import type { ComparisonResult, DigestGroup } from '../comparator/types.js';
import { projectIntersection, projectUnique } from '../comparator/projector.js';
import { compareStrings, toDisplayPath, toDisplayPaths } from '../utils/path-display.js';

export interface FormatOptions {
  sections: SectionSelection;
  sort: boolean;
  relative: boolean;

  /** Colour text output (default: when the terminal supports it) */
  color?: boolean;
}

/**
 * Renders a comparison result in the requested format
 */
export function formatOutput(result: ComparisonResult, format: OutputFormat, options: FormatOptions): string {
  return format === 'json' ? formatJsonOutput(result, options) : formatTextOutput(result, options);
}

/**
 * Formats output as human-readable text
 */
export function formatTextOutput(result: ComparisonResult, options: FormatOptions): string {
  const c: ChalkInstance = options.color === false ? new Chalk({ level: 0 }) : chalk;
  const lines: string[] = [];
  const { sections, sort, relative } = options;
  const section = (title: string, entries: string[]): void => {
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(c.bold(`${title} (${entries.length}):`));
    if (entries.length === 0) {
      lines.push(c.gray('  (none)'));
    }
    for (const entry of entries) {
      lines.push(`  ${entry}`);
    }
  };

  if (sections.intersection) {
    const pairs = projectIntersection(result.intersection).map(
      (pair) =>
        `${toDisplayPath(pair.dir1Path, result.dir1, relative)} <=> ${toDisplayPath(pair.dir2Path, result.dir2, relative)}`
    );
    section(`Files both in '${result.dir1}' and '${result.dir2}'`, sort ? pairs.sort(compareStrings) : pairs);
  }

  if (sections.dir1) {
    const paths = projectUnique(result.dir1Only, 'dir1').map((record) => record.path);
    section(`Files unique in '${result.dir1}'`, toDisplayPaths(paths, result.dir1, relative, sort));
  }

  if (sections.dir2) {
    const paths = projectUnique(result.dir2Only, 'dir2').map((record) => record.path);
    section(`Files unique in '${result.dir2}'`, toDisplayPaths(paths, result.dir2, relative, sort));
  }

  if (result.failures.length > 0) {
    lines.push('');
    lines.push(c.bold.red(`Files that could not be hashed (${result.failures.length}):`));
    for (const failure of result.failures) {
      lines.push(`  ${failure.path} [${failure.kind}]`);
    }
  }

  if (result.traversalIssues.length > 0) {
    lines.push('');
    lines.push(c.bold.red(`Paths that could not be traversed (${result.traversalIssues.length}):`));
    for (const issue of result.traversalIssues) {
      lines.push(`  ${issue.path} [${issue.code}]`);
    }
  }

  const { stats } = result;
  lines.push('');
  lines.push(c.bold.cyan('SUMMARY'));
  lines.push(c.cyan('-'.repeat(80)));
  lines.push(`  Files hashed in directory 1: ${stats.dir1Files} (${stats.dir1Digests} distinct)`);
  lines.push(`  Files hashed in directory 2: ${stats.dir2Files} (${stats.dir2Digests} distinct)`);
  lines.push(`  Shared contents:             ${c.green(stats.intersectionDigests.toString())}`);
  lines.push(`  Unique to directory 1:       ${c.yellow(stats.dir1OnlyDigests.toString())}`);
  lines.push(`  Unique to directory 2:       ${c.magenta(stats.dir2OnlyDigests.toString())}`);
  lines.push(`  Hash failures:               ${stats.hashFailures}`);
  lines.push(`  Traversal errors:            ${stats.traversalIssues}`);

  return lines.join('\n');
}

/**
 * Formats output as JSON, mapping each digest to its paths
 */
export function formatJsonOutput(result: ComparisonResult, options: FormatOptions): string {
  const { sections, sort, relative } = options;
  const ordered = (groups: readonly DigestGroup[]): DigestGroup[] =>
    sort ? [...groups].sort((a, b) => compareStrings(a.digest, b.digest)) : [...groups];
  const output: Record<string, unknown> = {};

  if (sections.intersection) {
    const intersection: Record<string, { directory1: string[]; directory2: string[] }> = {};
    for (const group of ordered(result.intersection)) {
      intersection[group.digest] = {
        directory1: toDisplayPaths(group.dir1, result.dir1, relative, sort),
        directory2: toDisplayPaths(group.dir2, result.dir2, relative, sort)
      };
    }
    output.intersection = intersection;
  }

  if (sections.dir1) {
    const directory1: Record<string, string[]> = {};
    for (const group of ordered(result.dir1Only)) {
      directory1[group.digest] = toDisplayPaths(group.dir1, result.dir1, relative, sort);
    }
    output.directory1 = directory1;
  }

  if (sections.dir2) {
    const directory2: Record<string, string[]> = {};
    for (const group of ordered(result.dir2Only)) {
      directory2[group.digest] = toDisplayPaths(group.dir2, result.dir2, relative, sort);
    }
    output.directory2 = directory2;
  }

  output.failures = result.failures.map(({ path, kind, message }) => ({ path, kind, message }));
  output.traversalErrors = result.traversalIssues.map(({ path, code, message }) => ({ path, code, message }));

  return JSON.stringify(output, null, 2);
}
