/**
 * Package Discovery
 *
 * Finds the directories that hold Go packages beneath a load root using
 * fast-glob, applying the go command's directory rules and user exclude
 * patterns (gitignore syntax via the `ignore` package).
 */

import { posix, dirname, relative, sep } from 'node:path';
import fg from 'fast-glob';
import ignore from 'ignore';

import type { LoadMode } from './types.js';

export interface DiscoveryOptions {
  mode: LoadMode;
  /** Vendor directory name skipped in project mode */
  vendorDirName?: string;
  /** Gitignore-style patterns relative to the root */
  excludePatterns?: string[];
}

/**
 * A directory containing `.go` files.
 */
export interface PackageDir {
  /** Absolute directory path */
  dir: string;
  /** Slash-separated path relative to the root ('' for the root itself) */
  relDir: string;
  /** Absolute paths of the `.go` files directly in the directory, sorted */
  files: string[];
}

/**
 * Directory patterns the go command never descends into: `testdata` and
 * directories starting with `_`. Dot-directories are excluded by fast-glob's
 * `dot: false`.
 */
const ALWAYS_IGNORED = ['**/testdata/**', '**/_*/**'];

/**
 * Discover package directories beneath `root`.
 *
 * In project mode the vendor directory and nested modules (subdirectories
 * with their own go.mod) are excluded.
 */
export function discoverPackageDirs(root: string, options: DiscoveryOptions): PackageDir[] {
  const ignored = [...ALWAYS_IGNORED];
  if (options.mode === 'project') {
    ignored.push(`${options.vendorDirName ?? 'vendor'}/**`);
  }

  const entries = fg.sync('**/*.go', {
    cwd: root,
    absolute: true,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: ignored,
  });

  const nestedModules = options.mode === 'project' ? findNestedModules(root, ignored) : [];
  const exclude = ignore().add(options.excludePatterns ?? []);

  const byDir = new Map<string, string[]>();
  for (const file of entries) {
    const relPath = toSlash(relative(root, file));
    if (exclude.ignores(relPath)) continue;
    if (nestedModules.some((m) => relPath.startsWith(`${m}/`))) continue;

    const dir = dirname(file);
    const files = byDir.get(dir);
    if (files) {
      files.push(file);
    } else {
      byDir.set(dir, [file]);
    }
  }

  return [...byDir.entries()]
    .map(([dir, files]) => ({
      dir,
      relDir: toSlash(relative(root, dir)),
      files: files.sort(),
    }))
    .sort((a, b) => a.relDir.localeCompare(b.relDir));
}

/**
 * List the `.go` files directly inside one directory, sorted.
 */
export function listGoFiles(dir: string): string[] {
  return fg
    .sync('*.go', { cwd: dir, absolute: true, dot: false, onlyFiles: true, suppressErrors: true })
    .sort();
}

/** Slash-separated relative directories of nested modules */
function findNestedModules(root: string, ignored: string[]): string[] {
  return fg
    .sync('*/**/go.mod', { cwd: root, dot: false, onlyFiles: true, suppressErrors: true, ignore: ignored })
    .map((p) => posix.dirname(p));
}

function toSlash(p: string): string {
  return sep === '/' ? p : p.split(sep).join('/');
}
