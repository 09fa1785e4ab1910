/**
 * Go module helpers: go.mod parsing and import-path naming rules.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Read the module path declared in `<dir>/go.mod`.
 *
 * @returns The module path, or undefined when go.mod is missing or has no
 * module directive
 */
export function readModulePath(dir: string): string | undefined {
  const goModPath = join(dir, 'go.mod');
  if (!existsSync(goModPath)) {
    return undefined;
  }
  return parseModulePath(readFileSync(goModPath, 'utf-8'));
}

/**
 * Extract the module path from go.mod content.
 */
export function parseModulePath(content: string): string | undefined {
  for (const rawLine of content.split('\n')) {
    const line = stripLineComment(rawLine).trim();
    const match = /^module\s+(.+)$/.exec(line);
    if (!match?.[1]) continue;

    const value = match[1].trim();
    if (value.startsWith('"') || value.startsWith('`')) {
      const quote = value.charAt(0);
      const end = value.indexOf(quote, 1);
      return end > 1 ? value.slice(1, end) : undefined;
    }
    return value;
  }
  return undefined;
}

function stripLineComment(line: string): string {
  const idx = line.indexOf('//');
  return idx >= 0 ? line.slice(0, idx) : line;
}

/**
 * The package name conventionally assumed for an import path when the
 * imported package itself is not available:
 * - the last path element,
 * - or the one before it when the last is a major version (`/v2`),
 * - without a `go-` prefix,
 * - cut at the first character that cannot appear in an identifier.
 *
 * @example assumedPackageName('gopkg.in/yaml.v3') // 'yaml'
 * @example assumedPackageName('github.com/x/go-cmp/v2') // 'cmp'
 */
export function assumedPackageName(importPath: string): string {
  const elements = importPath.split('/').filter((e) => e !== '');
  let base = elements[elements.length - 1] ?? importPath;
  if (/^v\d+$/.test(base) && elements.length > 1) {
    base = elements[elements.length - 2] ?? base;
  }
  if (base.startsWith('go-')) {
    base = base.slice(3);
  }
  const match = /^[A-Za-z0-9_]*/.exec(base);
  return match?.[0] || base;
}

/**
 * Join a module path and a slash-separated directory relative to the module
 * root into an import path.
 */
export function joinImportPath(modulePath: string, relDir: string): string {
  if (relDir === '' || relDir === '.') {
    return modulePath;
  }
  return `${modulePath}/${relDir}`;
}
