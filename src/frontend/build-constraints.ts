/**
 * Build Constraints
 *
 * Decides whether a Go file belongs to the build selected by a
 * BuildContext: file-name GOOS/GOARCH suffixes and `//go:build` lines.
 */

import type { BuildContext } from './types.js';

export const KNOWN_OS = new Set([
  'aix', 'android', 'darwin', 'dragonfly', 'freebsd', 'hurd', 'illumos', 'ios',
  'js', 'linux', 'nacl', 'netbsd', 'openbsd', 'plan9', 'solaris', 'wasip1',
  'windows', 'zos',
]);

export const KNOWN_ARCH = new Set([
  '386', 'amd64', 'amd64p32', 'arm', 'armbe', 'arm64', 'arm64be', 'loong64',
  'mips', 'mipsle', 'mips64', 'mips64le', 'mips64p32', 'mips64p32le', 'ppc',
  'ppc64', 'ppc64le', 'riscv', 'riscv64', 's390', 's390x', 'sparc', 'sparc64',
  'wasm',
]);

const UNIX_OS = new Set([
  'aix', 'android', 'darwin', 'dragonfly', 'freebsd', 'hurd', 'illumos', 'ios',
  'linux', 'netbsd', 'openbsd', 'solaris',
]);

/**
 * Parsed `//go:build` expression.
 */
export type BuildExpr =
  | { op: 'tag'; tag: string }
  | { op: 'not'; x: BuildExpr }
  | { op: 'and' | 'or'; x: BuildExpr; y: BuildExpr };

export class BuildConstraintError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'BuildConstraintError';
  }
}

/**
 * Collect the set of satisfied build tags for a context.
 */
export function buildTagSet(ctx: BuildContext): Set<string> {
  const tags = new Set<string>([ctx.goos, ctx.goarch, 'gc', ...ctx.tags]);
  if (UNIX_OS.has(ctx.goos)) tags.add('unix');
  if (ctx.goos === 'android') tags.add('linux');
  if (ctx.goos === 'illumos') tags.add('solaris');
  if (ctx.goos === 'ios') tags.add('darwin');
  if (ctx.cgoEnabled) tags.add('cgo');

  const minor = Number.parseInt(ctx.goVersion.split('.')[1] ?? '0', 10);
  for (let i = 1; i <= minor; i++) {
    tags.add(`go1.${i}`);
  }
  return tags;
}

/**
 * Check a file name against GOOS/GOARCH suffix rules
 * (`name_linux.go`, `name_arm64.go`, `name_windows_amd64_test.go`).
 */
export function matchFileName(fileName: string, tags: Set<string>): boolean {
  let name = fileName.endsWith('.go') ? fileName.slice(0, -3) : fileName;
  const underscore = name.indexOf('_');
  if (underscore < 0) {
    return true;
  }
  name = name.slice(underscore);

  const parts = name.split('_');
  if (parts[parts.length - 1] === 'test') {
    parts.pop();
  }
  const n = parts.length;
  const last = parts[n - 1] ?? '';
  const secondLast = parts[n - 2] ?? '';

  if (n >= 2 && KNOWN_OS.has(secondLast) && KNOWN_ARCH.has(last)) {
    return tags.has(secondLast) && tags.has(last);
  }
  if (n >= 1 && (KNOWN_OS.has(last) || KNOWN_ARCH.has(last))) {
    return tags.has(last);
  }
  return true;
}

/**
 * Parse the expression of a `//go:build` line.
 *
 * @throws BuildConstraintError on malformed input
 */
export function parseBuildExpr(source: string): BuildExpr {
  const tokens = tokenize(source);
  let pos = 0;

  const peek = (): string | undefined => tokens[pos];
  const next = (): string | undefined => tokens[pos++];

  function parseOr(): BuildExpr {
    let x = parseAnd();
    while (peek() === '||') {
      next();
      x = { op: 'or', x, y: parseAnd() };
    }
    return x;
  }

  function parseAnd(): BuildExpr {
    let x = parseNot();
    while (peek() === '&&') {
      next();
      x = { op: 'and', x, y: parseNot() };
    }
    return x;
  }

  function parseNot(): BuildExpr {
    const token = next();
    if (token === undefined) {
      throw new BuildConstraintError('unexpected end of expression');
    }
    if (token === '!') {
      return { op: 'not', x: parseNot() };
    }
    if (token === '(') {
      const x = parseOr();
      if (next() !== ')') {
        throw new BuildConstraintError('missing close paren');
      }
      return x;
    }
    if (token === ')' || token === '&&' || token === '||') {
      throw new BuildConstraintError(`unexpected token ${token}`);
    }
    return { op: 'tag', tag: token };
  }

  const expr = parseOr();
  if (pos !== tokens.length) {
    throw new BuildConstraintError(`unexpected token ${tokens[pos] ?? ''}`);
  }
  return expr;
}

function tokenize(source: string): string[] {
  const tokens: string[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
    } else if (ch === '(' || ch === ')' || ch === '!') {
      tokens.push(ch);
      i++;
    } else if (source.startsWith('&&', i) || source.startsWith('||', i)) {
      tokens.push(source.slice(i, i + 2));
      i += 2;
    } else {
      const match = /^[A-Za-z0-9_.]+/.exec(source.slice(i));
      if (!match) {
        throw new BuildConstraintError(`invalid character ${JSON.stringify(ch)}`);
      }
      tokens.push(match[0]);
      i += match[0].length;
    }
  }
  return tokens;
}

export function evaluateBuildExpr(expr: BuildExpr, tags: Set<string>): boolean {
  switch (expr.op) {
    case 'tag':
      return tags.has(expr.tag);
    case 'not':
      return !evaluateBuildExpr(expr.x, tags);
    case 'and':
      return evaluateBuildExpr(expr.x, tags) && evaluateBuildExpr(expr.y, tags);
    case 'or':
      return evaluateBuildExpr(expr.x, tags) || evaluateBuildExpr(expr.y, tags);
  }
}

/**
 * Evaluate the `//go:build` lines found in a file header.
 * A file without constraint lines always matches.
 *
 * @param headerComments - comment texts that precede the package clause
 * @throws BuildConstraintError when a constraint line is malformed
 */
export function matchBuildLines(headerComments: string[], tags: Set<string>): boolean {
  for (const comment of headerComments) {
    const text = comment.trim();
    if (!text.startsWith('//go:build')) continue;
    const rest = text.slice('//go:build'.length);
    if (rest !== '' && !/^\s/.test(rest)) continue;
    if (!evaluateBuildExpr(parseBuildExpr(rest.trim()), tags)) {
      return false;
    }
  }
  return true;
}
