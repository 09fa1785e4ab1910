/**
 * Go Module Helper Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { assumedPackageName, joinImportPath, parseModulePath, readModulePath } from '../module.js';

describe('parseModulePath', () => {
  it('reads the module directive', () => {
    expect(parseModulePath('module example.com/demo\n\ngo 1.22\n')).toBe('example.com/demo');
  });

  it('skips comments and accepts quoted paths', () => {
    expect(parseModulePath('// comment\nmodule "example.com/quoted" // trailing\n')).toBe('example.com/quoted');
  });

  it('returns undefined without a module directive', () => {
    expect(parseModulePath('go 1.22\n')).toBeUndefined();
  });
});

describe('readModulePath', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gochunk-module-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads go.mod from a directory', () => {
    writeFileSync(join(dir, 'go.mod'), 'module example.com/demo\n');
    expect(readModulePath(dir)).toBe('example.com/demo');
  });

  it('returns undefined when go.mod is missing', () => {
    expect(readModulePath(dir)).toBeUndefined();
  });
});

describe('assumedPackageName', () => {
  it('uses the last path element', () => {
    expect(assumedPackageName('fmt')).toBe('fmt');
    expect(assumedPackageName('net/http')).toBe('http');
  });

  it('skips major version suffixes and go- prefixes', () => {
    expect(assumedPackageName('github.com/x/go-cmp/v2')).toBe('cmp');
  });

  it('cuts at the first non-identifier character', () => {
    expect(assumedPackageName('gopkg.in/yaml.v3')).toBe('yaml');
  });
});

describe('joinImportPath', () => {
  it('joins module path and directory', () => {
    expect(joinImportPath('example.com/demo', '')).toBe('example.com/demo');
    expect(joinImportPath('example.com/demo', 'internal/store')).toBe('example.com/demo/internal/store');
  });
});
