/**
 * Test Utilities - Temporary Go Modules
 *
 * Writes small Go source trees under the OS temp directory for tests that
 * run the real front-end.
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { TreeSitterFrontend } from '../frontend/frontend.js';
import { PositionIndex } from '../frontend/position-index.js';
import type { BuildContext, CompilationUnit, SyntaxNode, TypesInfo } from '../frontend/types.js';

/** Build context used by tests unless one overrides it */
export const TEST_BUILD_CONTEXT: BuildContext = {
  goos: 'linux',
  goarch: 'amd64',
  goVersion: '1.22',
  cgoEnabled: true,
  tags: [],
};

/**
 * Create a temporary directory holding `files` (slash-separated relative
 * path to content). Returns the directory's real path.
 */
export function createTempModule(files: Record<string, string>): string {
  const root = realpathSync(mkdtempSync(join(tmpdir(), 'gochunk-test-')));
  writeTree(root, files);
  return root;
}

/**
 * Write `files` beneath an existing directory.
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relPath, content] of Object.entries(files)) {
    const path = join(root, ...relPath.split('/'));
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, 'utf-8');
  }
}

export function removeTempModule(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

/**
 * A single-file package loaded through the real front-end.
 */
export interface LoadedSource {
  root: string;
  unit: CompilationUnit;
  info: TypesInfo;
  file: SyntaxNode;
  /** Top-level declaration by name (function, method, or first spec name) */
  decl(name: string): SyntaxNode;
}

/**
 * Load `source` as `<root>/demo.go` of module `example.com/demo`.
 */
export function loadSource(source: string): LoadedSource {
  const root = createTempModule({ 'go.mod': 'module example.com/demo\n', 'demo.go': source });
  const result = new TreeSitterFrontend().load(root, {
    mode: 'project',
    positions: new PositionIndex(),
    buildContext: TEST_BUILD_CONTEXT,
  });
  const unit = result.units[0];
  const file = unit?.syntax?.[0]?.root;
  if (!unit?.typesInfo || !file) {
    throw new Error(`failed to load test source: ${result.error?.message ?? 'no unit'}`);
  }

  return {
    root,
    unit,
    info: unit.typesInfo,
    file,
    decl(name: string): SyntaxNode {
      const found = file.namedChildren.find((d) => {
        const direct = d.childForFieldName('name');
        if (direct) return direct.text === name;
        return d.descendantsOfType(['type_spec', 'var_spec', 'const_spec']).some(
          (s) => s.childForFieldName('name')?.text === name
        );
      });
      if (!found) throw new Error(`no declaration ${name}`);
      return found;
    },
  };
}
