/**
 * Front-end Types
 *
 * Contracts between the Go front-end (parsing, package discovery, type
 * resolution) and the chunk extraction pipeline. The pipeline only sees
 * these interfaces, so any front-end that can answer them is substitutable.
 */

import type Parser from 'tree-sitter';
import type { PositionIndex } from './position-index.js';

/** A node of a tree-sitter Go syntax tree. */
export type SyntaxNode = Parser.SyntaxNode;

/**
 * The package an import declaration refers to.
 */
export interface ImportedPackage {
  /** Full import path, e.g. `github.com/pkg/errors` */
  path: string;
  /** Package name declared by the imported package (or the assumed one) */
  name: string;
}

/**
 * What an identifier use resolves to.
 *
 * Only `pkgName` carries meaning for qualifier handling; the other kinds
 * exist so that a local binding shadowing an import alias is recognised as
 * "not an import".
 */
export type GoObject =
  | { kind: 'pkgName'; name: string; imported: ImportedPackage }
  | { kind: 'type'; name: string; pkgPath?: string }
  | { kind: 'typeParam'; name: string }
  | { kind: 'var' | 'const'; name: string; pkgPath?: string; spec?: SyntaxNode; index?: number }
  | { kind: 'func'; name: string; pkgPath?: string; decl?: SyntaxNode }
  | { kind: 'builtin'; name: string }
  | { kind: 'nil'; name: 'nil' };

/**
 * Type-resolution capability of a compilation unit.
 *
 * Both lookups may return undefined: type information is allowed to be
 * partial and consumers must fall back to syntax.
 */
export interface TypesInfo {
  /** Canonical type string of an expression or type expression */
  typeOf(expr: SyntaxNode): string | undefined;
  /** Object an identifier use refers to */
  objectOf(ident: SyntaxNode): GoObject | undefined;
}

/**
 * One parsed source file of a unit.
 */
export interface SourceFile {
  /** Absolute file path */
  path: string;
  /** Root `source_file` node */
  root: SyntaxNode;
  /** Base of this file in the shared position index */
  base: number;
}

/**
 * One Go package after parsing and type resolution.
 *
 * `syntax`, `typesInfo` and `positions` are optional: a unit missing any of
 * them cannot be chunked and is skipped by the extractor.
 */
export interface CompilationUnit {
  /** Import path (unit identity) */
  id: string;
  /** Package name from the package clause */
  name: string;
  /** Absolute directory of the package */
  dir: string;
  /** Absolute paths of the files that make up the package */
  goFiles: string[];
  syntax?: SourceFile[];
  typesInfo?: TypesInfo;
  positions?: PositionIndex;
  /** Non-fatal problems found while loading the package */
  errors: string[];
}

/**
 * Build context used to select files, mirroring the go command's.
 */
export interface BuildContext {
  goos: string;
  goarch: string;
  /** Go language version, e.g. "1.22" (enables go1.1 .. go1.22 tags) */
  goVersion: string;
  cgoEnabled: boolean;
  /** Extra user build tags */
  tags: string[];
}

/**
 * How a load pass interprets its root directory.
 * - project: root is a module root (reads go.mod, skips vendor/)
 * - vendor: root is a vendor directory (import paths are relative paths)
 */
export type LoadMode = 'project' | 'vendor';

/**
 * Options for a single load pass.
 */
export interface LoadPassOptions {
  mode: LoadMode;
  /** Position index shared by all passes of a run */
  positions: PositionIndex;
  buildContext: BuildContext;
  /** Include `_test.go` files */
  includeTests?: boolean;
  /** Gitignore-style patterns, relative to the pass root */
  excludePatterns?: string[];
  /** Vendor directory name beneath a project root (project mode) */
  vendorDirName?: string;
}

/**
 * Result of a load pass. A pass can report an error and still return the
 * units it managed to load.
 */
export interface LoadPassResult {
  units: CompilationUnit[];
  error?: Error;
}

/**
 * The compilation front-end service.
 */
export interface GoFrontend {
  load(dir: string, options: LoadPassOptions): LoadPassResult;
}
