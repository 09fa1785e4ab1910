/**
 * Go Front-end Module
 *
 * Parses Go packages with tree-sitter and answers the type-resolution
 * queries the chunk extractor needs.
 *
 * @example
 * ```ts
 * import { TreeSitterFrontend, PositionIndex } from './frontend';
 *
 * const result = new TreeSitterFrontend().load('/path/to/module', {
 *   mode: 'project',
 *   positions: new PositionIndex(),
 *   buildContext: { goos: 'linux', goarch: 'amd64', goVersion: '1.22', cgoEnabled: true, tags: [] },
 * });
 * ```
 */

export { TreeSitterFrontend } from './frontend.js';
export { PositionIndex, IndexedFile, INVALID_POSITION, type Position } from './position-index.js';
export { TypeTable } from './type-table.js';
export { checkPackage, type CheckOptions } from './checker.js';
export { discoverPackageDirs, type PackageDir } from './discovery.js';
export { assumedPackageName, parseModulePath, readModulePath } from './module.js';
export {
  BuildConstraintError,
  buildTagSet,
  matchBuildLines,
  matchFileName,
  parseBuildExpr,
} from './build-constraints.js';
export { parseGoSource, declarationSpecs, declaredNames, importSpecs } from './syntax.js';

export type {
  BuildContext,
  CompilationUnit,
  GoFrontend,
  GoObject,
  ImportedPackage,
  LoadMode,
  LoadPassOptions,
  LoadPassResult,
  SourceFile,
  SyntaxNode,
  TypesInfo,
} from './types.js';
