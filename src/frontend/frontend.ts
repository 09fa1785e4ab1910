/**
 * Tree-sitter Front-end
 *
 * Loads Go packages from a directory tree: file selection by build
 * context, tree-sitter parsing, registration in the shared position index
 * and scope resolution into a TypeTable per package.
 *
 * A load pass never throws for problems with individual files or packages;
 * they are recorded on the unit (`errors`) or reported as the pass error.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';

import { checkPackage } from './checker.js';
import { discoverPackageDirs, listGoFiles, type PackageDir } from './discovery.js';
import { assumedPackageName, joinImportPath, readModulePath } from './module.js';
import { buildTagSet, matchBuildLines, matchFileName } from './build-constraints.js';
import {
  hasSyntaxErrors,
  headerComments,
  importSpecs,
  packageClauseName,
  parseGoSource,
} from './syntax.js';
import type {
  CompilationUnit,
  GoFrontend,
  LoadPassOptions,
  LoadPassResult,
  SourceFile,
  SyntaxNode,
} from './types.js';

/**
 * A parsed file awaiting inclusion in a unit.
 */
interface ParsedFile {
  path: string;
  content: string;
  root: SyntaxNode;
  packageName: string;
  isTest: boolean;
}

/**
 * A unit after parsing, before scope resolution.
 */
interface ParsedUnit {
  id: string;
  name: string;
  dir: string;
  files: ParsedFile[];
  errors: string[];
}

export class TreeSitterFrontend implements GoFrontend {
  load(dir: string, options: LoadPassOptions): LoadPassResult {
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
      return { units: [], error: new Error(`directory not found: ${dir}`) };
    }

    let modulePath = '';
    let passError: Error | undefined;
    if (options.mode === 'project') {
      const declared = readModulePath(dir);
      if (declared === undefined) {
        passError = new Error(`go.mod file not found or has no module directive in ${dir}`);
      }
      modulePath = declared ?? basename(dir);
    }

    const tags = buildTagSet(options.buildContext);
    const parsed: ParsedUnit[] = [];
    const seen = new Set<string>();

    const packageDirs = discoverPackageDirs(dir, {
      mode: options.mode,
      vendorDirName: options.vendorDirName,
      excludePatterns: options.excludePatterns,
    });
    for (const pkgDir of packageDirs) {
      const id = options.mode === 'project' ? joinImportPath(modulePath, pkgDir.relDir) : pkgDir.relDir;
      for (const unit of parsePackage(id, pkgDir, tags, options.includeTests ?? false)) {
        seen.add(unit.id);
        parsed.push(unit);
      }
    }

    if (options.mode === 'project') {
      const vendorDir = join(dir, options.vendorDirName ?? 'vendor');
      parsed.push(...loadVendoredImports(parsed, vendorDir, seen, tags));
    }

    const names = new Map<string, string>();
    for (const unit of parsed) {
      if (!names.has(unit.id)) names.set(unit.id, unit.name);
    }
    const importName = (importPath: string): string =>
      names.get(importPath) ?? assumedPackageName(importPath);

    const units = parsed.map((unit) => resolveUnit(unit, options, importName));
    return passError ? { units, error: passError } : { units };
  }
}

/**
 * Parse the files of one directory into its package unit, plus an external
 * test unit (`<id>_test`) when test files declare `package <name>_test`.
 */
function parsePackage(id: string, pkgDir: PackageDir, tags: Set<string>, includeTests: boolean): ParsedUnit[] {
  const errors: string[] = [];
  const files: ParsedFile[] = [];

  for (const path of pkgDir.files) {
    const fileName = basename(path);
    if (fileName.startsWith('_') || fileName.startsWith('.')) continue;
    const isTest = fileName.endsWith('_test.go');
    if (isTest && !includeTests) continue;
    if (!matchFileName(fileName, tags)) continue;

    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      errors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    let root: SyntaxNode;
    try {
      root = parseGoSource(content);
    } catch (error) {
      errors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    try {
      if (!matchBuildLines(headerComments(root), tags)) continue;
    } catch (error) {
      errors.push(`${path}: invalid //go:build line: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    const packageName = packageClauseName(root);
    if (packageName === undefined) {
      errors.push(`${path}: expected 'package', found EOF`);
      continue;
    }
    if (hasSyntaxErrors(root)) {
      errors.push(`${path}: syntax error`);
    }
    files.push({ path, content, root, packageName, isTest });
  }

  const primary = files.find((f) => !f.isTest) ?? files.find((f) => !f.packageName.endsWith('_test')) ?? files[0];
  if (!primary) return [];
  const name = primary.packageName;

  const unit: ParsedUnit = { id, name, dir: pkgDir.dir, files: [], errors };
  const external: ParsedUnit = { id: `${id}_test`, name: `${name}_test`, dir: pkgDir.dir, files: [], errors: [] };

  for (const file of files) {
    if (file.packageName === name) {
      unit.files.push(file);
    } else if (file.isTest && file.packageName === `${name}_test`) {
      external.files.push(file);
    } else {
      errors.push(
        `found packages ${name} (${basename(primary.path)}) and ${file.packageName} (${basename(file.path)}) in ${pkgDir.dir}`
      );
      unit.files.push(file);
    }
  }

  const units: ParsedUnit[] = [];
  if (unit.files.length > 0) units.push(unit);
  if (external.files.length > 0) units.push(external);
  return units;
}

/**
 * Follow the imports of already parsed units into the vendor directory,
 * transitively, the way the go command resolves vendored imports.
 */
function loadVendoredImports(
  initial: ParsedUnit[],
  vendorDir: string,
  seen: Set<string>,
  tags: Set<string>
): ParsedUnit[] {
  if (!existsSync(vendorDir)) return [];

  const loaded: ParsedUnit[] = [];
  const queue = [...initial];
  for (let unit = queue.shift(); unit; unit = queue.shift()) {
    for (const file of unit.files) {
      for (const spec of importSpecs(file.root)) {
        if (seen.has(spec.path)) continue;
        seen.add(spec.path);

        const dir = join(vendorDir, ...spec.path.split('/'));
        if (!existsSync(dir)) continue;
        const files = listGoFiles(dir);
        if (files.length === 0) continue;

        for (const vendored of parsePackage(spec.path, { dir, relDir: spec.path, files }, tags, false)) {
          loaded.push(vendored);
          queue.push(vendored);
        }
      }
    }
  }
  return loaded;
}

/**
 * Register the unit's files in the position index and resolve its scopes.
 */
function resolveUnit(
  unit: ParsedUnit,
  options: LoadPassOptions,
  importName: (importPath: string) => string
): CompilationUnit {
  const syntax: SourceFile[] = unit.files.map((file) => ({
    path: file.path,
    root: file.root,
    base: options.positions.addFile(file.path, file.content).base,
  }));

  const typesInfo = checkPackage({ pkgPath: unit.id, files: syntax, importName });

  return {
    id: unit.id,
    name: unit.name,
    dir: unit.dir,
    goFiles: unit.files.map((f) => f.path),
    syntax,
    typesInfo,
    positions: options.positions,
    errors: unit.errors,
  };
}
