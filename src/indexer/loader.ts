/**
 * Corpus Loader
 *
 * Builds the deduplicated list of compilation units for a project: one
 * pass over the module root (own packages plus vendored packages they
 * import) and one pass over the vendor directory (every vendored package).
 * Both passes share one position index. Load errors are reported and the
 * units a pass did produce are kept.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';

import {
  PositionIndex,
  TreeSitterFrontend,
  type BuildContext,
  type CompilationUnit,
  type GoFrontend,
  type LoadPassOptions,
  type LoadPassResult,
} from '../frontend/index.js';
import { Diagnostics } from '../utils/diagnostics.js';
import { DEFAULT_VENDOR_DIR, resolveVendorPath } from './vendor-path.js';

/**
 * Options for loading a corpus.
 */
export interface LoadCorpusOptions {
  /** Build context used to select files */
  buildContext: BuildContext;

  /** Front-end to load packages with (default: TreeSitterFrontend) */
  frontend?: GoFrontend;

  /** Collector for recoverable problems (default: a silent collector) */
  diagnostics?: Diagnostics;

  /** Vendor directory name beneath the project root (default: vendor) */
  vendorDirName?: string;

  /** Load `_test.go` files */
  includeTests?: boolean;

  /** Gitignore-style patterns excluded from both passes */
  excludePatterns?: string[];
}

/**
 * Counters for one load.
 */
export interface LoadStats {
  /** Units produced by the project pass */
  projectUnits: number;
  /** Units produced by the vendor pass */
  vendorUnits: number;
  /** Units dropped because an earlier unit had the same id */
  duplicateUnits: number;
  /** Units in the merged list */
  totalUnits: number;
}

export interface CorpusLoadResult {
  units: CompilationUnit[];
  positions: PositionIndex;
  /** Absolute vendor directory path */
  vendorPath: string;
  stats: LoadStats;
}

/** Number of files listed per unit in the debug listing */
const LISTED_FILES = 3;

/**
 * Load the project's own packages and its vendored dependencies.
 *
 * @param projectRoot - Absolute module root (contains go.mod)
 * @throws VendorPathError if the vendor directory path cannot be resolved
 */
export function loadCorpus(projectRoot: string, options: LoadCorpusOptions): CorpusLoadResult {
  const diagnostics = options.diagnostics ?? new Diagnostics();
  const frontend = options.frontend ?? new TreeSitterFrontend();
  const vendorDirName = options.vendorDirName ?? DEFAULT_VENDOR_DIR;
  const vendorPath = resolveVendorPath(projectRoot, vendorDirName);

  const vendorExists = existsSync(join(projectRoot, vendorDirName));
  if (!vendorExists) {
    diagnostics.warn(
      'vendor-missing',
      `Vendor directory not found at ${vendorPath}; vendored dependencies will not be loaded`,
      { filePath: vendorPath }
    );
  }

  const positions = new PositionIndex();
  const passOptions: Omit<LoadPassOptions, 'mode'> = {
    positions,
    buildContext: options.buildContext,
    includeTests: options.includeTests,
    excludePatterns: options.excludePatterns,
    vendorDirName,
  };

  diagnostics.debug(`Loading project packages from ${projectRoot}`);
  const projectUnits = runPass(frontend, projectRoot, { ...passOptions, mode: 'project' }, 'project', diagnostics);

  let vendorUnits: CompilationUnit[] = [];
  if (vendorExists) {
    diagnostics.debug(`Loading vendored packages from ${vendorPath}`);
    vendorUnits = runPass(frontend, vendorPath, { ...passOptions, mode: 'vendor' }, 'vendored', diagnostics);
  }

  const { units, duplicates } = mergeUnits(projectUnits, vendorUnits);

  for (const unit of units) {
    const files = unit.goFiles.slice(0, LISTED_FILES).join(', ');
    const more = unit.goFiles.length > LISTED_FILES ? `, ... (${unit.goFiles.length} files)` : '';
    diagnostics.debug(`Loaded package ${unit.id}: ${files}${more}`);
  }

  return {
    units,
    positions,
    vendorPath,
    stats: {
      projectUnits: projectUnits.length,
      vendorUnits: vendorUnits.length,
      duplicateUnits: duplicates,
      totalUnits: units.length,
    },
  };
}

/**
 * Run one load pass. A pass error is reported and whatever units the pass
 * produced are returned.
 */
function runPass(
  frontend: GoFrontend,
  dir: string,
  options: LoadPassOptions,
  label: string,
  diagnostics: Diagnostics
): CompilationUnit[] {
  let result: LoadPassResult;
  try {
    result = frontend.load(dir, options);
  } catch (error) {
    diagnostics.warn('load-pass', `Error loading ${label} packages: ${errorMessage(error)}`, { filePath: dir });
    return [];
  }

  if (result.error) {
    diagnostics.warn('load-pass', `Error loading ${label} packages: ${result.error.message}`, { filePath: dir });
  }
  for (const unit of result.units) {
    for (const message of unit.errors) {
      diagnostics.warn('unit-error', message, { unitId: unit.id });
    }
  }
  return result.units;
}

/**
 * Concatenate unit lists, keeping the first unit of each id.
 */
export function mergeUnits(
  ...lists: ReadonlyArray<readonly CompilationUnit[]>
): { units: CompilationUnit[]; duplicates: number } {
  const seen = new Set<string>();
  const units: CompilationUnit[] = [];
  let duplicates = 0;

  for (const list of lists) {
    for (const unit of list) {
      if (seen.has(unit.id)) {
        duplicates++;
        continue;
      }
      seen.add(unit.id);
      units.push(unit);
    }
  }
  return { units, duplicates };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
