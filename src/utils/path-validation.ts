/**
 * Path Validation Utilities
 *
 * Validation of the module root handed to `gochunk extract`, with
 * structured results.
 */

import { join, resolve } from 'node:path';
import { accessSync, constants, existsSync, realpathSync, statSync } from 'node:fs';

// ============================================================================
// Types
// ============================================================================

/**
 * Why a path was rejected.
 */
export type PathRejection = 'not-found' | 'unresolvable' | 'not-directory' | 'unreadable' | 'no-module';

/**
 * Result of path validation.
 *
 * Uses discriminated union to force callers to handle both success and failure.
 * Warnings are returned even on success for non-fatal issues.
 */
export type PathValidationResult =
  | { valid: true; normalizedPath: string; warnings: string[] }
  | { valid: false; reason: PathRejection; path: string; error: string; hint: string };

/**
 * Configuration options for path validation.
 */
export interface PathValidationOptions {
  /** Whether to check read permissions (default: true) */
  checkReadable?: boolean;
  /** Module marker file expected at the root (default: go.mod) */
  moduleFile?: string;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate a Go module root.
 *
 * Checks, in order:
 * 1. Path existence
 * 2. Symlink resolution (detects loops)
 * 3. Is a directory (not a file)
 * 4. Read permissions
 * 5. Module marker file present
 *
 * @example
 * const result = validateProjectPath('./my-module');
 * if (result.valid) {
 *   console.log(`Using path: ${result.normalizedPath}`);
 * } else {
 *   console.error(result.error);
 * }
 */
export function validateProjectPath(
  inputPath: string,
  options: PathValidationOptions = {}
): PathValidationResult {
  const { checkReadable = true, moduleFile = 'go.mod' } = options;
  const warnings: string[] = [];

  const absolutePath = resolve(inputPath);

  if (!existsSync(absolutePath)) {
    return {
      valid: false,
      reason: 'not-found',
      path: absolutePath,
      error: `Path does not exist: ${absolutePath}`,
      hint: 'Check the path and try again. Use an absolute path to avoid ambiguity.',
    };
  }

  let realPath: string;
  try {
    realPath = realpathSync(absolutePath);
  } catch (error) {
    const loop = error instanceof Error && 'code' in error && error.code === 'ELOOP';
    return {
      valid: false,
      reason: 'unresolvable',
      path: absolutePath,
      error: loop ? `Symlink loop detected at: ${absolutePath}` : `Cannot resolve path: ${absolutePath}`,
      hint: loop
        ? 'The path contains circular symlinks. Remove or fix the symlink loop.'
        : `System error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!statSync(realPath).isDirectory()) {
    return {
      valid: false,
      reason: 'not-directory',
      path: realPath,
      error: `Path is not a directory: ${realPath}`,
      hint: 'gochunk extract requires the module root directory, not a file.',
    };
  }

  if (checkReadable) {
    try {
      accessSync(realPath, constants.R_OK);
    } catch {
      return {
        valid: false,
        reason: 'unreadable',
        path: realPath,
        error: `Permission denied: cannot read ${realPath}`,
        hint: 'Check file permissions. You may need to run: chmod +r <path>',
      };
    }
  }

  if (!existsSync(join(realPath, moduleFile))) {
    return {
      valid: false,
      reason: 'no-module',
      path: realPath,
      error: `No ${moduleFile} found in ${realPath}`,
      hint: `Run gochunk from the directory that contains ${moduleFile}.`,
    };
  }

  if (absolutePath !== realPath) {
    warnings.push(`Symlink resolved: ${absolutePath} -> ${realPath}`);
  }

  return {
    valid: true,
    normalizedPath: realPath,
    warnings,
  };
}
