/**
 * Error type definitions for gochunk
 *
 * These custom error classes carry:
 * - A recovery hint shown to the user
 * - An exit code for programmatic error handling
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, options?: { cause?: unknown }) {
    super(message, options);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (invalid TOML, schema
 * violations, unknown keys).
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: gochunk config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the project path is not a Go module root.
 *
 * Exit code 1: General error
 */
export class ProjectPathError extends CLIError {
  constructor(path: string, reason: string) {
    super(
      `Not a Go module root: ${path} (${reason})`,
      'Pass the directory that contains go.mod',
      1
    );
    this.name = 'ProjectPathError';
  }
}

/**
 * Thrown when the absolute path of the vendor directory cannot be
 * resolved. This is the only condition that aborts a load.
 *
 * Exit code 6: Vendor path error
 */
export class VendorPathError extends CLIError {
  constructor(vendorDir: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Failed to resolve vendor directory ${vendorDir}${detail}`,
      'Check that the project path is accessible',
      6,
      { cause }
    );
    this.name = 'VendorPathError';
  }
}

/**
 * Thrown when the chunk file cannot be written.
 *
 * Exit code 7: Output error
 */
export class OutputError extends CLIError {
  constructor(path: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Failed to write output file ${path}${detail}`,
      'Check that the output directory exists and is writable, or pass --output',
      7,
      { cause }
    );
    this.name = 'OutputError';
  }
}
