/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Recoverable-problem collection
export {
  Diagnostics,
  formatDiagnostic,
  type Diagnostic,
  type DiagnosticCategory,
  type DiagnosticContext,
} from './diagnostics.js';

// Injected logging
export { consoleLogger, silentLogger, type Logger } from './logger.js';

// Module root validation
export {
  validateProjectPath,
  type PathRejection,
  type PathValidationOptions,
  type PathValidationResult,
} from './path-validation.js';
