/**
 * Diagnostics Collector
 *
 * Recoverable problems found while loading and extracting are recorded
 * here instead of being logged from deep inside library code. The collector
 * forwards every entry to the injected Logger and keeps it for the run
 * summary.
 */

import { silentLogger, type Logger } from './logger.js';

export type DiagnosticCategory =
  | 'vendor-missing'
  | 'load-pass'
  | 'unit-error'
  | 'unit-skipped'
  | 'file-read'
  | 'invalid-span';

/**
 * Where a diagnostic applies. Every field is optional; only what is known
 * is rendered.
 */
export interface DiagnosticContext {
  unitId?: string;
  filePath?: string;
  line?: number;
  startOffset?: number;
  endOffset?: number;
  fileLength?: number;
}

export interface Diagnostic extends DiagnosticContext {
  category: DiagnosticCategory;
  message: string;
}

export class Diagnostics {
  private readonly entries: Diagnostic[] = [];
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  warn(category: DiagnosticCategory, message: string, context: DiagnosticContext = {}): void {
    const diagnostic: Diagnostic = { category, message, ...context };
    this.entries.push(diagnostic);
    this.logger.warn(formatDiagnostic(diagnostic));
  }

  /** Emit a debug-level message; not recorded */
  debug(message: string): void {
    this.logger.debug?.(message);
  }

  get all(): readonly Diagnostic[] {
    return this.entries;
  }

  byCategory(category: DiagnosticCategory): Diagnostic[] {
    return this.entries.filter((d) => d.category === category);
  }
}

/**
 * Render a diagnostic as one line:
 * `<message> (unit <id>, <file>:<line>, offsets <start>-<end> of <length>)`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const parts: string[] = [];
  if (diagnostic.unitId !== undefined) {
    parts.push(`unit ${diagnostic.unitId}`);
  }
  if (diagnostic.filePath !== undefined) {
    parts.push(diagnostic.line !== undefined ? `${diagnostic.filePath}:${diagnostic.line}` : diagnostic.filePath);
  }
  if (diagnostic.startOffset !== undefined && diagnostic.endOffset !== undefined) {
    const length = diagnostic.fileLength !== undefined ? ` of ${diagnostic.fileLength}` : '';
    parts.push(`offsets ${diagnostic.startOffset}-${diagnostic.endOffset}${length}`);
  }
  return parts.length > 0 ? `${diagnostic.message} (${parts.join(', ')})` : diagnostic.message;
}
