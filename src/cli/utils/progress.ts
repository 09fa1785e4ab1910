/**
 * Progress Reporter
 *
 * Manages progress display for extraction runs.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: Simple text output for non-TTY environments
 *
 * Design decisions:
 * - Throttles spinner updates to prevent flickering (100ms minimum)
 * - Truncates file paths to fit terminal width
 * - Respects NO_COLOR environment variable
 * - Detects TTY automatically for appropriate output mode
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { ExtractStats } from '../../indexer/chunker/extractor.js';
import type { ChunkRecord } from '../../indexer/chunker/types.js';
import type { LoadStats } from '../../indexer/loader.js';
import type { Diagnostic } from '../../utils/diagnostics.js';

/**
 * Stages in the extraction pipeline.
 * Order matters - this is the sequence they occur in.
 */
export type ExtractionStage = 'loading' | 'extracting' | 'writing';

/**
 * Human-readable labels for each stage.
 */
const STAGE_ORDER: readonly ExtractionStage[] = ['loading', 'extracting', 'writing'];

const STAGE_LABELS: Record<ExtractionStage, string> = {
  loading: 'Loading',
  extracting: 'Extracting',
  writing: 'Writing',
};

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show detailed per-unit output */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  /** Which stage completed */
  stage: ExtractionStage;

  /** Number of items processed */
  processed: number;

  /** Total items in this stage */
  total: number;

  /** Time taken in milliseconds */
  durationMs: number;

  /** Additional stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * Final result of the extraction pipeline.
 */
export interface ExtractionPipelineResult {
  /** Module root the corpus was loaded from */
  projectPath: string;

  /** Output file, when the writing stage ran */
  outputFile?: string;

  /** Serialized chunks, in extraction order */
  records: ChunkRecord[];

  /** Number of chunks extracted */
  chunksCreated: number;

  /** Number of chunks written to the output file */
  chunksWritten: number;

  /** Size of the output file in bytes */
  bytesWritten: number;

  /** Corpus loader counters */
  load: LoadStats;

  /** Extractor counters */
  extract: ExtractStats;

  /** Total time in milliseconds */
  totalDurationMs: number;

  /** Time breakdown by stage */
  stageDurations: Partial<Record<ExtractionStage, number>>;

  /** Rendered warning diagnostics */
  warnings: string[];

  /** Every recorded diagnostic */
  diagnostics: Diagnostic[];
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: ExtractionStage;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter manages all progress display during extraction.
 *
 * Usage:
 * ```typescript
 * const reporter = new ProgressReporter({ json: false, verbose: false, ... });
 *
 * reporter.startStage('extracting', 12);
 * reporter.updateProgress(3, 'example.com/demo/internal/store');
 * reporter.completeStage({ stage: 'extracting', processed: 140, total: 140, durationMs: 500 });
 *
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: ExtractionStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = 0;
  private verboseLines: string[] = [];

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file path display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    // Apply NO_COLOR if set
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a new stage of the extraction pipeline.
   *
   * @param stage - Which stage is starting
   * @param total - Expected total items (0 if unknown, like during loading)
   */
  startStage(stage: ExtractionStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.verboseLines = [];

    if (this.options.json) {
      this.emitJson({
        type: 'stage_start',
        timestamp: new Date().toISOString(),
        stage,
        data: { total },
      });
      return;
    }

    if (this.options.isInteractive) {
      // Stop any existing spinner
      this.spinner?.stop();

      // Start new spinner
      const label = STAGE_LABELS[stage];
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      // Non-TTY: simple text output
      console.log(`${STAGE_LABELS[stage]}...`);
    }
  }

  /**
   * Update progress within the current stage.
   *
   * @param processed - Number of items processed so far
   * @param currentFile - Current unit or file being processed (optional)
   */
  updateProgress(processed: number, currentFile?: string): void {
    if (!this.currentStage) return;

    // Throttle updates to prevent flickering
    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: {
          processed,
          total: this.currentTotal,
          currentFile,
        },
      });
      return;
    }

    // Build progress text
    let progressText: string;
    if (this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      progressText = `${processed}/${this.currentTotal} (${percentage}%)`;
    } else {
      // Unknown total (loading stage)
      progressText = `Loaded ${processed} packages`;
    }

    // Truncate file path if needed
    const truncatedPath = currentFile
      ? this.truncatePath(currentFile)
      : '';

    if (this.options.isInteractive && this.spinner) {
      // Update spinner text
      this.spinner.text = truncatedPath
        ? `${progressText.padEnd(25)} ${chalk.dim(truncatedPath)}`
        : progressText;
    }

    // Verbose mode: collect file details for later display
    if (this.options.verbose && currentFile) {
      this.verboseLines.push(`  → ${currentFile}`);
    }
  }

  /**
   * Mark the current stage as complete.
   *
   * @param stats - Statistics about the completed stage
   */
  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.options.isInteractive && this.spinner) {
      // Show success with final count
      this.spinner.succeed(
        `${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );

      // In verbose mode, show the collected file details
      if (this.options.verbose && this.verboseLines.length > 0) {
        // Show first 10 and indicate if more
        const linesToShow = this.verboseLines.slice(0, 10);
        for (const line of linesToShow) {
          console.log(chalk.dim(line));
        }
        if (this.verboseLines.length > 10) {
          console.log(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
        }
      }
    } else {
      // Non-TTY
      console.log(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Display a warning message.
   *
   * @param message - Warning message
   * @param context - Optional context (e.g., file path)
   */
  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    // In interactive mode, warnings are only shown in verbose mode
    // (to not clutter the spinner output)
    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  /**
   * Display the final summary after extraction completes.
   *
   * @param result - The complete pipeline result
   */
  showSummary(result: ExtractionPipelineResult): void {
    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { result: summarize(result) },
      });
      return;
    }

    const duration = this.formatDuration(result.totalDurationMs);
    const { load, extract } = result;

    console.log('');
    console.log(chalk.green.bold('Extraction Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Packages loaded:')}  ${load.totalUnits.toLocaleString()} (${load.projectUnits} project, ${load.vendorUnits} vendored, ${load.duplicateUnits} duplicate)`);
    console.log(`  ${chalk.dim('Packages skipped:')} ${extract.unitsSkipped.toLocaleString()}`);
    console.log(`  ${chalk.dim('Files read:')}       ${extract.filesRead.toLocaleString()}${extract.filesFailed > 0 ? ` (${extract.filesFailed} failed)` : ''}`);
    console.log(`  ${chalk.dim('Chunks created:')}   ${result.chunksCreated.toLocaleString()}`);
    console.log(`  ${chalk.dim('Time elapsed:')}     ${duration}`);
    if (result.outputFile !== undefined) {
      console.log(`  ${chalk.dim('Output size:')}      ${this.formatBytes(result.bytesWritten)}`);
    }

    if (this.options.verbose) {
      const byType = Object.entries(extract.chunksByType)
        .filter(([, count]) => count > 0)
        .map(([type, count]) => `${type} ${count}`);
      if (byType.length > 0) {
        console.log(`  ${chalk.dim('By entity type:')}   ${byType.join(', ')}`);
      }
    }

    // Show stage breakdown in verbose mode
    if (this.options.verbose && Object.keys(result.stageDurations).length > 0) {
      console.log('');
      console.log(chalk.dim('  Breakdown:'));
      for (const stage of STAGE_ORDER) {
        const durationMs = result.stageDurations[stage];
        if (durationMs === undefined) continue;
        const stageLabel = STAGE_LABELS[stage];
        const stageDuration = this.formatDuration(durationMs);
        console.log(`    ${chalk.dim(stageLabel + ':')}${' '.repeat(12 - stageLabel.length)}${stageDuration}`);
      }
    }

    // Show warnings if any
    if (result.warnings.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${result.warnings.length} warning(s) during extraction`));
      if (this.options.verbose) {
        for (const warning of result.warnings.slice(0, 5)) {
          console.log(chalk.dim(`    - ${warning}`));
        }
        if (result.warnings.length > 5) {
          console.log(chalk.dim(`    ... and ${result.warnings.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  /**
   * Emit a JSON event to stdout.
   */
  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }

  /**
   * Get the unit name for a stage (files, chunks, etc.).
   */
  private getStageUnit(stage: ExtractionStage): string {
    switch (stage) {
      case 'loading':
        return 'packages';
      case 'extracting':
        return 'chunks';
      case 'writing':
        return 'chunks written';
    }
  }

  /**
   * Truncate a file path to fit display width.
   */
  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }

    // Take the last MAX_PATH_LENGTH - 3 characters and prefix with ...
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }

  /**
   * Format milliseconds as human-readable duration.
   */
  private formatDuration(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    }
    if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(0);
    return `${minutes}m ${seconds}s`;
  }

  /**
   * Format bytes as human-readable size.
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) {
      return `${bytes} B`;
    }
    if (bytes < 1024 * 1024) {
      return `${(bytes / 1024).toFixed(1)} KB`;
    }
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
}

/**
 * Pipeline result without the chunk records, for the JSON summary event.
 */
export function summarize(result: ExtractionPipelineResult): Omit<ExtractionPipelineResult, 'records' | 'diagnostics'> {
  const { records: _records, diagnostics: _diagnostics, ...summary } = result;
  return summary;
}

/**
 * Create a ProgressReporter with sensible defaults.
 *
 * @param options - Partial options (defaults will be applied)
 * @returns Configured ProgressReporter instance
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
