/**
 * Extraction Pipeline
 *
 * Orchestrates the complete extraction workflow:
 * Load → Extract → Write
 *
 * The pipeline fires stage callbacks and leaves display to the
 * ProgressReporter. It runs synchronously: the corpus is fully loaded
 * before extraction starts, and the output is written once at the end.
 * Recoverable problems become diagnostics; only a vendor path that cannot
 * be resolved or an output file that cannot be written is thrown.
 */

import type { BuildContext, GoFrontend } from '../frontend/index.js';
import { Diagnostics, formatDiagnostic } from '../utils/diagnostics.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { writeChunks } from '../output/index.js';
import { extractChunks } from './chunker/extractor.js';
import { toRecord } from './chunker/types.js';
import { loadCorpus } from './loader.js';
import type { ExtractionStage, StageStats, ExtractionPipelineResult } from '../cli/utils/progress.js';

/**
 * Options for running the extraction pipeline.
 */
export interface ExtractionPipelineOptions {
  /** Absolute path to the module root (contains go.mod) */
  projectPath: string;

  /** Build context used to select files */
  buildContext: BuildContext;

  /** Vendor directory name beneath the project root (default: vendor) */
  vendorDirName?: string;

  /** Load `_test.go` files */
  includeTests?: boolean;

  /** Gitignore-style patterns excluded from loading */
  excludePatterns?: string[];

  /** Rewrite import aliases to full import paths (default: true) */
  rewriteQualifiers?: boolean;

  /** Output file. When omitted the writing stage is skipped */
  outputFile?: string;

  /** JSON indentation of the output file (default: 2) */
  indent?: number;

  /** Front-end override, mainly for tests */
  frontend?: GoFrontend;

  /** Receives every diagnostic as it is recorded */
  logger?: Logger;

  // Progress callbacks
  onStageStart?: (stage: ExtractionStage, total: number) => void;
  onProgress?: (stage: ExtractionStage, processed: number, total: number, current?: string) => void;
  onStageComplete?: (stage: ExtractionStage, stats: StageStats) => void;
}

/**
 * Run the complete extraction pipeline.
 *
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: true });
 *
 * const result = runExtractionPipeline({
 *   projectPath: '/path/to/module',
 *   buildContext,
 *   outputFile: 'code_chunks.json',
 *   logger: { warn: (msg) => reporter.warn(msg) },
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, current) => reporter.updateProgress(processed, current),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 * });
 *
 * reporter.showSummary(result);
 * ```
 *
 * @throws VendorPathError if the vendor directory path cannot be resolved
 * @throws OutputError if the output file cannot be written
 */
export function runExtractionPipeline(options: ExtractionPipelineOptions): ExtractionPipelineResult {
  const { projectPath, onStageStart, onProgress, onStageComplete } = options;

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<ExtractionStage, number>> = {};
  const diagnostics = new Diagnostics(options.logger ?? silentLogger);

  // =========================================================================
  // STAGE 1: LOADING
  // =========================================================================
  const loadStartTime = performance.now();
  onStageStart?.('loading', 0);

  const corpus = loadCorpus(projectPath, {
    buildContext: options.buildContext,
    frontend: options.frontend,
    diagnostics,
    vendorDirName: options.vendorDirName,
    includeTests: options.includeTests,
    excludePatterns: options.excludePatterns,
  });

  stageDurations.loading = Math.round(performance.now() - loadStartTime);
  onStageComplete?.('loading', {
    stage: 'loading',
    processed: corpus.stats.totalUnits,
    total: corpus.stats.totalUnits,
    durationMs: stageDurations.loading,
    details: {
      projectUnits: corpus.stats.projectUnits,
      vendorUnits: corpus.stats.vendorUnits,
      duplicateUnits: corpus.stats.duplicateUnits,
    },
  });

  // =========================================================================
  // STAGE 2: EXTRACTING
  // =========================================================================
  const extractStartTime = performance.now();
  onStageStart?.('extracting', corpus.units.length);

  const extraction = extractChunks(corpus.units, projectPath, {
    diagnostics,
    vendorDirName: options.vendorDirName,
    rewriteQualifiers: options.rewriteQualifiers,
    onUnit: (unit, processed, total) => {
      onProgress?.('extracting', processed, total, unit.id);
    },
  });
  const records = extraction.chunks.map(toRecord);

  stageDurations.extracting = Math.round(performance.now() - extractStartTime);
  onStageComplete?.('extracting', {
    stage: 'extracting',
    processed: records.length,
    total: records.length,
    durationMs: stageDurations.extracting,
    details: {
      unitsProcessed: extraction.stats.unitsProcessed,
      unitsSkipped: extraction.stats.unitsSkipped,
      filesRead: extraction.stats.filesRead,
      filesFailed: extraction.stats.filesFailed,
      declarationsSkipped: extraction.stats.declarationsSkipped,
      chunksByType: extraction.stats.chunksByType,
    },
  });

  // =========================================================================
  // STAGE 3: WRITING
  // =========================================================================
  let chunksWritten = 0;
  let bytesWritten = 0;
  if (options.outputFile !== undefined) {
    const writeStartTime = performance.now();
    onStageStart?.('writing', records.length);

    bytesWritten = writeChunks(records, options.outputFile, options.indent);
    chunksWritten = records.length;

    stageDurations.writing = Math.round(performance.now() - writeStartTime);
    onStageComplete?.('writing', {
      stage: 'writing',
      processed: chunksWritten,
      total: records.length,
      durationMs: stageDurations.writing,
      details: { bytesWritten },
    });
  }

  return {
    projectPath,
    outputFile: options.outputFile,
    records,
    chunksCreated: records.length,
    chunksWritten,
    bytesWritten,
    load: corpus.stats,
    extract: extraction.stats,
    totalDurationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
    warnings: diagnostics.all.map(formatDiagnostic),
    diagnostics: [...diagnostics.all],
  };
}
