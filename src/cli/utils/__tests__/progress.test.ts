/**
 * ProgressReporter Tests
 *
 * Tests the progress display system for different output modes:
 * - Interactive (TTY with spinners)
 * - JSON (NDJSON events)
 * - Non-interactive (simple text)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProgressReporter,
  createProgressReporter,
  type ProgressReporterOptions,
  type StageStats,
  type ExtractionPipelineResult,
  summarize,
} from '../progress.js';

function sampleResult(): ExtractionPipelineResult {
  return {
    projectPath: '/m',
    outputFile: '/m/code_chunks.json',
    records: [],
    chunksCreated: 200,
    chunksWritten: 200,
    bytesWritten: 1024 * 1024,
    load: { projectUnits: 10, vendorUnits: 4, duplicateUnits: 2, totalUnits: 12 },
    extract: {
      unitsProcessed: 12,
      unitsSkipped: 0,
      filesRead: 40,
      filesFailed: 0,
      declarationsSkipped: 0,
      chunksByType: { function: 120, method: 50, type: 20, const: 5, var: 5 },
    },
    totalDurationMs: 30000,
    stageDurations: { loading: 1000, extracting: 5000 },
    warnings: ['Vendor directory not found at /m/vendor; vendored dependencies will not be loaded (/m/vendor)'],
    diagnostics: [],
  };
}

describe('ProgressReporter', () => {
  // Capture console output
  let consoleOutput: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  beforeEach(() => {
    consoleOutput = [];
    console.log = vi.fn((...args) => {
      consoleOutput.push(args.map(String).join(' '));
    });
    console.error = vi.fn((...args) => {
      consoleOutput.push(args.map(String).join(' '));
    });
    console.warn = vi.fn((...args) => {
      consoleOutput.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    console.warn = originalWarn;
    vi.restoreAllMocks();
  });

  describe('JSON mode', () => {
    const jsonOptions: ProgressReporterOptions = {
      json: true,
      verbose: false,
      noColor: false,
      isInteractive: false,
    };

    it('should emit stage_start event', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('loading', 100);

      expect(consoleOutput).toHaveLength(1);
      const event = JSON.parse(consoleOutput[0]!);
      expect(event.type).toBe('stage_start');
      expect(event.stage).toBe('loading');
      expect(event.data.total).toBe(100);
      expect(event.timestamp).toBeDefined();
    });

    it('should emit stage_progress event', async () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('extracting', 50);

      // Wait for throttle to pass
      await new Promise((resolve) => setTimeout(resolve, 150));

      reporter.updateProgress(25, 'example.com/demo/internal/store');

      expect(consoleOutput).toHaveLength(2); // start + progress
      const event = JSON.parse(consoleOutput[1]!);
      expect(event.type).toBe('stage_progress');
      expect(event.stage).toBe('extracting');
      expect(event.data.processed).toBe(25);
      expect(event.data.total).toBe(50);
      expect(event.data.currentFile).toBe('example.com/demo/internal/store');
    });

    it('should emit stage_complete event', () => {
      const reporter = new ProgressReporter(jsonOptions);
      const stats: StageStats = {
        stage: 'extracting',
        processed: 100,
        total: 100,
        durationMs: 5000,
        details: { unitsSkipped: 2 },
      };

      reporter.completeStage(stats);

      expect(consoleOutput).toHaveLength(1);
      const event = JSON.parse(consoleOutput[0]!);
      expect(event.type).toBe('stage_complete');
      expect(event.stage).toBe('extracting');
      expect(event.data.processed).toBe(100);
      expect(event.data.durationMs).toBe(5000);
      expect(event.data.details?.unitsSkipped).toBe(2);
    });

    it('should emit warning event', () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.warn('Invalid offsets for declaration; skipping declaration', 'main.go');

      expect(consoleOutput).toHaveLength(1);
      const event = JSON.parse(consoleOutput[0]!);
      expect(event.type).toBe('warning');
      expect(event.data.message).toBe('Invalid offsets for declaration; skipping declaration');
      expect(event.data.context).toBe('main.go');
    });

    it('should emit complete event on summary', () => {
      const reporter = new ProgressReporter(jsonOptions);
      const result = sampleResult();

      reporter.showSummary(result);

      expect(consoleOutput).toHaveLength(1);
      const event = JSON.parse(consoleOutput[0]!);
      expect(event.type).toBe('complete');
      expect(event.data.result.chunksCreated).toBe(200);
      expect(event.data.result.load.totalUnits).toBe(12);
      expect(event.data.result.records).toBeUndefined();
      expect(event.data.result.diagnostics).toBeUndefined();
    });
  });

  describe('Non-interactive mode', () => {
    const textOptions: ProgressReporterOptions = {
      json: false,
      verbose: false,
      noColor: true, // Disable colors for predictable output
      isInteractive: false,
    };

    it('should output text for stage start', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.startStage('loading', 0);

      expect(consoleOutput).toEqual(['Loading...']);
    });

    it('should output text for stage complete', () => {
      const reporter = new ProgressReporter(textOptions);
      const stats: StageStats = {
        stage: 'extracting',
        processed: 100,
        total: 100,
        durationMs: 1000,
      };

      reporter.completeStage(stats);

      expect(consoleOutput).toEqual(['Extracting complete: 100 chunks']);
    });

    it('should always show warnings', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.warn('Vendor directory not found', '/m/vendor');

      expect(consoleOutput).toEqual(['Warning: Vendor directory not found (/m/vendor)']);
    });

    it('should print the summary', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.showSummary(sampleResult());

      expect(consoleOutput).toContain('  Packages loaded:  12 (10 project, 4 vendored, 2 duplicate)');
      expect(consoleOutput).toContain('  Chunks created:   200');
      expect(consoleOutput).toContain('  Time elapsed:     30.0s');
      expect(consoleOutput).toContain('  Output size:      1.0 MB');
      expect(consoleOutput).toContain('  1 warning(s) during extraction');
    });
  });

  describe('createProgressReporter factory', () => {
    it('should create reporter with defaults', () => {
      const reporter = createProgressReporter();
      expect(reporter).toBeInstanceOf(ProgressReporter);
    });

    it('should create reporter with custom options', () => {
      const reporter = createProgressReporter({
        json: true,
        verbose: true,
      });
      expect(reporter).toBeInstanceOf(ProgressReporter);
    });
  });

  describe('summarize', () => {
    it('drops records and diagnostics', () => {
      const summary = summarize(sampleResult());

      expect('records' in summary).toBe(false);
      expect('diagnostics' in summary).toBe(false);
      expect(summary.chunksWritten).toBe(200);
    });
  });

  describe('update throttling', () => {
    const jsonOptions: ProgressReporterOptions = {
      json: true,
      verbose: false,
      noColor: false,
      isInteractive: false,
    };

    it('should throttle rapid updates', async () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('loading', 100);

      // First update goes through (no previous time)
      reporter.updateProgress(1);

      // These should be throttled (too fast)
      reporter.updateProgress(2);
      reporter.updateProgress(3);
      reporter.updateProgress(4);

      // Should have start + first progress = 2
      expect(consoleOutput).toHaveLength(2);
    });

    it('should emit after throttle delay', async () => {
      const reporter = new ProgressReporter(jsonOptions);
      reporter.startStage('loading', 100);
      reporter.updateProgress(5); // First update

      // Wait for throttle to pass
      await new Promise((resolve) => setTimeout(resolve, 150));
      reporter.updateProgress(10);

      expect(consoleOutput).toHaveLength(3); // start + first + delayed
    });
  });
});
