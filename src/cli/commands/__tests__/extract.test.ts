/**
 * Tests for extract command
 *
 * Tests cover:
 * - Tag list parsing
 * - Option and config precedence
 * - Path validation
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { resolve } from 'node:path';
import { createExtractCommand, parseTagList } from '../extract.js';
import type { CommandContext } from '../../types.js';
import type { ExtractionPipelineResult } from '../../utils/progress.js';

// Note: vi.mock() calls are hoisted to the top of the file by Vitest

vi.mock('../../../indexer/index.js', () => ({
  runExtractionPipeline: vi.fn(),
}));

vi.mock('../../../config/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../config/index.js')>()),
  loadConfig: vi.fn(),
  resolveBuildContext: vi.fn(),
}));

import * as indexer from '../../../indexer/index.js';
import * as config from '../../../config/index.js';
import { FileNotFoundError, ProjectPathError } from '../../../errors/index.js';
import { TEST_BUILD_CONTEXT, createTempModule, removeTempModule } from '../../../test-utils/index.js';

const RESULT: ExtractionPipelineResult = {
  projectPath: '/m',
  records: [],
  chunksCreated: 3,
  chunksWritten: 3,
  bytesWritten: 512,
  load: { projectUnits: 1, vendorUnits: 0, duplicateUnits: 0, totalUnits: 1 },
  extract: {
    unitsProcessed: 1,
    unitsSkipped: 0,
    filesRead: 1,
    filesFailed: 0,
    declarationsSkipped: 0,
    chunksByType: { function: 3, method: 0, type: 0, const: 0, var: 0 },
  },
  totalDurationMs: 40,
  stageDurations: {},
  warnings: [],
  diagnostics: [],
};

describe('parseTagList', () => {
  it('splits on commas and whitespace', () => {
    expect(parseTagList('netgo, osusergo integration')).toEqual(['netgo', 'osusergo', 'integration']);
  });

  it('drops empty entries', () => {
    expect(parseTagList(' , ')).toEqual([]);
  });
});

describe('createExtractCommand', () => {
  let mockContext: CommandContext;
  let root: string;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});

    mockContext = {
      options: { verbose: false, json: false },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    vi.mocked(config.loadConfig).mockReturnValue(structuredClone(config.DEFAULT_CONFIG));
    vi.mocked(config.resolveBuildContext).mockReturnValue(TEST_BUILD_CONTEXT);
    vi.mocked(indexer.runExtractionPipeline).mockReturnValue(RESULT);

    root = createTempModule({ 'go.mod': 'module example.com/demo\n', 'plain/readme.txt': 'x' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempModule(root);
  });

  // Helper to run the command
  async function runCommand(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createExtractCommand(() => mockContext));
    // Prevent Commander from calling process.exit on errors
    program.exitOverride();
    await program.parseAsync(['node', 'test', 'extract', ...args]);
  }

  it('creates command with correct name', () => {
    expect(createExtractCommand(() => mockContext).name()).toBe('extract');
  });

  it('runs the pipeline with config defaults', async () => {
    await runCommand([root]);

    expect(config.resolveBuildContext).toHaveBeenCalledWith(config.DEFAULT_CONFIG.loader, undefined);
    expect(indexer.runExtractionPipeline).toHaveBeenCalledWith(
      expect.objectContaining({
        projectPath: root,
        buildContext: TEST_BUILD_CONTEXT,
        vendorDirName: 'vendor',
        includeTests: false,
        excludePatterns: [],
        rewriteQualifiers: true,
        outputFile: resolve('code_chunks.json'),
        indent: 2,
      })
    );
    expect(mockContext.log).toHaveBeenCalledWith(
      expect.stringContaining(`Successfully extracted 3 code chunks to ${resolve('code_chunks.json')}`)
    );
  });

  it('lets command-line options override the config', async () => {
    await runCommand([
      root,
      '-o',
      'out/chunks.json',
      '--tags',
      'netgo,e2e',
      '--vendor-dir',
      'third_party',
      '--include-tests',
      '--no-rewrite',
    ]);

    expect(config.resolveBuildContext).toHaveBeenCalledWith(config.DEFAULT_CONFIG.loader, ['netgo', 'e2e']);
    expect(indexer.runExtractionPipeline).toHaveBeenCalledWith(
      expect.objectContaining({
        vendorDirName: 'third_party',
        includeTests: true,
        rewriteQualifiers: false,
        outputFile: resolve('out/chunks.json'),
      })
    );
  });

  it('rejects a missing path', async () => {
    await expect(runCommand([`${root}/missing`])).rejects.toBeInstanceOf(FileNotFoundError);
    expect(indexer.runExtractionPipeline).not.toHaveBeenCalled();
  });

  it('rejects a directory without go.mod', async () => {
    await expect(runCommand([`${root}/plain`])).rejects.toBeInstanceOf(ProjectPathError);
    expect(indexer.runExtractionPipeline).not.toHaveBeenCalled();
  });
});
