/**
 * Extraction Pipeline Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { runExtractionPipeline } from '../pipeline.js';
import { TEST_BUILD_CONTEXT, createTempModule, removeTempModule } from '../../test-utils/index.js';

const HELLO = 'package main\n\nimport "fmt"\n\nfunc Hello() {\n\tfmt.Println("hi")\n}\n';

describe('runExtractionPipeline', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) removeTempModule(root);
    root = undefined;
  });

  it('loads, extracts and writes the chunk file', () => {
    root = createTempModule({ 'go.mod': 'module example.com/demo\n', 'main.go': HELLO });
    const outputFile = join(root, 'out', 'chunks.json');
    const onStageStart = vi.fn();
    const onProgress = vi.fn();
    const onStageComplete = vi.fn();
    const warn = vi.fn();

    const result = runExtractionPipeline({
      projectPath: root,
      buildContext: TEST_BUILD_CONTEXT,
      outputFile,
      logger: { warn },
      onStageStart,
      onProgress,
      onStageComplete,
    });

    expect(onStageStart.mock.calls).toEqual([
      ['loading', 0],
      ['extracting', 1],
      ['writing', 1],
    ]);
    expect(onProgress.mock.calls).toEqual([['extracting', 1, 1, 'example.com/demo']]);
    expect(onStageComplete.mock.calls.map((call) => call[0])).toEqual(['loading', 'extracting', 'writing']);

    expect(result.chunksCreated).toBe(1);
    expect(result.chunksWritten).toBe(1);
    expect(result.records[0]?.metadata.entity_name).toBe('Hello');

    const written = readFileSync(outputFile, 'utf-8');
    expect(JSON.parse(written)).toEqual(result.records);
    expect(result.bytesWritten).toBe(Buffer.byteLength(written, 'utf-8'));

    expect(result.diagnostics.map((d) => d.category)).toEqual(['vendor-missing']);
    expect(result.warnings).toHaveLength(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('extracts every declaration of a file longer than 32K characters', () => {
    root = createTempModule({
      'go.mod': 'module example.com/demo\n',
      'small.go': 'package demo\n\nfunc Small() {}\n',
      'big.go': `package demo\n\n${Array.from({ length: 1500 }, (_, i) => `func F${i}() {}`).join('\n')}\n`,
    });

    const result = runExtractionPipeline({ projectPath: root, buildContext: TEST_BUILD_CONTEXT });

    expect(result.chunksCreated).toBe(1501);
    expect(result.diagnostics.map((d) => d.category)).toEqual(['vendor-missing']);
    expect(result.records.map((r) => r.metadata.entity_name)).toContain('Small');
    expect(result.records.map((r) => r.metadata.entity_name)).toContain('F1499');
  });

  it('skips the writing stage without an output file', () => {
    root = createTempModule({ 'go.mod': 'module example.com/demo\n', 'main.go': HELLO });
    const onStageStart = vi.fn();

    const result = runExtractionPipeline({
      projectPath: root,
      buildContext: TEST_BUILD_CONTEXT,
      onStageStart,
    });

    expect(onStageStart.mock.calls.map((call) => call[0])).toEqual(['loading', 'extracting']);
    expect(result.chunksWritten).toBe(0);
    expect(result.bytesWritten).toBe(0);
    expect(result.stageDurations.writing).toBeUndefined();
    expect(result.outputFile).toBeUndefined();
  });
});
