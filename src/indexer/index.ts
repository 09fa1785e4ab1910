/**
 * Indexer Module
 *
 * Loads a Go module and its vendored dependencies and extracts one chunk
 * per top-level declaration.
 *
 * @example
 * ```ts
 * import { runExtractionPipeline } from './indexer';
 *
 * const result = runExtractionPipeline({
 *   projectPath: '/path/to/module',
 *   buildContext,
 *   outputFile: 'code_chunks.json',
 * });
 *
 * console.log(`Extracted ${result.chunksCreated} chunks`);
 * ```
 */

// Pipeline
export { runExtractionPipeline, type ExtractionPipelineOptions } from './pipeline.js';

// Corpus loading
export {
  loadCorpus,
  mergeUnits,
  type LoadCorpusOptions,
  type LoadStats,
  type CorpusLoadResult,
} from './loader.js';

export { DEFAULT_VENDOR_DIR, resolveVendorPath, isVendoredPath } from './vendor-path.js';

// Chunker module
export * from './chunker/index.js';
