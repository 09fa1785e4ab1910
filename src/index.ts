/**
 * gochunk - Library Entry Point
 *
 * The CLI (`gochunk extract <path>`) covers most uses. This module exports
 * the pipeline and its parts for programmatic use.
 *
 * @example Extract in process
 * ```typescript
 * import { loadConfig, resolveBuildContext, runExtractionPipeline } from 'gochunk';
 *
 * const config = loadConfig(false);
 * const result = runExtractionPipeline({
 *   projectPath: '/path/to/module',
 *   buildContext: resolveBuildContext(config.loader),
 * });
 * for (const record of result.records) {
 *   console.log(record.id, record.metadata.accessed_symbols);
 * }
 * ```
 *
 * @packageDocumentation
 */

// Re-export types for library consumers
export type { GlobalOptions, CommandContext } from './cli/types.js';
export type { ExtractionStage, ExtractionPipelineResult, StageStats } from './cli/utils/progress.js';

// Pipeline, loader and chunker
export * from './indexer/index.js';

// Front-end
export {
  TreeSitterFrontend,
  PositionIndex,
  type BuildContext,
  type CompilationUnit,
  type GoFrontend,
  type TypesInfo,
} from './frontend/index.js';

// Output
export { serializeChunks, writeChunks } from './output/index.js';

// Configuration
export { loadConfig, resolveBuildContext, DEFAULT_CONFIG, type Config } from './config/index.js';

// Diagnostics, logging and path validation
export * from './utils/index.js';

// Errors
export * from './errors/index.js';
