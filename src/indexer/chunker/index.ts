/**
 * Chunker Module
 *
 * Carves Go declarations into chunks and resolves the symbols they use.
 *
 * @example
 * ```ts
 * import { extractChunks, toRecord } from './chunker';
 *
 * const { chunks, stats } = extractChunks(corpus.units, projectRoot, { diagnostics });
 * const records = chunks.map(toRecord);
 * ```
 */

// Extraction
export {
  extractChunks,
  type ExtractOptions,
  type ExtractStats,
  type ExtractResult,
} from './extractor.js';

// Symbol resolution
export {
  accessedSymbols,
  forEachQualifiedAccess,
  signature,
  typeText,
  type QualifiedAccess,
} from './resolver.js';

// Qualifier rewriting
export { applyQualifierReplacements, applyReplacements, collectQualifiers } from './rewriter.js';

// Types
export {
  chunkId,
  toRecord,
  type Chunk,
  type ChunkBase,
  type ChunkMetadata,
  type ChunkRecord,
  type EntityType,
  type FunctionChunk,
  type MethodChunk,
  type TypeCategory,
  type TypeChunk,
  type ValueChunk,
} from './types.js';
