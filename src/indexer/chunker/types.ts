/**
 * Chunk Types
 *
 * A chunk is one extracted declaration: identity, (possibly rewritten)
 * source text and metadata. Internally the metadata is a tagged union on
 * the entity type; it is flattened to the open key/value mapping only when
 * the chunk is serialized.
 */

/**
 * Kind of declaration a chunk was carved from.
 */
export type EntityType = 'function' | 'method' | 'type' | 'const' | 'var';

/**
 * Shape of a declared type's underlying type.
 */
export type TypeCategory = 'struct' | 'interface' | 'alias_or_basic';

/**
 * Fields shared by every chunk.
 */
export interface ChunkBase {
  /** `<file_path>:<start_line>-<end_line>-<entity_name>` */
  id: string;

  /** Chunk text (after qualifier rewriting, when enabled) */
  document: string;

  /** Path of the originating file */
  filePath: string;

  /** Name from the package clause of the originating unit */
  packageName: string;

  /** True when the file lives under the project's vendor directory */
  isVendored: boolean;

  entityName: string;

  /** Sorted, deduplicated `<import-path>.<identifier>` references */
  accessedSymbols: string[];

  /** 1-based line of the span start */
  startLine: number;

  /** 1-based line of the span end */
  endLine: number;

  /** Span start offset in the file text (not serialized) */
  startOffset: number;

  /** Span end offset in the file text (not serialized) */
  endOffset: number;
}

export interface FunctionChunk extends ChunkBase {
  entityType: 'function';
}

export interface MethodChunk extends ChunkBase {
  entityType: 'method';
  receiverType: string;
}

export interface TypeChunk extends ChunkBase {
  entityType: 'type';
  typeCategory: TypeCategory;
}

export interface ValueChunk extends ChunkBase {
  entityType: 'const' | 'var';
  /** Declared type, else the type of the first initializer; absent when unknown */
  valueType?: string;
}

export type Chunk = FunctionChunk | MethodChunk | TypeChunk | ValueChunk;

/**
 * Open metadata mapping as serialized.
 */
export type ChunkMetadata = Record<string, string | boolean | string[]>;

/**
 * Serialized chunk: `{ id, document, metadata }`.
 */
export interface ChunkRecord {
  id: string;
  document: string;
  metadata: ChunkMetadata;
}

/**
 * Build a chunk id from its location and entity name.
 */
export function chunkId(filePath: string, startLine: number, endLine: number, entityName: string): string {
  return `${filePath}:${startLine}-${endLine}-${entityName}`;
}

/**
 * Flatten a chunk to its serialized record. Kind-specific keys are only
 * present for the kinds that set them.
 */
export function toRecord(chunk: Chunk): ChunkRecord {
  const metadata: ChunkMetadata = {
    file_path: chunk.filePath,
    package_name: chunk.packageName,
    is_vendored: chunk.isVendored,
    entity_type: chunk.entityType,
    entity_name: chunk.entityName,
    accessed_symbols: [...chunk.accessedSymbols],
  };

  switch (chunk.entityType) {
    case 'method':
      metadata.receiver_type = chunk.receiverType;
      break;
    case 'type':
      metadata.type_category = chunk.typeCategory;
      break;
    case 'const':
    case 'var':
      if (chunk.valueType !== undefined) {
        metadata.type = chunk.valueType;
      }
      break;
    case 'function':
      break;
  }

  return { id: chunk.id, document: chunk.document, metadata };
}
