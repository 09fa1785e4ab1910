/**
 * Declaration Extractor
 *
 * Walks the top-level declarations of every compilation unit and carves
 * one chunk per function/method and one chunk per type, const or var
 * binding. Chunk text is sliced from the file's text at the offsets the
 * position index reports; the syntax tree only provides positions.
 *
 * Failures are isolated: a unit without type information, an unreadable
 * file or an out-of-range span is reported on the Diagnostics collector and
 * skipped; everything else is still extracted.
 */

import { readFileSync } from 'node:fs';

import { TOP_LEVEL_DECLARATIONS, declarationSpecs, declaredNames } from '../../frontend/syntax.js';
import type {
  CompilationUnit,
  PositionIndex,
  SourceFile,
  SyntaxNode,
  TypesInfo,
} from '../../frontend/index.js';
import { isVendoredPath, resolveVendorPath } from '../vendor-path.js';
import { Diagnostics } from '../../utils/diagnostics.js';
import { accessedSymbols, typeText } from './resolver.js';
import { applyQualifierReplacements } from './rewriter.js';
import {
  chunkId,
  type Chunk,
  type ChunkBase,
  type EntityType,
  type TypeCategory,
} from './types.js';

/**
 * Options for chunk extraction.
 */
export interface ExtractOptions {
  /** Collector for recoverable problems (default: a silent collector) */
  diagnostics?: Diagnostics;

  /** Vendor directory name beneath the project root (default: vendor) */
  vendorDirName?: string;

  /** Rewrite import aliases to full import paths (default: true) */
  rewriteQualifiers?: boolean;

  /** Called after each unit is processed */
  onUnit?: (unit: CompilationUnit, processed: number, total: number) => void;
}

/**
 * Counters for one extraction run.
 */
export interface ExtractStats {
  unitsProcessed: number;
  unitsSkipped: number;
  filesRead: number;
  filesFailed: number;
  declarationsSkipped: number;
  chunksByType: Record<EntityType, number>;
}

export interface ExtractResult {
  chunks: Chunk[];
  stats: ExtractStats;
}

/**
 * A resolved source range in one file.
 */
interface Span {
  startOffset: number;
  endOffset: number;
  startLine: number;
  endLine: number;
}

/**
 * Per-file state shared by the declarations of one file.
 */
interface FileContext {
  unit: CompilationUnit;
  info: TypesInfo;
  positions: PositionIndex;
  file: SourceFile;
  content: string;
  isVendored: boolean;
  rewrite: boolean;
  diagnostics: Diagnostics;
}

/**
 * Group-level fields copied into every binding of a declaration.
 */
type SharedFields = Pick<ChunkBase, 'filePath' | 'packageName' | 'isVendored' | 'accessedSymbols'>;

/**
 * Extract chunks from loaded compilation units.
 *
 * @param units - Units from the corpus loader
 * @param projectRoot - Module root the units were loaded from
 * @throws VendorPathError if the vendor directory path cannot be resolved
 */
export function extractChunks(
  units: readonly CompilationUnit[],
  projectRoot: string,
  options: ExtractOptions = {}
): ExtractResult {
  const diagnostics = options.diagnostics ?? new Diagnostics();
  const rewrite = options.rewriteQualifiers ?? true;
  const vendorPath = resolveVendorPath(projectRoot, options.vendorDirName);

  const chunks: Chunk[] = [];
  const stats: ExtractStats = {
    unitsProcessed: 0,
    unitsSkipped: 0,
    filesRead: 0,
    filesFailed: 0,
    declarationsSkipped: 0,
    chunksByType: { function: 0, method: 0, type: 0, const: 0, var: 0 },
  };

  units.forEach((unit, index) => {
    const { typesInfo, syntax, positions } = unit;
    if (!typesInfo || !syntax || !positions) {
      stats.unitsSkipped++;
      diagnostics.warn(
        'unit-skipped',
        `Skipping package ${unit.id} due to missing type information, syntax trees, or position index`,
        { unitId: unit.id }
      );
      options.onUnit?.(unit, index + 1, units.length);
      return;
    }

    for (const file of syntax) {
      let content: string;
      try {
        content = readFileSync(file.path, 'utf-8');
      } catch (error) {
        stats.filesFailed++;
        diagnostics.warn(
          'file-read',
          `Error reading file: ${error instanceof Error ? error.message : String(error)}`,
          { unitId: unit.id, filePath: file.path }
        );
        continue;
      }
      stats.filesRead++;

      const ctx: FileContext = {
        unit,
        info: typesInfo,
        positions,
        file,
        content,
        isVendored: isVendoredPath(file.path, vendorPath),
        rewrite,
        diagnostics,
      };

      for (const decl of file.root.namedChildren) {
        if (!TOP_LEVEL_DECLARATIONS.has(decl.type)) continue;
        const produced = extractDeclaration(decl, ctx);
        if (produced === undefined) {
          stats.declarationsSkipped++;
          continue;
        }
        for (const chunk of produced) {
          chunks.push(chunk);
          stats.chunksByType[chunk.entityType]++;
        }
      }
    }

    stats.unitsProcessed++;
    options.onUnit?.(unit, index + 1, units.length);
  });

  return { chunks, stats };
}

/**
 * Chunks for one top-level declaration, or undefined when the declaration
 * itself had to be skipped.
 */
function extractDeclaration(decl: SyntaxNode, ctx: FileContext): Chunk[] | undefined {
  const span = resolveSpan(decl, ctx, 'declaration');
  if (!span) return undefined;

  const shared: SharedFields = {
    filePath: ctx.file.path,
    packageName: ctx.unit.name,
    isVendored: ctx.isVendored,
    accessedSymbols: accessedSymbols(decl, ctx.info),
  };

  switch (decl.type) {
    case 'function_declaration':
    case 'method_declaration':
      return [functionChunk(decl, span, shared, ctx)];

    case 'import_declaration':
      return [];

    default: {
      const chunks: Chunk[] = [];
      for (const spec of declarationSpecs(decl)) {
        const chunk = specChunk(spec, shared, ctx);
        if (chunk) chunks.push(chunk);
      }
      return chunks;
    }
  }
}

function functionChunk(decl: SyntaxNode, span: Span, shared: SharedFields, ctx: FileContext): Chunk {
  const name = decl.childForFieldName('name')?.text ?? '';
  const document = rewriteText(sliceSpan(span, ctx), decl, ctx);

  const receiverType = receiverTypeText(decl, ctx.info);
  if (receiverType !== undefined) {
    const entityName = `${receiverType}.${name}`;
    return {
      ...shared,
      ...span,
      id: chunkId(shared.filePath, span.startLine, span.endLine, entityName),
      document,
      entityType: 'method',
      entityName,
      receiverType,
    };
  }

  return {
    ...shared,
    ...span,
    id: chunkId(shared.filePath, span.startLine, span.endLine, name),
    document,
    entityType: 'function',
    entityName: name,
  };
}

/**
 * Type text of a method's receiver, undefined for plain functions.
 */
function receiverTypeText(decl: SyntaxNode, info: TypesInfo): string | undefined {
  if (decl.type !== 'method_declaration') return undefined;
  const receiver = decl.childForFieldName('receiver');
  const param = receiver?.namedChildren.find((c) => c.type === 'parameter_declaration');
  const type = param?.childForFieldName('type');
  return type ? typeText(type, info) : undefined;
}

/**
 * Chunk for one binding of a declaration group, re-spanned on the binding
 * itself. The group's shared fields are copied, never shared.
 */
function specChunk(spec: SyntaxNode, shared: SharedFields, ctx: FileContext): Chunk | undefined {
  const span = resolveSpan(spec, ctx, 'spec');
  if (!span) return undefined;

  const document = rewriteText(sliceSpan(span, ctx), spec, ctx);
  const base = { ...shared, accessedSymbols: [...shared.accessedSymbols], ...span, document };

  if (spec.type === 'type_spec' || spec.type === 'type_alias') {
    const entityName = spec.childForFieldName('name')?.text ?? '';
    return {
      ...base,
      id: chunkId(shared.filePath, span.startLine, span.endLine, entityName),
      entityType: 'type',
      entityName,
      typeCategory: typeCategory(spec.childForFieldName('type')),
    };
  }

  if (spec.type === 'var_spec' || spec.type === 'const_spec') {
    const entityName = declaredNames(spec)
      .map((n) => n.text)
      .join(', ');
    const valueType = bindingType(spec, ctx.info);
    return {
      ...base,
      id: chunkId(shared.filePath, span.startLine, span.endLine, entityName),
      entityType: spec.type === 'var_spec' ? 'var' : 'const',
      entityName,
      ...(valueType !== undefined ? { valueType } : {}),
    };
  }

  return undefined;
}

function typeCategory(type: SyntaxNode | null): TypeCategory {
  switch (type?.type) {
    case 'struct_type':
      return 'struct';
    case 'interface_type':
      return 'interface';
    default:
      return 'alias_or_basic';
  }
}

/**
 * Declared type of a value binding, else the resolved type of its first
 * initializer.
 */
function bindingType(spec: SyntaxNode, info: TypesInfo): string | undefined {
  const typeNode = spec.childForFieldName('type');
  if (typeNode) {
    return typeText(typeNode, info);
  }
  const values = spec.childForFieldName('value');
  const first = values?.type === 'expression_list' ? values.namedChildren[0] : values;
  return first ? info.typeOf(first) : undefined;
}

/**
 * Offsets and lines of a node, via the shared position index. Spans
 * outside the file text are reported and yield undefined.
 */
function resolveSpan(node: SyntaxNode, ctx: FileContext, what: 'declaration' | 'spec'): Span | undefined {
  const start = ctx.positions.position(ctx.file.base + node.startIndex);
  const end = ctx.positions.position(ctx.file.base + node.endIndex);
  const length = ctx.content.length;

  if (start.offset < 0 || end.offset < 0 || end.offset > length || start.offset > end.offset) {
    ctx.diagnostics.warn('invalid-span', `Invalid offsets for ${what}; skipping ${what}`, {
      unitId: ctx.unit.id,
      filePath: ctx.file.path,
      line: start.line,
      startOffset: start.offset,
      endOffset: end.offset,
      fileLength: length,
    });
    return undefined;
  }

  return {
    startOffset: start.offset,
    endOffset: end.offset,
    startLine: start.line,
    endLine: end.line,
  };
}

function sliceSpan(span: Span, ctx: FileContext): string {
  return ctx.content.slice(span.startOffset, span.endOffset);
}

function rewriteText(text: string, node: SyntaxNode, ctx: FileContext): string {
  return ctx.rewrite ? applyQualifierReplacements(text, node, ctx.info) : text;
}
