/**
 * Chunk Model Tests
 */

import { describe, it, expect } from 'vitest';
import { chunkId, toRecord, type Chunk, type ChunkBase } from '../types.js';

const BASE: Omit<ChunkBase, 'id' | 'entityName'> = {
  document: 'body',
  filePath: '/src/a.go',
  packageName: 'a',
  isVendored: false,
  accessedSymbols: ['fmt.Println'],
  startLine: 3,
  endLine: 9,
  startOffset: 20,
  endOffset: 80,
};

describe('chunkId', () => {
  it('joins path, lines and entity name', () => {
    expect(chunkId('/src/a.go', 3, 9, 'Run')).toBe('/src/a.go:3-9-Run');
  });
});

describe('toRecord', () => {
  it('serializes a function with the common keys only', () => {
    const chunk: Chunk = { ...BASE, id: '/src/a.go:3-9-Run', entityName: 'Run', entityType: 'function' };

    expect(toRecord(chunk)).toEqual({
      id: '/src/a.go:3-9-Run',
      document: 'body',
      metadata: {
        file_path: '/src/a.go',
        package_name: 'a',
        is_vendored: false,
        entity_type: 'function',
        entity_name: 'Run',
        accessed_symbols: ['fmt.Println'],
      },
    });
  });

  it('adds receiver_type for methods', () => {
    const chunk: Chunk = {
      ...BASE,
      id: 'm',
      entityName: 'a.T.M',
      entityType: 'method',
      receiverType: 'a.T',
    };
    expect(toRecord(chunk).metadata.receiver_type).toBe('a.T');
  });

  it('adds type_category for types', () => {
    const chunk: Chunk = { ...BASE, id: 't', entityName: 'T', entityType: 'type', typeCategory: 'struct' };
    expect(toRecord(chunk).metadata.type_category).toBe('struct');
  });

  it('adds type for values only when known', () => {
    const typed: Chunk = { ...BASE, id: 'v', entityName: 'x', entityType: 'var', valueType: 'int' };
    const untyped: Chunk = { ...BASE, id: 'c', entityName: 'c', entityType: 'const' };

    expect(toRecord(typed).metadata.type).toBe('int');
    expect('type' in toRecord(untyped).metadata).toBe(false);
  });

  it('copies the symbol list', () => {
    const chunk: Chunk = { ...BASE, id: 'f', entityName: 'f', entityType: 'function' };
    const record = toRecord(chunk);
    expect(record.metadata.accessed_symbols).not.toBe(chunk.accessedSymbols);
  });
});
