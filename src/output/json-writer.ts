/**
 * JSON Output Writer
 *
 * Serializes chunk records as one pretty-printed JSON array. Metadata is an
 * open mapping, so records are written as they are, key order included.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { OutputError } from '../errors/index.js';
import type { ChunkRecord } from '../indexer/chunker/types.js';

/**
 * Render records as the output file's text (trailing newline included).
 */
export function serializeChunks(records: readonly ChunkRecord[], indent = 2): string {
  return `${JSON.stringify(records, null, indent)}\n`;
}

/**
 * Write records to `outputPath`, creating its parent directory when needed.
 *
 * @returns Number of bytes written
 * @throws OutputError if the file cannot be written
 */
export function writeChunks(records: readonly ChunkRecord[], outputPath: string, indent = 2): number {
  const text = serializeChunks(records, indent);
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, text, 'utf-8');
  } catch (error) {
    throw new OutputError(outputPath, error);
  }
  return Buffer.byteLength(text, 'utf-8');
}
