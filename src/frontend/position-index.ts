/**
 * Position Index
 *
 * A file set: every file added gets its own disjoint range of global
 * positions, so a single integer identifies a file and an offset within it.
 * Offsets are code-unit offsets into the decoded source text, which is what
 * tree-sitter's Node binding reports as `startIndex`/`endIndex`.
 */

/**
 * A resolved position. Lines and columns are 1-based; an invalid position
 * has an empty filename, offset -1 and line 0.
 */
export interface Position {
  filename: string;
  offset: number;
  line: number;
  column: number;
}

export const INVALID_POSITION: Readonly<Position> = Object.freeze({
  filename: '',
  offset: -1,
  line: 0,
  column: 0,
});

/**
 * A file registered in the index.
 */
export class IndexedFile {
  readonly name: string;
  readonly base: number;
  readonly size: number;
  private readonly lineStarts: number[];

  constructor(name: string, base: number, content: string) {
    this.name = name;
    this.base = base;
    this.size = content.length;
    this.lineStarts = [0];
    for (let i = 0; i < content.length; i++) {
      if (content.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  /** Offset of a global position in this file */
  offset(pos: number): number {
    return pos - this.base;
  }

  /** Resolve an offset to line and column */
  position(offset: number): Position {
    if (offset < 0 || offset > this.size) {
      return { ...INVALID_POSITION };
    }
    // Binary search for the last line start <= offset
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    const lineStart = this.lineStarts[lo] ?? 0;
    return {
      filename: this.name,
      offset,
      line: lo + 1,
      column: offset - lineStart + 1,
    };
  }
}

/**
 * Shared position index for all files loaded in one run.
 */
export class PositionIndex {
  private readonly files: IndexedFile[] = [];
  private readonly byName = new Map<string, IndexedFile>();
  private nextBase = 1;

  /**
   * Register a file. Adding a file that is already registered returns the
   * existing entry so that overlapping load passes agree on positions.
   */
  addFile(name: string, content: string): IndexedFile {
    const existing = this.byName.get(name);
    if (existing && existing.size === content.length) {
      return existing;
    }
    const file = new IndexedFile(name, this.nextBase, content);
    // +1 so that the end position of one file is not the base of the next
    this.nextBase += content.length + 1;
    this.files.push(file);
    this.byName.set(name, file);
    return file;
  }

  /** Find the file containing a global position */
  file(pos: number): IndexedFile | undefined {
    if (pos <= 0) {
      return undefined;
    }
    let lo = 0;
    let hi = this.files.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const candidate = this.files[mid];
      if (!candidate) break;
      if (pos < candidate.base) {
        hi = mid - 1;
      } else if (pos > candidate.base + candidate.size) {
        lo = mid + 1;
      } else {
        return candidate;
      }
    }
    return undefined;
  }

  /** Resolve a global position */
  position(pos: number): Position {
    const file = this.file(pos);
    if (!file) {
      return { ...INVALID_POSITION };
    }
    return file.position(file.offset(pos));
  }
}
