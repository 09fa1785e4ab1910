/**
 * Diagnostics Collector Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Diagnostics, formatDiagnostic } from '../diagnostics.js';

describe('Diagnostics', () => {
  it('records warnings and forwards them to the logger', () => {
    const warn = vi.fn();
    const diagnostics = new Diagnostics({ warn });

    diagnostics.warn('unit-error', 'broken import', { unitId: 'example.com/demo' });

    expect(diagnostics.all).toEqual([
      { category: 'unit-error', message: 'broken import', unitId: 'example.com/demo' },
    ]);
    expect(warn).toHaveBeenCalledWith('broken import (unit example.com/demo)');
  });

  it('passes debug messages through without recording them', () => {
    const debug = vi.fn();
    const diagnostics = new Diagnostics({ warn: vi.fn(), debug });

    diagnostics.debug('Loaded package example.com/demo: a.go (1 files)');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(diagnostics.all).toEqual([]);
  });

  it('filters by category', () => {
    const diagnostics = new Diagnostics();
    diagnostics.warn('file-read', 'one');
    diagnostics.warn('vendor-missing', 'two');
    diagnostics.warn('file-read', 'three');

    expect(diagnostics.byCategory('file-read').map((d) => d.message)).toEqual(['one', 'three']);
    expect(diagnostics.byCategory('vendor-missing').map((d) => d.message)).toEqual(['two']);
  });
});

describe('formatDiagnostic', () => {
  it('renders the message alone without context', () => {
    expect(formatDiagnostic({ category: 'load-pass', message: 'failed' })).toBe('failed');
  });

  it('renders every known context field', () => {
    expect(
      formatDiagnostic({
        category: 'invalid-span',
        message: 'Invalid offsets for declaration; skipping declaration',
        unitId: 'example.com/demo',
        filePath: '/m/a.go',
        line: 3,
        startOffset: 14,
        endOffset: 26,
        fileLength: 13,
      })
    ).toBe(
      'Invalid offsets for declaration; skipping declaration (unit example.com/demo, /m/a.go:3, offsets 14-26 of 13)'
    );
  });

  it('renders a file without a line', () => {
    expect(
      formatDiagnostic({ category: 'vendor-missing', message: 'missing', filePath: '/m/vendor' })
    ).toBe('missing (/m/vendor)');
  });
});
