/**
 * Tests for config command
 *
 * Tests cover:
 * - Environment overrides of [loader] keys
 * - set/get/list output
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { createConfigCommand, environmentOverride } from '../config.js';
import { _clearEnvCache } from '../../../config/env.js';
import type { CommandContext } from '../../types.js';

vi.mock('../../../config/loader.js', () => ({
  getConfigValue: vi.fn(),
  setConfigValue: vi.fn(),
  listConfig: vi.fn(),
  resetConfig: vi.fn(),
}));

import * as loader from '../../../config/loader.js';

describe('environmentOverride', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('names GOOS and GOARCH for the platform keys', () => {
    vi.stubEnv('GOOS', 'darwin');
    vi.stubEnv('GOARCH', 'arm64');

    expect(environmentOverride('loader.goos')).toBe('GOOS');
    expect(environmentOverride('loader.goarch')).toBe('GOARCH');
    expect(environmentOverride('output.file')).toBeUndefined();
  });

  it('names GOFLAGS only when it carries a -tags flag', () => {
    vi.stubEnv('GOFLAGS', '-mod=vendor');
    expect(environmentOverride('loader.build_tags')).toBeUndefined();

    _clearEnvCache();
    vi.stubEnv('GOFLAGS', '-mod=vendor -tags=integration');
    expect(environmentOverride('loader.build_tags')).toBe('GOFLAGS');
  });

  it('reports nothing when the environment is unset', () => {
    vi.stubEnv('GOOS', '');

    expect(environmentOverride('loader.goos')).toBeUndefined();
  });
});

describe('createConfigCommand', () => {
  let mockContext: CommandContext;

  beforeEach(() => {
    vi.clearAllMocks();
    _clearEnvCache();
    vi.unstubAllEnvs();
    vi.spyOn(console, 'log').mockImplementation(() => {});

    mockContext = {
      options: { verbose: false, json: false },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    _clearEnvCache();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  async function runCommand(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createConfigCommand(() => mockContext));
    program.exitOverride();
    await program.parseAsync(['node', 'test', 'config', ...args]);
  }

  it('warns when the environment shadows the key that was set', async () => {
    vi.stubEnv('GOOS', 'windows');
    vi.mocked(loader.getConfigValue).mockReturnValue('darwin');

    await runCommand(['set', 'loader.goos', 'darwin']);

    expect(loader.setConfigValue).toHaveBeenCalledWith('loader.goos', 'darwin');
    expect(mockContext.warn).toHaveBeenCalledWith('GOOS is set in the environment and takes precedence over loader.goos');
  });

  it('does not warn for keys without an environment override', async () => {
    vi.mocked(loader.getConfigValue).mockReturnValue(false);

    await runCommand(['set', 'extract.rewrite_qualifiers', 'false']);

    expect(loader.setConfigValue).toHaveBeenCalledWith('extract.rewrite_qualifiers', 'false');
    expect(mockContext.warn).not.toHaveBeenCalled();
  });

  it('prints list values in the form set accepts', async () => {
    vi.mocked(loader.getConfigValue).mockReturnValue(['integration', 'netgo']);

    await runCommand(['get', 'loader.build_tags']);

    expect(mockContext.log).toHaveBeenCalledWith('[integration,netgo]');
  });

  it('reports an unknown key', async () => {
    vi.mocked(loader.getConfigValue).mockReturnValue(undefined);

    await runCommand(['get', 'search.top_k']);

    expect(mockContext.error).toHaveBeenCalledWith('Unknown config key: search.top_k');
    expect(process.exitCode).toBe(1);
  });

  it('lists settings as JSON under --json', async () => {
    mockContext.options.json = true;
    vi.mocked(loader.listConfig).mockReturnValue([
      ['output.file', 'code_chunks.json'],
      ['loader.goos', 'linux'],
    ]);

    await runCommand(['list']);

    expect(console.log).toHaveBeenCalledWith(
      JSON.stringify({ 'output.file': 'code_chunks.json', 'loader.goos': 'linux' }, null, 2)
    );
  });

  it('requires --force to reset', async () => {
    await runCommand(['reset']);

    expect(loader.resetConfig).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});
