/**
 * Config Command
 *
 * Reads and edits ~/.gochunk/config.toml. Keys are `<section>.<name>`
 * with sections [output], [loader] and [extract]:
 *   gochunk config get loader.goos
 *   gochunk config set loader.build_tags [integration,netgo]
 *   gochunk config list
 *   gochunk config path
 *   gochunk config reset --force
 *
 * GOOS, GOARCH and GOFLAGS=-tags=... in the environment win over the
 * matching [loader] keys when a build context is resolved; `set` and
 * `list` point that out.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath } from '../../config/paths.js';
import { getConfigValue, setConfigValue, listConfig, resetConfig } from '../../config/loader.js';
import { loadEnv, parseGoflagsTags } from '../../config/env.js';
import type { CommandContext } from '../types.js';

const EXAMPLES = `
Examples:
  $ gochunk config get output.file
  $ gochunk config set output.indent 4
  $ gochunk config set loader.goos darwin
  $ gochunk config set loader.build_tags [integration,netgo]
  $ gochunk config set extract.rewrite_qualifiers false
`;

/**
 * The environment variable that overrides a config key, when one is set.
 */
export function environmentOverride(key: string): string | undefined {
  const env = loadEnv();
  switch (key) {
    case 'loader.goos':
      return env.GOOS !== undefined ? 'GOOS' : undefined;
    case 'loader.goarch':
      return env.GOARCH !== undefined ? 'GOARCH' : undefined;
    case 'loader.build_tags':
      return parseGoflagsTags(env.GOFLAGS) !== undefined ? 'GOFLAGS' : undefined;
    default:
      return undefined;
  }
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Show or change output, loader and extract settings')
    .addHelpText('after', EXAMPLES);

  configCmd
    .command('get <key>')
    .description('Print one setting (e.g., gochunk config get loader.goarch)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('gochunk config list')} to see the [output], [loader] and [extract] keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Change one setting; lists are written as [a,b] (e.g., gochunk config set output.indent 4)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);
        const stored = getConfigValue(key);
        const override = environmentOverride(key);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: stored, ...(override ? { override } : {}) }));
          return;
        }
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(formatValue(stored))}`);
        if (override) {
          ctx.warn(`${override} is set in the environment and takes precedence over ${key}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List every setting by section')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        let currentSection = '';
        for (const [key, value] of entries) {
          const section = key.split('.')[0] ?? '';
          if (section !== currentSection) {
            if (currentSection !== '') ctx.log('');
            ctx.log(chalk.bold(`[${section}]`));
            currentSection = section;
          }

          const override = environmentOverride(key);
          const note = override ? chalk.dim(` (overridden by ${override})`) : '';
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}${note}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Print the location of config.toml ($GOCHUNK_HOME or ~/.gochunk)')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Rewrite config.toml with the defaults (code_chunks.json, linux/amd64, rewriting on)')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow(`This will overwrite ${getConfigPath()} with the default settings.`));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        resetConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, path: getConfigPath() }));
        } else {
          ctx.log(`${chalk.green('✓')} Restored default settings in ${getConfigPath()}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Render a setting the way it would be typed back into `config set`.
 */
function formatValue(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(String).join(',')}]`;
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }

  process.exitCode = 1;
}
