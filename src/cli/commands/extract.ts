/**
 * Extract Command
 *
 * Extracts code chunks from a Go module and its vendored dependencies.
 *
 * Usage:
 *   gochunk extract <path>                  Extract to code_chunks.json
 *   gochunk extract . -o chunks.json        Choose the output file
 *   gochunk extract . --tags integration    Select files with extra build tags
 *   gochunk extract . --no-rewrite          Keep import aliases as written
 *   gochunk extract . --json                Output progress as NDJSON
 *
 * The extraction pipeline:
 * 1. Loading - Parse the module's packages and the vendored packages
 * 2. Extracting - Carve one chunk per top-level declaration
 * 3. Writing - Serialize the chunks as a JSON array
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { runExtractionPipeline } from '../../indexer/index.js';
import { loadConfig, resolveBuildContext } from '../../config/index.js';
import { FileNotFoundError, ProjectPathError } from '../../errors/index.js';
import { validateProjectPath } from '../../utils/path-validation.js';

/**
 * Command-specific options.
 */
interface ExtractCommandOptions {
  output?: string;
  vendorDir?: string;
  tags?: string;
  includeTests?: boolean;
  rewrite: boolean;
}

/**
 * Split a comma- or space-separated tag list.
 */
export function parseTagList(value: string): string[] {
  return value
    .split(/[,\s]+/)
    .map((t) => t.trim())
    .filter(Boolean);
}

/**
 * Create the extract command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createExtractCommand(getContext: () => CommandContext): Command {
  return new Command('extract')
    .argument('<path>', 'Path to the Go module root (the directory holding go.mod)')
    .description('Extract code chunks from a Go module and its vendored dependencies')
    .option('-o, --output <file>', 'Output file (default: output.file from config)')
    .option('--vendor-dir <dir>', 'Vendor directory name beneath the module root')
    .option('--tags <list>', 'Comma-separated build tags')
    .option('--include-tests', 'Include _test.go files')
    .option('--no-rewrite', 'Do not rewrite import aliases to full import paths')
    .action((path: string, cmdOptions: ExtractCommandOptions) => {
      const ctx = getContext();

      const validation = validateProjectPath(path);
      if (!validation.valid) {
        if (validation.reason === 'not-found') {
          throw new FileNotFoundError(validation.path);
        }
        throw new ProjectPathError(validation.path, validation.error);
      }
      for (const warning of validation.warnings) {
        ctx.debug(warning);
      }
      const projectPath = validation.normalizedPath;

      const config = loadConfig();
      const buildContext = resolveBuildContext(
        config.loader,
        cmdOptions.tags !== undefined ? parseTagList(cmdOptions.tags) : undefined
      );
      const outputFile = resolve(cmdOptions.output ?? config.output.file);

      ctx.debug(`Module root: ${projectPath}`);
      ctx.debug(`Output file: ${outputFile}`);
      ctx.debug(
        `Build context: ${buildContext.goos}/${buildContext.goarch}, go${buildContext.goVersion}, ` +
          `cgo=${buildContext.cgoEnabled}, tags=[${buildContext.tags.join(', ')}]`
      );

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
        noColor: !!process.env.NO_COLOR,
        isInteractive: process.stdout.isTTY ?? false,
      });

      const result = runExtractionPipeline({
        projectPath,
        buildContext,
        vendorDirName: cmdOptions.vendorDir ?? config.loader.vendor_dir,
        includeTests: cmdOptions.includeTests ?? config.loader.include_tests,
        excludePatterns: config.loader.exclude_patterns,
        rewriteQualifiers: cmdOptions.rewrite && config.extract.rewrite_qualifiers,
        outputFile,
        indent: config.output.indent,

        logger: {
          warn: (message) => reporter.warn(message),
          debug: (message) => ctx.debug(message),
        },
        onStageStart: (stage, total) => {
          reporter.startStage(stage, total);
        },
        onProgress: (stage, processed, total, current) => {
          reporter.updateProgress(processed, current);
        },
        onStageComplete: (stage, stats) => {
          reporter.completeStage(stats);
        },
      });

      reporter.showSummary(result);
      ctx.log(`${chalk.green('✓')} Successfully extracted ${result.chunksWritten} code chunks to ${outputFile}`);
    });
}
