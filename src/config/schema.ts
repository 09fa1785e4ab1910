/**
 * Configuration Schema
 *
 * Defines the shape of ~/.gochunk/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Output configuration
 * Controls where and how the chunk file is written
 */
export const OutputConfigSchema = z.object({
  file: z.string().min(1).describe('Output file name, relative to the working directory'),
  indent: z
    .number()
    .int()
    .min(0)
    .max(8)
    .describe('JSON indentation width (0 writes a single line)'),
});

/**
 * Loader configuration
 * Controls package discovery and the build context used to select files
 */
export const LoaderConfigSchema = z.object({
  vendor_dir: z.string().min(1).describe('Vendored dependency directory beneath the project root'),
  include_tests: z.boolean().describe('Load _test.go files'),
  build_tags: z.array(z.string()).describe('Extra build tags (like go build -tags)'),
  goos: z.string().min(1).describe('Target operating system for file selection'),
  goarch: z.string().min(1).describe('Target architecture for file selection'),
  go_version: z
    .string()
    .regex(/^1\.\d+$/, 'Expected a Go release such as "1.22"')
    .describe('Go release whose go1.N build tags are satisfied'),
  cgo_enabled: z.boolean().describe('Whether the cgo build tag is satisfied'),
  exclude_patterns: z
    .array(z.string())
    .describe('Gitignore-style patterns of files to leave out, relative to each load root'),
});

/**
 * Extraction configuration
 */
export const ExtractConfigSchema = z.object({
  rewrite_qualifiers: z
    .boolean()
    .describe('Rewrite import aliases in chunk text to full import paths'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  output: OutputConfigSchema,
  loader: LoaderConfigSchema,
  extract: ExtractConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
