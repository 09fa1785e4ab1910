/**
 * Build Context Resolution
 *
 * Combines the [loader] config section, the go command's environment
 * variables and command-line tags into the BuildContext used for file
 * selection.
 */

import type { BuildContext } from '../frontend/index.js';
import type { Config } from './schema.js';
import { loadEnv, parseGoflagsTags } from './env.js';

/**
 * Resolve the build context.
 *
 * Precedence, highest first: `cliTags` (for tags only), environment
 * (`GOOS`, `GOARCH`, `GOFLAGS=-tags=...`), config file.
 */
export function resolveBuildContext(loader: Config['loader'], cliTags?: string[]): BuildContext {
  const env = loadEnv();
  return {
    goos: env.GOOS ?? loader.goos,
    goarch: env.GOARCH ?? loader.goarch,
    goVersion: loader.go_version,
    cgoEnabled: loader.cgo_enabled,
    tags: cliTags ?? parseGoflagsTags(env.GOFLAGS) ?? loader.build_tags,
  };
}
