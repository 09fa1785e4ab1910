/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  output: {
    file: 'code_chunks.json',
    indent: 2,
  },

  // Matches a default `go build` on linux/amd64
  loader: {
    vendor_dir: 'vendor',
    include_tests: false,
    build_tags: [],
    goos: 'linux',
    goarch: 'amd64',
    go_version: '1.22',
    cgo_enabled: true,
    exclude_patterns: [],
  },

  extract: {
    rewrite_qualifiers: true,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.gochunk/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# gochunk configuration
# Location: ~/.gochunk/config.toml (or $GOCHUNK_HOME/config.toml)

[output]
file = "${DEFAULT_CONFIG.output.file}"
indent = ${DEFAULT_CONFIG.output.indent}

# File selection, mirroring the go command's build context.
# GOOS, GOARCH and GOFLAGS=-tags=... in the environment take precedence.
[loader]
vendor_dir = "${DEFAULT_CONFIG.loader.vendor_dir}"
include_tests = ${DEFAULT_CONFIG.loader.include_tests}
build_tags = []
goos = "${DEFAULT_CONFIG.loader.goos}"
goarch = "${DEFAULT_CONFIG.loader.goarch}"
go_version = "${DEFAULT_CONFIG.loader.go_version}"
cgo_enabled = ${DEFAULT_CONFIG.loader.cgo_enabled}
# exclude_patterns = ["internal/generated/", "*_mock.go"]

[extract]
rewrite_qualifiers = ${DEFAULT_CONFIG.extract.rewrite_qualifiers}
`;
