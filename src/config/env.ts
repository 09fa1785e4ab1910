/**
 * Environment Variable Handler
 *
 * Reads the environment variables gochunk honours. Supports .env files
 * for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

/**
 * Environment variable schema. Empty strings count as unset.
 */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

export const EnvSchema = z.object({
  /** Directory holding config.toml (default ~/.gochunk) */
  GOCHUNK_HOME: optionalString,
  GOOS: optionalString,
  GOARCH: optionalString,
  /** Only the -tags flag is read */
  GOFLAGS: optionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment variables (loaded once at first access).
 * _clearEnvCache() resets it for tests.
 */
let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    GOCHUNK_HOME: process.env.GOCHUNK_HOME,
    GOOS: process.env.GOOS,
    GOARCH: process.env.GOARCH,
    GOFLAGS: process.env.GOFLAGS,
  });
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Extract the build tags named by a -tags flag in GOFLAGS.
 * Accepts `-tags=a,b`, `--tags=a,b` and the older space-separated list.
 *
 * @returns The tags, or undefined when GOFLAGS sets no -tags flag
 */
export function parseGoflagsTags(goflags: string | undefined): string[] | undefined {
  if (!goflags) return undefined;
  for (const flag of goflags.split(/\s+/)) {
    const match = /^--?tags=(.*)$/.exec(flag);
    if (!match) continue;
    const value = match[1] ?? '';
    return value
      .split(value.includes(',') ? ',' : ' ')
      .map((t) => t.trim())
      .filter((t) => t !== '');
  }
  return undefined;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
