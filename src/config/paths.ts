/**
 * Centralized Path Definitions
 *
 * Single source of truth for gochunk's own directory paths.
 *
 * Directory structure:
 * ~/.gochunk/          ($GOCHUNK_HOME when set)
 * └── config.toml      (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

import { getEnv } from './env.js';

/**
 * Get the gochunk directory path (~/.gochunk, or $GOCHUNK_HOME)
 * @returns Absolute path to the gochunk directory
 */
export function getGochunkDir(): string {
  return getEnv('GOCHUNK_HOME') ?? join(homedir(), '.gochunk');
}

/**
 * Get the config file path (~/.gochunk/config.toml)
 * @returns Absolute path to the TOML config file
 */
export function getConfigPath(): string {
  return join(getGochunkDir(), 'config.toml');
}
