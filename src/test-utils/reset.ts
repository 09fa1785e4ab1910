/**
 * Test Utilities - Unified Reset
 *
 * Resets process-wide caches between tests.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';

/**
 * Reset all cached state for test isolation: the parsed environment is
 * re-read on next access.
 */
export function resetAll(): void {
  _clearEnvCache();
}
