/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTempModule, removeTempModule } from '../../test-utils/index.js';
 *
 * const root = createTempModule({ 'go.mod': 'module example.com/demo\n' });
 * afterEach(() => removeTempModule(root));
 * ```
 */

export { resetAll } from './reset.js';
export {
  TEST_BUILD_CONTEXT,
  createTempModule,
  loadSource,
  removeTempModule,
  writeTree,
  type LoadedSource,
} from './go-module.js';
