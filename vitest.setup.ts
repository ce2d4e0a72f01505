/**
 * Centralized Vitest Setup
 *
 * - Keeps library logs quiet unless a run sets CONFIDENCE_LOG_LEVEL itself
 * - Restores the global dimension registry to its built-in schemas before
 *   every test, so registrations never leak between tests
 */

import { beforeEach } from 'vitest';
import { resetRegistry } from './src/epistemics/dimension_registry.js';

if (process.env.CONFIDENCE_LOG_LEVEL === undefined) {
  process.env.CONFIDENCE_LOG_LEVEL = 'silent';
}

beforeEach(() => {
  resetRegistry();
});
