/**
 * Test Utilities Index
 *
 * Role:
 *   Centralized export point for all test utilities.
 *
 * This file is:
 *   - Test-only infrastructure
 *   - Single import source for test utilities
 *   - Pure re-exports with no logic
 */

export {
  BENCHMARK,
  baselineSeries,
  createDecisionReport,
  createRunInput,
  DOCS_SOURCE_RULES,
  metricSample,
  SKIP_TESTS_ON_DOCS,
} from './fixtures/engine/engine-fixtures.ts';
export { type FakeConsole, fakeConsole, printedLines } from './mocks/console/fake-console.ts';
export { MemoryBaselineStore } from './mocks/store/memory-baseline-store.ts';
export { createDeferred, type Deferred } from './utils/deferred.ts';
export { restoreEnv, snapshotEnv, withEnv } from './utils/env.ts';
export { captureError, captureRejection } from './utils/errors.ts';
export { createTempDir, removeTempDir, writeTempFile } from './utils/temp-utils.ts';
