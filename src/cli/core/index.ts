/**
 * CI Decision Engine — CLI
 *
 * Role:
 *   Command-line surface of the decision engine: reads a change set, the
 *   decision config and metric samples, then publishes the plan and verdicts.
 *
 * Principles:
 *   - Fail fast on invalid input
 *   - Deterministic decisions and exit codes
 *   - Local execution mirrors CI semantics
 */

// Execution re-exports
export { executeWithArgs, type MainDeps, type MainResult } from '../execution/index.ts';
// Input handling re-exports
export {
  type ChangeSource,
  type CLIArgs,
  DEFAULT_LOG_DIR,
  DEFAULT_OUTPUT_DIR,
  ensureSafeDirectoryPath,
  parseCliArgs,
  resolveChangeSource,
} from '../input/index.ts';
// Observability re-exports
export {
  createChildTraceContext,
  createRunLogger,
  createTraceContext,
  formatTraceparent,
  parseTraceparent,
  resolveRunTraceContext,
  type RunLogger,
  type TraceContext,
} from '../observability/index.ts';
// Output re-exports
export {
  formatGithubOutputs,
  publishToGithub,
  renderReport,
  writeArtifacts,
} from '../output/index.ts';
// Source and store re-exports
export { listChangedFiles, loadMetricSamples, readFileList } from '../sources/index.ts';
export {
  type BaselineStore,
  DEFAULT_BASELINE_DIR,
  FileBaselineStore,
  readBaselines,
} from '../store/index.ts';
// Core exports
export {
  type EntrypointDeps,
  main,
  runEntrypoint,
  sanitizeArgs,
} from './entrypoint/entrypoint.ts';
export { showHelp } from './help/formatter.ts';
export { showVersion } from './help/help.ts';
