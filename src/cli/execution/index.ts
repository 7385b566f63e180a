/**
 * Execution: one decision run from parsed arguments to exit code.
 */

export { executeWithArgs, type MainDeps, type MainResult } from './execution.ts';
