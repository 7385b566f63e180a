/**
 * Input handling: argument parsing and validation helpers.
 */

export { type CLIArgs, DEFAULT_LOG_DIR, DEFAULT_OUTPUT_DIR, parseCliArgs } from './args.ts';
export {
  type ChangeSource,
  ensureSafeDirectoryPath,
  resolveChangeSource,
} from './validation.ts';
