/**
 * CLI Help Text
 *
 * Role:
 *   Format the `--help` output.
 *
 * Responsibilities:
 *   - Describe every option with its default
 *   - Show common invocations
 */

import { DEFAULT_CONFIG_PATH } from '../../../config/loader.ts';
import { DEFAULT_LOG_DIR, DEFAULT_OUTPUT_DIR } from '../../input/args.ts';
import { DEFAULT_BASELINE_DIR } from '../../store/baseline-store.ts';

/**
 * Static help message template. `[CONFIG]`, `[BASELINE]`, `[OUTPUT]` and
 * `[LOGS]` are replaced with the default paths by `showHelp()`.
 */
const HELP_MESSAGE = `
CI Decision Engine

USAGE:
  ci-decide [OPTIONS]

CHANGE SOURCE (exactly one):
  --files <list>            Changed files, comma separated (repeatable)
  --files-from <path>       Newline-delimited list of changed files
  --base <ref> --head <ref> Changed files from git diff between two revisions

OPTIONS:
  --config <path>           Decision config (default: [CONFIG])
  --metrics <path>          JSON array of current metric samples
  --baseline-dir <path>     Baseline history directory (default: [BASELINE])
  --append-baseline         Append current samples to the baseline after evaluation
  --output-dir <path>       Directory for decision.json and summary.md (default: [OUTPUT])
  --log-dir <path>          Directory for the run log (default: [LOGS])
  --structured-logs         Write the run log as JSON lines
  --verbose                 Enable verbose logging (alias: --debug)
  --help                    Show this help message
  --version                 Show version number

EXAMPLES:
  ci-decide --files README.md,docs/intro.md
  ci-decide --base origin/main --head HEAD --metrics bench.json
  ci-decide --files-from changed.txt --metrics bench.json --append-baseline

NOTES:
  • Files no rule matches are unclassified and always force job groups to run
  • Exit code 1 means a metric regressed or the run failed
  • In GitHub Actions, outputs and the step summary are written automatically
`;

/**
 * Build the help message with the default paths filled in.
 */
export function showHelp(): string {
  return HELP_MESSAGE.replace('[CONFIG]', DEFAULT_CONFIG_PATH)
    .replace('[BASELINE]', DEFAULT_BASELINE_DIR)
    .replace('[OUTPUT]', DEFAULT_OUTPUT_DIR)
    .replace('[LOGS]', DEFAULT_LOG_DIR);
}
