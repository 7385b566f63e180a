/**
 * Decision Artifacts
 *
 * Writes the machine-readable report and the Markdown summary for
 * downstream jobs.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { generateMarkdownSummary, serializeReport } from '../../engine/summary.ts';
import type { DecisionReport } from '../../engine/types.ts';

export const DECISION_FILE = 'decision.json';
export const SUMMARY_FILE = 'summary.md';

export interface ArtifactPaths {
  readonly decisionPath: string;
  readonly summaryPath: string;
}

export async function writeArtifacts(
  outputDir: string,
  report: DecisionReport,
): Promise<ArtifactPaths> {
  const decisionPath = path.join(outputDir, DECISION_FILE);
  const summaryPath = path.join(outputDir, SUMMARY_FILE);

  // eslint-disable-next-line security/detect-non-literal-fs-filename -- validated by the caller
  await mkdir(outputDir, { recursive: true });
  await writeFile(decisionPath, `${serializeReport(report)}\n`, 'utf8');
  await writeFile(summaryPath, `${generateMarkdownSummary(report)}\n`, 'utf8');

  return { decisionPath, summaryPath };
}
