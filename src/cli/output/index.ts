/**
 * Output: artifacts, GitHub Actions integration and the terminal report.
 */

export { DECISION_FILE, SUMMARY_FILE, writeArtifacts } from './artifacts.ts';
export { formatGithubOutputs, jobOutputName, publishToGithub } from './github.ts';
export { renderReport, type ReportStreams, supportsColor, type TextSink } from './ui.tsx';
