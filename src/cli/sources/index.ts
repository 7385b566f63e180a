export {
  type GitDiffOptions,
  listChangedFiles,
  parseFileList,
  readFileList,
} from './changed-files.ts';
export { loadMetricSamples, parseMetricSamples } from './metric-samples.ts';
