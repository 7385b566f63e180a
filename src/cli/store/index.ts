export {
  type BaselineStore,
  DEFAULT_BASELINE_DIR,
  DEFAULT_READ_CONCURRENCY,
  FileBaselineStore,
  readBaselines,
} from './baseline-store.ts';
