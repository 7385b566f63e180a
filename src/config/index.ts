export {
  buildDecisionConfig,
  DEFAULT_CONFIG_PATH,
  type DecisionConfig,
  loadDecisionConfig,
  type ParseOptions,
  parseDecisionConfig,
} from './loader.ts';
export {
  decisionConfigSchema,
  METRIC_NAME_PATTERN,
  metricSampleInputSchema,
  metricSampleSchema,
  type RawDecisionConfig,
} from './schema.ts';
