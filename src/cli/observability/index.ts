/**
 * Observability: run log and tracing
 */

export {
  createRunLogger,
  DEFAULT_COMPONENT,
  type LogLevel,
  RUN_LOG_FILE,
  type RunLogger,
  type RunLoggerOptions,
} from './logger.ts';
export {
  createChildTraceContext,
  createTraceContext,
  formatTraceparent,
  parseTraceparent,
  resolveRunTraceContext,
  type TraceContext,
  traceContextToJSON,
} from './tracing.ts';
