/**
 * Run Logger
 *
 * Role:
 *   Deterministic, auditable log of one decision run, correlated with the
 *   report through a trace context.
 *
 * Guarantees:
 *   - One log file per run: `<logDir>/decision.log`
 *   - Entries are written in call order, one line per message line
 *   - Plain mode prefixes every line with timestamp, component and trace ID
 *   - Structured mode writes one JSON object per line
 *
 * Non-goals:
 *   - No console output (the CLI owns the console)
 *   - No decisions
 */

import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { PassThrough, pipeline, Transform } from 'node:stream';
import { promisify } from 'node:util';

import { createTraceContext, type TraceContext, traceContextToJSON } from './tracing.ts';

const pipelineAsync = promisify(pipeline);

export const RUN_LOG_FILE = 'decision.log';
export const DEFAULT_COMPONENT = 'ci-decide';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface RunLoggerOptions {
  readonly logDir: string;
  readonly structured?: boolean;
  /** Entries below this level are dropped (default `info`). */
  readonly level?: LogLevel;
  readonly component?: string;
  /** Generated when absent. */
  readonly traceContext?: TraceContext;
  readonly clock?: () => Date;
}

export interface RunLogger {
  readonly logPath: string;
  readonly traceContext: TraceContext;
  log(level: LogLevel, message: string, component?: string): void;
  debug(message: string, component?: string): void;
  info(message: string, component?: string): void;
  warn(message: string, component?: string): void;
  error(message: string, component?: string): void;
  /** Flush and close the log file. Rejects when writing failed. */
  close(): Promise<void>;
}

interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
}

/* -------------------------------------------------------------------------- */
/* Formatting                                                                 */
/* -------------------------------------------------------------------------- */

type LineFormatter = (entry: LogEntry, line: string) => string;

/**
 * `[timestamp] [component] [trace=xxxxxxxx] WARN: message`; info lines carry
 * no level marker.
 */
function createPlainFormatter(traceContext: TraceContext): LineFormatter {
  const trace = `[trace=${traceContext.traceId.slice(0, 8)}]`;
  return (entry, line) => {
    const level = entry.level === 'info' ? '' : `${entry.level.toUpperCase()}: `;
    const suffix = line.length === 0 && level === '' ? '' : ` ${level}${line}`;
    return `[${entry.timestamp}] [${entry.component}] ${trace}${suffix}`;
  };
}

function createStructuredFormatter(traceContext: TraceContext): LineFormatter {
  const trace = traceContextToJSON(traceContext);
  return (entry, line) =>
    JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      message: line,
      ...trace,
    });
}

/**
 * Object-mode transform turning entries into newline-terminated lines.
 * Multi-line messages produce one formatted line each.
 */
function createFormattingTransform(format: LineFormatter): Transform {
  return new Transform({
    writableObjectMode: true,
    transform(entry: LogEntry, _enc, cb): void {
      for (const line of entry.message.split(/\r?\n/)) {
        this.push(`${format(entry, line)}\n`);
      }
      cb();
    },
  });
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Open the run log. The file is truncated; one log per run.
 */
export async function createRunLogger(options: RunLoggerOptions): Promise<RunLogger> {
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  await mkdir(options.logDir, { recursive: true });

  const logPath = path.join(options.logDir, RUN_LOG_FILE);
  const traceContext = options.traceContext ?? createTraceContext();
  const minimum = LEVEL_RANK[options.level ?? 'info'];
  const defaultComponent = options.component ?? DEFAULT_COMPONENT;
  const clock = options.clock ?? ((): Date => new Date());

  const source = new PassThrough({ objectMode: true });
  const format =
    options.structured === true
      ? createStructuredFormatter(traceContext)
      : createPlainFormatter(traceContext);
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  const writeStream = createWriteStream(logPath, { flags: 'w' });

  let failure: unknown;
  const done = pipelineAsync(source, createFormattingTransform(format), writeStream).catch(
    (error: unknown) => {
      failure = error;
    },
  );
  let closed = false;

  const log = (level: LogLevel, message: string, component = defaultComponent): void => {
    if (closed || LEVEL_RANK[level] < minimum) {
      return;
    }
    const entry: LogEntry = { timestamp: clock().toISOString(), level, component, message };
    source.write(entry);
  };

  return {
    logPath,
    traceContext,
    log,
    debug: (message, component) => log('debug', message, component),
    info: (message, component) => log('info', message, component),
    warn: (message, component) => log('warn', message, component),
    error: (message, component) => log('error', message, component),
    async close(): Promise<void> {
      if (!closed) {
        closed = true;
        source.end();
      }
      await done;
      if (failure !== undefined) {
        throw failure;
      }
    },
  };
}
