/**
 * Run Tracing
 *
 * W3C Trace Context identifiers that tie a decision run's log to its report
 * and, when the CI runner exports a `TRACEPARENT`, to the surrounding
 * pipeline trace.
 */

import { randomBytes } from 'node:crypto';

export interface TraceContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly samplingDecision: boolean;
}

export interface TraceContextJSON {
  readonly traceId: string;
  readonly spanId: string;
  readonly sampled: boolean;
  readonly parentSpanId?: string;
}

const TRACEPARENT_PATTERN = /^00-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;
const INVALID_TRACE_ID = '0'.repeat(32);
const INVALID_SPAN_ID = '0'.repeat(16);

/** 32 hex digits. */
export function generateTraceId(): string {
  return randomBytes(16).toString('hex');
}

/** 16 hex digits. */
export function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

export function createTraceContext(traceId?: string, samplingDecision = true): TraceContext {
  return {
    traceId: traceId ?? generateTraceId(),
    spanId: generateSpanId(),
    samplingDecision,
  };
}

/**
 * New span within the parent's trace.
 */
export function createChildTraceContext(parent: TraceContext): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    samplingDecision: parent.samplingDecision,
  };
}

/**
 * @example
 * formatTraceparent(ctx) // "00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01"
 */
export function formatTraceparent(ctx: TraceContext): string {
  return `00-${ctx.traceId}-${ctx.spanId}-${ctx.samplingDecision ? '01' : '00'}`;
}

/**
 * Parse a `traceparent` header value. Returns null when it is malformed or
 * carries the all-zero IDs the format reserves as invalid.
 */
export function parseTraceparent(traceparent: string): TraceContext | null {
  const match = TRACEPARENT_PATTERN.exec(traceparent.trim().toLowerCase());
  if (match === null) {
    return null;
  }

  const [, traceId, spanId, flags] = match;
  if (
    traceId === undefined ||
    spanId === undefined ||
    flags === undefined ||
    traceId === INVALID_TRACE_ID ||
    spanId === INVALID_SPAN_ID
  ) {
    return null;
  }

  // Bit 0 of trace-flags is the sampled flag.
  return { traceId, spanId, samplingDecision: (Number.parseInt(flags, 16) & 1) === 1 };
}

/**
 * Trace context for a run: a child of an upstream `traceparent` when one is
 * given and valid, otherwise a fresh trace.
 */
export function resolveRunTraceContext(traceparent: string | undefined): TraceContext {
  const upstream = traceparent === undefined ? null : parseTraceparent(traceparent);
  return upstream === null ? createTraceContext() : createChildTraceContext(upstream);
}

export function traceContextToJSON(ctx: TraceContext): TraceContextJSON {
  return {
    traceId: ctx.traceId,
    spanId: ctx.spanId,
    sampled: ctx.samplingDecision,
    ...(ctx.parentSpanId === undefined ? {} : { parentSpanId: ctx.parentSpanId }),
  };
}
