/**
 * Trace Context
 *
 * AsyncLocalStorage-based context so every log line emitted while handling a
 * batch pass or a single user's delivery cycle carries the same ids.
 *
 * - Scheduled batch pass: batch id is the trace root.
 * - Per-user cycle inside a batch: child span, batch id as correlationId.
 * - On-demand cycle: its own trace root.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface TraceContext {
  /** Root trace id */
  traceId: string;
  /** Groups work started by the same batch pass */
  correlationId?: string;
  /** Span of the caller */
  parentId?: string;
  /** Span of this operation */
  spanId?: string;
}

const storage = new AsyncLocalStorage<TraceContext>();

/**
 * Run `fn` with trace context. Async work started inside inherits it.
 */
export function withTraceContext<T>(context: TraceContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * Current trace context, or undefined outside withTraceContext.
 */
export function getTraceContext(): TraceContext | undefined {
  return storage.getStore();
}

function generateSpanId(): string {
  return `root_${randomUUID().slice(0, 8)}`;
}

export function createTraceContext(
  id: string,
  options: { correlationId?: string; parentId?: string; spanId?: string } = {}
): TraceContext {
  const result: TraceContext = {
    traceId: id,
    spanId: options.spanId ?? generateSpanId(),
  };
  if (options.correlationId !== undefined) {
    result.correlationId = options.correlationId;
  }
  if (options.parentId !== undefined) {
    result.parentId = options.parentId;
  }
  return result;
}

/**
 * Context for one user's cycle. Inside a batch the cycle joins the batch
 * trace; outside one it starts a new root.
 */
export function createUserCycleContext(userId: number): TraceContext {
  const parent = getTraceContext();
  const spanId = `user_${String(userId)}`;

  if (!parent) {
    return createTraceContext(randomUUID(), { spanId });
  }

  const options: { correlationId: string; spanId: string; parentId?: string } = {
    correlationId: parent.correlationId ?? parent.traceId,
    spanId,
  };
  if (parent.spanId !== undefined) {
    options.parentId = parent.spanId;
  }
  return createTraceContext(parent.traceId, options);
}
