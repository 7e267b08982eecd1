import { AsyncLocalStorage } from 'node:async_hooks';
import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { nowMs, recordDependencyMetric } from './metrics.js';

export type TraceContext = {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
};

const traceStore = new AsyncLocalStorage<TraceContext>();

function randomHex(size: number) {
  return crypto.randomBytes(size).toString('hex');
}

export function getTraceContext() {
  return traceStore.getStore();
}

export function parseTraceparent(header: string | undefined): string | null {
  if (!header) return null;
  const traceId = header.split('-')[1];
  return traceId && /^[0-9a-f]{32}$/.test(traceId) ? traceId : null;
}

export function createTraceMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const traceId = parseTraceparent(req.header('traceparent')) ?? randomHex(16);
    const spanId = randomHex(8);
    const ctx: TraceContext = { traceId, spanId };
    res.setHeader('traceparent', `00-${traceId}-${spanId}-01`);
    traceStore.run(ctx, next);
  };
}

/**
 * Runs an outbound call inside a child span and records its latency and
 * outcome in the dependency metrics window.
 *
 * `isFailure` lets callers that resolve instead of throwing (the failure-risk
 * probe hands back a sentinel) still count the call as an error.
 */
export async function instrumentDependency<T>(
  dependency: string,
  operation: string,
  fn: () => Promise<T>,
  isFailure: (output: T) => boolean = () => false
): Promise<T> {
  const parent = traceStore.getStore();
  const context: TraceContext = {
    traceId: parent?.traceId ?? randomHex(16),
    spanId: randomHex(8),
    parentSpanId: parent?.spanId
  };

  const start = nowMs();

  return traceStore.run(context, async () => {
    try {
      const output = await fn();
      recordDependencyMetric(dependency, operation, nowMs() - start, isFailure(output));
      return output;
    } catch (error) {
      recordDependencyMetric(dependency, operation, nowMs() - start, true);
      throw error;
    }
  });
}
