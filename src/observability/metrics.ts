import { performance } from 'node:perf_hooks';
import type { NextFunction, Request, Response } from 'express';

export type RouteSnapshot = {
  route: string;
  requests: number;
  errors: number;
  errorRate: number;
  throughputRps: number;
  p95Ms: number;
  p99Ms: number;
};

export type DependencySnapshot = {
  dependency: string;
  operation: string;
  requests: number;
  errors: number;
  errorRate: number;
  avgMs: number;
};

type CounterWindow = { timestamp: number; count: number; errors: number; durations: number[] };

const WINDOW_MS = 15 * 60 * 1000;
const routeBuckets = new Map<string, CounterWindow[]>();
const dependencyBuckets = new Map<string, CounterWindow[]>();

function trimWindows(windows: CounterWindow[]): CounterWindow[] {
  const floor = Date.now() - WINDOW_MS;
  return windows.filter((item) => item.timestamp >= floor);
}

export function quantile(values: number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.ceil(sorted.length * q) - 1);
  return sorted[Math.max(0, index)] ?? 0;
}

function upsert(map: Map<string, CounterWindow[]>, key: string, durationMs: number, isError: boolean) {
  const minuteStamp = Math.floor(Date.now() / 60000) * 60000;
  const windows = map.get(key) ?? [];
  const current = windows.find((item) => item.timestamp === minuteStamp);
  if (current) {
    current.count += 1;
    current.errors += isError ? 1 : 0;
    current.durations.push(durationMs);
  } else {
    windows.push({ timestamp: minuteStamp, count: 1, errors: isError ? 1 : 0, durations: [durationMs] });
  }
  map.set(key, trimWindows(windows));
}

function summarize(windows: CounterWindow[]) {
  const durations = windows.flatMap((w) => w.durations);
  const requests = windows.reduce((sum, w) => sum + w.count, 0);
  const errors = windows.reduce((sum, w) => sum + w.errors, 0);
  return { durations, requests, errors, errorRate: requests ? errors / requests : 0 };
}

export function nowMs() {
  return performance.now();
}

export function recordRouteMetric(route: string, durationMs: number, statusCode: number) {
  upsert(routeBuckets, route, durationMs, statusCode >= 500);
}

export function recordDependencyMetric(dependency: string, operation: string, durationMs: number, isError: boolean) {
  upsert(dependencyBuckets, `${dependency}:${operation}`, durationMs, isError);
}

export function getRouteSnapshots(): RouteSnapshot[] {
  return [...routeBuckets.entries()].map(([route, windows]) => {
    const { durations, requests, errors, errorRate } = summarize(windows);
    return {
      route,
      requests,
      errors,
      errorRate,
      throughputRps: requests / (WINDOW_MS / 1000),
      p95Ms: quantile(durations, 0.95),
      p99Ms: quantile(durations, 0.99)
    };
  }).sort((a, b) => b.requests - a.requests);
}

export function getDependencySnapshots(): DependencySnapshot[] {
  return [...dependencyBuckets.entries()].map(([key, windows]) => {
    const [dependency, operation] = key.split(':');
    const { durations, requests, errors, errorRate } = summarize(windows);
    const avgMs = durations.length ? durations.reduce((sum, value) => sum + value, 0) / durations.length : 0;
    return {
      dependency: dependency ?? 'unknown',
      operation: operation ?? 'operation',
      requests,
      errors,
      errorRate,
      avgMs
    };
  }).sort((a, b) => b.requests - a.requests);
}

export function resetMetrics() {
  routeBuckets.clear();
  dependencyBuckets.clear();
}

export function createRouteMetricMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = nowMs();
    res.on('finish', () => {
      const route = `${req.method} ${req.baseUrl}${req.route?.path ?? req.path}`;
      recordRouteMetric(route.replace(/\/+/g, '/'), nowMs() - start, res.statusCode);
    });
    next();
  };
}
