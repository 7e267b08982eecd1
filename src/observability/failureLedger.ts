import type { ExternalProviderErrorCode } from '../errors/ExternalProviderError.js';

export type FailureSource = 'prediction_api' | 'client' | 'server';

export type FailedRequest = {
  requestId: string | null;
  route: string;
  status: number;
  code: string;
  message: string;
  at: number;
};

export type FailureGroup = {
  source: FailureSource;
  code: string;
  count: number;
  routes: string[];
  statuses: number[];
  last_seen_at: string;
  last_message: string;
  last_request_id: string | null;
};

export type UpstreamFailureSummary = {
  total: number;
  by_code: Record<ExternalProviderErrorCode, number>;
};

const MAX_ENTRIES = 2000;
const entries: FailedRequest[] = [];

const UPSTREAM_CODES: readonly ExternalProviderErrorCode[] = [
  'UPSTREAM_CONNECTION_FAILED',
  'UPSTREAM_TIMEOUT',
  'UPSTREAM_BAD_STATUS',
  'UPSTREAM_INVALID_RESPONSE'
];

function isUpstreamCode(code: string): code is ExternalProviderErrorCode {
  return UPSTREAM_CODES.some((known) => known === code);
}

export function failureSource(entry: Pick<FailedRequest, 'code' | 'status'>): FailureSource {
  if (isUpstreamCode(entry.code)) return 'prediction_api';
  return entry.status < 500 ? 'client' : 'server';
}

export function recordFailedRequest(entry: FailedRequest) {
  if (entries.length >= MAX_ENTRIES) {
    entries.shift();
  }
  entries.push(entry);
}

function entriesSince(sinceMs: number) {
  const cutoff = Date.now() - sinceMs;
  return entries.filter((entry) => entry.at >= cutoff);
}

/** Failed requests grouped by where they came from and their error code, busiest first. */
export function getFailureGroups(sinceMs: number, limit = 10): FailureGroup[] {
  const groups = new Map<string, FailureGroup>();

  for (const entry of entriesSince(sinceMs)) {
    const source = failureSource(entry);
    const key = `${source}:${entry.code}`;
    const lastSeen = new Date(entry.at).toISOString();
    const group = groups.get(key);
    if (!group) {
      groups.set(key, {
        source,
        code: entry.code,
        count: 1,
        routes: [entry.route],
        statuses: [entry.status],
        last_seen_at: lastSeen,
        last_message: entry.message,
        last_request_id: entry.requestId
      });
      continue;
    }
    group.count += 1;
    if (!group.routes.includes(entry.route)) group.routes.push(entry.route);
    if (!group.statuses.includes(entry.status)) group.statuses.push(entry.status);
    if (lastSeen >= group.last_seen_at) {
      group.last_seen_at = lastSeen;
      group.last_message = entry.message;
      group.last_request_id = entry.requestId;
    }
  }

  return [...groups.values()].sort((a, b) => b.count - a.count).slice(0, limit);
}

export function getUpstreamFailureSummary(sinceMs: number): UpstreamFailureSummary {
  const byCode: Record<ExternalProviderErrorCode, number> = {
    UPSTREAM_CONNECTION_FAILED: 0,
    UPSTREAM_TIMEOUT: 0,
    UPSTREAM_BAD_STATUS: 0,
    UPSTREAM_INVALID_RESPONSE: 0
  };
  let total = 0;
  for (const entry of entriesSince(sinceMs)) {
    if (!isUpstreamCode(entry.code)) continue;
    byCode[entry.code] += 1;
    total += 1;
  }
  return { total, by_code: byCode };
}

export function clearFailedRequests() {
  entries.splice(0, entries.length);
}
