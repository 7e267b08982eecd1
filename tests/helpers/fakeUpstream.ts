import type {
  FetchLike,
  UpstreamRequestInit,
  UpstreamResponse
} from '../../src/services/modelHealth/predictionServiceClient.js';

export type FakeHandler = (init: UpstreamRequestInit) => Promise<UpstreamResponse> | UpstreamResponse;

export interface RecordedCall {
  url: string;
  method: string;
  body?: string;
}

export function jsonResponse(body: unknown, status = 200): UpstreamResponse {
  return textResponse(JSON.stringify(body), status);
}

export function textResponse(text: string, status = 200): UpstreamResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => text
  };
}

/** Never settles on its own; rejects the way node-fetch does once the signal aborts. */
export function hangUntilAborted(init: UpstreamRequestInit): Promise<UpstreamResponse> {
  return new Promise((_resolve, reject) => {
    init.signal.addEventListener('abort', () => {
      const error = new Error('The operation was aborted.');
      error.name = 'AbortError';
      reject(error);
    });
  });
}

export function refuseConnection(): Promise<UpstreamResponse> {
  return Promise.reject(new TypeError('connect ECONNREFUSED 127.0.0.1:8000'));
}

export function createFakeFetch(routes: Record<string, FakeHandler>) {
  const calls: RecordedCall[] = [];

  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, method: init.method, body: init.body });
    const path = new URL(url).pathname;
    const handler = routes[path];
    if (!handler) {
      return textResponse('not found', 404);
    }
    return handler(init);
  };

  return { fetchImpl, calls };
}
