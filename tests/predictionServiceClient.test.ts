import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ExternalProviderError } from '../src/errors/ExternalProviderError.js';
import { getDependencySnapshots, resetMetrics } from '../src/observability/metrics.js';
import {
  PredictionServiceClient,
  parseFailureRiskReport,
  type FetchLike
} from '../src/services/modelHealth/predictionServiceClient.js';
import type { PredictionRequest } from '../src/services/modelHealth/types.js';
import {
  createFakeFetch,
  hangUntilAborted,
  jsonResponse,
  refuseConnection,
  textResponse
} from './helpers/fakeUpstream.js';

const request: PredictionRequest = {
  modelType: 'bad',
  trafficVolume: 120,
  timeOfDay: 18,
  dayOfWeek: 4,
  weatherRisk: 2,
  roadRisk: 1
};

function createClient(fetchImpl: FetchLike, timeoutMs = 1_000) {
  return new PredictionServiceClient({
    baseUrl: 'http://prediction.test/',
    predictTimeoutMs: timeoutMs,
    failureRiskTimeoutMs: timeoutMs,
    fetchImpl
  });
}

function expectUpstreamError(code: ExternalProviderError['code']) {
  return (error: unknown) => {
    assert.ok(error instanceof ExternalProviderError);
    assert.equal(error.code, code);
    return true;
  };
}

test('predict', async (t) => {
  await t.test('posts snake_case features and parses the response', async () => {
    const upstream = createFakeFetch({
      '/predict': () => jsonResponse({ prediction: 1, confidence: 0.58, latency: 0.004, model_type: 'bad' })
    });

    const result = await createClient(upstream.fetchImpl).predict(request);

    assert.deepEqual(result, { prediction: 1, confidence: 0.58, latency: 0.004, modelType: 'bad' });
    assert.equal(upstream.calls.length, 1);
    assert.equal(upstream.calls[0]?.url, 'http://prediction.test/predict');
    assert.equal(upstream.calls[0]?.method, 'POST');
    assert.deepEqual(JSON.parse(upstream.calls[0]?.body ?? '{}'), {
      model_type: 'bad',
      traffic_volume: 120,
      time_of_day: 18,
      day_of_week: 4,
      weather_risk: 2,
      road_risk: 1
    });
  });

  await t.test('fills in the model type and latency when absent', async () => {
    const upstream = createFakeFetch({ '/predict': () => jsonResponse({ prediction: 'delay', confidence: 0.8 }) });

    const result = await createClient(upstream.fetchImpl).predict(request);

    assert.deepEqual(result, { prediction: 'delay', confidence: 0.8, latency: 0, modelType: 'bad' });
  });

  await t.test('rejects a response without confidence', async () => {
    const upstream = createFakeFetch({ '/predict': () => jsonResponse({ prediction: 1, latency: 0.01 }) });

    await assert.rejects(createClient(upstream.fetchImpl).predict(request), expectUpstreamError('UPSTREAM_INVALID_RESPONSE'));
    assert.equal(upstream.calls.length, 1);
  });

  await t.test('reports the upstream status and body', async () => {
    const upstream = createFakeFetch({ '/predict': () => textResponse('model not loaded', 500) });

    await assert.rejects(createClient(upstream.fetchImpl).predict(request), (error: unknown) => {
      assert.ok(error instanceof ExternalProviderError);
      assert.equal(error.code, 'UPSTREAM_BAD_STATUS');
      assert.deepEqual(error.details, { status: 500, body: 'model not loaded' });
      return true;
    });
    assert.equal(upstream.calls.length, 1);
  });

  await t.test('maps a refused connection', async () => {
    const upstream = createFakeFetch({ '/predict': refuseConnection });

    await assert.rejects(createClient(upstream.fetchImpl).predict(request), expectUpstreamError('UPSTREAM_CONNECTION_FAILED'));
    assert.equal(upstream.calls.length, 1);
  });

  await t.test('times out', async () => {
    const upstream = createFakeFetch({ '/predict': hangUntilAborted });

    await assert.rejects(createClient(upstream.fetchImpl, 20).predict(request), expectUpstreamError('UPSTREAM_TIMEOUT'));
    assert.equal(upstream.calls.length, 1);
  });
});

test('fetchFailureRisk', async (t) => {
  await t.test('parses a complete report', async () => {
    const upstream = createFakeFetch({
      '/failure-risk': () => jsonResponse({
        risk: 'MEDIUM',
        degradation: { overall_degradation: 0.35, confidence_drop: 0.2, psi_increase: 0.15 },
        failure_probability: 0.45,
        metrics: { avg_confidence: 0.61, total_predictions: 40 }
      })
    });

    const outcome = await createClient(upstream.fetchImpl).fetchFailureRisk();

    assert.deepEqual(outcome, {
      kind: 'report',
      riskLevel: 'MEDIUM',
      degradation: { overallDegradation: 0.35, confidenceDrop: 0.2, psiIncrease: 0.15 },
      failureProbability: 0.45,
      avgConfidence: 0.61
    });
    assert.equal(upstream.calls[0]?.method, 'GET');
  });

  await t.test('keeps the error marker whatever its value', async () => {
    const upstream = createFakeFetch({ '/failure-risk': () => jsonResponse({ error: null, risk: 'HIGH' }) });

    const outcome = await createClient(upstream.fetchImpl).fetchFailureRisk();

    assert.equal(outcome.kind, 'report');
    assert.deepEqual(outcome.kind === 'report' ? outcome.error : undefined, { message: 'null' });
  });

  await t.test('turns a 503 into a transport failure', async () => {
    const upstream = createFakeFetch({ '/failure-risk': () => textResponse('unavailable', 503) });

    const outcome = await createClient(upstream.fetchImpl).fetchFailureRisk();

    assert.equal(outcome.kind, 'transport_failure');
    assert.equal(outcome.kind === 'transport_failure' ? outcome.reason : null, 'bad_status');
    assert.equal(upstream.calls.length, 1);
  });

  await t.test('turns a timeout into a transport failure', async () => {
    const upstream = createFakeFetch({ '/failure-risk': hangUntilAborted });

    const outcome = await createClient(upstream.fetchImpl, 20).fetchFailureRisk();

    assert.equal(outcome.kind === 'transport_failure' ? outcome.reason : null, 'timeout');
    assert.equal(upstream.calls.length, 1);
  });

  await t.test('turns a refused connection into a transport failure', async () => {
    const upstream = createFakeFetch({ '/failure-risk': refuseConnection });

    const outcome = await createClient(upstream.fetchImpl).fetchFailureRisk();

    assert.equal(outcome.kind === 'transport_failure' ? outcome.reason : null, 'connection');
    assert.equal(upstream.calls.length, 1);
  });

  await t.test('treats unparseable bodies as transport failures', async () => {
    const invalidJson = createFakeFetch({ '/failure-risk': () => textResponse('<html>', 200) });
    const notAnObject = createFakeFetch({ '/failure-risk': () => jsonResponse([0.4, 0.5]) });

    const first = await createClient(invalidJson.fetchImpl).fetchFailureRisk();
    const second = await createClient(notAnObject.fetchImpl).fetchFailureRisk();

    assert.equal(first.kind === 'transport_failure' ? first.reason : null, 'invalid_response');
    assert.equal(second.kind === 'transport_failure' ? second.reason : null, 'invalid_response');
    assert.equal(invalidJson.calls.length, 1);
    assert.equal(notAnObject.calls.length, 1);
  });

  await t.test('counts failed probes in the dependency metrics', async () => {
    resetMetrics();
    const upstream = createFakeFetch({ '/failure-risk': refuseConnection });

    await createClient(upstream.fetchImpl).fetchFailureRisk();

    const snapshot = getDependencySnapshots().find((item) => item.operation === 'failure_risk');
    assert.equal(snapshot?.dependency, 'prediction_api');
    assert.equal(snapshot?.requests, 1);
    assert.equal(snapshot?.errors, 1);
  });
});

test('parseFailureRiskReport defaults', async (t) => {
  await t.test('empty object', () => {
    assert.deepEqual(parseFailureRiskReport({}), {
      kind: 'report',
      riskLevel: 'UNKNOWN',
      degradation: { overallDegradation: 0, confidenceDrop: 0, psiIncrease: 0 },
      failureProbability: undefined,
      avgConfidence: undefined
    });
  });

  await t.test('non-numeric degradation fields', () => {
    const report = parseFailureRiskReport({
      risk: 'LOW',
      degradation: { overall_degradation: 'high', psi_increase: 0.3 }
    });
    assert.deepEqual(report?.degradation, { overallDegradation: 0, confidenceDrop: 0, psiIncrease: 0.3 });
  });

  await t.test('string error marker', () => {
    assert.deepEqual(parseFailureRiskReport({ error: 'Not enough data' })?.error, { message: 'Not enough data' });
  });

  await t.test('rejects non-objects', () => {
    assert.equal(parseFailureRiskReport('HIGH'), null);
    assert.equal(parseFailureRiskReport(null), null);
  });
});
