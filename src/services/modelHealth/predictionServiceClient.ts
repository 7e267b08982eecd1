import fetch from 'node-fetch';
import { z } from 'zod';
import { ExternalProviderError } from '../../errors/ExternalProviderError.js';
import { instrumentDependency } from '../../observability/telemetry.js';
import type {
  FailureRiskOutcome,
  FailureRiskReport,
  PredictionRequest,
  PredictionResult,
  TransportFailure,
  TransportFailureReason
} from './types.js';

export interface UpstreamRequestInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface UpstreamResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: UpstreamRequestInit) => Promise<UpstreamResponse>;

export interface PredictionServiceClientOptions {
  baseUrl: string;
  predictTimeoutMs: number;
  failureRiskTimeoutMs: number;
  fetchImpl?: FetchLike;
}

const DEPENDENCY = 'prediction_api';
const MAX_ERROR_BODY_LENGTH = 500;

const predictionResponseSchema = z.object({
  prediction: z.union([z.number(), z.string()]),
  confidence: z.number().finite(),
  latency: z.number().finite().min(0).catch(0),
  model_type: z.string().optional()
});

const numberOrZero = z.number().finite().catch(0);
const optionalNumber = z.number().finite().optional().catch(undefined);

const failureRiskSchema = z.object({
  risk: z.string().catch('UNKNOWN'),
  degradation: z.object({
    overall_degradation: numberOrZero,
    confidence_drop: numberOrZero,
    psi_increase: numberOrZero
  }).catch({ overall_degradation: 0, confidence_drop: 0, psi_increase: 0 }),
  failure_probability: optionalNumber,
  metrics: z.object({ avg_confidence: optionalNumber }).catch({ avg_confidence: undefined })
});

const TRANSPORT_REASONS: Record<ExternalProviderError['code'], TransportFailureReason> = {
  UPSTREAM_CONNECTION_FAILED: 'connection',
  UPSTREAM_TIMEOUT: 'timeout',
  UPSTREAM_BAD_STATUS: 'bad_status',
  UPSTREAM_INVALID_RESPONSE: 'invalid_response'
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeErrorMarker(marker: unknown): string {
  if (typeof marker === 'string') return marker;
  return JSON.stringify(marker) ?? 'unknown error';
}

/**
 * Normalises a failure-risk payload. Missing or non-numeric fields fall back to
 * their defaults; only a body that is not a JSON object is rejected.
 */
export function parseFailureRiskReport(body: unknown): FailureRiskReport | null {
  if (!isRecord(body)) return null;

  const parsed = failureRiskSchema.parse(body);
  const report: FailureRiskReport = {
    kind: 'report',
    riskLevel: parsed.risk,
    degradation: {
      overallDegradation: parsed.degradation.overall_degradation,
      confidenceDrop: parsed.degradation.confidence_drop,
      psiIncrease: parsed.degradation.psi_increase
    },
    failureProbability: parsed.failure_probability,
    avgConfidence: parsed.metrics.avg_confidence
  };

  if ('error' in body) {
    report.error = { message: describeErrorMarker(body.error) };
  }

  return report;
}

export function toTransportFailure(error: unknown): TransportFailure {
  if (error instanceof ExternalProviderError) {
    return { kind: 'transport_failure', reason: TRANSPORT_REASONS[error.code], message: error.message };
  }

  return {
    kind: 'transport_failure',
    reason: 'connection',
    message: error instanceof Error ? error.message : 'Unknown transport error'
  };
}

export class PredictionServiceClient {
  private readonly baseUrl: string;

  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: PredictionServiceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async predict(request: PredictionRequest): Promise<PredictionResult> {
    return instrumentDependency(DEPENDENCY, 'predict', async () => {
      const body = await this.requestJson('/predict', {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify({
          model_type: request.modelType,
          traffic_volume: request.trafficVolume,
          time_of_day: request.timeOfDay,
          day_of_week: request.dayOfWeek,
          weather_risk: request.weatherRisk,
          road_risk: request.roadRisk
        })
      }, this.options.predictTimeoutMs);

      const parsed = predictionResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ExternalProviderError(
          'UPSTREAM_INVALID_RESPONSE',
          'Prediction service returned an unexpected payload',
          parsed.error.flatten()
        );
      }

      return {
        prediction: parsed.data.prediction,
        confidence: parsed.data.confidence,
        latency: parsed.data.latency,
        modelType: parsed.data.model_type ?? request.modelType
      };
    });
  }

  /** Never rejects: any failure to obtain a report comes back as a sentinel. */
  async fetchFailureRisk(): Promise<FailureRiskOutcome> {
    return instrumentDependency(DEPENDENCY, 'failure_risk', async (): Promise<FailureRiskOutcome> => {
      try {
        const body = await this.requestJson('/failure-risk', {
          method: 'GET',
          headers: { accept: 'application/json' }
        }, this.options.failureRiskTimeoutMs);

        const report = parseFailureRiskReport(body);
        if (!report) {
          return { kind: 'transport_failure', reason: 'invalid_response', message: 'Failure-risk body is not an object' };
        }
        return report;
      } catch (error) {
        return toTransportFailure(error);
      }
    }, (outcome) => outcome.kind === 'transport_failure');
  }

  private async requestJson(path: string, init: Omit<UpstreamRequestInit, 'signal'>, timeoutMs: number): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const url = `${this.baseUrl}${path}`;

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const text = await response.text();

      if (!response.ok) {
        throw new ExternalProviderError('UPSTREAM_BAD_STATUS', `Prediction service responded with ${response.status}`, {
          status: response.status,
          body: text.slice(0, MAX_ERROR_BODY_LENGTH)
        });
      }

      try {
        return JSON.parse(text);
      } catch {
        throw new ExternalProviderError('UPSTREAM_INVALID_RESPONSE', `Prediction service returned invalid JSON from ${path}`);
      }
    } catch (error) {
      if (error instanceof ExternalProviderError) throw error;
      if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
        throw new ExternalProviderError('UPSTREAM_TIMEOUT', `Prediction service did not answer ${path} within ${timeoutMs}ms`);
      }
      throw new ExternalProviderError('UPSTREAM_CONNECTION_FAILED', `Connection to prediction service at ${this.baseUrl} failed`, {
        cause: error instanceof Error ? error.message : String(error)
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
