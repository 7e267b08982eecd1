import type { Env } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import {
  MODEL_PROFILES,
  describePrediction,
  describeSystemHealth,
  describeVerdict,
  summarizeInput,
  type InputSummary,
  type ModelProfile,
  type PredictionView,
  type SystemHealthView,
  type VerdictView
} from './presentation.js';
import { PredictionServiceClient } from './predictionServiceClient.js';
import { assessSystemHealth, classifyRisk } from './riskClassifier.js';
import type { FailureRiskOutcome, PredictionRequest, PredictionResult, RiskVerdict } from './types.js';

export interface ModelHealthGateway {
  predict(request: PredictionRequest): Promise<PredictionResult>;
  fetchFailureRisk(): Promise<FailureRiskOutcome>;
}

export interface ModelHealthAssessment {
  prediction: PredictionResult & { display: PredictionView };
  verdict: RiskVerdict;
  view: VerdictView;
  systemHealth: SystemHealthView | null;
  inputSummary: InputSummary;
}

export interface SystemOverview {
  available: boolean;
  systemHealth: SystemHealthView | null;
  comparison: ModelProfile[];
}

function logOutcome(outcome: FailureRiskOutcome) {
  if (outcome.kind === 'transport_failure') {
    logger.warn('failure_risk.unavailable', { reason: outcome.reason, message: outcome.message });
  } else if (outcome.error) {
    logger.info('failure_risk.upstream_error', { message: outcome.error.message });
  }
}

export class ModelHealthService {
  constructor(private readonly gateway: ModelHealthGateway) {}

  /**
   * One submission: score the features, then probe failure risk. A failed
   * prediction call rejects; a failed risk probe only changes the tier.
   */
  async assess(request: PredictionRequest): Promise<ModelHealthAssessment> {
    const prediction = await this.gateway.predict(request);
    const outcome = await this.gateway.fetchFailureRisk();
    logOutcome(outcome);

    const verdict = classifyRisk(prediction, outcome);
    logger.info('model_health.assessed', {
      model: prediction.modelType,
      tier: verdict.tier,
      risk_level: verdict.riskLevel,
      progress: verdict.progressValue
    });

    return {
      prediction: { ...prediction, display: describePrediction(prediction) },
      verdict,
      view: describeVerdict(verdict),
      systemHealth: outcome.kind === 'report' ? describeSystemHealth(assessSystemHealth(outcome)) : null,
      inputSummary: summarizeInput(request)
    };
  }

  async systemOverview(): Promise<SystemOverview> {
    const outcome = await this.gateway.fetchFailureRisk();
    logOutcome(outcome);

    if (outcome.kind === 'transport_failure') {
      return { available: false, systemHealth: null, comparison: MODEL_PROFILES };
    }

    return {
      available: true,
      systemHealth: describeSystemHealth(assessSystemHealth(outcome)),
      comparison: MODEL_PROFILES
    };
  }

  listModels(): ModelProfile[] {
    return MODEL_PROFILES;
  }
}

export function createModelHealthService(config: Pick<Env, 'PREDICTION_API_BASE_URL' | 'PREDICT_TIMEOUT_MS' | 'FAILURE_RISK_TIMEOUT_MS'>) {
  return new ModelHealthService(new PredictionServiceClient({
    baseUrl: config.PREDICTION_API_BASE_URL,
    predictTimeoutMs: config.PREDICT_TIMEOUT_MS,
    failureRiskTimeoutMs: config.FAILURE_RISK_TIMEOUT_MS
  }));
}
