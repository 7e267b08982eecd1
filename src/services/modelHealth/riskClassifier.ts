import type {
  ConfidenceBreakdown,
  ConfidenceFallbackVerdict,
  FailureRiskOutcome,
  FailureRiskReport,
  PredictionResult,
  RiskLevel,
  RiskVerdict,
  SystemHealthStatus,
  SystemHealthVerdict
} from './types.js';

export const HEALTHY_CONFIDENCE_FLOOR = 0.75;
export const RISKY_CONFIDENCE_FLOOR = 0.5;

export const SYSTEM_AT_RISK_PROBABILITY = 0.3;
export const SYSTEM_CRITICAL_PROBABILITY = 0.7;

const TELEMETRY_RISK_LEVELS = new Map<string, RiskLevel>([
  ['HIGH', 'CRITICAL'],
  ['MEDIUM', 'RISKY']
]);

const CONFIDENCE_LABELS: Record<RiskLevel, Pick<ConfidenceBreakdown, 'healthStatus' | 'riskLevel'>> = {
  HEALTHY: { healthStatus: 'Healthy', riskLevel: 'Low' },
  RISKY: { healthStatus: 'Risky', riskLevel: 'Medium' },
  CRITICAL: { healthStatus: 'Critical', riskLevel: 'High' }
};

function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, finiteOrZero(value)));
}

/** Both boundaries are exclusive on their lower side: 0.75 is RISKY, 0.5 is CRITICAL. */
export function classifyConfidence(confidence: number): RiskLevel {
  const value = finiteOrZero(confidence);
  if (value > HEALTHY_CONFIDENCE_FLOOR) return 'HEALTHY';
  if (value > RISKY_CONFIDENCE_FLOOR) return 'RISKY';
  return 'CRITICAL';
}

export function mapTelemetryRisk(riskLevel: string): RiskLevel {
  return TELEMETRY_RISK_LEVELS.get(riskLevel) ?? 'HEALTHY';
}

export function classifySystemHealth(failureProbability: number): SystemHealthStatus {
  const value = finiteOrZero(failureProbability);
  if (value < SYSTEM_AT_RISK_PROBABILITY) return 'HEALTHY';
  if (value < SYSTEM_CRITICAL_PROBABILITY) return 'AT_RISK';
  return 'CRITICAL';
}

function classifyFromConfidence(
  prediction: PredictionResult,
  tier: ConfidenceFallbackVerdict['tier']
): ConfidenceFallbackVerdict {
  const riskLevel = classifyConfidence(prediction.confidence);
  return {
    strategy: 'CONFIDENCE_FALLBACK',
    tier,
    riskLevel,
    progressValue: clampUnit(prediction.confidence),
    breakdown: {
      confidenceScore: prediction.confidence,
      ...CONFIDENCE_LABELS[riskLevel]
    }
  };
}

/**
 * Turns a prediction and whatever the failure-risk probe produced into the
 * per-prediction verdict. Upstream telemetry wins when it is usable; otherwise
 * the prediction's own confidence decides.
 */
export function classifyRisk(prediction: PredictionResult, outcome: FailureRiskOutcome): RiskVerdict {
  if (outcome.kind === 'transport_failure') {
    return classifyFromConfidence(prediction, 'TRANSPORT_FAILURE');
  }

  if (outcome.error) {
    return classifyFromConfidence(prediction, 'UPSTREAM_ERROR');
  }

  const { degradation } = outcome;
  const progress = degradation.overallDegradation > 0 ? degradation.overallDegradation : prediction.confidence;

  return {
    strategy: 'TELEMETRY',
    tier: 'TELEMETRY',
    riskLevel: mapTelemetryRisk(outcome.riskLevel),
    progressValue: clampUnit(progress),
    breakdown: {
      confidenceDrop: degradation.confidenceDrop,
      psiIncrease: degradation.psiIncrease,
      overallDegradation: degradation.overallDegradation,
      riskLevel: outcome.riskLevel
    }
  };
}

export function assessSystemHealth(report: FailureRiskReport): SystemHealthVerdict {
  const failureProbability = report.failureProbability ?? 0;
  return {
    status: classifySystemHealth(failureProbability),
    failureProbability,
    avgConfidence: report.avgConfidence ?? 0
  };
}
