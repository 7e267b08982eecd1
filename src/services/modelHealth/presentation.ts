import type {
  ModelVariant,
  PredictionRequest,
  PredictionResult,
  RiskLevel,
  RiskVerdict,
  SystemHealthStatus,
  SystemHealthVerdict
} from './types.js';

export type Tone = 'success' | 'warning' | 'error';

export interface VerdictView {
  tone: Tone;
  headline: string;
  detail: string;
  progress: number;
}

export interface SystemHealthView extends SystemHealthVerdict {
  tone: Tone;
  headline: string;
  avgConfidenceLabel: string;
  failureRiskLabel: string;
}

export interface PredictionView {
  prediction: string;
  confidence: string;
  latency: string;
  model: string;
}

export interface InputSummary {
  model: string;
  trafficVolume: number;
  time: string;
  day: string;
  weatherRisk: string;
  roadRisk: string;
}

export interface ModelProfile {
  variant: ModelVariant;
  label: string;
  description: string;
  expectedConfidence: string;
  note: string;
}

const DAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];
const RISK_SCALE_LABELS = ['Low', 'Medium', 'High'];

const TONES: Record<RiskLevel, Tone> = {
  HEALTHY: 'success',
  RISKY: 'warning',
  CRITICAL: 'error'
};

const TELEMETRY_HEADLINES: Record<RiskLevel, string> = {
  HEALTHY: 'Model Healthy',
  RISKY: 'Model Degrading',
  CRITICAL: 'Model Likely to Collapse'
};

const CONFIDENCE_HEADLINES: Record<RiskLevel, string> = {
  HEALTHY: 'Model Healthy - High confidence prediction',
  RISKY: 'Model Risky - Medium confidence, monitor closely',
  CRITICAL: 'Model Likely to Collapse - Very low confidence!'
};

const SYSTEM_HEADLINES: Record<SystemHealthStatus, { tone: Tone; headline: string }> = {
  HEALTHY: { tone: 'success', headline: 'System Healthy' },
  AT_RISK: { tone: 'warning', headline: 'System at Risk' },
  CRITICAL: { tone: 'error', headline: 'System Critical' }
};

export const MODEL_PROFILES: ModelProfile[] = [
  {
    variant: 'good',
    label: 'Good Model',
    description: 'Trained with high-quality data; should provide accurate predictions.',
    expectedConfidence: 'High (>75%)',
    note: 'Stable performance'
  },
  {
    variant: 'bad',
    label: 'Bad Model',
    description: 'Trained with lower-quality data; may provide less accurate predictions.',
    expectedConfidence: 'Low (<60%)',
    note: 'May degrade faster'
  }
];

export function formatPercent(value: number, digits = 2): string {
  return `${(value * 100).toFixed(digits)}%`;
}

export function describeVerdict(verdict: RiskVerdict): VerdictView {
  const tone = TONES[verdict.riskLevel];

  if (verdict.strategy === 'TELEMETRY') {
    return {
      tone,
      headline: TELEMETRY_HEADLINES[verdict.riskLevel],
      detail: `Degradation: ${formatPercent(verdict.breakdown.overallDegradation, 1)} from baseline`,
      progress: verdict.progressValue
    };
  }

  return {
    tone,
    headline: CONFIDENCE_HEADLINES[verdict.riskLevel],
    detail: `Confidence: ${formatPercent(verdict.breakdown.confidenceScore)}`,
    progress: verdict.progressValue
  };
}

export function describeSystemHealth(health: SystemHealthVerdict): SystemHealthView {
  return {
    ...health,
    ...SYSTEM_HEADLINES[health.status],
    avgConfidenceLabel: formatPercent(health.avgConfidence),
    failureRiskLabel: formatPercent(health.failureProbability)
  };
}

export function describePrediction(result: PredictionResult): PredictionView {
  return {
    prediction: String(result.prediction),
    confidence: formatPercent(result.confidence),
    latency: `${(result.latency * 1000).toFixed(2)} ms`,
    model: result.modelType.toUpperCase()
  };
}

export function summarizeInput(request: PredictionRequest): InputSummary {
  return {
    model: request.modelType.toUpperCase(),
    trafficVolume: request.trafficVolume,
    time: `${request.timeOfDay}:00`,
    day: DAY_NAMES[request.dayOfWeek] ?? String(request.dayOfWeek),
    weatherRisk: RISK_SCALE_LABELS[request.weatherRisk] ?? String(request.weatherRisk),
    roadRisk: RISK_SCALE_LABELS[request.roadRisk] ?? String(request.roadRisk)
  };
}
