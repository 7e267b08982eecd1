export type ModelVariant = 'good' | 'bad';

export type RiskScale = 0 | 1 | 2;

export interface PredictionRequest {
  modelType: ModelVariant;
  trafficVolume: number;
  timeOfDay: number;
  dayOfWeek: number;
  weatherRisk: RiskScale;
  roadRisk: RiskScale;
}

export interface PredictionResult {
  prediction: number | string;
  confidence: number;
  /** Seconds spent by the upstream model. */
  latency: number;
  modelType: string;
}

export interface DegradationMetrics {
  confidenceDrop: number;
  psiIncrease: number;
  overallDegradation: number;
}

export interface FailureRiskReport {
  kind: 'report';
  /** Raw upstream label: HIGH, MEDIUM, LOW or UNKNOWN in practice. */
  riskLevel: string;
  degradation: DegradationMetrics;
  /** Present when upstream could not compute degradation. */
  error?: { message: string };
  failureProbability?: number;
  avgConfidence?: number;
}

export type TransportFailureReason = 'connection' | 'timeout' | 'bad_status' | 'invalid_response';

export interface TransportFailure {
  kind: 'transport_failure';
  reason: TransportFailureReason;
  message: string;
}

export type FailureRiskOutcome = FailureRiskReport | TransportFailure;

export type RiskLevel = 'HEALTHY' | 'RISKY' | 'CRITICAL';

export type VerdictTier = 'TELEMETRY' | 'UPSTREAM_ERROR' | 'TRANSPORT_FAILURE';

export interface TelemetryBreakdown {
  confidenceDrop: number;
  psiIncrease: number;
  overallDegradation: number;
  riskLevel: string;
}

export interface ConfidenceBreakdown {
  confidenceScore: number;
  healthStatus: 'Healthy' | 'Risky' | 'Critical';
  riskLevel: 'Low' | 'Medium' | 'High';
}

interface VerdictBase {
  riskLevel: RiskLevel;
  progressValue: number;
}

export interface TelemetryVerdict extends VerdictBase {
  strategy: 'TELEMETRY';
  tier: 'TELEMETRY';
  breakdown: TelemetryBreakdown;
}

export interface ConfidenceFallbackVerdict extends VerdictBase {
  strategy: 'CONFIDENCE_FALLBACK';
  tier: 'UPSTREAM_ERROR' | 'TRANSPORT_FAILURE';
  breakdown: ConfidenceBreakdown;
}

export type RiskVerdict = TelemetryVerdict | ConfidenceFallbackVerdict;

export type SystemHealthStatus = 'HEALTHY' | 'AT_RISK' | 'CRITICAL';

export interface SystemHealthVerdict {
  status: SystemHealthStatus;
  failureProbability: number;
  avgConfidence: number;
}
