/**
 * Snake-case output records for downstream consumers
 */

import { ScannerConfig } from '../config/schema';
import { ScanDiagnostics, ScanResult, SignalRecord } from '../types';

export interface TechnicalFeaturesOutput {
  price_momentum: number;
  volume_trend: number;
  trend_quality: number;
  correlation_with_btc: number;
  market_strength: number;
}

export interface ScoreBreakdownOutput {
  regime: number;
  breakout: number;
  volume_surge: number;
  divergence: number;
  divergence_penalty: number;
  divergence_overridden: boolean;
  relative_strength: number;
}

export interface SignalOutputRecord {
  symbol: string;
  confidence_score: number;
  regime: string;
  entry_price: number;
  stop_loss: number;
  technical_features: TechnicalFeaturesOutput;
  volatility_regime: string;
  routing: string;
  rejection_reason: string | null;
  breakout_method: string;
  prior_range_high: number;
  volume_surge_ratio: number;
  risk_per_unit: number;
  quality_tier: string;
  arm_level: number | null;
  relative_strength: number;
  score_breakdown: ScoreBreakdownOutput;
}

export interface StatusDocument {
  updated_at: string;
  scan_id: string;
  baseline: string;
  scan_duration_ms: number;
  counts: { signals: number; watch: number; rejected: number; failed: number };
  config: {
    min_confidence: number;
    max_signals: number;
    max_watch: number;
    volume_surge_threshold: number;
    donchian_lookback: number;
  };
  diagnostics: ScanDiagnostics;
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function toOutputRecord(record: SignalRecord): SignalOutputRecord {
  const { features, confidence, breakout, risk } = record;
  const b = confidence.breakdown;
  return {
    symbol: record.symbol,
    confidence_score: confidence.score,
    regime: record.regime.regime,
    entry_price: risk.entryPrice,
    stop_loss: risk.stopLoss,
    technical_features: {
      price_momentum: round(features.priceMomentum, 4),
      volume_trend: round(features.volumeTrend, 4),
      trend_quality: round(features.trendQuality, 4),
      correlation_with_btc: round(features.correlationWithBtc, 4),
      market_strength: round(features.marketStrength, 4),
    },
    volatility_regime: features.volatilityRegime,
    routing: record.routing,
    rejection_reason: record.rejectionReason,
    breakout_method: breakout.method,
    prior_range_high: breakout.priorRangeHigh,
    volume_surge_ratio: round(breakout.volumeSurgeRatio, 4),
    risk_per_unit: risk.riskPerUnit,
    quality_tier: record.qualityTier,
    arm_level: record.armLevel,
    relative_strength: round(record.regime.relativeStrength, 6),
    score_breakdown: {
      regime: round(b.regime, 2),
      breakout: round(b.breakout, 2),
      volume_surge: round(b.volumeSurge, 2),
      divergence: round(b.divergence, 2),
      divergence_penalty: round(b.divergencePenalty, 2),
      divergence_overridden: b.divergenceOverridden,
      relative_strength: round(b.relativeStrength, 2),
    },
  };
}

export function toStatusDocument(result: ScanResult, config: ScannerConfig): StatusDocument {
  return {
    updated_at: new Date(result.timestamp).toISOString(),
    scan_id: result.scanId,
    baseline: result.baseline,
    scan_duration_ms: result.scanDuration,
    counts: {
      signals: result.signals.length,
      watch: result.watch.length,
      rejected: result.rejected.length,
      failed: result.diagnostics.failed,
    },
    config: {
      min_confidence: config.output.minConfidence,
      max_signals: config.output.maxSignals,
      max_watch: config.output.maxWatch,
      volume_surge_threshold: config.breakout.volumeSurgeThreshold,
      donchian_lookback: config.regime.donchianLookback,
    },
    diagnostics: result.diagnostics,
  };
}
