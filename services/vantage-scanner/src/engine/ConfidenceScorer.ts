/**
 * ConfidenceScorer - Fixed-weight 0-100 score
 *
 * Components (maximum points):
 * - regime (30): trending 22 / reclaiming 18 / weak 0, plus up to 8 for
 *   trend strength, minus 4 when the 4H trend disagrees
 * - breakout (25) + volume surge (10)
 * - divergence (15): reduced by the configured penalty unless the trend is
 *   strong enough to override it
 * - relative strength (20)
 */

import { ScannerConfig } from '../config/schema';
import {
  BreakoutEvent,
  ConfidenceScore,
  DivergenceResult,
  QualityTier,
  Regime,
  RegimeState,
} from '../types';
import { Statistics } from '../utils/math/Statistics';

export const SIGNAL_THRESHOLD = 70;
export const WATCH_THRESHOLD = 60;

export const SCORE_WEIGHTS = {
  regime: 30,
  breakout: 25,
  volumeSurge: 10,
  divergence: 15,
  relativeStrength: 20,
} as const;

const REGIME_BASE: Record<Regime, number> = {
  trending: 22,
  reclaiming: 18,
  weak: 0,
};

const TREND_STRENGTH_BONUS = 8;
const H4_MISALIGNED_PENALTY = 4;
const TWO_CLOSE_POINTS = 25;
const CLEAN_RETEST_POINTS = 22;
const PENDING_POINTS = 10;
const RS_FULL_SCALE = 0.05;

export class ConfidenceScorer {
  constructor(private readonly config: ScannerConfig) {}

  regimePoints(regime: RegimeState): number {
    const f = Statistics.clamp01(regime.trendStrength / this.config.regime.strongTrendStrength);
    let points = REGIME_BASE[regime.regime] + TREND_STRENGTH_BONUS * f;
    if (!regime.h4Aligned) points -= H4_MISALIGNED_PENALTY;
    return Math.max(0, points);
  }

  breakoutPoints(breakout: BreakoutEvent): number {
    if (breakout.confirmed) {
      return breakout.method === 'two_close_confirmation' ? TWO_CLOSE_POINTS : CLEAN_RETEST_POINTS;
    }
    if (breakout.state === 'PendingConfirmation' || breakout.state === 'Retested') {
      return PENDING_POINTS;
    }
    return 0;
  }

  volumeSurgePoints(ratio: number): number {
    const scale = 2 * this.config.breakout.volumeSurgeThreshold;
    return SCORE_WEIGHTS.volumeSurge * Statistics.clamp01(ratio / scale);
  }

  relativeStrengthPoints(relativeStrength: number): number {
    return SCORE_WEIGHTS.relativeStrength *
      Statistics.clamp01(0.5 + relativeStrength / (2 * RS_FULL_SCALE));
  }

  score(regime: RegimeState, breakout: BreakoutEvent, divergence: DivergenceResult): ConfidenceScore {
    const strongTrend = regime.trendStrength >= this.config.regime.strongTrendStrength;
    const divergenceOverridden = divergence.detected && strongTrend;
    const divergencePenalty = divergence.detected && !strongTrend ? this.config.divergence.penalty : 0;

    const regimePts = this.regimePoints(regime);
    const breakoutPts = this.breakoutPoints(breakout);
    const surgePts = this.volumeSurgePoints(breakout.volumeSurgeRatio);
    const divergencePts = SCORE_WEIGHTS.divergence - divergencePenalty;
    const rsPts = this.relativeStrengthPoints(regime.relativeStrength);

    const raw = regimePts + breakoutPts + surgePts + divergencePts + rsPts;

    return Object.freeze({
      score: Math.round(Statistics.clamp(raw, 0, 100)),
      breakdown: Object.freeze({
        regime: regimePts,
        breakout: breakoutPts,
        volumeSurge: surgePts,
        divergence: divergencePts,
        divergencePenalty,
        divergenceOverridden,
        relativeStrength: rsPts,
        raw,
      }),
    });
  }

  static qualityTier(score: number): QualityTier {
    if (score >= 90) return 'excellent';
    if (score >= 80) return 'very_good';
    if (score >= 70) return 'good';
    if (score >= 60) return 'fair';
    return 'poor';
  }
}
