/**
 * FeatureExtractor - Normalized feature vector per symbol
 *
 * Each feature is the percentile rank of the current value inside the
 * symbol's own history, so values are comparable across assets.
 */

import { FeatureConfig } from '../config/schema';
import { InsufficientHistoryError } from '../errors';
import { IndicatorSeries, TechnicalFeatures, VolatilityRegime } from '../types';
import { Statistics } from '../utils/math/Statistics';

const TREND_QUALITY_WINDOW = 20;

const MARKET_STRENGTH_WEIGHTS = {
  trendQuality: 0.35,
  volumeTrend: 0.25,
  priceMomentum: 0.25,
  confidence: 0.15,
} as const;

export class FeatureExtractor {
  constructor(private readonly config: FeatureConfig) {}

  priceMomentum(h4: IndicatorSeries): number {
    const { closes } = h4;
    const look = this.config.momentumLookback;
    if (closes.length < look + 1) {
      throw new InsufficientHistoryError('price_momentum', look + 1, closes.length);
    }
    const roc: number[] = [];
    for (let i = look; i < closes.length; i++) {
      roc.push(closes[i] / closes[i - look] - 1);
    }
    return Statistics.percentileRank(roc[roc.length - 1], roc);
  }

  volumeTrend(h1: IndicatorSeries): number {
    const { volumes } = h1;
    const { volumeShortWindow: short, volumeLongWindow: long } = this.config;
    if (volumes.length < long) {
      throw new InsufficientHistoryError('volume_trend', long, volumes.length);
    }
    const ratios: number[] = [];
    for (let i = long - 1; i < volumes.length; i++) {
      const longMean = Statistics.mean(volumes.slice(i - long + 1, i + 1));
      const shortMean = Statistics.mean(volumes.slice(i - short + 1, i + 1));
      ratios.push(longMean > 0 ? shortMean / longMean : NaN);
    }
    return Statistics.percentileRank(ratios[ratios.length - 1], ratios);
  }

  trendQuality(h4: IndicatorSeries): number {
    const { closes, ema20, ema50 } = h4;
    const spreads = closes.map((c, i) => (ema20[i] - ema50[i]) / c);
    const spreadRank = Statistics.percentileRank(spreads[spreads.length - 1], spreads);

    const from = Math.max(0, closes.length - TREND_QUALITY_WINDOW);
    let above = 0;
    let counted = 0;
    for (let i = from; i < closes.length; i++) {
      if (!Number.isFinite(ema20[i])) continue;
      counted++;
      if (closes[i] > ema20[i]) above++;
    }
    const shareAbove = counted > 0 ? above / counted : 0;
    return 0.5 * spreadRank + 0.5 * shareAbove;
  }

  /**
   * |Pearson| of recent 4H returns against the baseline's
   */
  correlationWithBaseline(h4Closes: readonly number[], baselineCloses: readonly number[]): number {
    const look = this.config.correlationLookback;
    const required = look + 1;
    if (h4Closes.length < required) {
      throw new InsufficientHistoryError('correlation', required, h4Closes.length);
    }
    if (baselineCloses.length < required) {
      throw new InsufficientHistoryError('correlation(baseline)', required, baselineCloses.length);
    }
    const symbolReturns = Statistics.returns(h4Closes.slice(h4Closes.length - required));
    const baselineReturns = Statistics.returns(baselineCloses.slice(baselineCloses.length - required));
    return Math.abs(Statistics.pearson(symbolReturns, baselineReturns));
  }

  volatilityRegime(h1: IndicatorSeries): VolatilityRegime {
    const atrPct = h1.atr.map((a, i) => (a / h1.closes[i]) * 100);
    const rank = Statistics.percentileRank(atrPct[atrPct.length - 1], atrPct);
    const { low, high } = this.config.volatilityPercentiles;
    if (rank < low) return 'low';
    if (rank > high) return 'high';
    return 'medium';
  }

  static marketStrength(
    trendQuality: number,
    volumeTrend: number,
    priceMomentum: number,
    score: number,
  ): number {
    const w = MARKET_STRENGTH_WEIGHTS;
    return Statistics.clamp01(
      w.trendQuality * trendQuality +
        w.volumeTrend * volumeTrend +
        w.priceMomentum * priceMomentum +
        w.confidence * (score / 100),
    );
  }

  extract(
    h4: IndicatorSeries,
    h1: IndicatorSeries,
    baselineCloses: readonly number[],
    score: number,
  ): TechnicalFeatures {
    const priceMomentum = this.priceMomentum(h4);
    const volumeTrend = this.volumeTrend(h1);
    const trendQuality = this.trendQuality(h4);
    return Object.freeze({
      priceMomentum,
      volumeTrend,
      trendQuality,
      correlationWithBtc: this.correlationWithBaseline(h4.closes, baselineCloses),
      marketStrength: FeatureExtractor.marketStrength(trendQuality, volumeTrend, priceMomentum, score),
      volatilityRegime: this.volatilityRegime(h1),
    });
  }
}
