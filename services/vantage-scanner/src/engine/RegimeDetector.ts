/**
 * RegimeDetector - Daily trend classification
 *
 * Trending when the daily fast EMA sits on or above the slow EMA and is
 * still rising faster than the minimum strength. Otherwise Reclaiming when
 * the last daily close crossed above the prior Donchian high. Otherwise Weak.
 */

import { RegimeConfig } from '../config/schema';
import { InsufficientHistoryError } from '../errors';
import { IndicatorSeries, Regime, RegimeState } from '../types';

export class RegimeDetector {
  constructor(private readonly config: RegimeConfig) {}

  /**
   * Fast EMA rate of change over the slope lookback
   */
  trendStrength(daily: IndicatorSeries): number {
    const { ema20 } = daily;
    const last = ema20.length - 1;
    const back = last - this.config.trendSlopeLookback;
    if (back < 0 || !Number.isFinite(ema20[back])) {
      const firstDefined = ema20.findIndex((v) => Number.isFinite(v));
      const required = (firstDefined < 0 ? ema20.length : firstDefined) +
        this.config.trendSlopeLookback + 1;
      throw new InsufficientHistoryError('trend_slope', required, ema20.length);
    }
    return ema20[last] / ema20[back] - 1;
  }

  /**
   * Close crossed above the previous bar's channel high after being at or
   * below the channel the bar before. Without N + 2 bars there is no reclaim.
   */
  isReclaim(daily: IndicatorSeries): boolean {
    const { closes, donchianHigh } = daily;
    const last = closes.length - 1;
    if (last < 2) return false;
    const prevHigh = donchianHigh[last - 1];
    const olderHigh = donchianHigh[last - 2];
    if (!Number.isFinite(prevHigh) || !Number.isFinite(olderHigh)) return false;
    return closes[last] > prevHigh && closes[last - 1] <= olderHigh;
  }

  detect(daily: IndicatorSeries, h4: IndicatorSeries, relativeStrength: number): RegimeState {
    const last = daily.closes.length - 1;
    const ema20 = daily.ema20[last];
    const ema50 = daily.ema50[last];
    const trendStrength = this.trendStrength(daily);
    const reclaimed = this.isReclaim(daily);

    const h4Last = h4.closes.length - 1;
    const h4Aligned = h4.ema20[h4Last] >= h4.ema50[h4Last];

    let regime: Regime = 'weak';
    if (ema20 >= ema50 && trendStrength > this.config.minTrendStrength) {
      regime = 'trending';
    } else if (reclaimed) {
      regime = 'reclaiming';
    }

    return Object.freeze({
      regime,
      trendStrength,
      emaSpread: (ema20 - ema50) / ema50,
      h4Aligned,
      reclaimed,
      relativeStrength,
    });
  }

  /**
   * Symbol 4H return minus baseline 4H return over the same lookback
   */
  static relativeStrength(
    symbolCloses: readonly number[],
    baselineCloses: readonly number[],
    lookback: number,
  ): number {
    const required = lookback + 1;
    if (symbolCloses.length < required) {
      throw new InsufficientHistoryError('relative_strength', required, symbolCloses.length);
    }
    if (baselineCloses.length < required) {
      throw new InsufficientHistoryError('relative_strength(baseline)', required, baselineCloses.length);
    }
    return RegimeDetector.lookbackReturn(symbolCloses, lookback) -
      RegimeDetector.lookbackReturn(baselineCloses, lookback);
  }

  private static lookbackReturn(closes: readonly number[], lookback: number): number {
    const last = closes.length - 1;
    return closes[last] / closes[last - lookback] - 1;
  }
}
