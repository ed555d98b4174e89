/**
 * DivergenceFilter - bearish RSI divergence on 1H
 *
 * The lookback window splits into a prior segment and a recent segment of
 * `minBarsBetweenPeaks` bars. Divergence: the recent peak makes a higher
 * high while RSI at that peak is lower than at the prior peak.
 */

import { DivergenceConfig } from '../config/schema';
import { InsufficientHistoryError } from '../errors';
import { DivergenceResult, IndicatorSeries } from '../types';

function argMax(values: readonly number[], from: number, to: number): number {
  let best = from;
  for (let i = from + 1; i < to; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

export class DivergenceFilter {
  constructor(
    private readonly config: DivergenceConfig,
    private readonly rsiPeriod: number,
  ) {}

  detect(h1: IndicatorSeries): DivergenceResult {
    const { lookback, minBarsBetweenPeaks } = this.config;
    const n = h1.highs.length;
    const required = lookback + this.rsiPeriod;
    if (n < required) {
      throw new InsufficientHistoryError('rsi_divergence', required, n);
    }

    const start = n - lookback;
    const split = n - minBarsBetweenPeaks;
    const priorIndex = argMax(h1.highs, start, split);
    const recentIndex = argMax(h1.highs, split, n);

    const priorHigh = h1.highs[priorIndex];
    const recentHigh = h1.highs[recentIndex];
    const priorRsi = h1.rsi[priorIndex];
    const recentRsi = h1.rsi[recentIndex];

    return Object.freeze({
      detected: recentHigh > priorHigh && recentRsi < priorRsi,
      priorHigh,
      recentHigh,
      priorRsi,
      recentRsi,
      priorIndex,
      recentIndex,
    });
  }
}
