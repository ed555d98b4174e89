/**
 * BreakoutValidator - 15M breakout state machine
 *
 * States: NoBreakout -> PendingConfirmation (-> Retested) -> Confirmed.
 * A close back at or below the prior range high drops a pending breakout
 * to NoBreakout and counts as a false breakout. Confirmed is terminal.
 *
 * Confirmation needs a volume surge plus either enough consecutive closes
 * above the range high (two-close) or a close clearing the range high by the
 * retest threshold (clean retest). The machine is re-derived on every run.
 */

import { BreakoutConfig } from '../config/schema';
import { InsufficientHistoryError } from '../errors';
import {
  BreakoutEvent,
  BreakoutState,
  BreakoutTransition,
  ConfirmationMethod,
  OHLCV,
} from '../types';
import { Statistics } from '../utils/math/Statistics';

export class BreakoutValidator {
  constructor(private readonly config: BreakoutConfig) {}

  /**
   * Highest 1H high over the bars preceding the last one.
   * look = min(max, max(min, n - 2)); needs at least min + 1 bars.
   */
  priorRangeHigh(h1: readonly OHLCV[]): number {
    const { prhMinLookback, prhMaxLookback } = this.config;
    const n = h1.length;
    if (n < prhMinLookback + 1) {
      throw new InsufficientHistoryError('prior_range_high', prhMinLookback + 1, n);
    }
    const look = Math.min(prhMaxLookback, Math.max(prhMinLookback, n - 2));
    let high = -Infinity;
    for (let i = n - 1 - look; i <= n - 2; i++) {
      high = Math.max(high, h1[i].high);
    }
    return high;
  }

  /**
   * volume[i] / median of the `lookback` volumes before i; 0 when fewer
   * than `lookback` bars precede i or the median is zero.
   */
  static volumeSurgeRatio(volumes: readonly number[], index: number, lookback: number): number {
    if (index < lookback) return 0;
    const median = Statistics.median(volumes.slice(index - lookback, index));
    if (!(median > 0)) return 0;
    return volumes[index] / median;
  }

  validate(m15: readonly OHLCV[], priorRangeHigh: number): BreakoutEvent {
    const { windowBars, confirmationBars, retestThresholdBps, volumeSurgeThreshold, volumeSurgeLookback } =
      this.config;
    if (m15.length < windowBars) {
      throw new InsufficientHistoryError('breakout_window', windowBars, m15.length);
    }

    const volumes = m15.map((b) => b.volume);
    const cleanLevel = priorRangeHigh * (1 + retestThresholdBps / 10000);
    const transitions: BreakoutTransition[] = [];

    let state: BreakoutState = 'NoBreakout';
    let method: ConfirmationMethod = 'none';
    let closesAbove = 0;
    let retested = false;
    let falseBreakouts = 0;
    let confirmingSurge: number | null = null;
    let lastSurge = 0;

    const record = (from: BreakoutState, to: BreakoutState, index: number, surge: number): BreakoutState => {
      transitions.push({
        from,
        to,
        barIndex: index,
        timestamp: m15[index].timestamp,
        close: m15[index].close,
        volumeSurgeRatio: surge,
      });
      return to;
    };

    for (let i = m15.length - windowBars; i < m15.length; i++) {
      const bar = m15[i];
      const surge = BreakoutValidator.volumeSurgeRatio(volumes, i, volumeSurgeLookback);
      lastSurge = surge;

      if (state === 'Confirmed') break;

      if (state === 'NoBreakout') {
        if (bar.close <= priorRangeHigh) continue;
        state = record(state, 'PendingConfirmation', i, surge);
        closesAbove = 1;
      } else {
        if (bar.close <= priorRangeHigh) {
          state = record(state, 'NoBreakout', i, surge);
          closesAbove = 0;
          falseBreakouts++;
          continue;
        }
        closesAbove++;
        if (bar.low <= priorRangeHigh) {
          retested = true;
          if (state === 'PendingConfirmation') state = record(state, 'Retested', i, surge);
        }
      }

      if (surge < volumeSurgeThreshold) continue;
      if (closesAbove >= confirmationBars) {
        method = 'two_close_confirmation';
      } else if (bar.close >= cleanLevel) {
        method = 'clean_retest';
      } else {
        continue;
      }
      state = record(state, 'Confirmed', i, surge);
      confirmingSurge = surge;
    }

    return Object.freeze({
      confirmed: state === 'Confirmed',
      method,
      state,
      priorRangeHigh,
      volumeSurgeRatio: confirmingSurge ?? lastSurge,
      closesAbove,
      retested,
      falseBreakouts,
      transitions: Object.freeze(transitions),
    });
  }
}
