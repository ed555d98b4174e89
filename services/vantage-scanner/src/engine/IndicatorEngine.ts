/**
 * IndicatorEngine - Pure Calculation Functions
 *
 * Windowed transforms over OHLCV series. Every function walks the series
 * left to right and the value at index i depends only on bars 0..i, so
 * appending a bar never changes an earlier value. Warm-up slots hold NaN.
 *
 * Core Functions:
 * - ema(): exponential moving average seeded with the simple mean
 * - trueRange() / atr(): true range and its rolling simple mean
 * - rsi(): Wilder-smoothed relative strength index
 * - donchianHigh() / donchianLow(): inclusive rolling channel
 * - rollingMedian(): rolling median (volume baseline)
 * - validateSeries(): structural checks on upstream bars
 */

import { InsufficientHistoryError, UpstreamDataError } from '../errors';
import { IndicatorConfig } from '../config/schema';
import { IndicatorSeries, IndicatorSet, OHLCV, TimeframeSeries } from '../types';
import { Statistics } from '../utils/math/Statistics';

function requireLength(indicator: string, required: number, actual: number): void {
  if (actual < required) {
    throw new InsufficientHistoryError(indicator, required, actual);
  }
}

function filledNaN(length: number): number[] {
  return new Array<number>(length).fill(NaN);
}

export class IndicatorEngine {
  /**
   * Exponential moving average, k = 2 / (period + 1).
   * The first defined value (index period - 1) is the simple mean of the
   * first `period` values.
   */
  static ema(values: readonly number[], period: number): number[] {
    requireLength(`EMA${period}`, period, values.length);
    const out = filledNaN(values.length);
    const k = 2 / (period + 1);
    let seed = 0;
    for (let i = 0; i < period; i++) seed += values[i];
    let prev = seed / period;
    out[period - 1] = prev;
    for (let i = period; i < values.length; i++) {
      prev = values[i] * k + prev * (1 - k);
      out[i] = prev;
    }
    return out;
  }

  static trueRange(bars: readonly OHLCV[]): number[] {
    return bars.map((bar, i) => {
      if (i === 0) return bar.high - bar.low;
      const prevClose = bars[i - 1].close;
      return Math.max(
        bar.high - bar.low,
        Math.abs(bar.high - prevClose),
        Math.abs(bar.low - prevClose),
      );
    });
  }

  /**
   * Average true range as the rolling simple mean of true range
   */
  static atr(bars: readonly OHLCV[], period: number): number[] {
    requireLength(`ATR${period}`, period, bars.length);
    const tr = IndicatorEngine.trueRange(bars);
    const out = filledNaN(bars.length);
    let windowSum = 0;
    for (let i = 0; i < tr.length; i++) {
      windowSum += tr[i];
      if (i >= period) windowSum -= tr[i - period];
      if (i >= period - 1) out[i] = windowSum / period;
    }
    return out;
  }

  /**
   * Wilder RSI. Needs period + 1 closes (period changes) for the first value.
   */
  static rsi(closes: readonly number[], period: number): number[] {
    requireLength(`RSI${period}`, period + 1, closes.length);
    const out = filledNaN(closes.length);

    let avgGain = 0;
    let avgLoss = 0;
    for (let i = 1; i <= period; i++) {
      const change = closes[i] - closes[i - 1];
      if (change > 0) avgGain += change;
      else avgLoss -= change;
    }
    avgGain /= period;
    avgLoss /= period;
    out[period] = IndicatorEngine.rsiValue(avgGain, avgLoss);

    for (let i = period + 1; i < closes.length; i++) {
      const change = closes[i] - closes[i - 1];
      const gain = change > 0 ? change : 0;
      const loss = change < 0 ? -change : 0;
      avgGain = (avgGain * (period - 1) + gain) / period;
      avgLoss = (avgLoss * (period - 1) + loss) / period;
      out[i] = IndicatorEngine.rsiValue(avgGain, avgLoss);
    }
    return out;
  }

  private static rsiValue(avgGain: number, avgLoss: number): number {
    if (avgLoss === 0) {
      return avgGain === 0 ? 50 : 100;
    }
    return 100 - 100 / (1 + avgGain / avgLoss);
  }

  static donchianHigh(highs: readonly number[], period: number): number[] {
    requireLength(`DonchianHigh${period}`, period, highs.length);
    return IndicatorEngine.rolling(highs, period, (window) => Math.max(...window));
  }

  static donchianLow(lows: readonly number[], period: number): number[] {
    requireLength(`DonchianLow${period}`, period, lows.length);
    return IndicatorEngine.rolling(lows, period, (window) => Math.min(...window));
  }

  static rollingMedian(values: readonly number[], period: number): number[] {
    requireLength(`Median${period}`, period, values.length);
    return IndicatorEngine.rolling(values, period, Statistics.median);
  }

  private static rolling(
    values: readonly number[],
    period: number,
    reduce: (window: readonly number[]) => number,
  ): number[] {
    const out = filledNaN(values.length);
    for (let i = period - 1; i < values.length; i++) {
      out[i] = reduce(values.slice(i - period + 1, i + 1));
    }
    return out;
  }

  /**
   * Reject bars a data feed should never have produced
   */
  static validateSeries(series: TimeframeSeries): void {
    const { symbol, timeframe, bars } = series;
    const context = { symbol, timeframe };
    if (bars.length === 0) {
      throw new UpstreamDataError(`${symbol} ${timeframe}: empty series`, context);
    }
    for (let i = 0; i < bars.length; i++) {
      const bar = bars[i];
      const fields = [bar.timestamp, bar.open, bar.high, bar.low, bar.close, bar.volume];
      if (!fields.every((v) => Number.isFinite(v))) {
        throw new UpstreamDataError(`${symbol} ${timeframe}: non-finite value at bar ${i}`, {
          ...context,
          index: i,
        });
      }
      if (bar.high < bar.low) {
        throw new UpstreamDataError(`${symbol} ${timeframe}: high below low at bar ${i}`, {
          ...context,
          index: i,
        });
      }
      if (!(bar.open > 0 && bar.high > 0 && bar.low > 0 && bar.close > 0)) {
        throw new UpstreamDataError(`${symbol} ${timeframe}: non-positive price at bar ${i}`, {
          ...context,
          index: i,
        });
      }
      if (bar.open < bar.low || bar.open > bar.high) {
        throw new UpstreamDataError(`${symbol} ${timeframe}: open outside high/low at bar ${i}`, {
          ...context,
          index: i,
        });
      }
      if (bar.close < bar.low || bar.close > bar.high) {
        throw new UpstreamDataError(`${symbol} ${timeframe}: close outside high/low at bar ${i}`, {
          ...context,
          index: i,
        });
      }
      if (bar.volume < 0) {
        throw new UpstreamDataError(`${symbol} ${timeframe}: negative volume at bar ${i}`, {
          ...context,
          index: i,
        });
      }
      if (i > 0 && bar.timestamp <= bars[i - 1].timestamp) {
        throw new UpstreamDataError(
          `${symbol} ${timeframe}: timestamps not strictly increasing at bar ${i}`,
          { ...context, index: i },
        );
      }
    }
  }

  /**
   * Minimum bars computeSeries accepts for the given windows
   */
  static requiredBars(config: IndicatorConfig, donchianLookback: number): number {
    return Math.max(
      config.emaFast,
      config.emaSlow,
      config.atrPeriod,
      config.rsiPeriod + 1,
      donchianLookback,
      config.volumeMedianLookback,
    );
  }

  static computeSeries(
    series: TimeframeSeries,
    config: IndicatorConfig,
    donchianLookback: number,
  ): IndicatorSeries {
    const { bars, timeframe } = series;
    requireLength(
      `indicators(${timeframe})`,
      IndicatorEngine.requiredBars(config, donchianLookback),
      bars.length,
    );

    const highs = bars.map((b) => b.high);
    const lows = bars.map((b) => b.low);
    const closes = bars.map((b) => b.close);
    const volumes = bars.map((b) => b.volume);

    return {
      timeframe,
      timestamps: bars.map((b) => b.timestamp),
      opens: bars.map((b) => b.open),
      highs,
      lows,
      closes,
      volumes,
      ema20: IndicatorEngine.ema(closes, config.emaFast),
      ema50: IndicatorEngine.ema(closes, config.emaSlow),
      atr: IndicatorEngine.atr(bars, config.atrPeriod),
      rsi: IndicatorEngine.rsi(closes, config.rsiPeriod),
      donchianHigh: IndicatorEngine.donchianHigh(highs, donchianLookback),
      donchianLow: IndicatorEngine.donchianLow(lows, donchianLookback),
      volumeMedian: IndicatorEngine.rollingMedian(volumes, config.volumeMedianLookback),
    };
  }

  /**
   * Immutable view of the indicators at the last bar
   */
  static snapshot(ind: IndicatorSeries): IndicatorSet {
    const last = ind.closes.length - 1;
    const close = ind.closes[last];
    const atr = ind.atr[last];
    return Object.freeze({
      timeframe: ind.timeframe,
      timestamp: ind.timestamps[last],
      barCount: ind.closes.length,
      close,
      ema20: ind.ema20[last],
      ema50: ind.ema50[last],
      atr,
      atrPct: close > 0 ? (atr / close) * 100 : NaN,
      rsi: ind.rsi[last],
      donchianHigh: ind.donchianHigh[last],
      donchianLow: ind.donchianLow[last],
      volumeMedian: ind.volumeMedian[last],
      currentVolume: ind.volumes[last],
    });
  }
}
