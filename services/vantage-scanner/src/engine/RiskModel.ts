/**
 * RiskModel - Structural stop placement
 *
 * stop = min(swing low of the recent 15M bars, entry - ATR(1H) x multiplier)
 * with the multiplier chosen by regime.
 */

import { RiskConfig } from '../config/schema';
import { InsufficientHistoryError, InvalidRiskError } from '../errors';
import { OHLCV, Regime, RiskParameters } from '../types';

export class RiskModel {
  constructor(private readonly config: RiskConfig) {}

  swingLow(m15: readonly OHLCV[]): number {
    const { swingLookback } = this.config;
    if (m15.length < swingLookback) {
      throw new InsufficientHistoryError('swing_low', swingLookback, m15.length);
    }
    return Math.min(...m15.slice(m15.length - swingLookback).map((b) => b.low));
  }

  multiplierFor(regime: Regime): number {
    return this.config.atrMultipliers[regime];
  }

  calculate(entryPrice: number, swingLow: number, atr: number, regime: Regime): RiskParameters {
    const atrMultiplier = this.multiplierFor(regime);
    const context = { entryPrice, swingLow, atr, regime };

    if (![entryPrice, swingLow, atr].every((v) => Number.isFinite(v))) {
      throw new InvalidRiskError('Non-finite risk input', context);
    }

    const stopLoss = Math.min(swingLow, entryPrice - atr * atrMultiplier);
    if (stopLoss >= entryPrice) {
      throw new InvalidRiskError(`Stop ${stopLoss} is not below entry ${entryPrice}`, {
        ...context,
        stopLoss,
      });
    }
    if (stopLoss <= 0) {
      throw new InvalidRiskError(`Stop ${stopLoss} is not positive`, { ...context, stopLoss });
    }

    const riskPerUnit = entryPrice - stopLoss;
    return Object.freeze({
      entryPrice,
      stopLoss,
      riskPerUnit,
      riskPct: (riskPerUnit / entryPrice) * 100,
      swingLow,
      atr,
      atrMultiplier,
    });
  }
}
