/**
 * SymbolEvaluator - runs one symbol through the full pipeline
 *
 * Reads only the symbol's own series plus the read-only baseline closes, so
 * evaluations can run concurrently in any order.
 */

import { ScannerConfig } from '../config/schema';
import { UpstreamDataError } from '../errors';
import {
  OHLCV,
  RejectionReason,
  SymbolEvaluation,
  SymbolSeries,
  Timeframe,
  TIMEFRAMES,
  TimeframeSeries,
} from '../types';
import { BreakoutValidator } from './BreakoutValidator';
import { ConfidenceScorer } from './ConfidenceScorer';
import { DivergenceFilter } from './DivergenceFilter';
import { FeatureExtractor } from './FeatureExtractor';
import { IndicatorEngine } from './IndicatorEngine';
import { RegimeDetector } from './RegimeDetector';
import { RiskModel } from './RiskModel';

export type RawSymbolBars = Partial<Record<Timeframe, readonly OHLCV[]>>;

export interface BaselineContext {
  readonly symbol: string;
  readonly closes4h: readonly number[];
}

export class SymbolEvaluator {
  private readonly regimeDetector: RegimeDetector;
  private readonly breakoutValidator: BreakoutValidator;
  private readonly riskModel: RiskModel;
  private readonly divergenceFilter: DivergenceFilter;
  private readonly scorer: ConfidenceScorer;
  private readonly featureExtractor: FeatureExtractor;

  constructor(private readonly config: ScannerConfig) {
    this.regimeDetector = new RegimeDetector(config.regime);
    this.breakoutValidator = new BreakoutValidator(config.breakout);
    this.riskModel = new RiskModel(config.risk);
    this.divergenceFilter = new DivergenceFilter(config.divergence, config.indicators.rsiPeriod);
    this.scorer = new ConfidenceScorer(config);
    this.featureExtractor = new FeatureExtractor(config.features);
  }

  /**
   * Wrap raw bars into validated timeframe series.
   * A missing timeframe is an upstream data problem.
   */
  static buildSeries(symbol: string, raw: RawSymbolBars): SymbolSeries {
    const build = (timeframe: Timeframe): TimeframeSeries => {
      const bars = raw[timeframe];
      if (!bars) {
        throw new UpstreamDataError(`${symbol}: missing ${timeframe} series`, { symbol, timeframe });
      }
      const series: TimeframeSeries = { symbol, timeframe, bars };
      IndicatorEngine.validateSeries(series);
      return series;
    };
    const [daily, h4, h1, m15] = TIMEFRAMES.map(build);
    return { '1D': daily, '4H': h4, '1H': h1, '15M': m15 };
  }

  /**
   * ATR% outside the band, or not a number at all, rejects the symbol
   */
  static atrGate(atrPct: number, band: { min: number; max: number }): RejectionReason | null {
    return atrPct >= band.min && atrPct <= band.max ? null : 'atr_out_of_band';
  }

  evaluate(
    symbol: string,
    raw: RawSymbolBars,
    baseline: BaselineContext,
  ): SymbolEvaluation {
    const { indicators, regime: regimeConfig, risk: riskConfig } = this.config;
    const series = SymbolEvaluator.buildSeries(symbol, raw);
    const donchian = regimeConfig.donchianLookback;

    const daily = IndicatorEngine.computeSeries(series['1D'], indicators, donchian);
    const h4 = IndicatorEngine.computeSeries(series['4H'], indicators, donchian);
    const h1 = IndicatorEngine.computeSeries(series['1H'], indicators, donchian);
    const m15 = series['15M'].bars;

    const relativeStrength = symbol === baseline.symbol
      ? 0
      : RegimeDetector.relativeStrength(h4.closes, baseline.closes4h, regimeConfig.rsLookback);
    const regime = this.regimeDetector.detect(daily, h4, relativeStrength);

    const h1Snapshot = IndicatorEngine.snapshot(h1);
    const gateFailure = SymbolEvaluator.atrGate(h1Snapshot.atrPct, riskConfig.atrBandPct);

    const priorRangeHigh = this.breakoutValidator.priorRangeHigh(series['1H'].bars);
    const breakout = this.breakoutValidator.validate(m15, priorRangeHigh);

    const entryPrice = m15[m15.length - 1].close;
    const swingLow = this.riskModel.swingLow(m15);
    const risk = this.riskModel.calculate(entryPrice, swingLow, h1Snapshot.atr, regime.regime);

    const divergence = this.divergenceFilter.detect(h1);
    const confidence = this.scorer.score(regime, breakout, divergence);
    const features = this.featureExtractor.extract(h4, h1, baseline.closes4h, confidence.score);

    return Object.freeze({
      symbol,
      regime,
      breakout,
      risk,
      divergence,
      confidence,
      features,
      qualityTier: ConfidenceScorer.qualityTier(confidence.score),
      atrPct: h1Snapshot.atrPct,
      gateFailure,
      evaluatedAt: m15[m15.length - 1].timestamp,
    });
  }
}
