/**
 * Core type definitions for the Vantage breakout scanner
 */

// OHLCV Data Structure
export interface OHLCV {
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export type Timeframe = '1D' | '4H' | '1H' | '15M';

export const TIMEFRAMES: readonly Timeframe[] = ['1D', '4H', '1H', '15M'];

export interface TimeframeSeries {
  readonly symbol: string;
  readonly timeframe: Timeframe;
  readonly bars: readonly OHLCV[];
}

export type SymbolSeries = Readonly<Record<Timeframe, TimeframeSeries>>;

/**
 * Input handed over by the data-fetching collaborator: every symbol's series
 * plus the reference asset used for relative strength and correlation.
 */
export interface UniverseSnapshot {
  readonly baseline: string;
  readonly generatedAt?: number;
  readonly symbols: Readonly<Record<string, Partial<Record<Timeframe, readonly OHLCV[]>>>>;
}

// Indicator Types
export interface IndicatorSet {
  readonly timeframe: Timeframe;
  readonly timestamp: number;
  readonly barCount: number;
  readonly close: number;
  readonly ema20: number;
  readonly ema50: number;
  readonly atr: number;
  readonly atrPct: number;
  readonly rsi: number;
  readonly donchianHigh: number;
  readonly donchianLow: number;
  readonly volumeMedian: number;
  readonly currentVolume: number;
}

/**
 * Full indicator history for one series. Warm-up slots hold NaN.
 */
export interface IndicatorSeries {
  readonly timeframe: Timeframe;
  readonly timestamps: readonly number[];
  readonly opens: readonly number[];
  readonly highs: readonly number[];
  readonly lows: readonly number[];
  readonly closes: readonly number[];
  readonly volumes: readonly number[];
  readonly ema20: readonly number[];
  readonly ema50: readonly number[];
  readonly atr: readonly number[];
  readonly rsi: readonly number[];
  readonly donchianHigh: readonly number[];
  readonly donchianLow: readonly number[];
  readonly volumeMedian: readonly number[];
}

// Regime Types
export type Regime = 'trending' | 'reclaiming' | 'weak';

export interface RegimeState {
  readonly regime: Regime;
  /** EMA20 rate of change over the slope lookback */
  readonly trendStrength: number;
  /** (EMA20 - EMA50) / EMA50 on the daily series */
  readonly emaSpread: number;
  readonly h4Aligned: boolean;
  readonly reclaimed: boolean;
  readonly relativeStrength: number;
}

// Breakout Types
export type BreakoutState = 'NoBreakout' | 'PendingConfirmation' | 'Retested' | 'Confirmed';

export type ConfirmationMethod = 'two_close_confirmation' | 'clean_retest' | 'none';

export interface BreakoutTransition {
  readonly from: BreakoutState;
  readonly to: BreakoutState;
  readonly barIndex: number;
  readonly timestamp: number;
  readonly close: number;
  readonly volumeSurgeRatio: number;
}

export interface BreakoutEvent {
  readonly confirmed: boolean;
  readonly method: ConfirmationMethod;
  readonly state: BreakoutState;
  readonly priorRangeHigh: number;
  readonly volumeSurgeRatio: number;
  readonly closesAbove: number;
  readonly retested: boolean;
  readonly falseBreakouts: number;
  readonly transitions: readonly BreakoutTransition[];
}

// Risk Types
export interface RiskParameters {
  readonly entryPrice: number;
  readonly stopLoss: number;
  readonly riskPerUnit: number;
  /** Distance to stop as a percentage of entry */
  readonly riskPct: number;
  readonly swingLow: number;
  readonly atr: number;
  readonly atrMultiplier: number;
}

// Divergence Types
export interface DivergenceResult {
  readonly detected: boolean;
  readonly priorHigh: number;
  readonly recentHigh: number;
  readonly priorRsi: number;
  readonly recentRsi: number;
  readonly priorIndex: number;
  readonly recentIndex: number;
}

// Scoring Types
export interface ScoreBreakdown {
  readonly regime: number;
  readonly breakout: number;
  readonly volumeSurge: number;
  readonly divergence: number;
  readonly divergencePenalty: number;
  readonly divergenceOverridden: boolean;
  readonly relativeStrength: number;
  /** Unrounded, unclamped sum of the components */
  readonly raw: number;
}

export interface ConfidenceScore {
  readonly score: number;
  readonly breakdown: ScoreBreakdown;
}

export type QualityTier = 'excellent' | 'very_good' | 'good' | 'fair' | 'poor';

// Feature Types
export type VolatilityRegime = 'low' | 'medium' | 'high';

export interface TechnicalFeatures {
  readonly priceMomentum: number;
  readonly volumeTrend: number;
  readonly trendQuality: number;
  readonly correlationWithBtc: number;
  readonly marketStrength: number;
  readonly volatilityRegime: VolatilityRegime;
}

// Routing Types
export type Routing = 'signal' | 'watch' | 'rejected';

export type RejectionReason =
  | 'insufficient_history'
  | 'invalid_risk'
  | 'upstream_data'
  | 'evaluation_error'
  | 'atr_out_of_band'
  | 'weak_regime'
  | 'low_confidence'
  | 'below_min_confidence';

/**
 * Everything one symbol's evaluation produces before universe-level routing.
 */
export interface SymbolEvaluation {
  readonly symbol: string;
  readonly regime: RegimeState;
  readonly breakout: BreakoutEvent;
  readonly risk: RiskParameters;
  readonly divergence: DivergenceResult;
  readonly confidence: ConfidenceScore;
  readonly features: TechnicalFeatures;
  readonly qualityTier: QualityTier;
  /** 1H ATR as a percentage of the 1H close */
  readonly atrPct: number;
  readonly gateFailure: RejectionReason | null;
  readonly evaluatedAt: number;
}

export interface SymbolFailure {
  readonly symbol: string;
  readonly reason: RejectionReason;
  readonly message: string;
}

export type SymbolOutcome =
  | { readonly ok: true; readonly evaluation: SymbolEvaluation }
  | { readonly ok: false; readonly failure: SymbolFailure };

export interface SignalRecord extends SymbolEvaluation {
  readonly routing: Routing;
  readonly rejectionReason: RejectionReason | null;
  /** Price that arms a watch entry (the prior range high) */
  readonly armLevel: number | null;
  /** 1-based rank of relative strength across the evaluated universe */
  readonly relativeStrengthRank: number;
}

export interface ScanDiagnostics {
  readonly totalSymbols: number;
  readonly evaluated: number;
  readonly failed: number;
  /** Failed symbols count as rejected, so the buckets sum to totalSymbols */
  readonly byRouting: Readonly<Record<Routing, number>>;
  readonly byRegime: Readonly<Record<Regime, number>>;
  readonly byRejectionReason: Readonly<Record<RejectionReason, number>>;
  readonly failures: readonly SymbolFailure[];
  readonly truncated: Readonly<{ signals: number; watch: number }>;
}

export interface AggregatedOutput {
  readonly signals: readonly SignalRecord[];
  readonly watch: readonly SignalRecord[];
  readonly rejected: readonly SignalRecord[];
  readonly ranked: readonly SignalRecord[];
  readonly diagnostics: ScanDiagnostics;
}

export interface ScanResult extends AggregatedOutput {
  readonly scanId: string;
  readonly baseline: string;
  readonly timestamp: number;
  readonly scanDuration: number;
}

export interface ScanStats {
  totalScans: number;
  averageDuration: number;
  lastScanDuration: number;
  successRate: number;
}
