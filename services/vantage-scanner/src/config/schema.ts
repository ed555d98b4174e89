import { z } from 'zod';

export const IndicatorConfigSchema = z.object({
  emaFast: z.number().int().min(2).default(20),
  emaSlow: z.number().int().min(2).default(50),
  atrPeriod: z.number().int().min(1).default(14),
  rsiPeriod: z.number().int().min(2).default(14),
  volumeMedianLookback: z.number().int().min(1).default(20),
}).refine((data) => data.emaFast < data.emaSlow, {
  message: 'emaFast must be shorter than emaSlow',
  path: ['emaFast'],
});

export const RegimeConfigSchema = z.object({
  donchianLookback: z.number().int().min(2).max(200).default(20),
  trendSlopeLookback: z.number().int().min(1).max(50).default(5),
  minTrendStrength: z.number().min(0).max(1).default(0.005),
  strongTrendStrength: z.number().gt(0).max(1).default(0.03),
  rsLookback: z.number().int().min(1).max(200).default(18),
  weakWatchTopFraction: z.number().gt(0).max(1).default(0.1),
});

export const BreakoutConfigSchema = z.object({
  prhMinLookback: z.number().int().min(1).default(36),
  prhMaxLookback: z.number().int().min(1).default(60),
  confirmationBars: z.number().int().min(1).max(10).default(2),
  retestThresholdBps: z.number().min(0).max(1000).default(20),
  volumeSurgeThreshold: z.number().gt(0).max(20).default(1.6),
  volumeSurgeLookback: z.number().int().min(1).max(50).default(3),
  windowBars: z.number().int().min(1).max(200).default(8),
}).refine((data) => data.prhMinLookback <= data.prhMaxLookback, {
  message: 'prhMinLookback must not exceed prhMaxLookback',
  path: ['prhMinLookback'],
});

export const AtrMultipliersSchema = z.object({
  trending: z.number().gt(0).max(10).default(1.5),
  reclaiming: z.number().gt(0).max(10).default(1.2),
  weak: z.number().gt(0).max(10).default(0.8),
});

export const RiskConfigSchema = z.object({
  swingLookback: z.number().int().min(1).max(200).default(8),
  atrMultipliers: AtrMultipliersSchema.default({}),
  atrBandPct: z.object({
    min: z.number().min(0).default(1),
    max: z.number().gt(0).default(40),
  }).refine((band) => band.min < band.max, {
    message: 'atrBandPct.min must be below atrBandPct.max',
    path: ['min'],
  }).default({}),
});

export const DivergenceConfigSchema = z.object({
  lookback: z.number().int().min(3).max(200).default(14),
  minBarsBetweenPeaks: z.number().int().min(1).default(5),
  penalty: z.number().min(0).max(15).default(15),
}).refine((data) => data.minBarsBetweenPeaks < data.lookback, {
  message: 'minBarsBetweenPeaks must be shorter than lookback',
  path: ['minBarsBetweenPeaks'],
});

export const FeatureConfigSchema = z.object({
  momentumLookback: z.number().int().min(1).default(20),
  volumeShortWindow: z.number().int().min(1).default(5),
  volumeLongWindow: z.number().int().min(1).default(20),
  correlationLookback: z.number().int().min(2).default(20),
  volatilityPercentiles: z.object({
    low: z.number().min(0).max(1).default(0.33),
    high: z.number().min(0).max(1).default(0.67),
  }).refine((p) => p.low < p.high, {
    message: 'volatilityPercentiles.low must be below high',
    path: ['low'],
  }).default({}),
}).refine((data) => data.volumeShortWindow < data.volumeLongWindow, {
  message: 'volumeShortWindow must be shorter than volumeLongWindow',
  path: ['volumeShortWindow'],
});

export const OutputConfigSchema = z.object({
  minConfidence: z.number().min(60).max(100).default(60),
  maxSignals: z.number().int().min(0).default(10),
  maxWatch: z.number().int().min(0).default(20),
});

export const ScanConfigSchema = z.object({
  maxParallel: z.number().int().min(1).max(100).default(10),
  baselineSymbol: z.string().min(1).default('BTC-USDT'),
});

export const ScannerConfigSchema = z.object({
  indicators: IndicatorConfigSchema.default({}),
  regime: RegimeConfigSchema.default({}),
  breakout: BreakoutConfigSchema.default({}),
  risk: RiskConfigSchema.default({}),
  divergence: DivergenceConfigSchema.default({}),
  features: FeatureConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  scan: ScanConfigSchema.default({}),
}).strict();

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type ScannerConfigInput = z.input<typeof ScannerConfigSchema>;
export type IndicatorConfig = ScannerConfig['indicators'];
export type RegimeConfig = ScannerConfig['regime'];
export type BreakoutConfig = ScannerConfig['breakout'];
export type RiskConfig = ScannerConfig['risk'];
export type DivergenceConfig = ScannerConfig['divergence'];
export type FeatureConfig = ScannerConfig['features'];
export type OutputConfig = ScannerConfig['output'];
