export { IndicatorEngine } from './IndicatorEngine';
export { RegimeDetector } from './RegimeDetector';
export { BreakoutValidator } from './BreakoutValidator';
export { RiskModel } from './RiskModel';
export { DivergenceFilter } from './DivergenceFilter';
export { ConfidenceScorer, SCORE_WEIGHTS, SIGNAL_THRESHOLD, WATCH_THRESHOLD } from './ConfidenceScorer';
export { FeatureExtractor } from './FeatureExtractor';
export { SymbolEvaluator } from './SymbolEvaluator';
export type { BaselineContext, RawSymbolBars } from './SymbolEvaluator';
export { SignalAggregator } from './SignalAggregator';
export { SignalScanner, runPipeline } from './SignalScanner';
