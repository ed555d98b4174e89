/**
 * SignalAggregator - universe-level routing, ranking and diagnostics
 *
 * Routing:
 * - ATR gate failure -> rejected (atr_out_of_band)
 * - weak regime -> watch when relative strength is positive and ranks in the
 *   top fraction of the evaluated universe, otherwise rejected (weak_regime)
 * - score >= 70 with a confirmed breakout -> signal
 * - score >= 60 -> watch, armed at the prior range high
 * - otherwise rejected (low_confidence)
 * minConfidence is an extra floor for trending and reclaiming symbols.
 * Symbols whose evaluation failed are counted as rejected in diagnostics.
 *
 * Ordering is (routing, score desc, symbol asc) and never depends on the
 * order outcomes arrived in.
 */

import { ScannerConfig } from '../config/schema';
import {
  InsufficientHistoryError,
  InvalidRiskError,
  UpstreamDataError,
} from '../errors';
import {
  AggregatedOutput,
  Regime,
  RejectionReason,
  Routing,
  ScanDiagnostics,
  SignalRecord,
  SymbolEvaluation,
  SymbolFailure,
  SymbolOutcome,
} from '../types';
import { SIGNAL_THRESHOLD, WATCH_THRESHOLD } from './ConfidenceScorer';

const ROUTING_PRIORITY: Record<Routing, number> = {
  signal: 0,
  watch: 1,
  rejected: 2,
};

function emptyReasonCounts(): Record<RejectionReason, number> {
  return {
    insufficient_history: 0,
    invalid_risk: 0,
    upstream_data: 0,
    evaluation_error: 0,
    atr_out_of_band: 0,
    weak_regime: 0,
    low_confidence: 0,
    below_min_confidence: 0,
  };
}

interface RouteDecision {
  routing: Routing;
  rejectionReason: RejectionReason | null;
  armLevel: number | null;
}

function compareSymbols(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class SignalAggregator {
  constructor(private readonly config: ScannerConfig) {}

  static failureReason(error: unknown): RejectionReason {
    if (error instanceof InsufficientHistoryError) return 'insufficient_history';
    if (error instanceof InvalidRiskError) return 'invalid_risk';
    if (error instanceof UpstreamDataError) return 'upstream_data';
    return 'evaluation_error';
  }

  /**
   * 1-based rank by relative strength (desc, ties by symbol)
   */
  static rankRelativeStrength(evaluations: readonly SymbolEvaluation[]): Map<string, number> {
    const ordered = [...evaluations].sort((a, b) => {
      const diff = b.regime.relativeStrength - a.regime.relativeStrength;
      return diff !== 0 ? diff : compareSymbols(a.symbol, b.symbol);
    });
    return new Map(ordered.map((e, i) => [e.symbol, i + 1]));
  }

  weakWatchCutoff(evaluatedCount: number): number {
    return Math.max(1, Math.ceil(evaluatedCount * this.config.regime.weakWatchTopFraction));
  }

  route(evaluation: SymbolEvaluation, rsRank: number, weakCutoff: number): RouteDecision {
    const { score } = evaluation.confidence;
    const armLevel = evaluation.breakout.priorRangeHigh;

    if (evaluation.gateFailure) {
      return { routing: 'rejected', rejectionReason: evaluation.gateFailure, armLevel: null };
    }

    if (evaluation.regime.regime === 'weak') {
      if (evaluation.regime.relativeStrength > 0 && rsRank <= weakCutoff) {
        return { routing: 'watch', rejectionReason: null, armLevel };
      }
      return { routing: 'rejected', rejectionReason: 'weak_regime', armLevel: null };
    }

    if (score < WATCH_THRESHOLD) {
      return { routing: 'rejected', rejectionReason: 'low_confidence', armLevel: null };
    }
    if (score < this.config.output.minConfidence) {
      return { routing: 'rejected', rejectionReason: 'below_min_confidence', armLevel: null };
    }
    if (score >= SIGNAL_THRESHOLD && evaluation.breakout.confirmed) {
      return { routing: 'signal', rejectionReason: null, armLevel: null };
    }
    return { routing: 'watch', rejectionReason: null, armLevel };
  }

  static compareRecords(a: SignalRecord, b: SignalRecord): number {
    const priority = ROUTING_PRIORITY[a.routing] - ROUTING_PRIORITY[b.routing];
    if (priority !== 0) return priority;
    const scoreDiff = b.confidence.score - a.confidence.score;
    if (scoreDiff !== 0) return scoreDiff;
    return compareSymbols(a.symbol, b.symbol);
  }

  aggregate(outcomes: readonly SymbolOutcome[]): AggregatedOutput {
    const evaluations: SymbolEvaluation[] = [];
    const failures: SymbolFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) evaluations.push(outcome.evaluation);
      else failures.push(outcome.failure);
    }

    const ranks = SignalAggregator.rankRelativeStrength(evaluations);
    const weakCutoff = this.weakWatchCutoff(evaluations.length);

    const ranked: SignalRecord[] = evaluations
      .map((evaluation) => {
        const relativeStrengthRank = ranks.get(evaluation.symbol) ?? evaluations.length;
        const decision = this.route(evaluation, relativeStrengthRank, weakCutoff);
        const record: SignalRecord = { ...evaluation, ...decision, relativeStrengthRank };
        return Object.freeze(record);
      })
      .sort(SignalAggregator.compareRecords);

    const allSignals = ranked.filter((r) => r.routing === 'signal');
    const allWatch = ranked.filter((r) => r.routing === 'watch');
    const rejected = ranked.filter((r) => r.routing === 'rejected');
    const { maxSignals, maxWatch } = this.config.output;
    const signals = allSignals.slice(0, maxSignals);
    const watch = allWatch.slice(0, maxWatch);

    const sortedFailures = [...failures].sort((a, b) => compareSymbols(a.symbol, b.symbol));

    return Object.freeze({
      signals: Object.freeze(signals),
      watch: Object.freeze(watch),
      rejected: Object.freeze(rejected),
      ranked: Object.freeze(ranked),
      diagnostics: this.buildDiagnostics(ranked, sortedFailures, {
        signals: allSignals.length - signals.length,
        watch: allWatch.length - watch.length,
      }),
    });
  }

  private buildDiagnostics(
    records: readonly SignalRecord[],
    failures: readonly SymbolFailure[],
    truncated: { signals: number; watch: number },
  ): ScanDiagnostics {
    const byRouting: Record<Routing, number> = { signal: 0, watch: 0, rejected: 0 };
    const byRegime: Record<Regime, number> = { trending: 0, reclaiming: 0, weak: 0 };
    const byRejectionReason = emptyReasonCounts();

    for (const record of records) {
      byRouting[record.routing]++;
      byRegime[record.regime.regime]++;
      if (record.rejectionReason) byRejectionReason[record.rejectionReason]++;
    }
    for (const failure of failures) {
      byRouting.rejected++;
      byRejectionReason[failure.reason]++;
    }

    return Object.freeze({
      totalSymbols: records.length + failures.length,
      evaluated: records.length,
      failed: failures.length,
      byRouting,
      byRegime,
      byRejectionReason,
      failures: Object.freeze([...failures]),
      truncated,
    });
  }
}
