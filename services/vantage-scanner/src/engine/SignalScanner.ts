/**
 * SignalScanner - Universe scanning engine
 *
 * Evaluates every symbol of a snapshot in batches of `maxParallel`
 * concurrent tasks, waits for all of them, then hands the outcomes to the
 * aggregator. A failing symbol becomes a diagnostic; only a bad config, a
 * missing baseline or an overlapping scan abort the run.
 *
 * Events:
 * - symbolFailed: one symbol's evaluation raised
 * - scanComplete: the aggregated ScanResult
 * - scanError: the run aborted
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '@vantage/shared';
import { createScannerConfig } from '../config/ConfigLoader';
import { ScannerConfig } from '../config/schema';
import { ErrorCode, ScannerError, errorMessage } from '../errors';
import { ScanResult, ScanStats, SymbolOutcome, UniverseSnapshot } from '../types';
import { SignalAggregator } from './SignalAggregator';
import { BaselineContext, RawSymbolBars, SymbolEvaluator } from './SymbolEvaluator';

export class SignalScanner extends EventEmitter {
  private readonly config: ScannerConfig;
  private readonly evaluator: SymbolEvaluator;
  private readonly aggregator: SignalAggregator;
  private readonly logger = Logger.getInstance('scanner:SignalScanner');
  private isScanning = false;
  private scanStats: ScanStats = {
    totalScans: 0,
    averageDuration: 0,
    lastScanDuration: 0,
    successRate: 0,
  };

  constructor(config: unknown = {}) {
    super();
    this.config = createScannerConfig(config);
    this.evaluator = new SymbolEvaluator(this.config);
    this.aggregator = new SignalAggregator(this.config);
  }

  getConfig(): ScannerConfig {
    return this.config;
  }

  async scan(snapshot: UniverseSnapshot): Promise<ScanResult> {
    if (this.isScanning) {
      throw new ScannerError(ErrorCode.SCAN_IN_PROGRESS, 'Scan already in progress');
    }

    this.isScanning = true;
    const scanId = uuidv4();
    const startTime = Date.now();
    const symbols = Object.keys(snapshot.symbols).sort();
    const timerId = this.logger.startTimer('scan', scanId, { symbols: symbols.length });

    try {
      const baseline = this.baselineContext(snapshot);
      this.logger.info('Starting scan', scanId, {
        baseline: snapshot.baseline,
        symbols: symbols.length,
        maxParallel: this.config.scan.maxParallel,
      });

      const outcomes = await this.evaluateParallel(snapshot, symbols, baseline, scanId);
      const aggregated = this.aggregator.aggregate(outcomes);
      const scanDuration = Date.now() - startTime;

      this.updateScanStats(scanDuration, aggregated.diagnostics.evaluated, symbols.length);
      this.logger.endTimer(timerId, {
        signals: aggregated.signals.length,
        watch: aggregated.watch.length,
        failed: aggregated.diagnostics.failed,
      });

      const result: ScanResult = Object.freeze({
        ...aggregated,
        scanId,
        baseline: snapshot.baseline,
        timestamp: Date.now(),
        scanDuration,
      });

      this.emit('scanComplete', result);
      return result;
    } catch (error) {
      const scanDuration = Date.now() - startTime;
      this.logger.endTimer(timerId, { aborted: true });
      this.emit('scanError', {
        scanId,
        error: errorMessage(error),
        duration: scanDuration,
        totalSymbols: symbols.length,
      });
      this.logger.error('Scan aborted', error instanceof Error ? error : undefined, scanId);
      throw error;
    } finally {
      this.isScanning = false;
    }
  }

  getScanStats(): ScanStats {
    return { ...this.scanStats };
  }

  isCurrentlyScanning(): boolean {
    return this.isScanning;
  }

  /**
   * Baseline 4H closes, shared read-only by every evaluation
   */
  private baselineContext(snapshot: UniverseSnapshot): BaselineContext {
    const bars = snapshot.symbols[snapshot.baseline]?.['4H'];
    if (!bars || bars.length === 0) {
      throw new ScannerError(
        ErrorCode.MISSING_BASELINE,
        `Baseline ${snapshot.baseline} has no 4H series`,
        { baseline: snapshot.baseline },
      );
    }
    return Object.freeze({
      symbol: snapshot.baseline,
      closes4h: Object.freeze(bars.map((b) => b.close)),
    });
  }

  private async evaluateParallel(
    snapshot: UniverseSnapshot,
    symbols: readonly string[],
    baseline: BaselineContext,
    scanId: string,
  ): Promise<SymbolOutcome[]> {
    const batchSize = this.config.scan.maxParallel;
    const outcomes: SymbolOutcome[] = [];

    for (let i = 0; i < symbols.length; i += batchSize) {
      const batch = symbols.slice(i, i + batchSize);
      this.logger.debug(
        `Evaluating batch ${Math.floor(i / batchSize) + 1}/${Math.ceil(symbols.length / batchSize)}`,
        scanId,
        { size: batch.length },
      );
      const results = await Promise.all(
        batch.map((symbol) =>
          this.evaluateSymbol(symbol, snapshot.symbols[symbol], baseline, scanId)
        ),
      );
      outcomes.push(...results);
    }

    return outcomes;
  }

  private async evaluateSymbol(
    symbol: string,
    raw: RawSymbolBars,
    baseline: BaselineContext,
    scanId: string,
  ): Promise<SymbolOutcome> {
    try {
      const evaluation = await Promise.resolve().then(() =>
        this.evaluator.evaluate(symbol, raw, baseline)
      );
      return { ok: true, evaluation };
    } catch (error) {
      const failure = {
        symbol,
        reason: SignalAggregator.failureReason(error),
        message: errorMessage(error),
      };
      this.logger.warn(`Evaluation failed for ${symbol}`, scanId, { ...failure });
      this.emit('symbolFailed', failure);
      return { ok: false, failure };
    }
  }

  private updateScanStats(duration: number, successCount: number, totalCount: number): void {
    this.scanStats.totalScans++;
    this.scanStats.lastScanDuration = duration;
    this.scanStats.averageDuration =
      (this.scanStats.averageDuration * (this.scanStats.totalScans - 1) + duration) /
      this.scanStats.totalScans;
    const successRate = totalCount > 0 ? successCount / totalCount : 0;
    this.scanStats.successRate =
      (this.scanStats.successRate * (this.scanStats.totalScans - 1) + successRate) /
      this.scanStats.totalScans;
  }
}

/**
 * One-shot scan with a fresh scanner
 */
export async function runPipeline(snapshot: UniverseSnapshot, config: unknown = {}): Promise<ScanResult> {
  return new SignalScanner(config).scan(snapshot);
}
