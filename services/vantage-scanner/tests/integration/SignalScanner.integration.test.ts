/**
 * End-to-end scans over synthetic universes
 */

import { SignalScanner, runPipeline } from '../../src/engine/SignalScanner';
import { ErrorCode, ScannerError } from '../../src/errors';
import { Logger } from '@vantage/shared';
import {
  BarShape,
  BASELINE,
  divergenceH1,
  geometricBars,
  quietWindow,
  rangeBoundH1,
  symbolBars,
  twoCloseWindow,
  universe,
} from '../helpers/bars';
import { ScanResult, SignalRecord, SymbolFailure, UniverseSnapshot } from '../../src/types';

function divergenceWindow(): BarShape[] {
  return [
    { close: 50.3, high: 50.35, low: 50.2 },
    { close: 50.45, high: 50.5, low: 50.3, volume: 1800 },
    ...Array.from({ length: 6 }, () => ({ close: 50.5, high: 50.6, low: 50.4 })),
  ];
}

function pendingWindow(): BarShape[] {
  return [...quietWindow(50, 7), { close: 50.025, high: 50.05, low: 49.98, volume: 1300 }];
}

function marketSnapshot(): UniverseSnapshot {
  const short = symbolBars({ dailyGrowth: 0.01 });
  const noFeed = symbolBars({ dailyGrowth: 0.01 });
  delete noFeed['15M'];

  return universe({
    'STRONG-USDT': symbolBars({ dailyGrowth: 0.01, h4Growth: 0.005, window: twoCloseWindow() }),
    'WEAK-USDT': symbolBars({ dailyGrowth: 0, h4Growth: 0.01 }),
    'PEND-USDT': symbolBars({ dailyGrowth: 0.01, h4Growth: 0.005, window: pendingWindow() }),
    'DIV-USDT': symbolBars({
      dailyGrowth: 0.004,
      h4Growth: 0.005,
      prh: 50.25,
      window: divergenceWindow(),
      h1: divergenceH1(),
    }),
    'GATE-USDT': symbolBars({
      dailyGrowth: 0.01,
      h4Growth: 0.005,
      window: twoCloseWindow(),
      h1: rangeBoundH1(150),
    }),
    'SHORT-USDT': { ...short, '1D': geometricBars('1D', 30, 0.01) },
    'NOFEED-USDT': noFeed,
    // entry 0.7 with ATR 1 puts the weak-regime stop below zero
    'TINY-USDT': symbolBars({ prh: 1.2 }),
  });
}

function bySymbol(result: ScanResult): Record<string, SignalRecord> {
  return Object.fromEntries(result.ranked.map((r) => [r.symbol, r]));
}

describe('SignalScanner integration', () => {
  let scanner: SignalScanner;

  beforeEach(() => {
    scanner = new SignalScanner();
  });

  describe('routing across a mixed universe', () => {
    let result: ScanResult;
    let records: Record<string, SignalRecord>;

    beforeAll(async () => {
      result = await new SignalScanner().scan(marketSnapshot());
      records = bySymbol(result);
    });

    it('orders signals, watch and rejected records', () => {
      expect(result.ranked.map((r) => [r.symbol, r.routing, r.confidence.score])).toEqual([
        ['STRONG-USDT', 'signal', 96],
        ['DIV-USDT', 'signal', 78],
        ['PEND-USDT', 'watch', 79],
        ['WEAK-USDT', 'watch', 38],
        ['GATE-USDT', 'rejected', 68],
        [BASELINE, 'rejected', 28],
      ]);
      expect(result.signals.map((r) => r.symbol)).toEqual(['STRONG-USDT', 'DIV-USDT']);
      expect(result.watch.map((r) => r.symbol)).toEqual(['PEND-USDT', 'WEAK-USDT']);
    });

    it('signals a confirmed two-close breakout in a trend', () => {
      const strong = records['STRONG-USDT'];

      expect(strong.regime.regime).toBe('trending');
      expect(strong.regime.trendStrength).toBeCloseTo(0.05104, 4);
      expect(strong.regime.relativeStrength).toBeCloseTo(0.093929, 5);
      expect(strong.breakout.method).toBe('two_close_confirmation');
      expect(strong.breakout.volumeSurgeRatio).toBe(1.8);
      expect(strong.risk.entryPrice).toBe(50.3);
      expect(strong.risk.stopLoss).toBeCloseTo(48.8, 10);
      expect(strong.confidence.breakdown.raw).toBeCloseTo(95.625, 10);
      expect(strong.qualityTier).toBe('excellent');
      expect(strong.armLevel).toBeNull();
    });

    it('puts an unconfirmed breakout on watch armed at the range high', () => {
      const pending = records['PEND-USDT'];

      expect(pending.breakout.state).toBe('PendingConfirmation');
      expect(pending.breakout.volumeSurgeRatio).toBe(1.3);
      expect(pending.armLevel).toBe(50);
      expect(pending.risk.stopLoss).toBeCloseTo(48.525, 10);
    });

    it('watches the strongest weak-regime symbol only', () => {
      const weak = records['WEAK-USDT'];

      expect(weak.regime.regime).toBe('weak');
      expect(weak.relativeStrengthRank).toBe(1);
      expect(weak.armLevel).toBe(50);
      expect(records[BASELINE].rejectionReason).toBe('weak_regime');
      expect(records[BASELINE].regime.relativeStrength).toBe(0);
    });

    it('penalises divergence in a moderate trend', () => {
      const div = records['DIV-USDT'];

      expect(div.divergence.detected).toBe(true);
      expect(div.divergence.priorIndex).toBe(46);
      expect(div.divergence.recentIndex).toBe(59);
      expect(div.confidence.breakdown.divergencePenalty).toBe(15);
      expect(div.confidence.breakdown.divergenceOverridden).toBe(false);
      expect(div.breakout.priorRangeHigh).toBeCloseTo(50.25, 10);
      expect(div.risk.stopLoss).toBeCloseTo(49.6857, 4);
      expect(div.atrPct).toBeCloseTo(1.0956, 4);
    });

    it('rejects a symbol whose ATR sits outside the band', () => {
      const gate = records['GATE-USDT'];

      expect(gate.gateFailure).toBe('atr_out_of_band');
      expect(gate.rejectionReason).toBe('atr_out_of_band');
      expect(gate.atrPct).toBeCloseTo(0.6689, 4);
    });

    it('keeps per-symbol failures out of the ranking', () => {
      expect(result.diagnostics.failures.map((f) => [f.symbol, f.reason])).toEqual([
        ['NOFEED-USDT', 'upstream_data'],
        ['SHORT-USDT', 'insufficient_history'],
        ['TINY-USDT', 'invalid_risk'],
      ]);
      expect(result.diagnostics.failures[0].message).toBe('NOFEED-USDT: missing 15M series');
      expect(result.diagnostics.failures[1].message).toBe('indicators(1D) requires 50 bars, got 30');
      expect(result.ranked.map((r) => r.symbol)).not.toContain('TINY-USDT');
    });

    it('summarises the run', () => {
      expect(result.baseline).toBe(BASELINE);
      expect(result.scanId).toBeString();
      expect(result.diagnostics.totalSymbols).toBe(9);
      expect(result.diagnostics.evaluated).toBe(6);
      expect(result.diagnostics.byRouting).toEqual({ signal: 2, watch: 2, rejected: 5 });
      expect(result.diagnostics.byRegime).toEqual({ trending: 4, reclaiming: 0, weak: 2 });
      expect(result.diagnostics.byRejectionReason).toMatchObject({
        atr_out_of_band: 1,
        weak_regime: 1,
        insufficient_history: 1,
        upstream_data: 1,
        invalid_risk: 1,
        low_confidence: 0,
      });
      expect(Object.isFrozen(result)).toBe(true);
    });
  });

  it('lets a strong trend override divergence', async () => {
    const result = await scanner.scan(
      universe({
        'DIV-USDT': symbolBars({
          dailyGrowth: 0.01,
          h4Growth: 0.005,
          prh: 50.25,
          window: divergenceWindow(),
          h1: divergenceH1(),
        }),
      }),
    );
    const div = bySymbol(result)['DIV-USDT'];

    expect(div.confidence.score).toBe(96);
    expect(div.confidence.breakdown.divergenceOverridden).toBe(true);
    expect(div.confidence.breakdown.divergencePenalty).toBe(0);
    expect(div.routing).toBe('signal');
  });

  it('applies a raised minimum confidence', async () => {
    const result = await runPipeline(marketSnapshot(), { output: { minConfidence: 80 } });
    const records = bySymbol(result);

    expect(result.signals.map((r) => r.symbol)).toEqual(['STRONG-USDT']);
    expect(records['DIV-USDT'].rejectionReason).toBe('below_min_confidence');
    expect(records['PEND-USDT'].rejectionReason).toBe('below_min_confidence');
    expect(records['WEAK-USDT'].routing).toBe('watch');
  });

  it('produces the same result whatever the batch size', async () => {
    const wide = await scanner.scan(marketSnapshot());
    const serial = await new SignalScanner({ scan: { maxParallel: 1 } }).scan(marketSnapshot());

    const shape = (r: ScanResult) => r.ranked.map((s) => [s.symbol, s.routing, s.confidence.breakdown.raw]);
    expect(shape(serial)).toEqual(shape(wide));
    expect(serial.diagnostics).toEqual(wide.diagnostics);
  });

  it('emits symbolFailed per failure and scanComplete once', async () => {
    const failures: SymbolFailure[] = [];
    const completed = jest.fn();
    scanner.on('symbolFailed', (failure: SymbolFailure) => failures.push(failure));
    scanner.on('scanComplete', completed);

    const result = await scanner.scan(marketSnapshot());

    expect(failures.map((f) => f.symbol).sort()).toEqual(['NOFEED-USDT', 'SHORT-USDT', 'TINY-USDT']);
    expect(completed).toHaveBeenCalledTimes(1);
    expect(completed).toHaveBeenCalledWith(result);
  });

  it('tracks scan statistics', async () => {
    await scanner.scan(marketSnapshot());
    await scanner.scan(universe({}));

    const stats = scanner.getScanStats();
    expect(stats.totalScans).toBe(2);
    expect(stats.successRate).toBeCloseTo((6 / 9 + 1) / 2, 10);
    expect(scanner.isCurrentlyScanning()).toBe(false);
  });

  it('aborts when the baseline has no 4H series', async () => {
    const errors = jest.fn();
    scanner.on('scanError', errors);
    const snapshot = universe({ 'STRONG-USDT': symbolBars({ dailyGrowth: 0.01 }) }, 'ETH-USDT');

    await expect(scanner.scan(snapshot)).rejects.toMatchObject({
      code: ErrorCode.MISSING_BASELINE,
      message: 'Baseline ETH-USDT has no 4H series',
    });
    expect(errors).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'Baseline ETH-USDT has no 4H series', totalSymbols: 2 }),
    );
    expect(scanner.isCurrentlyScanning()).toBe(false);
  });

  it('rejects malformed upstream bars as upstream_data', async () => {
    const zeroClose = symbolBars({ dailyGrowth: 0.01, h4Growth: 0.005, window: twoCloseWindow() });
    const h1 = rangeBoundH1(50);
    h1[h1.length - 1] = { ...h1[h1.length - 1], close: 0, low: 0 };
    zeroClose['1H'] = h1;

    const offRange = symbolBars({ dailyGrowth: 0.01, h4Growth: 0.005, window: twoCloseWindow() });
    const m15 = [...(offRange['15M'] ?? [])];
    m15[m15.length - 1] = { ...m15[m15.length - 1], close: 99, high: 50.4 };
    offRange['15M'] = m15;

    const result = await scanner.scan(universe({ 'ZERO-USDT': zeroClose, 'WICK-USDT': offRange }));

    expect(result.diagnostics.failures).toEqual([
      {
        symbol: 'WICK-USDT',
        reason: 'upstream_data',
        message: 'WICK-USDT 15M: close outside high/low at bar 39',
      },
      {
        symbol: 'ZERO-USDT',
        reason: 'upstream_data',
        message: 'ZERO-USDT 1H: non-positive price at bar 59',
      },
    ]);
    expect(result.signals).toEqual([]);
  });

  it('ends only its own timer when another scanner aborts', async () => {
    const logger = Logger.getInstance('scanner:SignalScanner');
    const endTimer = jest.spyOn(logger, 'endTimer');
    const warn = jest.spyOn(logger, 'warn');
    const failing = new SignalScanner();

    const healthy = scanner.scan(universe({ 'STRONG-USDT': symbolBars({ dailyGrowth: 0.01 }) }));
    const aborted = failing.scan(universe({}, 'ETH-USDT'));

    await expect(aborted).rejects.toMatchObject({ code: ErrorCode.MISSING_BASELINE });
    await expect(healthy).resolves.toHaveProperty('scanId');

    expect(endTimer).toHaveBeenCalledTimes(2);
    expect(endTimer.mock.results.map((r) => typeof r.value)).toEqual(['number', 'number']);
    expect(warn).not.toHaveBeenCalledWith(expect.stringContaining('Timer not found'));
    expect(logger.getActiveTimerCount()).toBe(0);

    endTimer.mockRestore();
    warn.mockRestore();
  });

  it('rejects an overlapping scan', async () => {
    const first = scanner.scan(marketSnapshot());
    const second = scanner.scan(marketSnapshot());

    await expect(second).rejects.toBeInstanceOf(ScannerError);
    await expect(second).rejects.toMatchObject({ code: ErrorCode.SCAN_IN_PROGRESS });
    await expect(first).resolves.toHaveProperty('scanId');
  });

  it('rejects an invalid config up front', () => {
    expect(() => new SignalScanner({ output: { minConfidence: 10 } })).toThrow(
      'Invalid scanner configuration',
    );
  });
});
