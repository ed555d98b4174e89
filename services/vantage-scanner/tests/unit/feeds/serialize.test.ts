import { createScannerConfig } from '../../../src/config/ConfigLoader';
import { round, toOutputRecord, toStatusDocument } from '../../../src/feeds/serialize';
import { failed, ok, scanResult } from '../../helpers/evaluations';

describe('serialize', () => {
  it('rounds to the given number of decimals', () => {
    expect(round(1.23456, 2)).toBe(1.23);
    expect(round(0.98765, 4)).toBe(0.9877);
    expect(round(5.625, 2)).toBe(5.63);
  });

  describe('toOutputRecord', () => {
    it('writes snake_case fields', () => {
      const result = scanResult([ok({ symbol: 'DOT-USDT', score: 72 })]);

      expect(toOutputRecord(result.signals[0])).toEqual({
        symbol: 'DOT-USDT',
        confidence_score: 72,
        regime: 'trending',
        entry_price: 50.3,
        stop_loss: 48.8,
        technical_features: {
          price_momentum: 0.5,
          volume_trend: 0.5,
          trend_quality: 0.5,
          correlation_with_btc: 0.5,
          market_strength: 0.5,
        },
        volatility_regime: 'medium',
        routing: 'signal',
        rejection_reason: null,
        breakout_method: 'two_close_confirmation',
        prior_range_high: 50,
        volume_surge_ratio: 1.6,
        risk_per_unit: 1.5,
        quality_tier: 'good',
        arm_level: null,
        relative_strength: 0.025,
        score_breakdown: {
          regime: 26,
          breakout: 25,
          volume_surge: 5,
          divergence: 15,
          divergence_penalty: 0,
          divergence_overridden: false,
          relative_strength: 15,
        },
      });
    });

    it('carries the arm level and rejection reason', () => {
      const result = scanResult([
        ok({ symbol: 'ETC-USDT', score: 64 }),
        ok({ symbol: 'LTC-USDT', score: 41 }),
      ]);

      expect(toOutputRecord(result.watch[0]).arm_level).toBe(50);
      expect(toOutputRecord(result.rejected[0]).rejection_reason).toBe('low_confidence');
    });
  });

  describe('toStatusDocument', () => {
    it('summarises the scan and the effective config', () => {
      const config = createScannerConfig({ output: { minConfidence: 65 } });
      const result = scanResult(
        [ok({ symbol: 'DOT-USDT', score: 72 }), failed('ZEC-USDT', 'upstream_data')],
        config,
      );
      const status = toStatusDocument(result, config);

      expect(status.updated_at).toBe('2024-01-02T03:04:05.000Z');
      expect(status.scan_id).toBe('scan-0001');
      expect(status.baseline).toBe('BTC-USDT');
      expect(status.scan_duration_ms).toBe(42);
      expect(status.counts).toEqual({ signals: 1, watch: 0, rejected: 0, failed: 1 });
      expect(status.config).toEqual({
        min_confidence: 65,
        max_signals: 10,
        max_watch: 20,
        volume_surge_threshold: 1.6,
        donchian_lookback: 20,
      });
      expect(status.diagnostics.failures).toEqual([
        { symbol: 'ZEC-USDT', reason: 'upstream_data', message: 'failed' },
      ]);
    });
  });
});
