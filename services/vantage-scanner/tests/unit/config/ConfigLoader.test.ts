import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_PATH_ENV,
  DEFAULT_SCANNER_CONFIG,
  createScannerConfig,
  loadScannerConfigFile,
  loadScannerConfigFromEnv,
} from '../../../src/config/ConfigLoader';
import { ConfigValidationError } from '../../../src/errors';

describe('ConfigLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scanner-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('createScannerConfig', () => {
    it('applies defaults for every section', () => {
      const config = createScannerConfig();

      expect(config.indicators).toEqual({
        emaFast: 20,
        emaSlow: 50,
        atrPeriod: 14,
        rsiPeriod: 14,
        volumeMedianLookback: 20,
      });
      expect(config.regime.donchianLookback).toBe(20);
      expect(config.regime.minTrendStrength).toBe(0.005);
      expect(config.breakout.volumeSurgeThreshold).toBe(1.6);
      expect(config.breakout.volumeSurgeLookback).toBe(3);
      expect(config.breakout.confirmationBars).toBe(2);
      expect(config.breakout.retestThresholdBps).toBe(20);
      expect(config.risk.atrMultipliers).toEqual({ trending: 1.5, reclaiming: 1.2, weak: 0.8 });
      expect(config.risk.atrBandPct).toEqual({ min: 1, max: 40 });
      expect(config.divergence.penalty).toBe(15);
      expect(config.output.minConfidence).toBe(60);
      expect(config.scan.baselineSymbol).toBe('BTC-USDT');
    });

    it('keeps defaults beside partial overrides', () => {
      const config = createScannerConfig({ risk: { atrMultipliers: { weak: 0.5 } } });

      expect(config.risk.atrMultipliers).toEqual({ trending: 1.5, reclaiming: 1.2, weak: 0.5 });
      expect(config.risk.swingLookback).toBe(8);
    });

    it('deep-freezes the result', () => {
      const config = createScannerConfig();

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.risk)).toBe(true);
      expect(Object.isFrozen(config.risk.atrMultipliers)).toBe(true);
    });

    it('rejects a minimum confidence below 60', () => {
      expect(() => createScannerConfig({ output: { minConfidence: 50 } })).toThrow(
        ConfigValidationError,
      );
    });

    it('reports the failing path', () => {
      let caught: unknown;
      try {
        createScannerConfig({ indicators: { emaFast: 60, emaSlow: 50 } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      if (caught instanceof ConfigValidationError) {
        expect(caught.issues).toEqual(['indicators.emaFast: emaFast must be shorter than emaSlow']);
      }
    });

    it('rejects unknown top-level keys', () => {
      expect(() => createScannerConfig({ exchange: 'bybit' })).toThrow(ConfigValidationError);
    });

    it('rejects an inverted ATR band', () => {
      expect(() => createScannerConfig({ risk: { atrBandPct: { min: 10, max: 5 } } })).toThrow(
        ConfigValidationError,
      );
    });

    it('exposes a frozen default instance', () => {
      expect(DEFAULT_SCANNER_CONFIG.output.maxSignals).toBe(10);
      expect(DEFAULT_SCANNER_CONFIG.output.maxWatch).toBe(20);
    });
  });

  describe('loadScannerConfigFile', () => {
    it('loads and validates a JSON file', () => {
      const file = path.join(tmpDir, 'scanner.json');
      fs.writeFileSync(file, JSON.stringify({ output: { minConfidence: 75 } }));

      expect(loadScannerConfigFile(file).output.minConfidence).toBe(75);
    });

    it('wraps unreadable files in ConfigValidationError', () => {
      const file = path.join(tmpDir, 'broken.json');
      fs.writeFileSync(file, '{ not json');

      expect(() => loadScannerConfigFile(file)).toThrow(ConfigValidationError);
      expect(() => loadScannerConfigFile(path.join(tmpDir, 'missing.json'))).toThrow(
        ConfigValidationError,
      );
    });
  });

  describe('loadScannerConfigFromEnv', () => {
    it('uses defaults without a config path', () => {
      expect(loadScannerConfigFromEnv({}).output.minConfidence).toBe(60);
    });

    it('reads the file named by the environment', () => {
      const file = path.join(tmpDir, 'env.json');
      fs.writeFileSync(file, JSON.stringify({ scan: { maxParallel: 3 } }));

      expect(loadScannerConfigFromEnv({ [CONFIG_PATH_ENV]: file }).scan.maxParallel).toBe(3);
    });
  });
});
