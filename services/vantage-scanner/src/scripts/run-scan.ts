#!/usr/bin/env node
/**
 * Run one scan over a universe snapshot and write the feeds.
 *
 * Usage: run-scan <snapshot.json> [outDir]
 * SCANNER_CONFIG_PATH points at an optional JSON config file; a .env file
 * in the working directory is read first.
 */

import * as path from 'path';
import { config as loadEnv } from 'dotenv';
import { Logger } from '@vantage/shared';
import { loadScannerConfigFromEnv } from '../config/ConfigLoader';
import { SignalScanner } from '../engine/SignalScanner';
import { FeedWriter } from '../feeds/FeedWriter';
import { loadUniverseSnapshot } from '../feeds/SnapshotLoader';
import { SignalJournal } from '../logging/SignalJournal';

loadEnv();

const logger = Logger.getInstance('scanner:cli');

async function main(argv: string[]): Promise<number> {
  const [snapshotPath, outDir = './feeds'] = argv;
  if (!snapshotPath) {
    console.error('Usage: run-scan <snapshot.json> [outDir]');
    return 2;
  }

  const config = loadScannerConfigFromEnv();
  const snapshot = loadUniverseSnapshot(path.resolve(snapshotPath), config.scan.baselineSymbol);
  const scanner = new SignalScanner(config);
  const result = await scanner.scan(snapshot);

  new FeedWriter(path.resolve(outDir)).write(result, config);
  new SignalJournal({ logDir: path.resolve(outDir, 'journal') }).recordScan(result);

  for (const record of result.signals) {
    console.log(
      `SIGNAL ${record.symbol} score=${record.confidence.score} entry=${record.risk.entryPrice} stop=${record.risk.stopLoss}`,
    );
  }
  for (const record of result.watch) {
    console.log(`WATCH  ${record.symbol} score=${record.confidence.score} arm=${record.armLevel ?? '-'}`);
  }
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal('Scan failed', error instanceof Error ? error : undefined);
    process.exitCode = 1;
  });
