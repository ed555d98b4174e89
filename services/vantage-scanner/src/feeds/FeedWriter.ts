/**
 * FeedWriter - writes signals.json, watch.json and status.json
 *
 * Each file is written to a temp path and renamed so readers never see a
 * half-written feed.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '@vantage/shared';
import { ScannerConfig } from '../config/schema';
import { ScanResult } from '../types';
import { toOutputRecord, toStatusDocument } from './serialize';

export const FEED_FILES = {
  signals: 'signals.json',
  watch: 'watch.json',
  status: 'status.json',
} as const;

export class FeedWriter {
  private readonly logger = Logger.getInstance('scanner:FeedWriter');

  constructor(private readonly outDir: string) {}

  write(result: ScanResult, config: ScannerConfig): string[] {
    fs.mkdirSync(this.outDir, { recursive: true });

    const written = [
      this.writeJson(FEED_FILES.signals, result.signals.map(toOutputRecord)),
      this.writeJson(FEED_FILES.watch, result.watch.map(toOutputRecord)),
      this.writeJson(FEED_FILES.status, toStatusDocument(result, config)),
    ];

    this.logger.info('Feeds written', result.scanId, {
      outDir: this.outDir,
      signals: result.signals.length,
      watch: result.watch.length,
    });
    return written;
  }

  private writeJson(fileName: string, payload: unknown): string {
    const target = path.join(this.outDir, fileName);
    const temp = `${target}.tmp`;
    fs.writeFileSync(temp, JSON.stringify(payload, null, 2) + '\n');
    fs.renameSync(temp, target);
    return target;
  }
}
