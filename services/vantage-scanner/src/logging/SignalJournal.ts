/**
 * SignalJournal - JSONL journal of routed records and per-symbol failures
 *
 * One JSON object per line. When the journal grows past `maxFileSize` it is
 * renamed with a timestamp suffix and a fresh file is started.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ScanResult, SymbolFailure } from '../types';
import { SignalOutputRecord, toOutputRecord } from '../feeds/serialize';

export interface SignalJournalConfig {
  logDir: string;
  logFileName: string;
  maxFileSize: number;
}

export interface RecordJournalEntry {
  timestamp: number;
  type: 'record';
  scanId: string;
  record: SignalOutputRecord;
}

export interface FailureJournalEntry {
  timestamp: number;
  type: 'failure';
  scanId: string;
  symbol: string;
  reason: string;
  message: string;
}

export type JournalEntry = RecordJournalEntry | FailureJournalEntry;

const DEFAULT_CONFIG: SignalJournalConfig = {
  logDir: './logs',
  logFileName: 'signals.jsonl',
  maxFileSize: 10 * 1024 * 1024, // 10MB
};

export class SignalJournal {
  private readonly config: SignalJournalConfig;
  private readonly logFilePath: string;

  constructor(config: Partial<SignalJournalConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logFilePath = path.join(this.config.logDir, this.config.logFileName);
    fs.mkdirSync(this.config.logDir, { recursive: true });
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  /**
   * Journal every routed record (signals, watch and rejected) and every
   * failure of one scan. Returns the number of lines written.
   */
  recordScan(result: ScanResult): number {
    const entries: JournalEntry[] = [
      ...result.ranked.map((record): RecordJournalEntry => ({
        timestamp: result.timestamp,
        type: 'record',
        scanId: result.scanId,
        record: toOutputRecord(record),
      })),
      ...result.diagnostics.failures.map((failure: SymbolFailure): FailureJournalEntry => ({
        timestamp: result.timestamp,
        type: 'failure',
        scanId: result.scanId,
        symbol: failure.symbol,
        reason: failure.reason,
        message: failure.message,
      })),
    ];
    for (const entry of entries) {
      this.writeEntry(entry);
    }
    return entries.length;
  }

  writeEntry(entry: JournalEntry): void {
    this.rotateIfNeeded();
    fs.appendFileSync(this.logFilePath, JSON.stringify(entry) + '\n');
  }

  readEntries(): JournalEntry[] {
    if (!fs.existsSync(this.logFilePath)) return [];
    return fs
      .readFileSync(this.logFilePath, 'utf-8')
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line): JournalEntry => JSON.parse(line));
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.logFilePath)) return;
    const { size } = fs.statSync(this.logFilePath);
    if (size < this.config.maxFileSize) return;

    const suffix = new Date().toISOString().replace(/[:.]/g, '-');
    const ext = path.extname(this.config.logFileName);
    const base = path.basename(this.config.logFileName, ext);
    let rotated = path.join(this.config.logDir, `${base}-${suffix}${ext}`);
    let counter = 1;
    while (fs.existsSync(rotated)) {
      rotated = path.join(this.config.logDir, `${base}-${suffix}-${counter}${ext}`);
      counter++;
    }
    fs.renameSync(this.logFilePath, rotated);
  }
}
