/**
 * Vantage Scanner - multi-timeframe breakout scanner
 *
 * Turns a universe snapshot of Daily/4H/1H/15M bars into ranked,
 * risk-annotated signals, a watch list and scan diagnostics.
 */

export * from './types';
export * from './errors';
export * from './config';
export * from './engine';
export * from './feeds';
export { SignalJournal } from './logging/SignalJournal';
export type { JournalEntry, SignalJournalConfig } from './logging/SignalJournal';
