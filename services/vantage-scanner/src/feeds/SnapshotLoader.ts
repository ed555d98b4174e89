/**
 * SnapshotLoader - parses the universe snapshot handed over by the
 * data-fetching side. Bars may be objects or [t, o, h, l, c, v] tuples.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { UpstreamDataError, errorMessage } from '../errors';
import { OHLCV, UniverseSnapshot } from '../types';

const BarObjectSchema = z.object({
  timestamp: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

const BarTupleSchema = z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]);

export const BarSchema = z.union([BarObjectSchema, BarTupleSchema]).transform((bar): OHLCV => {
  if (Array.isArray(bar)) {
    const [timestamp, open, high, low, close, volume] = bar;
    return { timestamp, open, high, low, close, volume };
  }
  return bar;
});

const SymbolBarsSchema = z.object({
  '1D': z.array(BarSchema).optional(),
  '4H': z.array(BarSchema).optional(),
  '1H': z.array(BarSchema).optional(),
  '15M': z.array(BarSchema).optional(),
});

export const UniverseSnapshotSchema = z.object({
  baseline: z.string().min(1).optional(),
  generatedAt: z.number().optional(),
  symbols: z.record(z.string(), SymbolBarsSchema),
});

export function parseUniverseSnapshot(raw: unknown, defaultBaseline: string): UniverseSnapshot {
  const result = UniverseSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new UpstreamDataError(`Invalid universe snapshot: ${issues.slice(0, 5).join('; ')}`, {
      issueCount: issues.length,
    });
  }
  const { baseline, generatedAt, symbols } = result.data;
  return {
    baseline: baseline ?? defaultBaseline,
    generatedAt,
    symbols,
  };
}

export function loadUniverseSnapshot(filePath: string, defaultBaseline: string): UniverseSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new UpstreamDataError(`Cannot read snapshot ${filePath}: ${errorMessage(error)}`, {
      filePath,
    });
  }
  return parseUniverseSnapshot(raw, defaultBaseline);
}
