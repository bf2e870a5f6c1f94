import { z } from 'zod';
import { DataError } from '@libs/core';
import { Candle } from '../types';

const numeric = z.union([z.number(), z.string().trim().min(1)]).transform(Number);

const candleObjectSchema = z.object({
  timestamp: numeric,
  open: numeric,
  high: numeric,
  low: numeric,
  close: numeric,
  volume: numeric,
});

// [timestamp, open, high, low, close, volume, ...ignored]
const candleRowSchema = z
  .tuple([numeric, numeric, numeric, numeric, numeric, numeric])
  .rest(z.unknown())
  .transform(([timestamp, open, high, low, close, volume]) => ({ timestamp, open, high, low, close, volume }));

const candleFileSchema = z.union([
  z.array(z.union([candleObjectSchema, candleRowSchema])),
  z.object({ candles: z.array(z.union([candleObjectSchema, candleRowSchema])) }).transform((file) => file.candles),
]);

/**
 * Reads candles from parsed JSON: an array of objects or of OHLCV rows, optionally
 * wrapped as `{ "candles": [...] }`. Timestamps in seconds are converted to ms.
 * Field values are not validated here; the backtest does that per candle.
 */
export function parseCandleFile(json: unknown): Candle[] {
  const parsed = candleFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DataError(`Unreadable candle file at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return parsed.data.map((candle) => ({
    ...candle,
    timestamp: candle.timestamp < 1e12 ? candle.timestamp * 1000 : candle.timestamp,
  }));
}
