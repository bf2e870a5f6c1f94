import { DataError } from '@libs/core';
import { Candle } from './types';

export interface RejectedCandle {
  candle: Candle;
  reason: string;
}

const PRICE_FIELDS = ['open', 'high', 'low', 'close'] as const;

export function validateCandle(candle: Candle, previous?: Candle): void {
  if (!Number.isFinite(candle.timestamp)) {
    throw new DataError(`Candle timestamp is not a finite number (${candle.timestamp}).`);
  }

  for (const field of PRICE_FIELDS) {
    const value = candle[field];
    if (!Number.isFinite(value) || value <= 0) {
      throw new DataError(`Candle ${candle.timestamp} has invalid ${field} (${value}).`);
    }
  }

  if (!Number.isFinite(candle.volume) || candle.volume < 0) {
    throw new DataError(`Candle ${candle.timestamp} has invalid volume (${candle.volume}).`);
  }

  if (candle.high < Math.max(candle.open, candle.close) || candle.low > Math.min(candle.open, candle.close)) {
    throw new DataError(`Candle ${candle.timestamp} has high/low outside its open/close range.`);
  }

  if (previous && candle.timestamp <= previous.timestamp) {
    throw new DataError(
      `Candle ${candle.timestamp} is not after the previous candle ${previous.timestamp}.`,
    );
  }
}

/**
 * Splits a sequence into candles that may reach the engine and rejected ones.
 * Ordering is checked against the last accepted candle, so a single bad row does not
 * poison the rest of the series.
 */
export function partitionValidCandles(candles: readonly Candle[]): {
  accepted: Candle[];
  rejected: RejectedCandle[];
} {
  const accepted: Candle[] = [];
  const rejected: RejectedCandle[] = [];

  for (const candle of candles) {
    try {
      validateCandle(candle, accepted[accepted.length - 1]);
      accepted.push(candle);
    } catch (error) {
      if (!(error instanceof DataError)) {
        throw error;
      }
      rejected.push({ candle, reason: error.message });
    }
  }

  return { accepted, rejected };
}

export class CandleWindow {
  private readonly candles: Candle[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Candle window capacity must be a positive integer (got ${capacity}).`);
    }
  }

  get size(): number {
    return this.candles.length;
  }

  last(): Candle | undefined {
    return this.candles[this.candles.length - 1];
  }

  /** Appends one candle, discarding the oldest when full. */
  append(candle: Candle): void {
    validateCandle(candle, this.last());
    this.candles.push(candle);
    if (this.candles.length > this.capacity) {
      this.candles.shift();
    }
  }

  /** Candles strictly newer than the newest one held. */
  newerThanLast(candles: readonly Candle[]): Candle[] {
    const last = this.last();
    if (!last) {
      return [...candles];
    }
    return candles.filter((candle) => candle.timestamp > last.timestamp);
  }

  toArray(): Candle[] {
    return [...this.candles];
  }
}
