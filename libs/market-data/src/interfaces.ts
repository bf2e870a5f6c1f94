import type { Candle } from '@libs/signals';
import { MarketDataProviderName, ProviderSnapshot } from './models';

/**
 * Read-only candle source. Implementations return closed candles only, oldest first.
 */
export interface MarketDataProvider {
  readonly provider: MarketDataProviderName;
  getCandles(instrument: string, interval: string, limit: number): Promise<Candle[]>;
  /** The most recent closed candle, or null when the exchange has none yet. */
  getLatestCandle(instrument: string, interval: string): Promise<Candle | null>;
  getSnapshot(): ProviderSnapshot;
}
