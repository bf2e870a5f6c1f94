import type { Candle } from '@libs/signals';

export type MarketDataProviderName = 'binance' | 'max';

/** Raw OHLCV row as returned by a REST endpoint, before the closed-candle filter. */
export interface ProviderCandle extends Candle {
  /** Epoch ms after which the candle can no longer change. */
  closeTime: number;
}

export interface ProviderSnapshot {
  provider: MarketDataProviderName;
  requests: number;
  failures: number;
  lastSuccessTs: number | null;
  lastError: string | null;
}
