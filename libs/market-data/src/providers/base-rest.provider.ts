import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import type { Candle } from '@libs/signals';
import { MarketDataProvider } from '../interfaces';
import { MarketDataProviderName, ProviderCandle, ProviderSnapshot } from '../models';
import { createHttpClient, isRetryableHttpError } from '../utils/http.util';
import { retry, RetryOptions } from '../utils/retry.util';
import { CanonicalInterval, normalizeToCanonical } from './interval-mapper';
import { getProviderEndpoints } from './providers.config';

export abstract class BaseRestProvider implements MarketDataProvider {
  readonly provider: MarketDataProviderName;
  readonly http: AxiosInstance;
  protected readonly logger: Logger;
  private readonly retryOptions: RetryOptions;
  private requests = 0;
  private failures = 0;
  private lastSuccessTs: number | null = null;
  private lastError: string | null = null;

  protected constructor(provider: MarketDataProviderName, configService: ConfigService) {
    this.provider = provider;
    this.logger = new Logger(`${provider}-provider`);
    const endpoints = getProviderEndpoints(configService, provider);
    const timeoutMs = configService.get<number>('MARKET_DATA_REST_TIMEOUT_MS', 10000);
    this.http = createHttpClient(endpoints.rest, timeoutMs);
    this.retryOptions = {
      attempts: configService.get<number>('MARKET_DATA_RETRY_ATTEMPTS', 3),
      baseDelayMs: configService.get<number>('MARKET_DATA_RETRY_BASE_DELAY_MS', 500),
      shouldRetry: isRetryableHttpError,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          JSON.stringify({
            event: 'provider_request_retry',
            provider: this.provider,
            attempt,
            delayMs,
            message: error instanceof Error ? error.message : 'Unknown error',
          }),
        ),
    };
  }

  async getCandles(instrument: string, interval: string, limit: number): Promise<Candle[]> {
    const canonical = normalizeToCanonical(interval);
    if (!canonical) {
      throw new Error(`Unsupported interval "${interval}" for ${this.provider}`);
    }

    // One extra row: the newest one is usually still forming.
    const rows = await this.request(() => this.fetchRows(instrument, canonical, limit + 1));
    const now = Date.now();
    return rows
      .filter((row) => row.closeTime <= now)
      .sort((a, b) => a.timestamp - b.timestamp)
      .slice(-limit)
      .map(({ timestamp, open, high, low, close, volume }) => ({ timestamp, open, high, low, close, volume }));
  }

  async getLatestCandle(instrument: string, interval: string): Promise<Candle | null> {
    const candles = await this.getCandles(instrument, interval, 1);
    return candles[candles.length - 1] ?? null;
  }

  getSnapshot(): ProviderSnapshot {
    return {
      provider: this.provider,
      requests: this.requests,
      failures: this.failures,
      lastSuccessTs: this.lastSuccessTs,
      lastError: this.lastError,
    };
  }

  protected abstract fetchRows(
    instrument: string,
    interval: CanonicalInterval,
    limit: number,
  ): Promise<ProviderCandle[]>;

  private async request<T>(fn: () => Promise<T>): Promise<T> {
    this.requests += 1;
    try {
      const result = await retry(fn, this.retryOptions);
      this.lastSuccessTs = Date.now();
      return result;
    } catch (error) {
      this.failures += 1;
      this.lastError = error instanceof Error ? error.message : 'Unknown error';
      throw error;
    }
  }
}
