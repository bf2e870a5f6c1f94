import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ProviderCandle } from '../models';
import { BaseRestProvider } from './base-rest.provider';
import { CanonicalInterval, toProviderInterval } from './interval-mapper';

const numeric = z.union([z.number(), z.string()]).transform(Number);

// [openTime, open, high, low, close, volume, closeTime, ...]
const klineRowSchema = z
  .tuple([numeric, numeric, numeric, numeric, numeric, numeric, numeric])
  .rest(z.unknown());

const klinesResponseSchema = z.array(klineRowSchema);

@Injectable()
export class BinanceMarketDataProvider extends BaseRestProvider {
  constructor(configService: ConfigService) {
    super('binance', configService);
  }

  protected async fetchRows(
    instrument: string,
    interval: CanonicalInterval,
    limit: number,
  ): Promise<ProviderCandle[]> {
    const response = await this.http.get<unknown>('/api/v3/klines', {
      params: {
        symbol: instrument.toUpperCase(),
        interval: toProviderInterval(this.provider, interval),
        limit: Math.min(limit, 1000),
      },
    });

    return klinesResponseSchema.parse(response.data).map((row) => ({
      timestamp: row[0],
      open: row[1],
      high: row[2],
      low: row[3],
      close: row[4],
      volume: row[5],
      // closeTime is the last millisecond of the candle
      closeTime: row[6] + 1,
    }));
  }
}
