import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ProviderCandle } from '../models';
import { BaseRestProvider } from './base-rest.provider';
import { CanonicalInterval, intervalToMs, toProviderInterval } from './interval-mapper';

const numeric = z.union([z.number(), z.string()]).transform(Number);

// [timestamp (s), open, high, low, close, volume]
const kRowSchema = z.tuple([numeric, numeric, numeric, numeric, numeric, numeric]).rest(z.unknown());

@Injectable()
export class MaxMarketDataProvider extends BaseRestProvider {
  constructor(configService: ConfigService) {
    super('max', configService);
  }

  protected async fetchRows(
    instrument: string,
    interval: CanonicalInterval,
    limit: number,
  ): Promise<ProviderCandle[]> {
    const response = await this.http.get<unknown>('/api/v2/k', {
      params: {
        market: instrument.toLowerCase(),
        period: toProviderInterval(this.provider, interval),
        limit: Math.min(limit, 10000),
      },
    });

    const periodMs = intervalToMs(interval);
    return z
      .array(kRowSchema)
      .parse(response.data)
      .map((row) => {
        const timestamp = row[0] * 1000;
        return {
          timestamp,
          open: row[1],
          high: row[2],
          low: row[3],
          close: row[4],
          volume: row[5],
          closeTime: timestamp + periodMs,
        };
      });
  }
}
