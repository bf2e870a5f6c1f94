import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { RedisService } from '@libs/core';
import { TradeRecord, TradeRecordSink } from '@libs/signals';

const tradeRecordSchema = z.object({
  instrument: z.string(),
  sequence: z.number().int(),
  timestamp: z.number(),
  direction: z.enum(['buy', 'sell']),
  price: z.number(),
  quantity: z.number(),
  confidenceScore: z.number(),
  realizedPnl: z.number().nullable(),
});

export type TradeRecordRedis = Pick<RedisService, 'rpush' | 'lrange'>;

/** Append-only trade history: one Redis list per instrument, one JSON record per leg. */
@Injectable()
export class RedisTradeRecordStore implements TradeRecordSink {
  private readonly prefix: string;

  constructor(
    @Inject(RedisService)
    private readonly redisService: TradeRecordRedis,
    configService: ConfigService,
  ) {
    this.prefix = configService.get<string>('TRADE_RECORDS_KEY_PREFIX', 'trades');
  }

  keyFor(instrument: string): string {
    return `${this.prefix}:${instrument.toUpperCase()}`;
  }

  async append(record: TradeRecord): Promise<void> {
    await this.redisService.rpush(this.keyFor(record.instrument), JSON.stringify(record));
  }

  async list(instrument: string): Promise<TradeRecord[]> {
    const rows = await this.redisService.lrange(this.keyFor(instrument), 0, -1);
    return rows.map((row) => tradeRecordSchema.parse(JSON.parse(row)));
  }
}
