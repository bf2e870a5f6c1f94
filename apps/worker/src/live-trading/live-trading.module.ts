import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { CoreModule, SIGNALS_QUEUE_NAME } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { SignalsModule } from '@libs/signals';
import { LogObservabilitySink } from '../sinks/log-observability.sink';
import { QueueSignalSink } from '../sinks/queue-signal.sink';
import { RedisTradeRecordStore } from '../sinks/redis-trade-record.store';
import { LiveTradingService } from './live-trading.service';

@Module({
  imports: [
    CoreModule,
    MarketDataModule,
    SignalsModule,
    BullModule.registerQueue({ name: SIGNALS_QUEUE_NAME }),
  ],
  providers: [LiveTradingService, QueueSignalSink, RedisTradeRecordStore, LogObservabilitySink],
  exports: [LiveTradingService, RedisTradeRecordStore],
})
export class LiveTradingModule {}
