import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { CoreModule, createRedisConnection, SIGNALS_QUEUE_NAME } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { HealthController } from './health.controller';
import { LiveTradingModule } from './live-trading/live-trading.module';
import { SignalsProcessor } from './queues/signals.processor';

@Module({
  imports: [
    CoreModule,
    MarketDataModule,
    LiveTradingModule,
    BullModule.forRootAsync({
      imports: [CoreModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        connection: createRedisConnection(configService),
      }),
    }),
    BullModule.registerQueue({ name: SIGNALS_QUEUE_NAME }),
  ],
  controllers: [HealthController],
  providers: [SignalsProcessor],
})
export class WorkerModule {}
