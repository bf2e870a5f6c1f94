import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { SIGNALS_QUEUE_NAME } from '@libs/core';
import { ProviderRegistryService, ProviderSnapshot } from '@libs/market-data';
import { TradeRecord } from '@libs/signals';
import { LiveTradingService, RunnerStatus } from './live-trading/live-trading.service';
import { RedisTradeRecordStore } from './sinks/redis-trade-record.store';

@Controller('health')
export class HealthController {
  constructor(
    private readonly liveTradingService: LiveTradingService,
    private readonly providerRegistryService: ProviderRegistryService,
    private readonly tradeStore: RedisTradeRecordStore,
    @InjectQueue(SIGNALS_QUEUE_NAME)
    private readonly signalsQueue: Pick<Queue, 'getJobCounts'>,
  ) {}

  @Get()
  health(): { ok: true } {
    return { ok: true };
  }

  @Get('runners')
  runners(): { ok: boolean; runners: RunnerStatus[] } {
    const runners = this.liveTradingService.getStatus();
    return { ok: runners.every((runner) => runner.running), runners };
  }

  @Get('providers')
  providers(): { ok: true; providers: ProviderSnapshot[] } {
    return { ok: true, providers: this.providerRegistryService.getSnapshots() };
  }

  @Get('queues')
  async queues(): Promise<{ ok: true; signals: Record<string, number> }> {
    const signals = await this.signalsQueue.getJobCounts('wait', 'active', 'delayed', 'failed', 'completed');
    return { ok: true, signals };
  }

  @Get('trades/:instrument')
  async trades(@Param('instrument') instrument: string): Promise<{ ok: true; trades: TradeRecord[] }> {
    if (!this.liveTradingService.getRunner(instrument)) {
      throw new NotFoundException(`No live runner for ${instrument}`);
    }
    return { ok: true, trades: await this.tradeStore.list(instrument) };
  }
}
