import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderRegistryService } from '@libs/market-data';
import { DetectorState, LiveRunner, LiveRunnerFactory } from '@libs/signals';
import { LogObservabilitySink } from '../sinks/log-observability.sink';
import { QueueSignalSink } from '../sinks/queue-signal.sink';
import { RedisTradeRecordStore } from '../sinks/redis-trade-record.store';

export interface RunnerStatus {
  instrument: string;
  running: boolean;
  bootstrapped: boolean;
  state: DetectorState;
  consecutiveFailures: number;
  closedTrades: number;
  lastTickAt: number | null;
}

/** One runner per configured instrument; runners share nothing. */
@Injectable()
export class LiveTradingService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LiveTradingService.name);
  private readonly runners = new Map<string, LiveRunner>();

  constructor(
    private readonly configService: ConfigService,
    private readonly runnerFactory: LiveRunnerFactory,
    private readonly providerRegistry: ProviderRegistryService,
    private readonly signalSink: QueueSignalSink,
    private readonly tradeStore: RedisTradeRecordStore,
    private readonly observability: LogObservabilitySink,
  ) {}

  onModuleInit(): void {
    const enabled = this.configService.get<boolean>('LIVE_TRADING_ENABLED', true);
    if (!enabled) {
      this.logger.log('Live trading disabled (LIVE_TRADING_ENABLED=false).');
      return;
    }

    // Resolve config eagerly so a bad rubric or provider fails startup.
    const provider = this.providerRegistry.getConfiguredProvider();
    const rubric = this.runnerFactory.rubric;
    const instruments = this.configService.get<string[]>('INSTRUMENTS', ['BTCUSDT']);

    for (const raw of instruments) {
      const instrument = raw.trim().toUpperCase();
      if (!instrument || this.runners.has(instrument)) {
        continue;
      }
      const runner = this.runnerFactory.create(instrument, provider, {
        signals: this.signalSink,
        trades: this.tradeStore,
        observability: this.observability,
      });
      this.runners.set(instrument, runner);
      runner.start();
    }

    this.logger.log(
      JSON.stringify({
        event: 'live_trading_started',
        provider: provider.provider,
        rubric: rubric.name,
        instruments: [...this.runners.keys()],
      }),
    );
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all([...this.runners.values()].map((runner) => runner.stop()));
    this.runners.clear();
  }

  getRunner(instrument: string): LiveRunner | undefined {
    return this.runners.get(instrument.toUpperCase());
  }

  getStatus(): RunnerStatus[] {
    return [...this.runners.entries()].map(([instrument, runner]) => ({
      instrument,
      running: runner.isRunning,
      bootstrapped: runner.isBootstrapped,
      state: runner.context.detector.state,
      consecutiveFailures: runner.failures,
      closedTrades: runner.context.ledger.history().length,
      lastTickAt: this.observability.lastSummary(instrument)?.tickAt ?? null,
    }));
  }
}
