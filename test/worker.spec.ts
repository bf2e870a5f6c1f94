import { afterEach, describe, expect, it, vi } from 'vitest';
import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigError, ProviderError } from '@libs/core';
import { MarketDataProvider, ProviderRegistryService } from '@libs/market-data';
import { createRubric, LiveRunnerFactory, scoreCandidate, Signal, TickSummary, TradeRecord } from '@libs/signals';
import { HealthController } from '../apps/worker/src/health.controller';
import { LiveTradingService } from '../apps/worker/src/live-trading/live-trading.service';
import { enqueueSignalAccepted, signalAcceptedJobId } from '../apps/worker/src/queues/signal-accepted.job';
import { lastSignalKey, SignalsProcessor } from '../apps/worker/src/queues/signals.processor';
import { LogObservabilitySink } from '../apps/worker/src/sinks/log-observability.sink';
import { QueueSignalSink } from '../apps/worker/src/sinks/queue-signal.sink';
import { RedisTradeRecordStore } from '../apps/worker/src/sinks/redis-trade-record.store';
import { makeFrame, START } from './helpers/fixtures';

const buySignal = (): Signal => {
  const { score, breakdown } = scoreCandidate(makeFrame(), 'buy', createRubric());
  return {
    instrument: 'BTCUSDT',
    timestamp: START,
    direction: 'buy',
    price: 100,
    confidenceScore: score,
    baseScore: score,
    advisoryAdjustment: 0,
    breakdown,
    accepted: true,
  };
};

const buyTrade: TradeRecord = {
  instrument: 'BTCUSDT',
  sequence: 1,
  timestamp: START,
  direction: 'buy',
  price: 100,
  quantity: 1,
  confidenceScore: 100,
  realizedPnl: null,
};

/** In-memory stand-in for the Redis list commands the store uses. */
const fakeRedisLists = () => {
  const lists = new Map<string, string[]>();
  const redis = { rpush: vi.fn(), lrange: vi.fn() };
  redis.rpush.mockImplementation(async (key: string, value: string) => {
    const list = lists.get(key) ?? [];
    list.push(value);
    lists.set(key, list);
    return list.length;
  });
  redis.lrange.mockImplementation(async (key: string) => lists.get(key) ?? []);
  return { redis, lists };
};

afterEach(() => {
  vi.useRealTimers();
});

describe('signal accepted job', () => {
  it('enqueues with a stable job id and the configured retry policy', async () => {
    const queue = { add: vi.fn() };

    await enqueueSignalAccepted(queue, buySignal(), buyTrade, { attempts: 4, backoffDelayMs: 1000 });

    expect(signalAcceptedJobId(buyTrade)).toBe('BTCUSDT-1-buy');
    expect(queue.add).toHaveBeenCalledWith(
      'signalAccepted',
      { signal: buySignal(), trade: buyTrade },
      {
        jobId: 'BTCUSDT-1-buy',
        attempts: 4,
        backoff: { type: 'exponential', delay: 1000 },
        removeOnComplete: true,
        removeOnFail: { count: 50 },
      },
    );
  });

  it('serializes non-finite breakdown values as null', async () => {
    const queue = { add: vi.fn() };
    const signal = buySignal();
    signal.breakdown.bollinger = { ...signal.breakdown.bollinger, value: NaN };

    await enqueueSignalAccepted(queue, signal, buyTrade, { attempts: 1, backoffDelayMs: 0 });

    expect(queue.add.mock.calls[0][1].signal.breakdown.bollinger.value).toBeNull();
  });
});

describe('QueueSignalSink', () => {
  it('uses the job defaults from config', async () => {
    const queue = { add: vi.fn() };
    const sink = new QueueSignalSink(new ConfigService({ SIGNALS_JOB_ATTEMPTS: 2 }), queue);

    await sink.onSignalAccepted(buySignal(), { instrument: 'BTCUSDT', trade: buyTrade });

    expect(queue.add.mock.calls[0][2]).toMatchObject({ attempts: 2, backoff: { type: 'exponential', delay: 3000 } });
  });
});

describe('SignalsProcessor', () => {
  it('stores the last accepted signal per instrument', async () => {
    const redis = { set: vi.fn() };
    const processor = new SignalsProcessor(redis);
    const data = JSON.parse(JSON.stringify({ signal: buySignal(), trade: buyTrade }));

    await processor.process({ name: 'signalAccepted', id: '1', data, attemptsMade: 0 });

    expect(lastSignalKey('btcusdt')).toBe('signals:last:BTCUSDT');
    expect(redis.set).toHaveBeenCalledTimes(1);
    const [key, value] = redis.set.mock.calls[0];
    expect(key).toBe('signals:last:BTCUSDT');
    expect(JSON.parse(value)).toMatchObject({ direction: 'buy', price: 100, sequence: 1, realizedPnl: null });
  });

  it('drops an invalid payload without retrying', async () => {
    const redis = { set: vi.fn() };
    const processor = new SignalsProcessor(redis);

    await expect(
      processor.process({ name: 'signalAccepted', id: '2', data: { signal: {} }, attemptsMade: 0 }),
    ).resolves.toBeUndefined();
    expect(redis.set).not.toHaveBeenCalled();
  });

  it('ignores unknown jobs', async () => {
    const redis = { set: vi.fn() };
    await new SignalsProcessor(redis).process({ name: 'other', id: '3', data: {}, attemptsMade: 0 });
    expect(redis.set).not.toHaveBeenCalled();
  });
});

describe('RedisTradeRecordStore', () => {
  it('appends to and reads back a per-instrument list', async () => {
    const { redis, lists } = fakeRedisLists();
    const store = new RedisTradeRecordStore(redis, new ConfigService({ TRADE_RECORDS_KEY_PREFIX: 'test-trades' }));
    const sell: TradeRecord = { ...buyTrade, direction: 'sell', price: 110, realizedPnl: 10 };

    await store.append(buyTrade);
    await store.append(sell);

    expect(store.keyFor('btcusdt')).toBe('test-trades:BTCUSDT');
    expect(lists.get('test-trades:BTCUSDT')).toHaveLength(2);
    expect(await store.list('btcusdt')).toEqual([buyTrade, sell]);
    expect(await store.list('ETHUSDT')).toEqual([]);
  });

  it('refuses a corrupted record', async () => {
    const { redis, lists } = fakeRedisLists();
    const store = new RedisTradeRecordStore(redis, new ConfigService({}));
    lists.set('trades:BTCUSDT', [JSON.stringify({ instrument: 'BTCUSDT' })]);

    await expect(store.list('BTCUSDT')).rejects.toThrow();
  });
});

describe('LogObservabilitySink', () => {
  it('keeps the last summary per instrument', () => {
    const sink = new LogObservabilitySink();
    const summary: TickSummary = {
      instrument: 'BTCUSDT',
      tickAt: START,
      candlesProcessed: 1,
      indicators: makeFrame(),
      acceptedSignals: [],
      rejectedCandidates: [],
      inapplicableCandidates: [],
      ledgerState: 'FLAT',
      openPosition: null,
      consecutiveFailures: 0,
    };

    sink.onTickSummary(summary);
    sink.onProviderError(new ProviderError('BTCUSDT', 5, 'down'));

    expect(sink.lastSummary('BTCUSDT')).toBe(summary);
    expect(sink.lastSummary('ETHUSDT')).toBeUndefined();
  });
});

describe('LiveTradingService', () => {
  const provider: MarketDataProvider = {
    provider: 'binance',
    getCandles: async () => [],
    getLatestCandle: async () => null,
    getSnapshot: () => ({ provider: 'binance', requests: 0, failures: 0, lastSuccessTs: null, lastError: null }),
  };

  const createService = (values: Record<string, unknown>) => {
    const configService = new ConfigService(values);
    const { redis } = fakeRedisLists();
    const tradeStore = new RedisTradeRecordStore(redis, configService);
    const registry = new ProviderRegistryService(configService, [provider]);
    const service = new LiveTradingService(
      configService,
      new LiveRunnerFactory(configService),
      registry,
      new QueueSignalSink(configService, { add: vi.fn() }),
      tradeStore,
      new LogObservabilitySink(),
    );
    return { service, registry, tradeStore };
  };

  it('starts one runner per distinct instrument and stops them all', async () => {
    vi.useFakeTimers();
    const { service } = createService({ INSTRUMENTS: ['btcusdt', 'ethusdt', 'BTCUSDT'] });

    service.onModuleInit();

    expect(service.getStatus()).toEqual([
      { instrument: 'BTCUSDT', running: true, bootstrapped: false, state: 'FLAT', consecutiveFailures: 0, closedTrades: 0, lastTickAt: null },
      { instrument: 'ETHUSDT', running: true, bootstrapped: false, state: 'FLAT', consecutiveFailures: 0, closedTrades: 0, lastTickAt: null },
    ]);
    expect(service.getRunner('ethusdt')?.context.instrument).toBe('ETHUSDT');

    await service.onModuleDestroy();
    expect(service.getStatus()).toEqual([]);
  });

  it('does nothing when live trading is disabled', () => {
    const { service } = createService({ LIVE_TRADING_ENABLED: false });

    service.onModuleInit();

    expect(service.getStatus()).toEqual([]);
  });

  it('fails startup on an invalid rubric', () => {
    const { service } = createService({ WEIGHT_RSI: 25 });

    expect(() => service.onModuleInit()).toThrow(ConfigError);
    expect(service.getStatus()).toEqual([]);
  });

  it('serves runner status and trades through the health controller', async () => {
    vi.useFakeTimers();
    const { service, registry, tradeStore } = createService({ INSTRUMENTS: ['BTCUSDT'] });
    const queue = { getJobCounts: vi.fn(async () => ({ wait: 0, active: 1 })) };
    const controller = new HealthController(service, registry, tradeStore, queue);
    service.onModuleInit();
    await tradeStore.append(buyTrade);

    expect(controller.runners().ok).toBe(true);
    expect(controller.providers().providers).toHaveLength(1);
    expect(await controller.queues()).toEqual({ ok: true, signals: { wait: 0, active: 1 } });
    expect(await controller.trades('btcusdt')).toEqual({ ok: true, trades: [buyTrade] });
    await expect(controller.trades('DOGEUSDT')).rejects.toThrow(NotFoundException);

    await service.onModuleDestroy();
  });
});

describe('LiveRunnerFactory', () => {
  it('converts configured seconds to runner milliseconds', () => {
    const factory = new LiveRunnerFactory(
      new ConfigService({ POLL_INTERVAL_SECONDS: 30, MAX_BACKOFF_SECONDS: 120, CANDLE_INTERVAL: '15m' }),
    );

    expect(factory.runnerOptions('BTCUSDT')).toEqual({
      instrument: 'BTCUSDT',
      interval: '15m',
      pollIntervalMs: 30_000,
      fetchTimeoutMs: 10_000,
      maxConsecutiveFailures: 5,
      maxBackoffMs: 120_000,
      windowMargin: 50,
      catchUpLimit: 5,
      sinkTimeoutMs: 5000,
    });
  });

  it('caches the rubric built from config', () => {
    const factory = new LiveRunnerFactory(new ConfigService({ RUBRIC_PRESET: 'advanced-70' }));

    expect(factory.rubric.name).toBe('advanced-70');
    expect(factory.rubric).toBe(factory.rubric);
    expect(factory.create('ETHUSDT', { getCandles: async () => [], getLatestCandle: async () => null }).window.capacity).toBe(100);
  });
});
