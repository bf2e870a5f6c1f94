import { Logger } from '@nestjs/common';
import { ConfigError, DataError, errorMessage, isStateError, ProviderError } from '@libs/core';
import { intervalToMs, MarketDataProvider, normalizeToCanonical, withTimeout } from '@libs/market-data';
import { CandleWindow } from '../candles';
import { InstrumentContext, PipelineStep, processCandle, warmCandle } from '../pipeline';
import { InapplicableCandidate, LiveRunnerSinks, TickSummary } from '../sinks';
import { Candle, IndicatorFrame, Signal } from '../types';

export type CandleSource = Pick<MarketDataProvider, 'getCandles' | 'getLatestCandle'>;

export interface LiveRunnerOptions {
  instrument: string;
  interval: string;
  pollIntervalMs: number;
  fetchTimeoutMs: number;
  maxConsecutiveFailures: number;
  maxBackoffMs: number;
  /** Extra candles kept beyond the warm-up length. */
  windowMargin: number;
  /** Candles requested after a failed tick or while still warming up. */
  catchUpLimit: number;
  /** Upper bound on each sink call; a slower sink is logged as failed. */
  sinkTimeoutMs: number;
}

export type TickOutcome =
  | { status: 'processed'; candles: number; accepted: Signal[]; summary: TickSummary }
  | { status: 'skipped'; reason: string; consecutiveFailures: number; summary: TickSummary };

const byTimestamp = (a: Candle, b: Candle): number => a.timestamp - b.timestamp;

/**
 * Polls one instrument and runs new candles through the shared pipeline. Ticks never
 * overlap; a failed fetch leaves the window untouched.
 */
export class LiveRunner {
  private readonly logger = new Logger(LiveRunner.name);
  readonly window: CandleWindow;
  private readonly intervalMs: number;
  private consecutiveFailures = 0;
  private lastTickSucceeded = false;
  private bootstrapped = false;
  private latestFrame: IndicatorFrame | null = null;
  private running = false;
  private timer?: NodeJS.Timeout;
  private inFlight: Promise<TickOutcome> | null = null;
  private loopDone: Promise<void> | null = null;

  constructor(
    private readonly options: LiveRunnerOptions,
    readonly context: InstrumentContext,
    private readonly provider: CandleSource,
    private readonly sinks: LiveRunnerSinks = {},
  ) {
    const interval = normalizeToCanonical(options.interval);
    if (!interval) {
      throw new ConfigError([`interval: unsupported candle interval "${options.interval}"`]);
    }
    this.intervalMs = intervalToMs(interval);
    this.window = new CandleWindow(context.engine.warmupLength + options.windowMargin);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  get isBootstrapped(): boolean {
    return this.bootstrapped;
  }

  /**
   * Loads a full window of history and warms the engine on it. No trading decision is
   * taken on historical candles.
   */
  async bootstrap(): Promise<number> {
    const { instrument, interval, fetchTimeoutMs } = this.options;
    const candles = await withTimeout(
      this.provider.getCandles(instrument, interval, this.window.capacity),
      fetchTimeoutMs,
    );

    for (const candle of [...candles].sort(byTimestamp)) {
      if (!this.appendToWindow(candle)) {
        continue;
      }
      this.latestFrame = warmCandle(this.context, candle) ?? this.latestFrame;
    }

    this.bootstrapped = true;
    this.lastTickSucceeded = true;
    this.logger.log(
      JSON.stringify({
        event: 'live_runner_bootstrapped',
        instrument,
        candles: this.window.size,
        warm: this.isWarm(),
      }),
    );
    return this.window.size;
  }

  tick(): Promise<TickOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.log(
      JSON.stringify({
        event: 'live_runner_started',
        instrument: this.options.instrument,
        pollIntervalMs: this.options.pollIntervalMs,
      }),
    );
    this.schedule(0);
  }

  /** Cancels the next tick and waits for the in-flight one to finish. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.loopDone) {
      await this.loopDone;
    }
    this.logger.log(JSON.stringify({ event: 'live_runner_stopped', instrument: this.options.instrument }));
  }

  /** Delay before the next tick: the poll interval, doubled per consecutive failure. */
  nextDelayMs(): number {
    const { pollIntervalMs, maxBackoffMs } = this.options;
    if (this.consecutiveFailures === 0) {
      return pollIntervalMs;
    }
    return Math.min(pollIntervalMs * 2 ** (this.consecutiveFailures - 1), maxBackoffMs);
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.loopDone = this.loop();
    }, delayMs);
  }

  private async loop(): Promise<void> {
    if (!this.running) {
      return;
    }

    try {
      await this.tick();
    } catch (error) {
      this.running = false;
      const failure = error instanceof Error ? error : new Error(errorMessage(error));
      this.logger.error(
        JSON.stringify({
          event: 'live_runner_halted',
          instrument: this.options.instrument,
          error: failure.name,
          stateViolation: isStateError(failure),
          message: failure.message,
        }),
      );
      await this.notify('onRunnerStopped', () =>
        this.sinks.observability?.onRunnerStopped?.(this.options.instrument, failure),
      );
      return;
    }

    if (this.running) {
      this.schedule(this.nextDelayMs());
    }
  }

  private async runTick(): Promise<TickOutcome> {
    if (!this.bootstrapped) {
      try {
        await this.bootstrap();
      } catch (error) {
        return this.skip(error);
      }
      return this.processed([], []);
    }

    let fetched: Candle[];
    try {
      fetched = await withTimeout(this.fetch(), this.options.fetchTimeoutMs);
    } catch (error) {
      return this.skip(error);
    }

    const steps: PipelineStep[] = [];
    for (const candle of this.window.newerThanLast([...fetched].sort(byTimestamp))) {
      if (!this.appendToWindow(candle)) {
        continue;
      }
      // StateError propagates and halts the runner.
      const step = processCandle(this.context, candle);
      this.latestFrame = step.frame ?? this.latestFrame;
      steps.push(step);
    }

    const accepted: Signal[] = [];
    for (const { event } of steps) {
      if (event.type !== 'accepted') {
        continue;
      }
      accepted.push(event.signal);
      await this.notify('onSignalAccepted', () =>
        this.sinks.signals?.onSignalAccepted(event.signal, {
          instrument: this.options.instrument,
          trade: event.trade,
        }),
      );
      await this.notify('appendTradeRecord', () => this.sinks.trades?.append(event.trade));
    }

    return this.processed(steps, accepted);
  }

  private async fetch(): Promise<Candle[]> {
    const { instrument, interval, catchUpLimit } = this.options;
    let candles: Candle[];
    if (this.lastTickSucceeded && this.isWarm()) {
      const latest = await this.provider.getLatestCandle(instrument, interval);
      candles = latest ? [latest] : [];
    } else {
      candles = await this.provider.getCandles(instrument, interval, catchUpLimit);
    }

    const missing = this.missingCandles(candles);
    if (missing === 0) {
      return candles;
    }

    const limit = Math.min(missing, this.window.capacity);
    const event = missing > limit ? 'candle_gap_exceeds_window' : 'candle_gap';
    this.logger.warn(JSON.stringify({ event, instrument, missing, limit }));
    return this.provider.getCandles(instrument, interval, limit);
  }

  /**
   * Candles between the window's last one and the newest fetched one, inclusive of the
   * latter; 0 when the fetched candles continue the window without a hole.
   */
  private missingCandles(candles: readonly Candle[]): number {
    const last = this.window.last();
    const newer = this.window.newerThanLast([...candles].sort(byTimestamp));
    if (!last || newer.length === 0) {
      return 0;
    }
    if (newer[0].timestamp - last.timestamp <= this.intervalMs) {
      return 0;
    }
    return Math.ceil((newer[newer.length - 1].timestamp - last.timestamp) / this.intervalMs);
  }

  private async processed(steps: PipelineStep[], accepted: Signal[]): Promise<TickOutcome> {
    this.consecutiveFailures = 0;
    this.lastTickSucceeded = true;

    const rejectedCandidates: Signal[] = [];
    const inapplicableCandidates: InapplicableCandidate[] = [];
    for (const { event } of steps) {
      if (event.type === 'rejected') {
        rejectedCandidates.push(event.signal);
      } else if (event.type === 'inapplicable' && event.reported) {
        inapplicableCandidates.push({
          direction: event.direction,
          timestamp: event.frame.timestamp,
          state: event.state,
        });
      }
    }

    const summary = this.summary({
      candlesProcessed: steps.length,
      acceptedSignals: accepted,
      rejectedCandidates,
      inapplicableCandidates,
    });
    await this.publishSummary(summary);
    return { status: 'processed', candles: steps.length, accepted, summary };
  }

  private async skip(error: unknown): Promise<TickOutcome> {
    const { instrument, maxConsecutiveFailures } = this.options;
    this.consecutiveFailures += 1;
    this.lastTickSucceeded = false;
    const reason = errorMessage(error);

    this.logger.warn(
      JSON.stringify({
        event: 'tick_skipped',
        instrument,
        reason,
        consecutiveFailures: this.consecutiveFailures,
        nextDelayMs: this.nextDelayMs(),
      }),
    );

    if (this.consecutiveFailures % maxConsecutiveFailures === 0) {
      const providerError = new ProviderError(
        instrument,
        this.consecutiveFailures,
        `Candle fetch for ${instrument} failed ${this.consecutiveFailures} times in a row: ${reason}`,
        error,
      );
      this.logger.error(
        JSON.stringify({
          event: 'provider_unavailable',
          instrument,
          attempts: providerError.attempts,
          message: providerError.message,
        }),
      );
      await this.notify('onProviderError', () => this.sinks.observability?.onProviderError?.(providerError));
    }

    const summary = this.summary({
      candlesProcessed: 0,
      acceptedSignals: [],
      rejectedCandidates: [],
      inapplicableCandidates: [],
      skipped: reason,
    });
    await this.publishSummary(summary);
    return { status: 'skipped', reason, consecutiveFailures: this.consecutiveFailures, summary };
  }

  private summary(
    partial: Pick<
      TickSummary,
      'candlesProcessed' | 'acceptedSignals' | 'rejectedCandidates' | 'inapplicableCandidates' | 'skipped'
    >,
  ): TickSummary {
    return {
      instrument: this.options.instrument,
      tickAt: Date.now(),
      indicators: this.latestFrame,
      ledgerState: this.context.detector.state,
      openPosition: this.context.ledger.current(),
      consecutiveFailures: this.consecutiveFailures,
      ...partial,
    };
  }

  private async publishSummary(summary: TickSummary): Promise<void> {
    await this.notify('onTickSummary', () => this.sinks.observability?.onTickSummary(summary));
  }

  /** Invalid candles are dropped with a warning. */
  private appendToWindow(candle: Candle): boolean {
    try {
      this.window.append(candle);
      return true;
    } catch (error) {
      if (!(error instanceof DataError)) {
        throw error;
      }
      this.logger.warn(
        JSON.stringify({
          event: 'candle_rejected',
          instrument: this.options.instrument,
          timestamp: candle.timestamp,
          reason: error.message,
        }),
      );
      return false;
    }
  }

  private isWarm(): boolean {
    return this.context.engine.count >= this.context.engine.warmupLength;
  }

  // Sink failures and timeouts are logged and never undo or interrupt a ledger mutation.
  private async notify(sink: string, fn: () => Promise<void> | void | undefined): Promise<void> {
    try {
      await withTimeout(Promise.resolve().then(fn), this.options.sinkTimeoutMs);
    } catch (error) {
      this.logger.error(
        JSON.stringify({
          event: 'sink_failed',
          instrument: this.options.instrument,
          sink,
          message: errorMessage(error),
        }),
      );
    }
  }
}
