import { Injectable, Logger } from '@nestjs/common';
import { ProviderError } from '@libs/core';
import { ObservabilitySink, TickSummary } from '@libs/signals';

const round = (value: number, decimals = 4): number | null =>
  Number.isFinite(value) ? Number(value.toFixed(decimals)) : null;

@Injectable()
export class LogObservabilitySink implements ObservabilitySink {
  private readonly logger = new Logger(LogObservabilitySink.name);
  private readonly lastSummaries = new Map<string, TickSummary>();

  onTickSummary(summary: TickSummary): void {
    this.lastSummaries.set(summary.instrument, summary);
    const frame = summary.indicators;
    const line = JSON.stringify({
      event: summary.skipped ? 'tick_skipped_summary' : 'tick_summary',
      instrument: summary.instrument,
      candles: summary.candlesProcessed,
      state: summary.ledgerState,
      accepted: summary.acceptedSignals.length,
      rejected: summary.rejectedCandidates.map((signal) => ({
        direction: signal.direction,
        timestamp: signal.timestamp,
        confidenceScore: signal.confidenceScore,
      })),
      inapplicable: summary.inapplicableCandidates,
      indicators: frame
        ? {
            timestamp: frame.timestamp,
            close: frame.close,
            macd: round(frame.macd),
            macdSignal: round(frame.macdSignal),
            rsi: round(frame.rsi, 2),
            volumeRatio: round(frame.volumeRatio, 2),
          }
        : null,
      failures: summary.consecutiveFailures,
      skipped: summary.skipped,
    });

    if (summary.skipped) {
      this.logger.warn(line);
    } else {
      this.logger.log(line);
    }
  }

  onProviderError(error: ProviderError): void {
    this.logger.error(
      JSON.stringify({
        event: 'operator_alert',
        kind: error.code,
        instrument: error.instrument,
        attempts: error.attempts,
        message: error.message,
      }),
    );
  }

  onRunnerStopped(instrument: string, error: Error): void {
    this.logger.error(
      JSON.stringify({ event: 'operator_alert', kind: 'RUNNER_STOPPED', instrument, error: error.name, message: error.message }),
    );
  }

  lastSummary(instrument: string): TickSummary | undefined {
    return this.lastSummaries.get(instrument);
  }
}
