import { Logger } from '@nestjs/common';
import { AdvisoryOverlay } from '../advisory';
import { partitionValidCandles, RejectedCandle, validateCandle } from '../candles';
import { createInstrumentContext, InstrumentContext, processCandle } from '../pipeline';
import { RubricConfig } from '../rubric/rubric';
import { Candle, ClosedPosition, OpenPosition, Signal, TradeRecord } from '../types';
import { BacktestStats, computeStats } from './stats';

export interface BacktestOptions {
  instrument?: string;
  advisory?: AdvisoryOverlay;
  /** Throw the first DataError instead of skipping malformed candles. */
  abortOnDataError?: boolean;
}

export interface OpenPositionReport {
  position: OpenPosition;
  markPrice: number;
  unrealizedPnl: number;
}

export interface BacktestResult {
  instrument: string;
  rubric: string;
  trades: ClosedPosition[];
  signals: Signal[];
  rejected: Signal[];
  inapplicable: number;
  tradeRecords: TradeRecord[];
  rejectedCandles: RejectedCandle[];
  openPosition: OpenPositionReport | null;
  stats: BacktestStats;
  /** The context after the last candle; `context.ledger.current()` still holds an open position. */
  context: InstrumentContext;
}

const logger = new Logger('BacktestRunner');

/**
 * Replays candles in order through a fresh context. Deterministic for identical input.
 * A StateError aborts the run; a position still open at the end is reported, never
 * force-closed, and left out of the statistics.
 */
export function runBacktest(
  candles: readonly Candle[],
  rubric: RubricConfig,
  options: BacktestOptions = {},
): BacktestResult {
  const instrument = options.instrument ?? 'BACKTEST';
  const { accepted, rejected: rejectedCandles } = options.abortOnDataError
    ? strictValidate(candles)
    : partitionValidCandles(candles);

  for (const { candle, reason } of rejectedCandles) {
    logger.warn(JSON.stringify({ event: 'candle_rejected', instrument, timestamp: candle.timestamp, reason }));
  }

  const context = createInstrumentContext(instrument, rubric, { advisory: options.advisory });
  const signals: Signal[] = [];
  const rejected: Signal[] = [];
  const tradeRecords: TradeRecord[] = [];
  let inapplicable = 0;

  for (const candle of accepted) {
    const { event } = processCandle(context, candle);
    if (event.type === 'accepted') {
      signals.push(event.signal);
      tradeRecords.push(event.trade);
    } else if (event.type === 'rejected') {
      rejected.push(event.signal);
    } else if (event.type === 'inapplicable') {
      inapplicable += 1;
    }
  }

  const trades = [...context.ledger.history()];
  const open = context.ledger.current();
  const last = accepted[accepted.length - 1];
  const openPosition =
    open && last
      ? { position: open, markPrice: last.close, unrealizedPnl: context.ledger.unrealizedPnl(last.close) }
      : null;

  const stats = computeStats(trades, accepted.length);
  logger.log(
    JSON.stringify({
      event: 'backtest_complete',
      instrument,
      rubric: rubric.name,
      candles: accepted.length,
      rejectedCandles: rejectedCandles.length,
      trades: stats.totalTrades,
      totalPnl: stats.totalPnl,
      open: Boolean(openPosition),
    }),
  );

  return {
    instrument,
    rubric: rubric.name,
    trades,
    signals,
    rejected,
    inapplicable,
    tradeRecords,
    rejectedCandles,
    openPosition,
    stats,
    context,
  };
}

function strictValidate(candles: readonly Candle[]): { accepted: Candle[]; rejected: RejectedCandle[] } {
  candles.forEach((candle, index) => validateCandle(candle, index > 0 ? candles[index - 1] : undefined));
  return { accepted: [...candles], rejected: [] };
}
