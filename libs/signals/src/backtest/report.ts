import { BacktestResult } from './backtest-runner';

const iso = (ms: number): string => new Date(ms).toISOString();

export function formatBacktestReport(result: BacktestResult, decimals = 2): string[] {
  const fixed = (value: number): string => value.toFixed(decimals);
  const { stats } = result;
  const lines = [
    `Backtest ${result.instrument} (rubric ${result.rubric})`,
    `Candles processed: ${stats.candlesProcessed}, rejected: ${result.rejectedCandles.length}`,
    `Signals accepted: ${result.signals.length}, rejected: ${result.rejected.length}, out of state: ${result.inapplicable}`,
    '',
  ];

  for (const trade of result.trades) {
    lines.push(
      `#${trade.sequence} ${iso(trade.entryTime)} @ ${fixed(trade.entryPrice)} -> ${iso(trade.exitTime)} @ ${fixed(trade.exitPrice)} pnl ${fixed(trade.realizedPnl)} (score ${trade.entrySignal.confidenceScore}/${trade.exitSignal.confidenceScore})`,
    );
  }

  if (result.openPosition) {
    const { position, markPrice, unrealizedPnl } = result.openPosition;
    lines.push(
      `#${position.sequence} OPEN since ${iso(position.entryTime)} @ ${fixed(position.entryPrice)}, mark ${fixed(markPrice)}, unrealized ${fixed(unrealizedPnl)}`,
    );
  }

  lines.push(
    '',
    `Trades: ${stats.totalTrades} (wins ${stats.winningTrades}, losses ${stats.losingTrades})`,
    `Win rate: ${(stats.winRate * 100).toFixed(1)}%`,
    `Total PnL: ${fixed(stats.totalPnl)}, average ${fixed(stats.averagePnl)}`,
    `Average win: ${fixed(stats.averageWin)}, average loss: ${fixed(stats.averageLoss)}`,
    `Profit factor: ${stats.profitFactor === null ? 'n/a' : fixed(stats.profitFactor)}`,
    `Max drawdown: ${fixed(stats.maxDrawdown)}`,
    `Average holding: ${(stats.averageHoldingMs / 3_600_000).toFixed(1)}h`,
  );
  return lines;
}
