import { ClosedPosition } from '../types';

export interface BacktestStats {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  /** winningTrades / totalTrades, 0 when there are no trades. */
  winRate: number;
  totalPnl: number;
  averagePnl: number;
  averageHoldingMs: number;
  averageWin: number;
  averageLoss: number;
  /** Gross profit / |gross loss|; null when nothing lost. */
  profitFactor: number | null;
  /** Largest peak-to-trough fall of cumulative realized PnL. */
  maxDrawdown: number;
  candlesProcessed: number;
}

const mean = (values: number[]): number =>
  values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;

export function computeStats(trades: readonly ClosedPosition[], candlesProcessed: number): BacktestStats {
  const pnls = trades.map((trade) => trade.realizedPnl);
  const wins = pnls.filter((pnl) => pnl > 0);
  const losses = pnls.filter((pnl) => pnl < 0);
  const grossProfit = wins.reduce((sum, pnl) => sum + pnl, 0);
  const grossLoss = losses.reduce((sum, pnl) => sum + pnl, 0);

  let cumulative = 0;
  let peak = 0;
  let maxDrawdown = 0;
  for (const pnl of pnls) {
    cumulative += pnl;
    peak = Math.max(peak, cumulative);
    maxDrawdown = Math.max(maxDrawdown, peak - cumulative);
  }

  return {
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: trades.length ? wins.length / trades.length : 0,
    totalPnl: cumulative,
    averagePnl: mean(pnls),
    averageHoldingMs: mean(trades.map((trade) => trade.exitTime - trade.entryTime)),
    averageWin: mean(wins),
    averageLoss: mean(losses),
    profitFactor: losses.length ? grossProfit / Math.abs(grossLoss) : null,
    maxDrawdown,
    candlesProcessed,
  };
}
