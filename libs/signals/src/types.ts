export type Direction = 'buy' | 'sell';

export type DetectorState = 'FLAT' | 'HOLDING';

export interface Candle {
  /** Candle open time, epoch ms. */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface IndicatorFrame {
  index: number;
  timestamp: number;
  close: number;
  macd: number;
  macdSignal: number;
  macdHist: number;
  rsi: number;
  bbUpper: number;
  bbMiddle: number;
  bbLower: number;
  obv: number;
  obvTrend: number;
  volumeRatio: number;
  volumeTrendPct: number;
  maFast: number;
  maSlow: number;
}

export interface IndicatorPeriods {
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  rsi: number;
  bollinger: number;
  bollingerStdDev: number;
  volume: number;
  volumeTrendLookback: number;
  obvTrendLookback: number;
  maFast: number;
  maSlow: number;
}

export type ScoreComponent = 'volume' | 'volumeTrend' | 'rsi' | 'bollinger' | 'obv' | 'trend';

export interface ComponentResult {
  passed: boolean;
  /** Points awarded (0 or `weight`). */
  points: number;
  weight: number;
  value: number;
}

export type ScoreBreakdown = Record<ScoreComponent, ComponentResult>;

export interface Signal {
  instrument: string;
  timestamp: number;
  direction: Direction;
  price: number;
  /** Final score in [0,100] compared against the threshold. */
  confidenceScore: number;
  /** Rubric score before any advisory adjustment. */
  baseScore: number;
  advisoryAdjustment: number;
  breakdown: ScoreBreakdown;
  accepted: boolean;
}

export interface OpenPosition {
  status: 'open';
  sequence: number;
  entrySignal: Signal;
  entryPrice: number;
  entryTime: number;
  quantity: number;
}

export interface ClosedPosition {
  status: 'closed';
  sequence: number;
  entrySignal: Signal;
  entryPrice: number;
  entryTime: number;
  quantity: number;
  exitSignal: Signal;
  exitPrice: number;
  exitTime: number;
  fees: number;
  realizedPnl: number;
}

export type Position = OpenPosition | ClosedPosition;

export interface TradeRecord {
  instrument: string;
  sequence: number;
  timestamp: number;
  direction: Direction;
  price: number;
  quantity: number;
  confidenceScore: number;
  realizedPnl: number | null;
}
