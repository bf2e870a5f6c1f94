import { Candle, IndicatorFrame } from '@libs/signals';

export const HOUR = 3_600_000;
export const START = Date.UTC(2024, 0, 1);

/** Price oscillates around `base`; MACD crosses below zero at troughs and above zero at peaks. */
export const sineCandles = (count: number, period = 40, amplitude = 10, base = 100): Candle[] => {
  const candles: Candle[] = [];
  let previousClose = base;
  for (let i = 0; i < count; i += 1) {
    const close = base + amplitude * Math.sin((2 * Math.PI * i) / period);
    const open = i === 0 ? close : previousClose;
    candles.push({
      timestamp: START + i * HOUR,
      open,
      high: Math.max(open, close) + 0.5,
      low: Math.min(open, close) - 0.5,
      close,
      volume: 1000 + 300 * ((i * 7) % 5),
    });
    previousClose = close;
  }
  return candles;
};

/** close = 100 + i, constant volume. */
export const rampCandles = (count: number, volume = 10): Candle[] =>
  Array.from({ length: count }, (_, i) => ({
    timestamp: START + i * HOUR,
    open: 99.5 + i,
    high: 100.5 + i,
    low: 99 + i,
    close: 100 + i,
    volume,
  }));

/**
 * A frame that satisfies every buy component of the default rubric:
 * band position 0.25, rising OBV, fast MA above slow.
 */
export const makeFrame = (overrides: Partial<IndicatorFrame> = {}): IndicatorFrame => ({
  index: 60,
  timestamp: START + 60 * HOUR,
  close: 100,
  macd: -1,
  macdSignal: -2,
  macdHist: 1,
  rsi: 50,
  bbUpper: 130,
  bbMiddle: 110,
  bbLower: 90,
  obv: 5000,
  obvTrend: 100,
  volumeRatio: 2,
  volumeTrendPct: 20,
  maFast: 101,
  maSlow: 100,
  ...overrides,
});
