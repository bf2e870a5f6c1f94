import { Candle, IndicatorFrame, IndicatorPeriods } from './types';
import { bollingerPosition, EmaState, RollingWindow, RsiState } from './indicators';

export const DEFAULT_INDICATOR_PERIODS: IndicatorPeriods = {
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  rsi: 14,
  bollinger: 20,
  bollingerStdDev: 2,
  volume: 20,
  volumeTrendLookback: 3,
  obvTrendLookback: 5,
  maFast: 20,
  maSlow: 50,
};

/** Number of candles needed before every field of a frame is defined. */
export function warmupLength(periods: IndicatorPeriods): number {
  return Math.max(
    periods.macdSlow + periods.macdSignal,
    periods.bollinger,
    periods.rsi + 1,
    periods.volume + periods.volumeTrendLookback,
    periods.maFast,
    periods.maSlow,
    periods.obvTrendLookback + 1,
  );
}

/**
 * Streaming indicator engine: each candle is pushed exactly once and only bounded
 * buffers are kept, so a replay and a live feed over the same candles produce the
 * same frames.
 */
export class IndicatorEngine {
  readonly warmupLength: number;
  private processed = 0;
  private previousClose = NaN;
  private obvTotal = 0;

  private readonly emaFast: EmaState;
  private readonly emaSlow: EmaState;
  private readonly emaSignal: EmaState;
  private readonly rsiState: RsiState;
  private readonly bollingerCloses: RollingWindow;
  private readonly volumes: RollingWindow;
  private readonly volumeRatios: RollingWindow;
  private readonly obvHistory: RollingWindow;
  private readonly fastCloses: RollingWindow;
  private readonly slowCloses: RollingWindow;

  constructor(readonly periods: IndicatorPeriods = DEFAULT_INDICATOR_PERIODS) {
    this.warmupLength = warmupLength(periods);
    this.emaFast = new EmaState(periods.macdFast);
    this.emaSlow = new EmaState(periods.macdSlow);
    this.emaSignal = new EmaState(periods.macdSignal);
    this.rsiState = new RsiState(periods.rsi);
    this.bollingerCloses = new RollingWindow(periods.bollinger);
    this.volumes = new RollingWindow(periods.volume);
    this.volumeRatios = new RollingWindow(periods.volumeTrendLookback + 1);
    this.obvHistory = new RollingWindow(periods.obvTrendLookback + 1);
    this.fastCloses = new RollingWindow(periods.maFast);
    this.slowCloses = new RollingWindow(periods.maSlow);
  }

  get count(): number {
    return this.processed;
  }

  push(candle: Candle): IndicatorFrame | undefined {
    const index = this.processed;
    this.processed += 1;

    const { close, volume } = candle;

    const fast = this.emaFast.push(close);
    const slow = this.emaSlow.push(close);
    const macdValue = fast - slow;
    const signal = this.emaSignal.push(macdValue);

    const rsiValue = this.rsiState.push(close);

    this.bollingerCloses.push(close);
    const bbMiddle = this.bollingerCloses.mean();
    const bbDeviation = this.bollingerCloses.stdDev() * this.periods.bollingerStdDev;

    if (!Number.isNaN(this.previousClose)) {
      if (close > this.previousClose) {
        this.obvTotal += volume;
      } else if (close < this.previousClose) {
        this.obvTotal -= volume;
      }
    }
    this.previousClose = close;
    this.obvHistory.push(this.obvTotal);

    this.volumes.push(volume);
    const volumeAverage = this.volumes.mean();
    const volumeRatio = volumeAverage > 0 ? volume / volumeAverage : NaN;
    this.volumeRatios.push(volumeRatio);

    this.fastCloses.push(close);
    this.slowCloses.push(close);

    if (this.processed < this.warmupLength) {
      return undefined;
    }

    const baseRatio = this.volumeRatios.first;
    const volumeTrendPct = baseRatio > 0 ? (volumeRatio / baseRatio - 1) * 100 : NaN;

    return {
      index,
      timestamp: candle.timestamp,
      close,
      macd: macdValue,
      macdSignal: signal,
      macdHist: macdValue - signal,
      rsi: rsiValue,
      bbUpper: bbMiddle + bbDeviation,
      bbMiddle,
      bbLower: bbMiddle - bbDeviation,
      obv: this.obvTotal,
      obvTrend: this.obvTotal - this.obvHistory.first,
      volumeRatio,
      volumeTrendPct,
      maFast: this.fastCloses.mean(),
      maSlow: this.slowCloses.mean(),
    };
  }
}

/**
 * Pure form of the engine: the frame for the last candle of `window`, or `undefined`
 * while the window is shorter than the warm-up length.
 */
export function compute(
  window: readonly Candle[],
  periods: IndicatorPeriods = DEFAULT_INDICATOR_PERIODS,
): IndicatorFrame | undefined {
  const engine = new IndicatorEngine(periods);
  let frame: IndicatorFrame | undefined;
  for (const candle of window) {
    frame = engine.push(candle);
  }
  return frame;
}

export function frameBollingerPosition(frame: IndicatorFrame): number {
  return bollingerPosition(frame.close, frame.bbLower, frame.bbUpper);
}
