/**
 * Indicator math. Every series helper returns an array aligned with its input, with `NaN`
 * where the value is not yet defined. The stateful building blocks (`EmaState`,
 * `RollingWindow`) are shared with the streaming IndicatorEngine so batch and streaming
 * results are identical.
 */

export class RollingWindow {
  private readonly values: number[] = [];

  constructor(readonly capacity: number) {}

  push(value: number): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values.shift();
    }
  }

  get full(): boolean {
    return this.values.length === this.capacity;
  }

  get first(): number {
    return this.values.length > 0 ? this.values[0] : NaN;
  }

  get last(): number {
    return this.values.length > 0 ? this.values[this.values.length - 1] : NaN;
  }

  mean(): number {
    if (!this.full) {
      return NaN;
    }
    let sum = 0;
    for (const value of this.values) {
      sum += value;
    }
    return sum / this.capacity;
  }

  /** Population standard deviation. */
  stdDev(): number {
    const mean = this.mean();
    if (Number.isNaN(mean)) {
      return NaN;
    }
    let sumSquares = 0;
    for (const value of this.values) {
      sumSquares += (value - mean) ** 2;
    }
    return Math.sqrt(sumSquares / this.capacity);
  }
}

/** EMA with k = 2/(n+1), seeded by the SMA of the first n finite inputs. */
export class EmaState {
  private readonly k: number;
  private readonly seed: number[] = [];
  private current = NaN;

  constructor(readonly period: number) {
    this.k = 2 / (period + 1);
  }

  push(value: number): number {
    if (!Number.isFinite(value)) {
      return this.current;
    }

    if (Number.isNaN(this.current)) {
      this.seed.push(value);
      if (this.seed.length === this.period) {
        this.current = this.seed.reduce((sum, item) => sum + item, 0) / this.period;
      }
      return this.current;
    }

    this.current = value * this.k + this.current * (1 - this.k);
    return this.current;
  }

  get value(): number {
    return this.current;
  }
}

/** RSI from simple rolling averages of gains and losses over the last `period` deltas. */
export class RsiState {
  private readonly gains: RollingWindow;
  private readonly losses: RollingWindow;
  private previous = NaN;

  constructor(readonly period: number) {
    this.gains = new RollingWindow(period);
    this.losses = new RollingWindow(period);
  }

  push(close: number): number {
    if (!Number.isNaN(this.previous)) {
      const delta = close - this.previous;
      this.gains.push(Math.max(delta, 0));
      this.losses.push(Math.max(-delta, 0));
    }
    this.previous = close;

    const avgGain = this.gains.mean();
    const avgLoss = this.losses.mean();
    if (Number.isNaN(avgGain) || Number.isNaN(avgLoss)) {
      return NaN;
    }
    if (avgLoss === 0) {
      return avgGain === 0 ? 50 : 100;
    }
    return 100 - 100 / (1 + avgGain / avgLoss);
  }
}

export function sma(values: number[], period: number): number[] {
  const window = new RollingWindow(period);
  return values.map((value) => {
    window.push(value);
    return window.mean();
  });
}

export function ema(values: number[], period: number): number[] {
  const state = new EmaState(period);
  return values.map((value) => state.push(value));
}

export function rsi(values: number[], period = 14): number[] {
  const state = new RsiState(period);
  return values.map((value) => state.push(value));
}

export function macd(
  values: number[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9,
): { macdLine: number[]; signalLine: number[]; histogram: number[] } {
  const emaFast = ema(values, fastPeriod);
  const emaSlow = ema(values, slowPeriod);
  const macdLine = values.map((_, index) => emaFast[index] - emaSlow[index]);
  const signalLine = ema(macdLine, signalPeriod);
  const histogram = macdLine.map((value, index) => value - signalLine[index]);

  return { macdLine, signalLine, histogram };
}

export function bollinger(
  values: number[],
  period = 20,
  stdDevMultiplier = 2,
): { upper: number[]; middle: number[]; lower: number[] } {
  const window = new RollingWindow(period);
  const upper: number[] = [];
  const middle: number[] = [];
  const lower: number[] = [];

  for (const value of values) {
    window.push(value);
    const mean = window.mean();
    const deviation = window.stdDev() * stdDevMultiplier;
    middle.push(mean);
    upper.push(mean + deviation);
    lower.push(mean - deviation);
  }

  return { upper, middle, lower };
}

export function obv(closes: number[], volumes: number[]): number[] {
  const length = Math.min(closes.length, volumes.length);
  const result: number[] = [];

  for (let i = 0; i < length; i += 1) {
    if (i === 0) {
      result.push(0);
      continue;
    }
    const prev = result[i - 1];
    if (closes[i] > closes[i - 1]) {
      result.push(prev + volumes[i]);
    } else if (closes[i] < closes[i - 1]) {
      result.push(prev - volumes[i]);
    } else {
      result.push(prev);
    }
  }

  return result;
}

/** Position of `close` inside the band, 0 at the lower band and 1 at the upper band. */
export function bollingerPosition(close: number, lower: number, upper: number): number {
  const width = upper - lower;
  if (!Number.isFinite(width) || width <= 0) {
    return NaN;
  }
  return (close - lower) / width;
}
