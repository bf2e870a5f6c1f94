import { AdvisoryOverlay } from './advisory';
import { IndicatorEngine } from './indicator-engine';
import { PositionLedger } from './position-ledger';
import { RubricConfig } from './rubric/rubric';
import { DetectorEvent, SignalDetector } from './signal-detector';
import { Candle, IndicatorFrame } from './types';

/** Everything one instrument needs; contexts never share state. */
export interface InstrumentContext {
  readonly instrument: string;
  readonly rubric: RubricConfig;
  readonly engine: IndicatorEngine;
  readonly detector: SignalDetector;
  readonly ledger: PositionLedger;
}

export interface InstrumentContextOptions {
  advisory?: AdvisoryOverlay;
  rejectedLogLimit?: number;
}

export interface PipelineStep {
  candle: Candle;
  frame: IndicatorFrame | undefined;
  event: DetectorEvent;
}

export function createInstrumentContext(
  instrument: string,
  rubric: RubricConfig,
  options: InstrumentContextOptions = {},
): InstrumentContext {
  const engine = new IndicatorEngine(rubric.periods);
  const ledger = new PositionLedger({ quantity: rubric.quantity, feeRate: rubric.feeRate });
  const detector = new SignalDetector({
    instrument,
    rubric,
    ledger,
    advisory: options.advisory,
    rejectedLogLimit: options.rejectedLogLimit,
  });
  return { instrument, rubric, engine, detector, ledger };
}

/** Engine then detector for one already-validated candle. */
export function processCandle(context: InstrumentContext, candle: Candle): PipelineStep {
  const frame = context.engine.push(candle);
  const event = context.detector.process(frame);
  return { candle, frame, event };
}

/** Feeds a candle without trading on it: history used to warm a live runner. */
export function warmCandle(context: InstrumentContext, candle: Candle): IndicatorFrame | undefined {
  const frame = context.engine.push(candle);
  if (frame) {
    context.detector.prime(frame);
  }
  return frame;
}
