import { Logger } from '@nestjs/common';
import { StateError } from '@libs/core';
import { AdvisoryOverlay, applyAdvisory } from './advisory';
import { PositionLedger } from './position-ledger';
import { RubricConfig } from './rubric/rubric';
import { scoreCandidate } from './scoring';
import { DetectorState, Direction, IndicatorFrame, Position, Signal, TradeRecord } from './types';

export type DetectorEvent =
  | { type: 'warmup' }
  | { type: 'none'; frame: IndicatorFrame }
  | { type: 'inapplicable'; frame: IndicatorFrame; direction: Direction; state: DetectorState; reported: boolean }
  | { type: 'rejected'; frame: IndicatorFrame; signal: Signal }
  | {
      type: 'accepted';
      frame: IndicatorFrame;
      signal: Signal;
      position: Position;
      trade: TradeRecord;
    };

export interface SignalDetectorOptions {
  instrument: string;
  rubric: RubricConfig;
  ledger: PositionLedger;
  advisory?: AdvisoryOverlay;
  /** Most recent rejected candidates kept in `rejectedCandidates`. */
  rejectedLogLimit?: number;
}

export const DEFAULT_REJECTED_LOG_LIMIT = 200;

/**
 * MACD crossover trigger between two consecutive defined frames.
 * Buy: histogram was negative, MACD crosses above signal, both still below zero.
 * Sell: mirror image above zero.
 */
export function detectTrigger(previous: IndicatorFrame, current: IndicatorFrame): Direction | null {
  if (
    previous.macdHist < 0 &&
    previous.macd <= previous.macdSignal &&
    current.macd > current.macdSignal &&
    current.macd < 0 &&
    current.macdSignal < 0
  ) {
    return 'buy';
  }

  if (
    previous.macdHist > 0 &&
    previous.macd >= previous.macdSignal &&
    current.macdSignal > current.macd &&
    current.macd > 0 &&
    current.macdSignal > 0
  ) {
    return 'sell';
  }

  return null;
}

export class SignalDetector {
  private readonly logger = new Logger(SignalDetector.name);
  private readonly instrument: string;
  private readonly rubric: RubricConfig;
  private readonly ledger: PositionLedger;
  private readonly advisory?: AdvisoryOverlay;
  private previous: IndicatorFrame | undefined;
  private currentState: DetectorState;
  private readonly rejected: Signal[] = [];
  private readonly rejectedLogLimit: number;

  constructor(options: SignalDetectorOptions) {
    this.instrument = options.instrument;
    this.rubric = options.rubric;
    this.ledger = options.ledger;
    this.advisory = options.advisory;
    this.rejectedLogLimit = Math.max(0, options.rejectedLogLimit ?? DEFAULT_REJECTED_LOG_LIMIT);
    this.currentState = options.ledger.current() ? 'HOLDING' : 'FLAT';
  }

  get state(): DetectorState {
    return this.currentState;
  }

  get rejectedCandidates(): readonly Signal[] {
    return this.rejected;
  }

  /** Records `frame` as the previous frame without evaluating it. */
  prime(frame: IndicatorFrame): void {
    this.previous = frame;
  }

  process(frame: IndicatorFrame | undefined): DetectorEvent {
    if (!frame) {
      return { type: 'warmup' };
    }

    const previous = this.previous;
    this.previous = frame;
    if (!previous) {
      return { type: 'none', frame };
    }

    const direction = detectTrigger(previous, frame);
    if (!direction) {
      return { type: 'none', frame };
    }

    const applicable = direction === 'buy' ? this.currentState === 'FLAT' : this.currentState === 'HOLDING';
    if (!applicable) {
      return this.outOfState(frame, direction);
    }

    const signal = this.score(frame, direction);
    if (!signal.accepted) {
      this.rejected.push(signal);
      if (this.rejected.length > this.rejectedLogLimit) {
        this.rejected.splice(0, this.rejected.length - this.rejectedLogLimit);
      }
      this.logger.debug(
        JSON.stringify({
          event: 'candidate_rejected',
          instrument: this.instrument,
          direction,
          timestamp: frame.timestamp,
          confidenceScore: signal.confidenceScore,
          threshold: this.rubric.confidenceThreshold,
        }),
      );
      return { type: 'rejected', frame, signal };
    }

    return this.accept(frame, signal);
  }

  /** Sequential: once a transition is actioned, later same-direction triggers are out of state. */
  processBatch(frames: readonly (IndicatorFrame | undefined)[]): DetectorEvent[] {
    return frames.map((frame) => this.process(frame));
  }

  private score(frame: IndicatorFrame, direction: Direction): Signal {
    const { score, breakdown } = scoreCandidate(frame, direction, this.rubric);
    const { adjustment, confidenceScore } = applyAdvisory(
      this.advisory,
      { instrument: this.instrument, frame, direction, baseScore: score },
      this.rubric.advisoryMaxAdjustment,
    );

    return {
      instrument: this.instrument,
      timestamp: frame.timestamp,
      direction,
      price: frame.close,
      confidenceScore,
      baseScore: score,
      advisoryAdjustment: adjustment,
      breakdown,
      accepted: confidenceScore >= this.rubric.confidenceThreshold,
    };
  }

  // Ledger StateErrors propagate: they mean detector and ledger disagree.
  private accept(frame: IndicatorFrame, signal: Signal): DetectorEvent {
    if (signal.direction === 'buy') {
      const position = this.ledger.open(signal, frame.close, frame.timestamp);
      this.currentState = 'HOLDING';
      this.logger.log(
        JSON.stringify({
          event: 'position_opened',
          instrument: this.instrument,
          sequence: position.sequence,
          price: position.entryPrice,
          confidenceScore: signal.confidenceScore,
        }),
      );
      return {
        type: 'accepted',
        frame,
        signal,
        position,
        trade: this.toTradeRecord(signal, position.sequence, position.quantity, null),
      };
    }

    const realizedPnl = this.ledger.close(signal, frame.close, frame.timestamp);
    const position = this.ledger.lastClosed();
    if (!position) {
      throw new StateError(`Ledger for ${this.instrument} reported a close but has no closed position.`);
    }
    this.currentState = 'FLAT';
    this.logger.log(
      JSON.stringify({
        event: 'position_closed',
        instrument: this.instrument,
        sequence: position.sequence,
        price: position.exitPrice,
        realizedPnl,
        confidenceScore: signal.confidenceScore,
      }),
    );
    return {
      type: 'accepted',
      frame,
      signal,
      position,
      trade: this.toTradeRecord(signal, position.sequence, position.quantity, realizedPnl),
    };
  }

  private outOfState(frame: IndicatorFrame, direction: Direction): DetectorEvent {
    const reported = this.rubric.outOfStatePolicy === 'report';
    const line = JSON.stringify({
      event: 'candidate_out_of_state',
      instrument: this.instrument,
      direction,
      state: this.currentState,
      timestamp: frame.timestamp,
    });
    if (reported) {
      this.logger.warn(line);
    } else {
      this.logger.debug(line);
    }
    return { type: 'inapplicable', frame, direction, state: this.currentState, reported };
  }

  private toTradeRecord(
    signal: Signal,
    sequence: number,
    quantity: number,
    realizedPnl: number | null,
  ): TradeRecord {
    return {
      instrument: this.instrument,
      sequence,
      timestamp: signal.timestamp,
      direction: signal.direction,
      price: signal.price,
      quantity,
      confidenceScore: signal.confidenceScore,
      realizedPnl,
    };
  }
}
