import { NoOpenPositionError, PositionAlreadyOpenError, StateError } from '@libs/core';
import { ClosedPosition, OpenPosition, Signal } from './types';

export interface PositionLedgerOptions {
  quantity: number;
  /** Charged on both legs: feeRate × (entry + exit) × quantity. */
  feeRate?: number;
}

export class PositionLedger {
  private position: OpenPosition | null = null;
  private readonly closed: ClosedPosition[] = [];
  private sequence = 0;
  private readonly quantity: number;
  private readonly feeRate: number;

  constructor(options: PositionLedgerOptions) {
    this.quantity = options.quantity;
    this.feeRate = options.feeRate ?? 0;
  }

  current(): OpenPosition | null {
    return this.position;
  }

  history(): readonly ClosedPosition[] {
    return Object.freeze([...this.closed]);
  }

  lastClosed(): ClosedPosition | undefined {
    return this.closed[this.closed.length - 1];
  }

  get isHolding(): boolean {
    return this.position !== null;
  }

  open(signal: Signal, price: number, time: number): OpenPosition {
    if (this.position) {
      throw new PositionAlreadyOpenError(this.position.entryTime);
    }

    this.sequence += 1;
    const position: OpenPosition = {
      status: 'open',
      sequence: this.sequence,
      entrySignal: signal,
      entryPrice: price,
      entryTime: time,
      quantity: this.quantity,
    };
    this.position = Object.freeze(position);
    return position;
  }

  /** Closes the open position and returns its realized PnL, net of fees. */
  close(signal: Signal, price: number, time: number): number {
    const position = this.position;
    if (!position) {
      throw new NoOpenPositionError();
    }
    if (time <= position.entryTime) {
      throw new StateError(
        `Exit time ${time} must be after entry time ${position.entryTime} (position #${position.sequence}).`,
      );
    }

    const fees = this.feeRate * (position.entryPrice + price) * position.quantity;
    const closed: ClosedPosition = {
      status: 'closed',
      sequence: position.sequence,
      entrySignal: position.entrySignal,
      entryPrice: position.entryPrice,
      entryTime: position.entryTime,
      quantity: position.quantity,
      exitSignal: signal,
      exitPrice: price,
      exitTime: time,
      fees,
      realizedPnl: (price - position.entryPrice) * position.quantity - fees,
    };

    this.closed.push(Object.freeze(closed));
    this.position = null;
    return closed.realizedPnl;
  }

  /** Mark-to-market of the open position, 0 when flat. Entry-side fees only. */
  unrealizedPnl(markPrice: number): number {
    if (!this.position) {
      return 0;
    }
    const { entryPrice, quantity } = this.position;
    return (markPrice - entryPrice) * quantity - this.feeRate * entryPrice * quantity;
  }
}
