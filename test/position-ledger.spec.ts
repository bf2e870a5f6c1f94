import { describe, expect, it } from 'vitest';
import { NoOpenPositionError, PositionAlreadyOpenError, StateError } from '@libs/core';
import { createRubric, PositionLedger, scoreCandidate, Signal } from '@libs/signals';
import { HOUR, makeFrame, START } from './helpers/fixtures';

const signal = (direction: Signal['direction'], price: number, timestamp: number): Signal => {
  const { score, breakdown } = scoreCandidate(makeFrame({ close: price }), direction, createRubric());
  return {
    instrument: 'ETHUSDT',
    timestamp,
    direction,
    price,
    confidenceScore: score,
    baseScore: score,
    advisoryAdjustment: 0,
    breakdown,
    accepted: true,
  };
};

describe('PositionLedger', () => {
  it('opens and closes a position net of fees', () => {
    const ledger = new PositionLedger({ quantity: 2, feeRate: 0.001 });
    const opened = ledger.open(signal('buy', 100, START), 100, START);

    expect(opened).toMatchObject({ status: 'open', sequence: 1, entryPrice: 100, quantity: 2 });
    expect(ledger.isHolding).toBe(true);

    const pnl = ledger.close(signal('sell', 110, START + HOUR), 110, START + HOUR);

    expect(pnl).toBeCloseTo(19.58, 10);
    expect(ledger.current()).toBeNull();
    expect(ledger.lastClosed()?.fees).toBeCloseTo(0.42, 10);
    expect(ledger.lastClosed()?.exitTime).toBe(START + HOUR);
  });

  it('numbers positions sequentially', () => {
    const ledger = new PositionLedger({ quantity: 1 });
    ledger.open(signal('buy', 100, START), 100, START);
    ledger.close(signal('sell', 90, START + HOUR), 90, START + HOUR);
    const second = ledger.open(signal('buy', 95, START + 2 * HOUR), 95, START + 2 * HOUR);

    expect(second.sequence).toBe(2);
    expect(ledger.history().map((position) => position.realizedPnl)).toEqual([-10]);
  });

  it('refuses a second open position', () => {
    const ledger = new PositionLedger({ quantity: 1 });
    ledger.open(signal('buy', 100, START), 100, START);

    expect(() => ledger.open(signal('buy', 101, START + HOUR), 101, START + HOUR)).toThrow(
      PositionAlreadyOpenError,
    );
    expect(ledger.current()?.entryPrice).toBe(100);
  });

  it('refuses to close when flat', () => {
    const ledger = new PositionLedger({ quantity: 1 });
    expect(() => ledger.close(signal('sell', 100, START), 100, START)).toThrow(NoOpenPositionError);
  });

  it('refuses an exit that does not come after the entry', () => {
    const ledger = new PositionLedger({ quantity: 1 });
    ledger.open(signal('buy', 100, START + HOUR), 100, START + HOUR);

    expect(() => ledger.close(signal('sell', 105, START), 105, START)).toThrow(StateError);
    expect(ledger.isHolding).toBe(true);
  });

  it('marks an open position to market with entry fees only', () => {
    const ledger = new PositionLedger({ quantity: 2, feeRate: 0.001 });
    expect(ledger.unrealizedPnl(120)).toBe(0);

    ledger.open(signal('buy', 100, START), 100, START);
    expect(ledger.unrealizedPnl(105)).toBeCloseTo(9.8, 10);
  });

  it('returns a frozen history snapshot', () => {
    const ledger = new PositionLedger({ quantity: 1 });
    ledger.open(signal('buy', 100, START), 100, START);
    ledger.close(signal('sell', 104, START + HOUR), 104, START + HOUR);
    const history = ledger.history();

    expect(Object.isFrozen(history)).toBe(true);
    expect(Object.isFrozen(history[0])).toBe(true);
  });
});
