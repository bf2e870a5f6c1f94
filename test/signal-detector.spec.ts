import { describe, expect, it } from 'vitest';
import {
  AdvisoryOverlay,
  createRubric,
  detectTrigger,
  DetectorEvent,
  IndicatorFrame,
  PositionLedger,
  RubricOverrides,
  SignalDetector,
} from '@libs/signals';
import { HOUR, makeFrame, START } from './helpers/fixtures';

const at = (index: number, overrides: Partial<IndicatorFrame> = {}): IndicatorFrame =>
  makeFrame({ index, timestamp: START + index * HOUR, ...overrides });

// Buy crossover below zero; band position 0.8 and a falling fast MA fail two components.
const buyPrev = (index: number) => at(index, { macd: -6, macdSignal: -1, macdHist: -5 });
const buyCross = (index: number, overrides: Partial<IndicatorFrame> = {}) =>
  at(index, { macd: -1.5, macdSignal: -2.5, macdHist: 1, bbLower: 60, bbUpper: 110, maFast: 99, ...overrides });

const sellPrev = (index: number) => at(index, { macd: 4, macdSignal: 3, macdHist: 1 });
const sellCross = (index: number) =>
  at(index, {
    macd: 2,
    macdSignal: 2.5,
    macdHist: -0.5,
    close: 110,
    bbLower: 90,
    bbUpper: 120,
    rsi: 70,
    volumeTrendPct: -5,
    obvTrend: -50,
  });

const sellsOnly: AdvisoryOverlay = {
  name: 'sells-only',
  adjust: ({ direction }) => (direction === 'sell' ? 2 : 0),
};

const createDetector = (overrides: RubricOverrides = {}, advisory?: AdvisoryOverlay) => {
  const rubric = createRubric(overrides);
  const ledger = new PositionLedger({ quantity: rubric.quantity, feeRate: rubric.feeRate });
  const detector = new SignalDetector({ instrument: 'BTCUSDT', rubric, ledger, advisory });
  return { detector, ledger };
};

const expectAccepted = (event: DetectorEvent) => {
  if (event.type !== 'accepted') {
    throw new Error(`expected an accepted event, got ${event.type}`);
  }
  return event;
};

describe('detectTrigger', () => {
  it('detects a buy crossover below zero', () => {
    expect(detectTrigger(buyPrev(1), buyCross(2))).toBe('buy');
  });

  it('detects a sell crossover above zero', () => {
    expect(detectTrigger(sellPrev(1), sellCross(2))).toBe('sell');
  });

  it('ignores a crossover on the wrong side of zero', () => {
    expect(detectTrigger(buyPrev(1), buyCross(2, { macd: 0.5, macdSignal: -0.5 }))).toBeNull();
  });

  it('ignores frames where MACD merely touches the signal line', () => {
    expect(detectTrigger(buyPrev(1), buyCross(2, { macd: -2.5 }))).toBeNull();
  });
});

describe('SignalDetector', () => {
  it('reports warm-up for undefined frames and primes on the first defined frame', () => {
    const { detector } = createDetector();

    expect(detector.process(undefined)).toEqual({ type: 'warmup' });
    expect(detector.process(buyCross(1)).type).toBe('none');
  });

  it('accepts a buy scoring 85 and opens a position at the close', () => {
    const { detector, ledger } = createDetector();
    detector.process(buyPrev(1));

    const event = expectAccepted(detector.process(buyCross(2)));

    expect(event.signal.confidenceScore).toBe(85);
    expect(event.signal.baseScore).toBe(85);
    expect(event.signal.breakdown.bollinger.passed).toBe(false);
    expect(event.signal.breakdown.trend.passed).toBe(false);
    expect(event.position).toMatchObject({ status: 'open', sequence: 1, entryPrice: 100 });
    expect(event.trade).toEqual({
      instrument: 'BTCUSDT',
      sequence: 1,
      timestamp: START + 2 * HOUR,
      direction: 'buy',
      price: 100,
      quantity: 1,
      confidenceScore: 85,
      realizedPnl: null,
    });
    expect(detector.state).toBe('HOLDING');
    expect(ledger.isHolding).toBe(true);
  });

  it('closes on a sell lifted over the threshold by the advisory overlay', () => {
    const { detector, ledger } = createDetector({}, sellsOnly);
    detector.processBatch([buyPrev(1), buyCross(2), sellPrev(3)]);

    const event = expectAccepted(detector.process(sellCross(4)));

    expect(event.signal.baseScore).toBe(80);
    expect(event.signal.advisoryAdjustment).toBe(2);
    expect(event.signal.confidenceScore).toBe(82);
    expect(event.position).toMatchObject({ status: 'closed', exitPrice: 110, realizedPnl: 10 });
    expect(event.trade.realizedPnl).toBe(10);
    expect(detector.state).toBe('FLAT');
    expect(ledger.history()).toHaveLength(1);
  });

  it('rejects a candidate below the threshold and keeps it for inspection', () => {
    const { detector, ledger } = createDetector();
    detector.process(buyPrev(1));

    const event = detector.process(buyCross(2, { rsi: 80 }));

    expect(event.type).toBe('rejected');
    if (event.type === 'rejected') {
      expect(event.signal.confidenceScore).toBe(65);
      expect(event.signal.accepted).toBe(false);
    }
    expect(detector.rejectedCandidates).toHaveLength(1);
    expect(detector.state).toBe('FLAT');
    expect(ledger.current()).toBeNull();
  });

  it('keeps only the most recent rejected candidates', () => {
    const rubric = createRubric();
    const ledger = new PositionLedger({ quantity: rubric.quantity, feeRate: rubric.feeRate });
    const detector = new SignalDetector({ instrument: 'BTCUSDT', rubric, ledger, rejectedLogLimit: 2 });

    for (const index of [1, 3, 5]) {
      detector.process(buyPrev(index));
      expect(detector.process(buyCross(index + 1, { rsi: 80 })).type).toBe('rejected');
    }

    expect(detector.rejectedCandidates.map((signal) => signal.timestamp)).toEqual([START + 4 * HOUR, START + 6 * HOUR]);
  });

  it('treats a sell trigger while flat as inapplicable', () => {
    const { detector } = createDetector();
    detector.process(sellPrev(1));

    expect(detector.process(sellCross(2))).toMatchObject({
      type: 'inapplicable',
      direction: 'sell',
      state: 'FLAT',
      reported: false,
    });
    expect(detector.rejectedCandidates).toHaveLength(0);
  });

  it('flags out-of-state candidates as reported under the report policy', () => {
    const { detector } = createDetector({ outOfStatePolicy: 'report' });
    detector.process(sellPrev(1));

    expect(detector.process(sellCross(2))).toMatchObject({ type: 'inapplicable', reported: true });
  });

  it('processes a batch sequentially so a repeated buy is out of state', () => {
    const { detector } = createDetector();

    const events = detector.processBatch([undefined, buyPrev(1), buyCross(2), buyPrev(3), buyCross(4)]);

    expect(events.map((event) => event.type)).toEqual(['warmup', 'none', 'accepted', 'none', 'inapplicable']);
  });

  it('does not trade on a primed frame', () => {
    const { detector, ledger } = createDetector();
    detector.prime(buyPrev(1));

    expect(detector.process(buyCross(2)).type).toBe('accepted');
    expect(ledger.current()?.entryTime).toBe(START + 2 * HOUR);
  });
});
