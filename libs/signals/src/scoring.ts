import { frameBollingerPosition } from './indicator-engine';
import { RubricConfig } from './rubric/rubric';
import { ComponentResult, Direction, IndicatorFrame, ScoreBreakdown } from './types';

export interface ScoreResult {
  /** min(100, weightedScore + trend bonus). */
  score: number;
  /** Sum of the weighted components, without the trend bonus. */
  weightedScore: number;
  breakdown: ScoreBreakdown;
}

const within = (value: number, [low, high]: readonly [number, number]): boolean =>
  Number.isFinite(value) && value >= low && value <= high;

const above = (value: number, bound: number): boolean => Number.isFinite(value) && value > bound;

const component = (passed: boolean, weight: number, value: number): ComponentResult => ({
  passed,
  points: passed ? weight : 0,
  weight,
  value,
});

/**
 * Binary, direction-aware rubric. A component whose input is not finite is never
 * satisfied, so a flat band or a zero volume average simply scores nothing.
 */
export function scoreCandidate(
  frame: IndicatorFrame,
  direction: Direction,
  rubric: RubricConfig,
): ScoreResult {
  const { weights, criteria } = rubric;
  const isBuy = direction === 'buy';
  const bandPosition = frameBollingerPosition(frame);
  const maSpread = frame.maFast - frame.maSlow;

  const breakdown: ScoreBreakdown = {
    volume: component(
      Number.isFinite(frame.volumeRatio) && frame.volumeRatio >= criteria.volumeRatioMin,
      weights.volume,
      frame.volumeRatio,
    ),
    volumeTrend: component(
      above(
        frame.volumeTrendPct,
        isBuy ? criteria.buyVolumeTrendMinPct : criteria.sellVolumeTrendMinPct,
      ),
      weights.volumeTrend,
      frame.volumeTrendPct,
    ),
    rsi: component(within(frame.rsi, criteria.rsiRange), weights.rsi, frame.rsi),
    bollinger: component(
      within(bandPosition, isBuy ? criteria.buyBollingerRange : criteria.sellBollingerRange),
      weights.bollinger,
      bandPosition,
    ),
    obv: component(
      Number.isFinite(frame.obvTrend) && (isBuy ? frame.obvTrend > 0 : frame.obvTrend < 0),
      weights.obv,
      frame.obvTrend,
    ),
    trend: component(
      Number.isFinite(maSpread) && (isBuy ? maSpread > 0 : maSpread < 0),
      rubric.trendBonus,
      maSpread,
    ),
  };

  const weightedScore =
    breakdown.volume.points +
    breakdown.volumeTrend.points +
    breakdown.rsi.points +
    breakdown.bollinger.points +
    breakdown.obv.points;

  return {
    score: clampScore(weightedScore + breakdown.trend.points),
    weightedScore,
    breakdown,
  };
}

export const clampScore = (value: number): number => Math.min(100, Math.max(0, value));
