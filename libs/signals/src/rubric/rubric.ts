import { z } from 'zod';
import { ConfigError } from '@libs/core';
import { IndicatorPeriods } from '../types';

const positiveInt = z.number().int().positive();
const score = z.number().int().min(0).max(100);
const range = z
  .tuple([z.number(), z.number()])
  .refine(([low, high]) => low <= high, { message: 'range lower bound must not exceed upper bound' });

export const rubricWeightsSchema = z.object({
  volume: score,
  volumeTrend: score,
  rsi: score,
  bollinger: score,
  obv: score,
});

export const scoringCriteriaSchema = z.object({
  volumeRatioMin: z.number().positive(),
  buyVolumeTrendMinPct: z.number(),
  sellVolumeTrendMinPct: z.number(),
  rsiRange: range,
  buyBollingerRange: range,
  sellBollingerRange: range,
});

export const indicatorPeriodsSchema = z
  .object({
    macdFast: positiveInt,
    macdSlow: positiveInt,
    macdSignal: positiveInt,
    rsi: positiveInt,
    bollinger: positiveInt,
    bollingerStdDev: z.number().positive(),
    volume: positiveInt,
    volumeTrendLookback: positiveInt,
    obvTrendLookback: positiveInt,
    maFast: positiveInt,
    maSlow: positiveInt,
  })
  .refine((periods) => periods.macdFast < periods.macdSlow, {
    message: 'macdFast must be shorter than macdSlow',
    path: ['macdFast'],
  })
  .refine((periods) => periods.maFast < periods.maSlow, {
    message: 'maFast must be shorter than maSlow',
    path: ['maFast'],
  });

export const rubricConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    weights: rubricWeightsSchema,
    /** Trend confirmation points, awarded on top of the weights; the total is capped at 100. */
    trendBonus: score,
    confidenceThreshold: score,
    periods: indicatorPeriodsSchema,
    criteria: scoringCriteriaSchema,
    quantity: z.number().positive(),
    feeRate: z.number().min(0).max(1),
    advisoryMaxAdjustment: score,
    outOfStatePolicy: z.enum(['ignore', 'report']),
  })
  .superRefine((config, ctx) => {
    const total = weightTotal(config.weights);
    if (total !== 100) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['weights'],
        message: `weights must sum to exactly 100 (got ${total})`,
      });
    }
  });

export type RubricWeights = z.infer<typeof rubricWeightsSchema>;
export type ScoringCriteria = z.infer<typeof scoringCriteriaSchema>;
export type OutOfStatePolicy = 'ignore' | 'report';

export interface RubricConfig {
  name: string;
  weights: RubricWeights;
  trendBonus: number;
  confidenceThreshold: number;
  periods: IndicatorPeriods;
  criteria: ScoringCriteria;
  quantity: number;
  feeRate: number;
  advisoryMaxAdjustment: number;
  outOfStatePolicy: OutOfStatePolicy;
}

export interface RubricOverrides {
  name?: string;
  weights?: Partial<RubricWeights>;
  trendBonus?: number;
  confidenceThreshold?: number;
  periods?: Partial<IndicatorPeriods>;
  criteria?: Partial<ScoringCriteria>;
  quantity?: number;
  feeRate?: number;
  advisoryMaxAdjustment?: number;
  outOfStatePolicy?: OutOfStatePolicy;
}

export function weightTotal(weights: RubricWeights): number {
  return weights.volume + weights.volumeTrend + weights.rsi + weights.bollinger + weights.obv;
}

/**
 * Validates a rubric and returns a frozen copy. Every problem is reported at once in a
 * ConfigError; values are never clamped.
 */
export function validateRubric(config: RubricConfig): Readonly<RubricConfig> {
  const result = rubricConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }

  const parsed = result.data;
  return Object.freeze({
    ...parsed,
    weights: Object.freeze({ ...parsed.weights }),
    periods: Object.freeze({ ...parsed.periods }),
    criteria: Object.freeze({ ...parsed.criteria }),
  });
}

export function mergeRubric(base: RubricConfig, overrides: RubricOverrides = {}): RubricConfig {
  const weights = overrides.weights ?? {};
  const periods = overrides.periods ?? {};
  const criteria = overrides.criteria ?? {};

  return {
    name: overrides.name ?? base.name,
    trendBonus: overrides.trendBonus ?? base.trendBonus,
    confidenceThreshold: overrides.confidenceThreshold ?? base.confidenceThreshold,
    quantity: overrides.quantity ?? base.quantity,
    feeRate: overrides.feeRate ?? base.feeRate,
    advisoryMaxAdjustment: overrides.advisoryMaxAdjustment ?? base.advisoryMaxAdjustment,
    outOfStatePolicy: overrides.outOfStatePolicy ?? base.outOfStatePolicy,
    weights: {
      volume: weights.volume ?? base.weights.volume,
      volumeTrend: weights.volumeTrend ?? base.weights.volumeTrend,
      rsi: weights.rsi ?? base.weights.rsi,
      bollinger: weights.bollinger ?? base.weights.bollinger,
      obv: weights.obv ?? base.weights.obv,
    },
    periods: {
      macdFast: periods.macdFast ?? base.periods.macdFast,
      macdSlow: periods.macdSlow ?? base.periods.macdSlow,
      macdSignal: periods.macdSignal ?? base.periods.macdSignal,
      rsi: periods.rsi ?? base.periods.rsi,
      bollinger: periods.bollinger ?? base.periods.bollinger,
      bollingerStdDev: periods.bollingerStdDev ?? base.periods.bollingerStdDev,
      volume: periods.volume ?? base.periods.volume,
      volumeTrendLookback: periods.volumeTrendLookback ?? base.periods.volumeTrendLookback,
      obvTrendLookback: periods.obvTrendLookback ?? base.periods.obvTrendLookback,
      maFast: periods.maFast ?? base.periods.maFast,
      maSlow: periods.maSlow ?? base.periods.maSlow,
    },
    criteria: {
      volumeRatioMin: criteria.volumeRatioMin ?? base.criteria.volumeRatioMin,
      buyVolumeTrendMinPct: criteria.buyVolumeTrendMinPct ?? base.criteria.buyVolumeTrendMinPct,
      sellVolumeTrendMinPct: criteria.sellVolumeTrendMinPct ?? base.criteria.sellVolumeTrendMinPct,
      rsiRange: criteria.rsiRange ?? base.criteria.rsiRange,
      buyBollingerRange: criteria.buyBollingerRange ?? base.criteria.buyBollingerRange,
      sellBollingerRange: criteria.sellBollingerRange ?? base.criteria.sellBollingerRange,
    },
  };
}
