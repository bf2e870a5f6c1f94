import { describe, expect, it } from 'vitest';
import { ConfigError } from '@libs/core';
import {
  createRubric,
  DEFAULT_RUBRIC_PRESET,
  getRubricPreset,
  RUBRIC_PRESET_NAMES,
  rubricFromEnv,
  validateRubric,
  weightTotal,
} from '@libs/signals';

const configIssues = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
};

describe('rubric presets', () => {
  it('ships three valid presets', () => {
    expect(RUBRIC_PRESET_NAMES).toEqual(['final-85', 'strict-85', 'advanced-70']);
    for (const name of RUBRIC_PRESET_NAMES) {
      expect(weightTotal(getRubricPreset(name).weights)).toBe(100);
    }
  });

  it('uses final-85 by default', () => {
    const rubric = createRubric();

    expect(DEFAULT_RUBRIC_PRESET).toBe('final-85');
    expect(rubric.name).toBe('final-85');
    expect(rubric.confidenceThreshold).toBe(80);
    expect(rubric.trendBonus).toBe(5);
    expect(rubric.weights).toEqual({ volume: 30, volumeTrend: 25, rsi: 20, bollinger: 15, obv: 10 });
  });

  it('differs between presets only where intended', () => {
    expect(getRubricPreset('strict-85').confidenceThreshold).toBe(85);
    const advanced = getRubricPreset('advanced-70');
    expect(advanced.trendBonus).toBe(0);
    expect(advanced.criteria.rsiRange).toEqual([30, 70]);
  });

  it('rejects an unknown preset', () => {
    expect(configIssues(() => getRubricPreset('yolo'))).toEqual([
      'preset: unknown rubric preset "yolo" (expected one of final-85, strict-85, advanced-70)',
    ]);
  });

  it('returns a frozen rubric', () => {
    const rubric = createRubric({ weights: { volume: 25, obv: 15 } });

    expect(Object.isFrozen(rubric)).toBe(true);
    expect(Object.isFrozen(rubric.weights)).toBe(true);
    expect(rubric.weights.volume).toBe(25);
    expect(rubric.weights.volumeTrend).toBe(25);
  });
});

describe('validateRubric', () => {
  it('requires the weights to sum to exactly 100', () => {
    expect(configIssues(() => createRubric({ weights: { volume: 31 } }))).toEqual([
      'weights: weights must sum to exactly 100 (got 101)',
    ]);
  });

  it('accepts whole-point weights only', () => {
    expect(configIssues(() => createRubric({ weights: { volume: 30.5, obv: 9.5 } }))).toEqual([
      'weights.volume: Expected integer, received float',
      'weights.obv: Expected integer, received float',
    ]);
    expect(configIssues(() => createRubric({ trendBonus: 2.5 }))).toEqual([
      'trendBonus: Expected integer, received float',
    ]);
  });

  it('reports every problem at once', () => {
    const issues = configIssues(() =>
      validateRubric({
        ...getRubricPreset('final-85'),
        confidenceThreshold: 101,
        quantity: 0,
      }),
    );

    expect(issues).toEqual([
      'confidenceThreshold: Number must be less than or equal to 100',
      'quantity: Number must be greater than 0',
    ]);
  });

  it('rejects inverted ranges', () => {
    expect(configIssues(() => createRubric({ criteria: { rsiRange: [70, 30] } }))).toEqual([
      'criteria.rsiRange: range lower bound must not exceed upper bound',
    ]);
  });

  it('rejects a fast MACD period that is not shorter than the slow one', () => {
    expect(configIssues(() => createRubric({ periods: { macdFast: 26 } }))).toEqual([
      'periods.macdFast: macdFast must be shorter than macdSlow',
    ]);
  });
});

describe('rubricFromEnv', () => {
  const reader = (values: Record<string, unknown>) => (key: string) => values[key];

  it('falls back to the default preset when nothing is set', () => {
    expect(rubricFromEnv(reader({}))).toEqual(createRubric());
  });

  it('applies a preset and overrides from string values', () => {
    const rubric = rubricFromEnv(
      reader({ RUBRIC_PRESET: 'strict-85', WEIGHT_VOLUME: '35', WEIGHT_OBV: '5', FEE_RATE: '0.001' }),
    );

    expect(rubric.name).toBe('strict-85');
    expect(rubric.confidenceThreshold).toBe(85);
    expect(rubric.weights.volume).toBe(35);
    expect(rubric.weights.obv).toBe(5);
    expect(rubric.feeRate).toBe(0.001);
  });

  it('treats empty strings as unset', () => {
    expect(rubricFromEnv(reader({ CONFIDENCE_THRESHOLD: '' })).confidenceThreshold).toBe(80);
  });

  it('names the offending key for unparsable values', () => {
    expect(configIssues(() => rubricFromEnv(reader({ WEIGHT_RSI: 'abc' })))).toEqual([
      'WEIGHT_RSI: Expected number, received string',
    ]);
  });

  it('passes the merged values through rubric validation', () => {
    expect(configIssues(() => rubricFromEnv(reader({ WEIGHT_RSI: '25' })))).toEqual([
      'weights: weights must sum to exactly 100 (got 105)',
    ]);
  });
});
