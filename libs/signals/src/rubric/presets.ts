import { ConfigError } from '@libs/core';
import { DEFAULT_INDICATOR_PERIODS } from '../indicator-engine';
import { mergeRubric, RubricConfig, RubricOverrides, validateRubric } from './rubric';

export type RubricPresetName = 'final-85' | 'strict-85' | 'advanced-70';

export const DEFAULT_RUBRIC_PRESET: RubricPresetName = 'final-85';

const FINAL_85: RubricConfig = {
  name: 'final-85',
  weights: { volume: 30, volumeTrend: 25, rsi: 20, bollinger: 15, obv: 10 },
  trendBonus: 5,
  confidenceThreshold: 80,
  periods: DEFAULT_INDICATOR_PERIODS,
  criteria: {
    volumeRatioMin: 1.4,
    buyVolumeTrendMinPct: 15,
    sellVolumeTrendMinPct: -10,
    rsiRange: [35, 65],
    buyBollingerRange: [0.15, 0.5],
    sellBollingerRange: [0.5, 0.85],
  },
  quantity: 1,
  feeRate: 0,
  advisoryMaxAdjustment: 10,
  outOfStatePolicy: 'ignore',
};

const PRESETS: Record<RubricPresetName, RubricConfig> = {
  'final-85': FINAL_85,
  'strict-85': mergeRubric(FINAL_85, { name: 'strict-85', confidenceThreshold: 85 }),
  // Looser bands, no trend confirmation.
  'advanced-70': mergeRubric(FINAL_85, {
    name: 'advanced-70',
    trendBonus: 0,
    confidenceThreshold: 70,
    criteria: {
      volumeRatioMin: 1.3,
      buyVolumeTrendMinPct: 10,
      sellVolumeTrendMinPct: -20,
      rsiRange: [30, 70],
      buyBollingerRange: [0.1, 0.6],
      sellBollingerRange: [0.4, 0.9],
    },
  }),
};

export const RUBRIC_PRESET_NAMES = Object.freeze(Object.keys(PRESETS));

const isPresetName = (name: string): name is RubricPresetName =>
  Object.prototype.hasOwnProperty.call(PRESETS, name);

export function getRubricPreset(name: string): Readonly<RubricConfig> {
  if (!isPresetName(name)) {
    throw new ConfigError([
      `preset: unknown rubric preset "${name}" (expected one of ${RUBRIC_PRESET_NAMES.join(', ')})`,
    ]);
  }
  return validateRubric(PRESETS[name]);
}

/** Preset plus overrides, validated. Throws ConfigError listing every issue. */
export function createRubric(
  overrides: RubricOverrides = {},
  preset: string = DEFAULT_RUBRIC_PRESET,
): Readonly<RubricConfig> {
  return validateRubric(mergeRubric(getRubricPreset(preset), overrides));
}
