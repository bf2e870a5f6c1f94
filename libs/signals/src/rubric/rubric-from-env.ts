import { ConfigError, envSchema } from '@libs/core';
import { createRubric } from './presets';
import { RubricConfig } from './rubric';

const rubricEnvSchema = envSchema.pick({
  RUBRIC_PRESET: true,
  OUT_OF_STATE_POLICY: true,
  CONFIDENCE_THRESHOLD: true,
  TRADE_QUANTITY: true,
  FEE_RATE: true,
  ADVISORY_MAX_ADJUSTMENT: true,
  TREND_BONUS: true,
  WEIGHT_VOLUME: true,
  WEIGHT_VOLUME_TREND: true,
  WEIGHT_RSI: true,
  WEIGHT_BOLLINGER: true,
  WEIGHT_OBV: true,
  MACD_FAST_PERIOD: true,
  MACD_SLOW_PERIOD: true,
  MACD_SIGNAL_PERIOD: true,
  RSI_PERIOD: true,
  BOLLINGER_PERIOD: true,
  BOLLINGER_STDDEV: true,
  VOLUME_PERIOD: true,
  VOLUME_TREND_LOOKBACK: true,
  OBV_TREND_LOOKBACK: true,
  MA_FAST_PERIOD: true,
  MA_SLOW_PERIOD: true,
});

export type RubricEnvKey = keyof typeof rubricEnvSchema.shape;

export const RUBRIC_ENV_KEYS = Object.freeze(Object.keys(rubricEnvSchema.shape));

/**
 * Builds the rubric from environment values. `read` is usually
 * `(key) => configService.get(key)`; raw strings from `process.env` work too.
 */
export function rubricFromEnv(read: (key: string) => unknown): Readonly<RubricConfig> {
  const raw: Record<string, unknown> = {};
  for (const key of RUBRIC_ENV_KEYS) {
    raw[key] = read(key);
  }

  const parsed = rubricEnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const env = parsed.data;
  return createRubric(
    {
      outOfStatePolicy: env.OUT_OF_STATE_POLICY,
      confidenceThreshold: env.CONFIDENCE_THRESHOLD,
      quantity: env.TRADE_QUANTITY,
      feeRate: env.FEE_RATE,
      advisoryMaxAdjustment: env.ADVISORY_MAX_ADJUSTMENT,
      trendBonus: env.TREND_BONUS,
      weights: {
        volume: env.WEIGHT_VOLUME,
        volumeTrend: env.WEIGHT_VOLUME_TREND,
        rsi: env.WEIGHT_RSI,
        bollinger: env.WEIGHT_BOLLINGER,
        obv: env.WEIGHT_OBV,
      },
      periods: {
        macdFast: env.MACD_FAST_PERIOD,
        macdSlow: env.MACD_SLOW_PERIOD,
        macdSignal: env.MACD_SIGNAL_PERIOD,
        rsi: env.RSI_PERIOD,
        bollinger: env.BOLLINGER_PERIOD,
        bollingerStdDev: env.BOLLINGER_STDDEV,
        volume: env.VOLUME_PERIOD,
        volumeTrendLookback: env.VOLUME_TREND_LOOKBACK,
        obvTrendLookback: env.OBV_TREND_LOOKBACK,
        maFast: env.MA_FAST_PERIOD,
        maSlow: env.MA_SLOW_PERIOD,
      },
    },
    env.RUBRIC_PRESET,
  );
}
