import { ConfigError, envSchema } from '@libs/core';

const backtestEnvSchema = envSchema.pick({
  BACKTEST_ABORT_ON_DATA_ERROR: true,
  BACKTEST_REPORT_DECIMALS: true,
});

export interface BacktestEnv {
  abortOnDataError: boolean;
  reportDecimals: number;
}

export function backtestEnvFromEnv(env: Record<string, string | undefined>): BacktestEnv {
  const parsed = backtestEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return {
    abortOnDataError: parsed.data.BACKTEST_ABORT_ON_DATA_ERROR,
    reportDecimals: parsed.data.BACKTEST_REPORT_DECIMALS,
  };
}
