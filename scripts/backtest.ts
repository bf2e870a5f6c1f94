import 'dotenv/config';
import 'reflect-metadata';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parseArgs } from 'util';
import { errorMessage } from '@libs/core';
import {
  backtestEnvFromEnv,
  formatBacktestReport,
  parseCandleFile,
  rubricFromEnv,
  runBacktest,
} from '@libs/signals';

const USAGE = 'Usage: backtest <candles.json> [--instrument BTCUSDT] [--preset final-85] [--json]';

const main = (): void => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      instrument: { type: 'string', default: 'BACKTEST' },
      preset: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
  });

  const file = positionals[0];
  if (!file) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const rubric = rubricFromEnv((key) =>
    key === 'RUBRIC_PRESET' && values.preset ? values.preset : process.env[key],
  );
  const candles = parseCandleFile(JSON.parse(readFileSync(resolve(file), 'utf8')));
  const { abortOnDataError, reportDecimals } = backtestEnvFromEnv(process.env);

  const result = runBacktest(candles, rubric, {
    instrument: values.instrument,
    abortOnDataError,
  });

  if (values.json) {
    const { context: _context, ...serializable } = result;
    console.info(JSON.stringify(serializable, null, 2));
    return;
  }

  for (const line of formatBacktestReport(result, reportDecimals)) {
    console.info(line);
  }
};

try {
  main();
} catch (error) {
  console.error(`❌ Backtest failed: ${errorMessage(error)}`);
  process.exitCode = 1;
}
