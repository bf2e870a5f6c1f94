export * from './types';
export * from './candles';
export * from './indicators';
export * from './indicator-engine';
export * from './rubric/rubric';
export * from './rubric/presets';
export * from './rubric/rubric-from-env';
export * from './scoring';
export * from './advisory';
export * from './position-ledger';
export * from './signal-detector';
export * from './pipeline';
export * from './sinks';
export * from './backtest/stats';
export * from './backtest/backtest-runner';
export * from './live/live-runner';
export * from './live/live-runner.factory';
export * from './signals.module';
export * from './backtest/candle-file';
export * from './backtest/report';
export * from './backtest/backtest-env';
