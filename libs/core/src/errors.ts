export type EngineErrorCode =
  | 'DATA_ERROR'
  | 'STATE_ERROR'
  | 'POSITION_ALREADY_OPEN'
  | 'NO_OPEN_POSITION'
  | 'CONFIG_ERROR'
  | 'PROVIDER_ERROR';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-order candle, rejected before it reaches the indicator engine. */
export class DataError extends EngineError {
  readonly code: EngineErrorCode = 'DATA_ERROR';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Ledger / detector logic violation. Always fatal to the operation that raised it.
 */
export class StateError extends EngineError {
  readonly code: EngineErrorCode = 'STATE_ERROR';

  constructor(message: string) {
    super(message);
  }
}

export class PositionAlreadyOpenError extends StateError {
  readonly code: EngineErrorCode = 'POSITION_ALREADY_OPEN';

  constructor(entryTime: number) {
    super(`A position is already open (entered at ${new Date(entryTime).toISOString()}).`);
  }
}

export class NoOpenPositionError extends StateError {
  readonly code: EngineErrorCode = 'NO_OPEN_POSITION';

  constructor() {
    super('There is no open position to close.');
  }
}

export class ConfigError extends EngineError {
  readonly code: EngineErrorCode = 'CONFIG_ERROR';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ProviderError extends EngineError {
  readonly code: EngineErrorCode = 'PROVIDER_ERROR';
  readonly instrument: string;
  readonly attempts: number;

  constructor(instrument: string, attempts: number, message: string, cause?: unknown) {
    super(message, { cause });
    this.instrument = instrument;
    this.attempts = attempts;
  }
}

export const isStateError = (error: unknown): error is StateError => error instanceof StateError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
