import { describe, expect, it } from 'vitest';
import { EnvSchema, envSchema } from '@libs/core';
import fs from 'fs';
import path from 'path';

const readEnvExampleKeys = (): Set<string> => {
  const envPath = path.join(process.cwd(), '.env.example');
  const content = fs.readFileSync(envPath, 'utf8');
  const keys = new Set<string>();

  content.split('\n').forEach((line) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }

    const match = trimmed.match(/^([A-Z0-9_]+)=/);
    if (match) {
      keys.add(match[1]);
    }
  });

  return keys;
};

describe('.env.example alignment', () => {
  it('includes all env.schema keys', () => {
    const envKeys = readEnvExampleKeys();
    const schemaKeys = Object.keys(envSchema.shape);
    const missing = schemaKeys.filter((key) => !envKeys.has(key));

    expect(missing).toEqual([]);
  });

  it('documents no key the schema does not know', () => {
    const schemaKeys = new Set(Object.keys(envSchema.shape));
    const unknown = [...readEnvExampleKeys()].filter((key) => !schemaKeys.has(key));

    expect(unknown).toEqual([]);
  });
});

describe('env schema', () => {
  it('fills defaults for an empty environment', () => {
    const env = EnvSchema.parse({});

    expect(env.INSTRUMENTS).toEqual(['BTCUSDT']);
    expect(env.POLL_INTERVAL_SECONDS).toBe(60);
    expect(env.MARKET_DATA_PROVIDER).toBe('binance');
    expect(env.LIVE_TRADING_ENABLED).toBe(true);
    expect(env.CONFIDENCE_THRESHOLD).toBeUndefined();
  });

  it('coerces strings from the process environment', () => {
    const env = EnvSchema.parse({
      INSTRUMENTS: 'btcusdt, ethusdt',
      LIVE_TRADING_ENABLED: 'no',
      FETCH_TIMEOUT_MS: '2500',
      FEE_RATE: '0.001',
    });

    expect(env.INSTRUMENTS).toEqual(['btcusdt', 'ethusdt']);
    expect(env.LIVE_TRADING_ENABLED).toBe(false);
    expect(env.FETCH_TIMEOUT_MS).toBe(2500);
    expect(env.FEE_RATE).toBe(0.001);
  });

  it('rejects a backoff cap shorter than the poll interval', () => {
    const result = EnvSchema.safeParse({ POLL_INTERVAL_SECONDS: '60', MAX_BACKOFF_SECONDS: '30' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        'MAX_BACKOFF_SECONDS must be >= POLL_INTERVAL_SECONDS',
      ]);
    }
  });

  it('requires an instrument when live trading is enabled', () => {
    const result = EnvSchema.safeParse({ INSTRUMENTS: ' , ' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['INSTRUMENTS']);
    }
  });
});
