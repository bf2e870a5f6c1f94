export type CanonicalInterval = '1m' | '5m' | '15m' | '30m' | '1h' | '4h' | '1d';

const INTERVAL_MS: Record<CanonicalInterval, number> = {
  '1m': 60_000,
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '30m': 30 * 60_000,
  '1h': 3_600_000,
  '4h': 4 * 3_600_000,
  '1d': 86_400_000,
};

export const isCanonicalInterval = (v: string): v is CanonicalInterval =>
  Object.prototype.hasOwnProperty.call(INTERVAL_MS, v);

export const normalizeToCanonical = (v: string): CanonicalInterval | null => {
  const s = String(v ?? '').trim();
  if (!s) return null;
  if (isCanonicalInterval(s)) return s;

  // numeric-minute and upper-case encodings
  const map: Record<string, CanonicalInterval> = {
    '1': '1m',
    '5': '5m',
    '15': '15m',
    '30': '30m',
    '60': '1h',
    '240': '4h',
    '1440': '1d',
    D: '1d',
    '1D': '1d',
    '1H': '1h',
    '4H': '4h',
  };
  return map[s] ?? null;
};

export const intervalToMs = (interval: CanonicalInterval): number => INTERVAL_MS[interval];

/** canonical -> provider REST parameter */
export const toProviderInterval = (provider: string, interval: CanonicalInterval): string | number => {
  switch (provider) {
    case 'max':
      return INTERVAL_MS[interval] / 60_000;
    case 'binance':
    default:
      return interval;
  }
};
