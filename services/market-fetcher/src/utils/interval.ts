import { IntervalError } from './errors.js';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

// kline intervals with a fixed length; '1M' is calendar-based and left out
const INTERVAL_MS = {
  '1s': SECOND,
  '1m': MINUTE,
  '3m': 3 * MINUTE,
  '5m': 5 * MINUTE,
  '15m': 15 * MINUTE,
  '30m': 30 * MINUTE,
  '1h': HOUR,
  '2h': 2 * HOUR,
  '4h': 4 * HOUR,
  '6h': 6 * HOUR,
  '8h': 8 * HOUR,
  '12h': 12 * HOUR,
  '1d': DAY,
  '3d': 3 * DAY,
  '1w': 7 * DAY,
} as const;

export type KlineInterval = keyof typeof INTERVAL_MS;

export const KLINE_INTERVALS: readonly string[] = Object.keys(INTERVAL_MS);

export function isKnownInterval(tag: string): tag is KlineInterval {
  return Object.prototype.hasOwnProperty.call(INTERVAL_MS, tag);
}

export function intervalToMs(tag: string): number {
  if (!isKnownInterval(tag)) throw new IntervalError(tag);
  return INTERVAL_MS[tag];
}
