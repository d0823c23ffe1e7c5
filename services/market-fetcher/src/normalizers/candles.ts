import type { CandleRow } from '../types/domain.js';
import { SchemaError } from '../utils/errors.js';
import { intervalToMs } from '../utils/interval.js';
import { toNumberOrNull } from '../utils/numeric.js';
import { RawKline } from '../utils/validators.js';

// positions in a /klines row; 6 (close time) and 11 (ignore) are dropped
const COL = {
  beginTime: 0,
  open: 1,
  high: 2,
  low: 3,
  close: 4,
  volume: 5,
  quoteVolume: 7,
  tradeNum: 8,
  takerBuyBaseAssetVolume: 9,
  takerBuyQuoteAssetVolume: 10,
} as const;

type BoundKline = Omit<CandleRow, 'candleEndTime'>;

function toFloat(raw: RawKline, col: keyof typeof COL, row: number): number {
  const n = toNumberOrNull(raw[COL[col]]);
  if (n === null) throw new SchemaError(`kline ${row}: ${col} is not numeric`, { row, col, value: raw[COL[col]] });
  return n;
}

function toInt(raw: RawKline, col: keyof typeof COL, row: number): number {
  const n = toFloat(raw, col, row);
  if (!Number.isSafeInteger(n)) throw new SchemaError(`kline ${row}: ${col} is not an integer`, { row, col, value: raw[COL[col]] });
  return n;
}

function toDate(raw: RawKline, row: number): Date {
  const d = new Date(toInt(raw, 'beginTime', row));
  if (Number.isNaN(d.getTime())) {
    throw new SchemaError(`kline ${row}: beginTime out of range`, { row, value: raw[COL.beginTime] });
  }
  return d;
}

function bindKline(value: unknown, row: number): BoundKline {
  const parsed = RawKline.safeParse(value);
  if (!parsed.success) {
    throw new SchemaError(`kline ${row}: malformed row`, { row, issues: parsed.error.issues }, parsed.error);
  }
  const raw = parsed.data;

  return {
    candleBeginTime: toDate(raw, row),
    open: toFloat(raw, 'open', row),
    high: toFloat(raw, 'high', row),
    low: toFloat(raw, 'low', row),
    close: toFloat(raw, 'close', row),
    volume: toFloat(raw, 'volume', row),
    quoteVolume: toFloat(raw, 'quoteVolume', row),
    tradeNum: toInt(raw, 'tradeNum', row),
    takerBuyBaseAssetVolume: toFloat(raw, 'takerBuyBaseAssetVolume', row),
    takerBuyQuoteAssetVolume: toFloat(raw, 'takerBuyQuoteAssetVolume', row),
  };
}

/**
 * Turns a /klines payload into rows sorted by begin time, each keyed by the
 * instant its bar closes (`candleEndTime = candleBeginTime + interval`).
 * Duplicated begin times are kept as they come.
 */
export function normalizeCandles(
  klines: readonly unknown[],
  interval: string,
  durationOf: (interval: string) => number = intervalToMs,
): CandleRow[] {
  // resolve first: an unknown interval fails before any row work
  const durationMs = durationOf(interval);

  const bound = klines.map(bindKline);
  // Array#sort is stable, so equal begin times keep payload order
  bound.sort((a, b) => a.candleBeginTime.getTime() - b.candleBeginTime.getTime());

  return bound.map((k) => ({
    candleEndTime: new Date(k.candleBeginTime.getTime() + durationMs),
    ...k,
  }));
}

/** Rows keyed by `candleEndTime` epoch ms; a later duplicate wins. */
export function indexByEndTime(rows: readonly CandleRow[]): Map<number, CandleRow> {
  return new Map(rows.map((r) => [r.candleEndTime.getTime(), r]));
}
