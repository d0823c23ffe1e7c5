import { Decimal } from 'decimal.js';
import type { z } from 'zod';
import type { TradingRule, VenueType } from '../types/domain.js';
import { SchemaError } from '../utils/errors.js';
import {
  CoinFuturesSymbolInfo,
  SpotSymbolInfo,
  UsdtFuturesSymbolInfo,
  type SymbolFilter,
} from '../utils/validators.js';

export type SymbolInfoParser = (info: unknown) => TradingRule;

/** Value of `fieldName` on the first filter tagged `filterType`, if any. */
export function getFromFilters(filters: readonly SymbolFilter[], filterType: string, fieldName: string): unknown {
  const filter = filters.find((f) => f.filterType === filterType);
  return filter?.[fieldName];
}

function symbolOf(info: unknown): string | undefined {
  if (typeof info === 'object' && info !== null && 'symbol' in info && typeof info.symbol === 'string') {
    return info.symbol;
  }
  return undefined;
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, info: unknown, venue: VenueType): T {
  const parsed = schema.safeParse(info);
  if (!parsed.success) {
    throw new SchemaError(
      `invalid ${venue} symbol info`,
      { venue, symbol: symbolOf(info), issues: parsed.error.issues },
      parsed.error,
    );
  }
  return parsed.data;
}

function toDecimal(value: unknown, field: string, symbol: string, opts: { positive: boolean }): Decimal {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new SchemaError(`${symbol}: ${field} missing`, { symbol, field });
  }
  let d: Decimal;
  try {
    d = new Decimal(value);
  } catch (err) {
    throw new SchemaError(`${symbol}: ${field} is not a decimal`, { symbol, field, value }, err);
  }
  const ok = d.isFinite() && (opts.positive ? d.gt(0) : d.gte(0));
  if (!ok) throw new SchemaError(`${symbol}: ${field} out of range`, { symbol, field, value });
  return d;
}

function fromFilter(
  filters: readonly SymbolFilter[],
  symbol: string,
  filterType: string,
  fieldName: string,
  opts: { positive: boolean },
): Decimal {
  return toDecimal(getFromFilters(filters, filterType, fieldName), `${filterType}.${fieldName}`, symbol, opts);
}

const POSITIVE = { positive: true };
const NON_NEGATIVE = { positive: false };

export const parseSpotSymbolInfo: SymbolInfoParser = (raw) => {
  const info = validate(SpotSymbolInfo, raw, 'spot');
  const { filters, symbol } = info;
  return Object.freeze({
    symbol,
    contractType: null,
    status: info.status,
    baseAsset: info.baseAsset,
    quoteAsset: info.quoteAsset,
    marginAsset: null,
    priceTick: fromFilter(filters, symbol, 'PRICE_FILTER', 'tickSize', POSITIVE),
    lotSize: fromFilter(filters, symbol, 'LOT_SIZE', 'stepSize', POSITIVE),
    minNotionalValue: fromFilter(filters, symbol, 'NOTIONAL', 'minNotional', NON_NEGATIVE),
  });
};

export const parseUsdtFuturesSymbolInfo: SymbolInfoParser = (raw) => {
  const info = validate(UsdtFuturesSymbolInfo, raw, 'usdt_futures');
  const { filters, symbol } = info;
  return Object.freeze({
    symbol,
    contractType: info.contractType,
    status: info.status,
    baseAsset: info.baseAsset,
    quoteAsset: info.quoteAsset,
    marginAsset: info.marginAsset,
    priceTick: fromFilter(filters, symbol, 'PRICE_FILTER', 'tickSize', POSITIVE),
    lotSize: fromFilter(filters, symbol, 'LOT_SIZE', 'stepSize', POSITIVE),
    minNotionalValue: fromFilter(filters, symbol, 'MIN_NOTIONAL', 'notional', NON_NEGATIVE),
  });
};

// size is quoted in contracts, so there is no notional floor to report
export const parseCoinFuturesSymbolInfo: SymbolInfoParser = (raw) => {
  const info = validate(CoinFuturesSymbolInfo, raw, 'coin_futures');
  const { filters, symbol } = info;
  return Object.freeze({
    symbol,
    contractType: info.contractType,
    status: info.contractStatus,
    baseAsset: info.baseAsset,
    quoteAsset: info.quoteAsset,
    marginAsset: info.marginAsset,
    priceTick: fromFilter(filters, symbol, 'PRICE_FILTER', 'tickSize', POSITIVE),
    lotSize: toDecimal(info.contractSize, 'contractSize', symbol, POSITIVE),
  });
};

export const SYMBOL_INFO_PARSERS: Readonly<Record<VenueType, SymbolInfoParser>> = {
  spot: parseSpotSymbolInfo,
  usdt_futures: parseUsdtFuturesSymbolInfo,
  coin_futures: parseCoinFuturesSymbolInfo,
};
