import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';

import {
  getFromFilters,
  parseCoinFuturesSymbolInfo,
  parseSpotSymbolInfo,
  parseUsdtFuturesSymbolInfo,
  SYMBOL_INFO_PARSERS,
} from '../../src/parsers/trading-rules.js';
import { SchemaError } from '../../src/utils/errors.js';
import type { VenueType } from '../../src/types/domain.js';

const usdtFutures = () => ({
  symbol: 'BTCUSDT',
  pair: 'BTCUSDT',
  contractType: 'PERPETUAL',
  status: 'TRADING',
  baseAsset: 'BTC',
  quoteAsset: 'USDT',
  marginAsset: 'USDT',
  filters: [
    { filterType: 'PRICE_FILTER', tickSize: '0.10', minPrice: '556.80', maxPrice: '4529764' },
    { filterType: 'LOT_SIZE', stepSize: '0.001', minQty: '0.001', maxQty: '1000' },
    { filterType: 'MARKET_LOT_SIZE', stepSize: '0.010', minQty: '0.001', maxQty: '120' },
    { filterType: 'MIN_NOTIONAL', notional: '5' },
  ],
});

const spot = () => ({
  symbol: 'ETHBTC',
  status: 'TRADING',
  baseAsset: 'ETH',
  quoteAsset: 'BTC',
  filters: [
    { filterType: 'PRICE_FILTER', tickSize: '0.00001000', minPrice: '0.00001000' },
    { filterType: 'LOT_SIZE', stepSize: '0.00010000', minQty: '0.00010000' },
    { filterType: 'NOTIONAL', minNotional: '0.00010000', applyMinToMarket: true },
  ],
});

const coinFutures = () => ({
  symbol: 'BTCUSD_PERP',
  pair: 'BTCUSD',
  contractType: 'PERPETUAL',
  contractStatus: 'TRADING',
  contractSize: 100,
  baseAsset: 'BTC',
  quoteAsset: 'USD',
  marginAsset: 'BTC',
  filters: [
    { filterType: 'PRICE_FILTER', tickSize: '0.1' },
    { filterType: 'LOT_SIZE', stepSize: '1', minQty: '1' },
  ],
});

describe('trading-rules parsers', () => {
  describe('parseUsdtFuturesSymbolInfo', () => {
    it('reads tick, step and notional from the filter list', () => {
      const rule = parseUsdtFuturesSymbolInfo(usdtFutures());

      expect(rule.symbol).toBe('BTCUSDT');
      expect(rule.contractType).toBe('PERPETUAL');
      expect(rule.marginAsset).toBe('USDT');
      expect(rule.status).toBe('TRADING');
      expect(rule.priceTick.equals(new Decimal('0.10'))).toBe(true);
      expect(rule.lotSize.toString()).toBe('0.001');
      expect(rule.minNotionalValue?.toString()).toBe('5');
    });

    it('keeps decimals exact', () => {
      const rule = parseUsdtFuturesSymbolInfo(usdtFutures());
      // 0.1 + 0.2 style drift would show here with floats
      expect(rule.priceTick.times(3).toString()).toBe('0.3');
    });

    it('throws SchemaError when MIN_NOTIONAL is absent', () => {
      const info = usdtFutures();
      info.filters = info.filters.filter((f) => f.filterType !== 'MIN_NOTIONAL');
      expect(() => parseUsdtFuturesSymbolInfo(info)).toThrow(SchemaError);
    });

    it('throws SchemaError on a non-positive tick', () => {
      const info = usdtFutures();
      info.filters[0] = { filterType: 'PRICE_FILTER', tickSize: '0', minPrice: '0', maxPrice: '0' };
      expect(() => parseUsdtFuturesSymbolInfo(info)).toThrow(/PRICE_FILTER.tickSize out of range/);
    });

    it('throws SchemaError on a non-decimal step', () => {
      const info = usdtFutures();
      info.filters[1] = { filterType: 'LOT_SIZE', stepSize: 'abc', minQty: '0.001', maxQty: '1000' };
      expect(() => parseUsdtFuturesSymbolInfo(info)).toThrow(/LOT_SIZE.stepSize is not a decimal/);
    });
  });

  describe('parseSpotSymbolInfo', () => {
    it('uses NOTIONAL.minNotional and leaves futures fields null', () => {
      const rule = parseSpotSymbolInfo(spot());

      expect(rule.contractType).toBeNull();
      expect(rule.marginAsset).toBeNull();
      expect(rule.priceTick.toString()).toBe('0.00001');
      expect(rule.lotSize.toString()).toBe('0.0001');
      expect(rule.minNotionalValue?.toString()).toBe('0.0001');
    });

    it('throws SchemaError when LOT_SIZE is missing', () => {
      const info = spot();
      info.filters = info.filters.filter((f) => f.filterType !== 'LOT_SIZE');
      expect(() => parseSpotSymbolInfo(info)).toThrow(/ETHBTC: LOT_SIZE.stepSize missing/);
    });
  });

  describe('parseCoinFuturesSymbolInfo', () => {
    it('takes lot size from contractSize and status from contractStatus', () => {
      const rule = parseCoinFuturesSymbolInfo({ ...coinFutures(), contractStatus: 'PENDING_TRADING' });

      expect(rule.status).toBe('PENDING_TRADING');
      expect(rule.lotSize.toString()).toBe('100');
      expect(rule.priceTick.toString()).toBe('0.1');
      expect(rule.marginAsset).toBe('BTC');
      expect('minNotionalValue' in rule).toBe(false);
    });

    it('rejects a record without contractStatus', () => {
      const { contractStatus: _omit, ...info } = coinFutures();
      expect(() => parseCoinFuturesSymbolInfo(info)).toThrow(SchemaError);
    });
  });

  it('every variant yields positive tick/lot, notional only where size is in quote currency', () => {
    const fixtures: Record<VenueType, unknown> = {
      spot: spot(),
      usdt_futures: usdtFutures(),
      coin_futures: coinFutures(),
    };
    const expectNotional: Record<VenueType, boolean> = {
      spot: true,
      usdt_futures: true,
      coin_futures: false,
    };

    for (const venue of ['spot', 'usdt_futures', 'coin_futures'] as const) {
      const rule = SYMBOL_INFO_PARSERS[venue](fixtures[venue]);
      expect(rule.priceTick.gt(0)).toBe(true);
      expect(rule.lotSize.gt(0)).toBe(true);
      expect(rule.minNotionalValue !== undefined).toBe(expectNotional[venue]);
    }
  });

  it('returns frozen records', () => {
    expect(Object.isFrozen(parseSpotSymbolInfo(spot()))).toBe(true);
  });

  it('attaches the symbol to schema errors', () => {
    try {
      parseUsdtFuturesSymbolInfo({ symbol: 'ETHUSDT', filters: [] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      expect(err).toMatchObject({ code: 'SCHEMA_ERROR', details: { venue: 'usdt_futures', symbol: 'ETHUSDT' } });
    }
  });

  describe('getFromFilters', () => {
    const filters = [
      { filterType: 'LOT_SIZE', stepSize: '0.1' },
      { filterType: 'LOT_SIZE', stepSize: '0.5' },
    ];

    it('returns the field of the first matching filter', () => {
      expect(getFromFilters(filters, 'LOT_SIZE', 'stepSize')).toBe('0.1');
    });

    it('returns undefined when no filter matches', () => {
      expect(getFromFilters(filters, 'PRICE_FILTER', 'tickSize')).toBeUndefined();
    });
  });
});
