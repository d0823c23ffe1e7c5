import type { Decimal } from 'decimal.js';

export const VENUE_TYPES = ['spot', 'usdt_futures', 'coin_futures'] as const;
export type VenueType = (typeof VENUE_TYPES)[number];

export function isVenueType(v: string): v is VenueType {
  return VENUE_TYPES.some((t) => t === v);
}

// raw Binance value kept when it is none of the known ones
export type SymbolStatus = 'TRADING' | 'HALT' | 'BREAK' | (string & {});

export type TradingRule = {
  symbol: string;
  contractType: string | null;      // null for spot
  status: SymbolStatus;
  baseAsset: string;
  quoteAsset: string;
  marginAsset: string | null;       // null for spot
  priceTick: Decimal;
  lotSize: Decimal;                 // contract size on coin-margined futures
  minNotionalValue?: Decimal;       // absent on coin-margined futures
};

export type CandleRow = {
  candleEndTime: Date;              // begin + interval; row key
  candleBeginTime: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  quoteVolume: number;
  tradeNum: number;
  takerBuyBaseAssetVolume: number;
  takerBuyQuoteAssetVolume: number;
};

export type FundingRow = {
  symbol: string;
  fundingRate: number | null;       // null when the venue sent a placeholder
};

export type ApiLimits = {
  maxMinuteWeight: number;
  weightEfficientOnceCandles: number;
};

export type TimeAndWeight = {
  serverTime: Date;
  weight: number;
};
