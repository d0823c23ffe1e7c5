import { z } from 'zod';

// Binance sends decimals as strings ("0.00100000"); some fields come as numbers
const DecimalLike = z.union([z.string().min(1), z.number()]);

export const SymbolFilter = z.object({ filterType: z.string().min(1) }).passthrough();
export type SymbolFilter = z.infer<typeof SymbolFilter>;

export const SpotSymbolInfo = z.object({
  symbol: z.string().min(1),
  status: z.string(),
  baseAsset: z.string(),
  quoteAsset: z.string(),
  filters: z.array(SymbolFilter),
});

export const UsdtFuturesSymbolInfo = z.object({
  symbol: z.string().min(1),
  contractType: z.string(),
  status: z.string(),
  baseAsset: z.string(),
  quoteAsset: z.string(),
  marginAsset: z.string(),
  filters: z.array(SymbolFilter),
});

export const CoinFuturesSymbolInfo = z.object({
  symbol: z.string().min(1),
  contractType: z.string(),
  contractStatus: z.string(),
  baseAsset: z.string(),
  quoteAsset: z.string(),
  marginAsset: z.string(),
  contractSize: DecimalLike,
  filters: z.array(SymbolFilter),
});

// symbols are validated one by one by the parsers
export const ExchangeInfoBody = z.object({
  symbols: z.array(z.unknown()),
}).passthrough();
export type ExchangeInfoBody = z.infer<typeof ExchangeInfoBody>;

// [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades,
//  takerBuyBase, takerBuyQuote, ignore]
export const RawKline = z.array(z.union([z.number(), z.string()])).min(12);
export type RawKline = z.infer<typeof RawKline>;

export const KlinesBody = z.array(RawKline);

export const PremiumIndexEntry = z.object({
  symbol: z.string().min(1),
  // coerced later; placeholders like "" must not fail the batch
  lastFundingRate: z.unknown(),
}).passthrough();
export type PremiumIndexEntry = z.infer<typeof PremiumIndexEntry>;

export const PremiumIndexBody = z.array(PremiumIndexEntry);

export const ServerTimeBody = z.object({
  serverTime: z.number().int().nonnegative(),
});

export const BinanceErrorBody = z.object({
  code: z.number(),
  msg: z.string(),
});
