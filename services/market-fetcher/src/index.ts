export {
  BinanceFetcher,
  DEFAULT_RETRY_APPLICABILITY,
  type BinanceFetcherOptions,
  type RetryApplicability,
} from './services/fetcher.service.js';
export {
  BinanceMarketApi,
  createBinanceMarketApi,
  USED_WEIGHT_HEADER,
  type BinanceMarketApiOptions,
  type CallOptions,
  type KlineParams,
  type KlinesRequest,
  type MarketApi,
} from './api/binance.js';
export {
  getFromFilters,
  parseCoinFuturesSymbolInfo,
  parseSpotSymbolInfo,
  parseUsdtFuturesSymbolInfo,
  SYMBOL_INFO_PARSERS,
  type SymbolInfoParser,
} from './parsers/trading-rules.js';
export { indexByEndTime, normalizeCandles } from './normalizers/candles.js';
export { extractFundingRates, toNumberOrNull } from './normalizers/funding.js';
export { intervalToMs, isKnownInterval, KLINE_INTERVALS, type KlineInterval } from './utils/interval.js';
export { createRetrying, retryingCall, type RetryingCall, type RetryPolicy } from './utils/retry.js';
export {
  ConfigError,
  FetcherError,
  IntervalError,
  isRetryable,
  SchemaError,
  TransportError,
  type ErrorCode,
} from './utils/errors.js';
export { registry } from './metrics/metrics.js';
export * from './types/domain.js';
