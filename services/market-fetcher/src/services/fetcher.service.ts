import type { Logger } from 'pino';
import {
  createBinanceMarketApi,
  type BinanceMarketApiOptions,
  type CallOptions,
  type KlineParams,
  type MarketApi,
} from '../api/binance.js';
import { normalizeCandles } from '../normalizers/candles.js';
import { extractFundingRates } from '../normalizers/funding.js';
import { SYMBOL_INFO_PARSERS, type SymbolInfoParser } from '../parsers/trading-rules.js';
import {
  isVenueType,
  type ApiLimits,
  type CandleRow,
  type FundingRow,
  type TimeAndWeight,
  type TradingRule,
  type VenueType,
} from '../types/domain.js';
import { ConfigError } from '../utils/errors.js';
import { intervalToMs } from '../utils/interval.js';
import { logger } from '../utils/logger.js';
import { retryingCall, type RetryingCall } from '../utils/retry.js';

/** Which remote calls go through the retrying caller. */
export type RetryApplicability = {
  timeAndWeight: boolean;
  exchangeInfo: boolean;
  candles: boolean;
  fundingRate: boolean;
};

// time/weight and funding go straight to the transport unless opted in
export const DEFAULT_RETRY_APPLICABILITY: Readonly<RetryApplicability> = {
  timeAndWeight: false,
  exchangeInfo: true,
  candles: true,
  fundingRate: false,
};

// an override left undefined keeps the default
function resolveRetryOn(overrides: Partial<RetryApplicability> = {}): Readonly<RetryApplicability> {
  const d = DEFAULT_RETRY_APPLICABILITY;
  return Object.freeze({
    timeAndWeight: overrides.timeAndWeight ?? d.timeAndWeight,
    exchangeInfo: overrides.exchangeInfo ?? d.exchangeInfo,
    candles: overrides.candles ?? d.candles,
    fundingRate: overrides.fundingRate ?? d.fundingRate,
  });
}

export type BinanceFetcherOptions = {
  /** Pre-built transport; must be bound to the same venue. */
  marketApi?: MarketApi;
  /** Used to build the transport when `marketApi` is not given. */
  api?: BinanceMarketApiOptions;
  retrying?: RetryingCall;
  retryOn?: Partial<RetryApplicability>;
  durationOf?: (interval: string) => number;
};

export class BinanceFetcher {
  readonly tradeType: VenueType;

  private readonly marketApi: MarketApi;
  private readonly parseSymbolInfo: SymbolInfoParser;
  private readonly retrying: RetryingCall;
  private readonly retryOn: Readonly<RetryApplicability>;
  private readonly durationOf: (interval: string) => number;
  private readonly log: Logger;

  constructor(type: string, opts: BinanceFetcherOptions = {}) {
    if (!isVenueType(type)) {
      throw new ConfigError(`Type ${type} not supported`, 'UNSUPPORTED_VENUE', { type });
    }
    if (opts.marketApi && opts.marketApi.venue !== type) {
      throw new ConfigError(
        `market api is bound to ${opts.marketApi.venue}, not ${type}`,
        'UNSUPPORTED_VENUE',
        { type, apiVenue: opts.marketApi.venue },
      );
    }

    this.tradeType = type;
    this.marketApi = opts.marketApi ?? createBinanceMarketApi(type, opts.api);
    this.parseSymbolInfo = SYMBOL_INFO_PARSERS[type];
    this.retrying = opts.retrying ?? retryingCall;
    this.retryOn = resolveRetryOn(opts.retryOn);
    this.durationOf = opts.durationOf ?? intervalToMs;
    this.log = logger.child({ venue: type });
  }

  getApiLimits(): ApiLimits {
    return {
      maxMinuteWeight: this.marketApi.MAX_MINUTE_WEIGHT,
      weightEfficientOnceCandles: this.marketApi.WEIGHT_EFFICIENT_ONCE_CANDLES,
    };
  }

  async getTimeAndWeight(opts?: CallOptions): Promise<TimeAndWeight> {
    const api = this.marketApi;
    const { serverTimeMs, weight } = await this.call(
      'timeAndWeight',
      api.requestTimeAndWeight.bind(api),
      opts,
    );
    return { serverTime: new Date(serverTimeMs), weight };
  }

  /** Trading rules from /exchangeInfo, keyed by symbol. */
  async getExchangeInfo(opts?: CallOptions): Promise<Map<string, TradingRule>> {
    const api = this.marketApi;
    const exgInfo = await this.call('exchangeInfo', api.requestExchangeInfo.bind(api), opts);

    const results = new Map<string, TradingRule>();
    for (const info of exgInfo.symbols) {
      const rule = this.parseSymbolInfo(info);
      results.set(rule.symbol, rule);
    }
    this.log.debug({ symbols: results.size }, 'exchange info parsed');
    return results;
  }

  /** /klines for one symbol, normalized, sorted and keyed by close instant. */
  async getCandle(symbol: string, interval: string, params: KlineParams = {}, opts?: CallOptions): Promise<CandleRow[]> {
    // unknown intervals fail here, before a request is spent
    this.durationOf(interval);

    const api = this.marketApi;
    const data = await this.call(
      'candles',
      api.requestKlines.bind(api),
      { ...params, symbol, interval },
      opts,
    );
    return normalizeCandles(data, interval, this.durationOf);
  }

  async getFundingRate(opts?: CallOptions): Promise<FundingRow[]> {
    if (this.tradeType === 'spot') {
      throw new ConfigError('Cannot request funding rate for spot', 'FUNDING_UNSUPPORTED', { venue: this.tradeType });
    }
    const api = this.marketApi;
    const data = await this.call('fundingRate', api.requestPremiumIndex.bind(api), opts);
    return extractFundingRates(data);
  }

  private call<A extends unknown[], R>(
    op: keyof RetryApplicability,
    operation: (...args: A) => Promise<R>,
    ...args: A
  ): Promise<R> {
    return this.retryOn[op] ? this.retrying(operation, ...args) : operation(...args);
  }
}
