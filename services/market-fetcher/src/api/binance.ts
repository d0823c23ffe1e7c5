import type { Logger } from 'pino';
import type { Dispatcher } from 'undici';
import type { z } from 'zod';
import { cfg } from '../config/index.js';
import { getJson, headerValue, type JsonResponse } from '../http/client.js';
import { binanceLatency, binanceRequests, binanceUsedWeight } from '../metrics/metrics.js';
import type { VenueType } from '../types/domain.js';
import { ConfigError, FetcherError, SchemaError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  ExchangeInfoBody,
  KlinesBody,
  PremiumIndexBody,
  ServerTimeBody,
  type PremiumIndexEntry,
  type RawKline,
} from '../utils/validators.js';

export const USED_WEIGHT_HEADER = 'x-mbx-used-weight-1m';

export type CallOptions = {
  /** Per-call deadline; falls back to the transport default. */
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type KlineParams = {
  startTime?: number;
  endTime?: number;
  limit?: number;
  timeZone?: string;
};

export type KlinesRequest = KlineParams & { symbol: string; interval: string };

/** Transport for one venue. Everything here is a single HTTP round trip. */
export interface MarketApi {
  readonly venue: VenueType;
  readonly MAX_MINUTE_WEIGHT: number;
  readonly WEIGHT_EFFICIENT_ONCE_CANDLES: number;
  readonly CANDLES_PER_EFFICIENT_REQUEST: number;

  requestTimeAndWeight(opts?: CallOptions): Promise<{ serverTimeMs: number; weight: number }>;
  requestExchangeInfo(opts?: CallOptions): Promise<ExchangeInfoBody>;
  requestKlines(req: KlinesRequest, opts?: CallOptions): Promise<RawKline[]>;
  requestPremiumIndex(opts?: CallOptions): Promise<PremiumIndexEntry[]>;
}

type VenueProfile = {
  prefix: string;
  maxMinuteWeight: number;
  // cheapest candles-per-weight kline request: its weight and its limit
  weightEfficientOnceCandles: number;
  candlesPerEfficientRequest: number;
  hasFunding: boolean;
};

const VENUE_PROFILES: Readonly<Record<VenueType, VenueProfile>> = {
  spot: {
    prefix: '/api/v3',
    maxMinuteWeight: 6000,
    weightEfficientOnceCandles: 2,
    candlesPerEfficientRequest: 1000,
    hasFunding: false,
  },
  usdt_futures: {
    prefix: '/fapi/v1',
    maxMinuteWeight: 2400,
    weightEfficientOnceCandles: 2,
    candlesPerEfficientRequest: 499,
    hasFunding: true,
  },
  coin_futures: {
    prefix: '/dapi/v1',
    maxMinuteWeight: 2400,
    weightEfficientOnceCandles: 2,
    candlesPerEfficientRequest: 499,
    hasFunding: true,
  },
};

export type BinanceMarketApiOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
};

type Endpoint = 'time' | 'exchangeInfo' | 'klines' | 'premiumIndex';

function readWeight(res: JsonResponse): number | undefined {
  const raw = headerValue(res.headers, USED_WEIGHT_HEADER);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

export class BinanceMarketApi implements MarketApi {
  readonly MAX_MINUTE_WEIGHT: number;
  readonly WEIGHT_EFFICIENT_ONCE_CANDLES: number;
  readonly CANDLES_PER_EFFICIENT_REQUEST: number;

  private readonly profile: VenueProfile;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly log: Logger;

  constructor(readonly venue: VenueType, opts: BinanceMarketApiOptions = {}) {
    this.profile = VENUE_PROFILES[venue];
    this.baseUrl = (opts.baseUrl ?? cfg.baseUrls[venue]).replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? cfg.timeoutMs;
    this.dispatcher = opts.dispatcher;
    this.log = logger.child({ venue });

    this.MAX_MINUTE_WEIGHT = this.profile.maxMinuteWeight;
    this.WEIGHT_EFFICIENT_ONCE_CANDLES = this.profile.weightEfficientOnceCandles;
    this.CANDLES_PER_EFFICIENT_REQUEST = this.profile.candlesPerEfficientRequest;
  }

  async requestTimeAndWeight(opts?: CallOptions) {
    const res = await this.get('time', {}, opts);
    const { serverTime } = this.decode('time', ServerTimeBody, res.body);
    const weight = readWeight(res);
    if (weight === undefined) {
      throw new SchemaError(`${USED_WEIGHT_HEADER} header missing`, { venue: this.venue });
    }
    return { serverTimeMs: serverTime, weight };
  }

  async requestExchangeInfo(opts?: CallOptions) {
    const res = await this.get('exchangeInfo', {}, opts);
    return this.decode('exchangeInfo', ExchangeInfoBody, res.body);
  }

  async requestKlines(req: KlinesRequest, opts?: CallOptions) {
    const res = await this.get('klines', req, opts);
    return this.decode('klines', KlinesBody, res.body);
  }

  async requestPremiumIndex(opts?: CallOptions) {
    if (!this.profile.hasFunding) {
      throw new ConfigError(`${this.venue} has no premium index`, 'FUNDING_UNSUPPORTED', { venue: this.venue });
    }
    const res = await this.get('premiumIndex', {}, opts);
    return this.decode('premiumIndex', PremiumIndexBody, res.body);
  }

  private decode<T>(endpoint: Endpoint, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SchemaError(`unexpected ${endpoint} response`, {
        venue: this.venue,
        endpoint,
        issues: parsed.error.issues,
      }, parsed.error);
    }
    return parsed.data;
  }

  private buildUrl(endpoint: Endpoint, params: Record<string, string | number | undefined>): string {
    const url = new URL(`${this.baseUrl}${this.profile.prefix}/${endpoint}`);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.append(k, String(v));
    }
    return url.toString();
  }

  private async get(
    endpoint: Endpoint,
    params: Record<string, string | number | undefined>,
    opts: CallOptions = {},
  ): Promise<JsonResponse> {
    const url = this.buildUrl(endpoint, params);
    const endTimer = binanceLatency.startTimer({ venue: this.venue, endpoint });
    this.log.debug({ url }, 'binance request');
    try {
      const res = await getJson(url, {
        timeoutMs: opts.timeoutMs ?? this.timeoutMs,
        signal: opts.signal,
        dispatcher: this.dispatcher,
      });
      binanceRequests.inc({ venue: this.venue, endpoint, status: String(res.status) });
      const weight = readWeight(res);
      if (weight !== undefined) binanceUsedWeight.set({ venue: this.venue }, weight);
      return res;
    } catch (err) {
      const status = err instanceof FetcherError ? String(err.status ?? err.code) : 'error';
      binanceRequests.inc({ venue: this.venue, endpoint, status });
      this.log.debug({ err, url }, 'binance request failed');
      throw err;
    } finally {
      endTimer();
    }
  }
}

export function createBinanceMarketApi(venue: VenueType, opts: BinanceMarketApiOptions = {}): MarketApi {
  return new BinanceMarketApi(venue, opts);
}
