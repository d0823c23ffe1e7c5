// src/config/index.ts
import { z } from 'zod';

const Env = z.object({
  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('0'),

  BINANCE_SPOT_BASE_URL: z.string().url().default('https://api.binance.com'),
  BINANCE_USDT_FUTURES_BASE_URL: z.string().url().default('https://fapi.binance.com'),
  BINANCE_COIN_FUTURES_BASE_URL: z.string().url().default('https://dapi.binance.com'),

  // per-request deadline when the caller passes none
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  RETRY_ATTEMPTS: z.coerce.number().int().positive().default(5),
  RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(200),
  RETRY_MAX_MS: z.coerce.number().int().nonnegative().default(5000),
});

const e = Env.parse(process.env);

export const cfg = {
  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',

  baseUrls: {
    spot: e.BINANCE_SPOT_BASE_URL,
    usdt_futures: e.BINANCE_USDT_FUTURES_BASE_URL,
    coin_futures: e.BINANCE_COIN_FUTURES_BASE_URL,
  },
  timeoutMs: e.HTTP_TIMEOUT_MS,

  retry: {
    maxAttempts: e.RETRY_ATTEMPTS,
    baseDelayMs: e.RETRY_BASE_MS,
    maxDelayMs: e.RETRY_MAX_MS,
  },
} as const;
