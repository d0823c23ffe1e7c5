import { Registry, Counter, Gauge, Histogram } from 'prom-client';
export const registry = new Registry();

export const binanceRequests = new Counter({
  name: 'binance_requests_total',
  help: 'REST calls to Binance by outcome',
  labelNames: ['venue', 'endpoint', 'status'] as const,
  registers: [registry],
});
export const binanceLatency = new Histogram({
  name: 'binance_request_duration_seconds',
  help: 'Binance REST latency',
  labelNames: ['venue', 'endpoint'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});
export const binanceUsedWeight = new Gauge({
  name: 'binance_used_weight_1m',
  help: 'Last x-mbx-used-weight-1m seen',
  labelNames: ['venue'] as const,
  registers: [registry],
});
