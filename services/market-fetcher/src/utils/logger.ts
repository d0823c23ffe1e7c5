import pino from 'pino';
import { cfg } from '../config/index.js';

export const logger = pino({
  name: 'market-fetcher',
  level: cfg.logLevel,
  ...(cfg.logPretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
});
