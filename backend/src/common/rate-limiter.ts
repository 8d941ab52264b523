/**
 * Upstream rate limiting
 *
 * One Bottleneck per provider: `maxConcurrent` bounds in-flight requests,
 * `minTime` spaces them out.
 */

import Bottleneck from 'bottleneck';
import { defaultLogger, type Logger } from './logger.js';

export type RateLimitConfig = {
  minTime: number;      // ms between requests
  maxConcurrent: number;
  reservoir?: number;   // max requests per refresh interval
  reservoirRefreshInterval?: number;
};

export const RATE_LIMITS: Record<'API_FOOTBALL' | 'TWILIO' | 'DEFAULT', RateLimitConfig> = {
  API_FOOTBALL: {
    minTime: 100,
    maxConcurrent: 5,
  },
  TWILIO: {
    minTime: 1000,       // 1 msg/sec per sender number
    maxConcurrent: 1,
  },
  DEFAULT: {
    minTime: 300,
    maxConcurrent: 1,
  },
};

export function createRateLimiter(provider: string, config: RateLimitConfig, logger: Logger = defaultLogger): Bottleneck {
  const limiter = new Bottleneck({
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
    reservoir: config.reservoir,
    reservoirRefreshInterval: config.reservoirRefreshInterval,
  });

  limiter.on('depleted', () => {
    logger.warn({ provider }, '[RateLimiter] Reservoir depleted, waiting');
  });

  limiter.on('error', (err: unknown) => {
    logger.error({ provider, error: err instanceof Error ? err.message : String(err) }, '[RateLimiter] Limiter error');
  });

  return limiter;
}
