/**
 * API-Football HTTP Client
 *
 * ═══════════════════════════════════════════════════════════════
 * Thin transport over API-Football v3:
 *   GET /fixtures?live=all
 *   GET /fixtures/statistics?fixture={id}
 *
 * Every request goes through the provider limiter and a bounded
 * exponential-backoff retry. Failures surface as UpstreamError; the
 * data service decides what to serve instead.
 * ═══════════════════════════════════════════════════════════════
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type Bottleneck from 'bottleneck';
import { UpstreamError } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import { createRateLimiter, RATE_LIMITS } from '../../../common/rate-limiter.js';
import type {
  ApiEnvelope,
  ApiFixtureItem,
  ApiTeamStatistics,
} from '../contracts/match.types.js';

// ============================================
// CONFIGURATION
// ============================================

export interface FootballApiClientConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  maxConcurrent: number;
  minTimeMs: number;
  adapter?: AxiosAdapter;
}

const DEFAULT_CONFIG: FootballApiClientConfig = {
  baseUrl: 'https://v3.football.api-sports.io',
  apiKey: '',
  timeoutMs: 10_000,
  maxRetries: 3,
  retryBaseMs: 500,
  retryMaxMs: 8_000,
  maxConcurrent: RATE_LIMITS.API_FOOTBALL.maxConcurrent,
  minTimeMs: RATE_LIMITS.API_FOOTBALL.minTime,
};

/**
 * What the data service needs from upstream.
 */
export interface FootballDataSource {
  isConfigured(): boolean;
  getLiveFixtures(): Promise<ApiFixtureItem[]>;
  getFixtureStatistics(fixtureId: string): Promise<ApiTeamStatistics[]>;
}

export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** attempt);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function hasErrors(errors: unknown): boolean {
  if (!errors) return false;
  if (Array.isArray(errors)) return errors.length > 0;
  if (typeof errors === 'object') return Object.keys(errors).length > 0;
  return true;
}

/**
 * 429, 5xx and transport failures are worth retrying; other 4xx are not.
 */
export function toUpstreamError(err: unknown, path: string): UpstreamError {
  if (err instanceof UpstreamError) return err;

  if (axios.isAxiosError(err)) {
    const status = err.response?.status ?? null;
    const retryable = status === null || status === 429 || status >= 500;
    return new UpstreamError(`${path}: ${err.message}`, status, retryable);
  }

  return new UpstreamError(`${path}: ${err instanceof Error ? err.message : String(err)}`, null, true);
}

// ============================================
// CLIENT
// ============================================

export class FootballApiClient implements FootballDataSource {
  private readonly client: AxiosInstance;
  private readonly config: FootballApiClientConfig;
  private readonly limiter: Bottleneck;
  private readonly logger: Logger;

  constructor(config: Partial<FootballApiClientConfig> = {}, logger: Logger = defaultLogger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger;

    this.client = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      headers: {
        'x-apisports-key': this.config.apiKey,
        Accept: 'application/json',
      },
      adapter: this.config.adapter,
    });

    this.limiter = createRateLimiter(
      'API_FOOTBALL',
      { maxConcurrent: this.config.maxConcurrent, minTime: this.config.minTimeMs },
      logger,
    );
  }

  isConfigured(): boolean {
    return this.config.apiKey.length > 0;
  }

  async getLiveFixtures(): Promise<ApiFixtureItem[]> {
    return this.get<ApiFixtureItem>('/fixtures', { live: 'all' });
  }

  async getFixtureStatistics(fixtureId: string): Promise<ApiTeamStatistics[]> {
    return this.get<ApiTeamStatistics>('/fixtures/statistics', { fixture: fixtureId });
  }

  // ============================================
  // TRANSPORT
  // ============================================

  private async get<T>(path: string, params: Record<string, string>): Promise<T[]> {
    let lastError: UpstreamError | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        const response = await this.limiter.schedule(() =>
          this.client.get<ApiEnvelope<T>>(path, { params }),
        );

        const body = response.data;
        if (hasErrors(body.errors)) {
          throw new UpstreamError(`${path}: API errors ${JSON.stringify(body.errors)}`, response.status, false);
        }
        return body.response ?? [];
      } catch (err) {
        lastError = toUpstreamError(err, path);
        if (!lastError.retryable || attempt === this.config.maxRetries) break;

        const delay = backoffDelay(attempt, this.config.retryBaseMs, this.config.retryMaxMs);
        this.logger.warn(
          { path, attempt: attempt + 1, delayMs: delay, status: lastError.status, error: lastError.message },
          '[FootballApiClient] Request failed, retrying',
        );
        await sleep(delay);
      }
    }

    throw lastError ?? new UpstreamError(`${path}: request failed`, null, false);
  }
}
