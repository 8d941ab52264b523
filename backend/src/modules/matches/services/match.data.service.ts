/**
 * MATCH DATA SERVICE
 * ==================
 *
 * fetchCurrentMatches():
 *   1. list live fixtures (fresh every call)
 *   2. per fixture, statistics from the TTL cache or upstream (batched,
 *      limiter-bound)
 *   3. statistics failure -> last known statistics (CACHE) or estimated
 *      placeholder (FALLBACK)
 *   4. fixture list failure -> last known snapshots (CACHE)
 *
 * Never throws.
 */

import { systemClock, type Clock } from '../../../common/clock.js';
import { errorMessage } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import { TtlCache, type TtlCacheStats } from '../../../common/ttl-cache.js';
import type { FootballDataSource } from '../clients/football-api.client.js';
import {
  FINISHED_STATUSES,
  LIVE_STATUSES,
  SCHEDULED_STATUSES,
  type ApiFixtureItem,
  type ApiTeamStatistics,
  type MatchSnapshot,
  type MatchSnapshotSource,
} from '../contracts/match.types.js';
import { fallbackSnapshot } from './match.fallback.js';
import { fixtureIdOf, mapFixture, statusOf } from './match.mapper.js';
import { withSource } from './snapshot.builder.js';

export interface CacheTtlConfig {
  liveMs: number;
  finishedMs: number;
  scheduledMs: number;
  defaultMs: number;
}

export interface MatchDataServiceOptions {
  ttl?: Partial<CacheTtlConfig>;
  batchSize?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface MatchDataStats {
  cache: TtlCacheStats;
  lastKnownFixtures: number;
  lastFetchAt: number | null;
  lastFetchError: string | null;
  sources: Record<MatchSnapshot['source'], number>;
}

const DEFAULT_TTL: CacheTtlConfig = {
  liveMs: 60_000,
  finishedMs: 300_000,
  scheduledMs: 600_000,
  defaultMs: 300_000,
};

const DEFAULT_BATCH_SIZE = 15;

export class MatchDataService implements MatchSnapshotSource {
  private readonly statsCache: TtlCache<ApiTeamStatistics[]>;
  private readonly lastKnownStats = new Map<string, ApiTeamStatistics[]>();
  private readonly lastKnownSnapshots = new Map<string, MatchSnapshot>();
  private readonly ttl: CacheTtlConfig;
  private readonly batchSize: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private lastFetchAt: number | null = null;
  private lastFetchError: string | null = null;
  private sourceCounts: Record<MatchSnapshot['source'], number> = { LIVE: 0, CACHE: 0, FALLBACK: 0 };
  private warnedUnconfigured = false;

  constructor(private readonly api: FootballDataSource, options: MatchDataServiceOptions = {}) {
    this.ttl = { ...DEFAULT_TTL, ...options.ttl };
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.statsCache = new TtlCache<ApiTeamStatistics[]>(this.ttl.defaultMs, this.clock);
  }

  async fetchCurrentMatches(): Promise<MatchSnapshot[]> {
    if (!this.api.isConfigured()) {
      if (!this.warnedUnconfigured) {
        this.logger.warn({}, '[MatchData] Football API key not configured, no live data');
        this.warnedUnconfigured = true;
      }
      return [];
    }

    let fixtures: ApiFixtureItem[];
    try {
      fixtures = await this.api.getLiveFixtures();
      this.lastFetchError = null;
    } catch (err) {
      this.lastFetchError = errorMessage(err);
      this.logger.error(
        { error: this.lastFetchError, fallbackFixtures: this.lastKnownSnapshots.size },
        '[MatchData] Fixture list unavailable, serving last known snapshots',
      );
      return [...this.lastKnownSnapshots.values()].map((s) => withSource(s, 'CACHE'));
    }

    const capturedAt = this.clock.now();
    this.lastFetchAt = capturedAt;

    const snapshots: MatchSnapshot[] = [];
    const valid = fixtures.filter((f) => fixtureIdOf(f) !== null);

    for (let i = 0; i < valid.length; i += this.batchSize) {
      const batch = valid.slice(i, i + this.batchSize);
      snapshots.push(...(await Promise.all(batch.map((item) => this.buildSnapshot(item, capturedAt)))));
    }

    this.lastKnownSnapshots.clear();
    for (const snapshot of snapshots) {
      this.lastKnownSnapshots.set(snapshot.fixtureId, snapshot);
      this.sourceCounts[snapshot.source]++;
    }

    return snapshots;
  }

  /**
   * Cache TTL tier by fixture status.
   */
  ttlFor(status: string): number {
    const s = status.toUpperCase();
    if (LIVE_STATUSES.has(s)) return this.ttl.liveMs;
    if (FINISHED_STATUSES.has(s)) return this.ttl.finishedMs;
    if (SCHEDULED_STATUSES.has(s)) return this.ttl.scheduledMs;
    return this.ttl.defaultMs;
  }

  getLastKnown(fixtureId: string): MatchSnapshot | null {
    return this.lastKnownSnapshots.get(fixtureId) ?? null;
  }

  /**
   * Drops expired statistics and stale fallbacks of fixtures that left
   * the live list.
   */
  cleanupExpired(): number {
    const pruned = this.statsCache.prune();
    let dropped = 0;
    for (const fixtureId of [...this.lastKnownStats.keys()]) {
      if (!this.lastKnownSnapshots.has(fixtureId)) {
        this.lastKnownStats.delete(fixtureId);
        dropped++;
      }
    }
    if (pruned + dropped > 0) {
      this.logger.debug?.({ pruned, dropped }, '[MatchData] Cache cleanup');
    }
    return pruned + dropped;
  }

  stats(): MatchDataStats {
    return {
      cache: this.statsCache.stats(),
      lastKnownFixtures: this.lastKnownSnapshots.size,
      lastFetchAt: this.lastFetchAt,
      lastFetchError: this.lastFetchError,
      sources: { ...this.sourceCounts },
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private async buildSnapshot(item: ApiFixtureItem, capturedAt: number): Promise<MatchSnapshot> {
    const fixtureId = fixtureIdOf(item) ?? '';

    const cached = this.statsCache.get(fixtureId);
    if (cached) {
      return mapFixture(item, cached, capturedAt, 'CACHE');
    }

    try {
      const statistics = await this.api.getFixtureStatistics(fixtureId);
      if (statistics.length === 0) {
        // Not published yet, or withdrawn upstream mid-match
        const stale = this.lastKnownStats.get(fixtureId);
        return stale ? mapFixture(item, stale, capturedAt, 'CACHE') : fallbackSnapshot(item, capturedAt);
      }
      this.statsCache.set(fixtureId, statistics, this.ttlFor(statusOf(item)));
      this.lastKnownStats.set(fixtureId, statistics);
      return mapFixture(item, statistics, capturedAt, 'LIVE');
    } catch (err) {
      const stale = this.lastKnownStats.get(fixtureId);
      this.logger.warn(
        { fixtureId, error: errorMessage(err), fallback: stale ? 'CACHE' : 'FALLBACK' },
        '[MatchData] Statistics unavailable',
      );
      return stale
        ? mapFixture(item, stale, capturedAt, 'CACHE')
        : fallbackSnapshot(item, capturedAt);
    }
  }
}
