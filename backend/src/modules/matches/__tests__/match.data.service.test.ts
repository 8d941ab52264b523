import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ManualClock } from '../../../common/clock.js';
import { UpstreamError } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import type { FootballDataSource } from '../clients/football-api.client.js';
import type { ApiFixtureItem, ApiTeamStatistics } from '../contracts/match.types.js';
import { MatchDataService } from '../services/match.data.service.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

function fixture(id: number, status = '2H'): ApiFixtureItem {
  return {
    fixture: { id, status: { short: status, elapsed: 70 } },
    league: { name: 'Premier League' },
    teams: { home: { id: 1, name: 'Arsenal' }, away: { id: 2, name: 'Chelsea' } },
    goals: { home: 2, away: 0 },
  };
}

const STATS: ApiTeamStatistics[] = [
  { team: { id: 1 }, statistics: [{ type: 'Shots on Goal', value: 6 }, { type: 'Ball Possession', value: '58%' }] },
  { team: { id: 2 }, statistics: [{ type: 'Shots on Goal', value: 2 }, { type: 'Ball Possession', value: '42%' }] },
];

class FakeFootballSource implements FootballDataSource {
  configured = true;
  fixtures: ApiFixtureItem[] = [fixture(101)];
  listError: Error | null = null;
  statsError: Error | null = null;
  statistics: ApiTeamStatistics[] = STATS;
  statsCalls = 0;

  isConfigured(): boolean {
    return this.configured;
  }

  async getLiveFixtures(): Promise<ApiFixtureItem[]> {
    if (this.listError) throw this.listError;
    return this.fixtures;
  }

  async getFixtureStatistics(): Promise<ApiTeamStatistics[]> {
    this.statsCalls++;
    if (this.statsError) throw this.statsError;
    return this.statistics;
  }
}

describe('MatchDataService', () => {
  let clock: ManualClock;
  let source: FakeFootballSource;
  let service: MatchDataService;

  beforeEach(() => {
    vi.clearAllMocks();
    clock = new ManualClock(1_000_000);
    source = new FakeFootballSource();
    service = new MatchDataService(source, { clock, logger: mockLogger });
  });

  it('builds live snapshots with statistics', async () => {
    const [snapshot] = await service.fetchCurrentMatches();

    expect(snapshot).toMatchObject({ fixtureId: '101', source: 'LIVE', capturedAt: 1_000_000 });
    expect(snapshot?.stats.home.shotsOnTarget).toBe(6);
    expect(snapshot?.stats.home.possession).toBe(58);
    expect(service.getLastKnown('101')).toBe(snapshot);
    expect(service.getLastKnown('999')).toBeNull();
  });

  it('serves statistics from cache inside the live TTL', async () => {
    await service.fetchCurrentMatches();
    clock.advance(30_000);

    const [snapshot] = await service.fetchCurrentMatches();
    expect(snapshot?.source).toBe('CACHE');
    expect(snapshot?.capturedAt).toBe(1_030_000);
    expect(source.statsCalls).toBe(1);

    clock.advance(31_000);
    const [fresh] = await service.fetchCurrentMatches();
    expect(fresh?.source).toBe('LIVE');
    expect(source.statsCalls).toBe(2);
  });

  it('falls back to the last known statistics when upstream fails', async () => {
    await service.fetchCurrentMatches();
    clock.advance(61_000);
    source.statsError = new UpstreamError('/fixtures/statistics: timeout', null, true);

    const [snapshot] = await service.fetchCurrentMatches();
    expect(snapshot?.source).toBe('CACHE');
    expect(snapshot?.stats.home.shotsOnTarget).toBe(6);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ fixtureId: '101', fallback: 'CACHE' }),
      '[MatchData] Statistics unavailable',
    );
  });

  it('estimates statistics when nothing is cached', async () => {
    source.statsError = new Error('boom');

    const [snapshot] = await service.fetchCurrentMatches();
    expect(snapshot?.source).toBe('FALLBACK');
    expect(snapshot?.stats.home.shotsOnTarget).toBe(3);
    expect(snapshot?.stats.home.possession).toBe(60);
  });

  it('estimates statistics when none are published yet', async () => {
    source.statistics = [];
    const [snapshot] = await service.fetchCurrentMatches();
    expect(snapshot?.source).toBe('FALLBACK');
  });

  it('keeps the last known statistics when upstream starts returning none', async () => {
    await service.fetchCurrentMatches();
    clock.advance(61_000);
    source.statistics = [];

    const [snapshot] = await service.fetchCurrentMatches();
    expect(snapshot?.source).toBe('CACHE');
    expect(snapshot?.stats.home.shotsOnTarget).toBe(6);
    expect(source.statsCalls).toBe(2);
  });

  it('serves last known snapshots when the fixture list fails', async () => {
    await service.fetchCurrentMatches();
    source.listError = new UpstreamError('/fixtures: 503', 503, true);

    const snapshots = await service.fetchCurrentMatches();
    expect(snapshots).toHaveLength(1);
    expect(snapshots[0]).toMatchObject({ fixtureId: '101', source: 'CACHE', capturedAt: 1_000_000 });
    expect(service.stats().lastFetchError).toBe('/fixtures: 503');
  });

  it('returns nothing and warns once without an API key', async () => {
    source.configured = false;

    expect(await service.fetchCurrentMatches()).toEqual([]);
    expect(await service.fetchCurrentMatches()).toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it('skips fixtures without an id', async () => {
    source.fixtures = [fixture(101), { fixture: { id: null } }, fixture(102)];
    const snapshots = await service.fetchCurrentMatches();
    expect(snapshots.map((s) => s.fixtureId)).toEqual(['101', '102']);
  });

  it('picks the TTL tier by status', () => {
    expect(service.ttlFor('1H')).toBe(60_000);
    expect(service.ttlFor('ft')).toBe(300_000);
    expect(service.ttlFor('NS')).toBe(600_000);
    expect(service.ttlFor('CANC')).toBe(300_000);
  });

  it('drops expired cache entries on cleanup', async () => {
    source.fixtures = [fixture(101), fixture(102, 'FT')];
    await service.fetchCurrentMatches();

    clock.advance(61_000);
    expect(service.cleanupExpired()).toBe(1);
    expect(service.stats().cache.size).toBe(1);
  });
});
