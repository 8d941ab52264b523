import { describe, it, expect } from 'vitest';
import type { ApiFixtureItem, ApiTeamStatistics } from '../contracts/match.types.js';
import { estimateStats, fallbackSnapshot } from '../services/match.fallback.js';
import { mapFixture, parseStatValue, parseTeamStatistics } from '../services/match.mapper.js';
import { createSnapshot, resolveSide } from '../services/snapshot.builder.js';

const fixture: ApiFixtureItem = {
  fixture: { id: 101, status: { short: '2H', elapsed: 70 } },
  league: { id: 39, name: 'Premier League' },
  teams: { home: { id: 42, name: 'Arsenal' }, away: { id: 49, name: 'Chelsea' } },
  goals: { home: 2, away: 0 },
};

const statistics: ApiTeamStatistics[] = [
  {
    team: { id: 49, name: 'Chelsea' },
    statistics: [
      { type: 'Ball Possession', value: '42%' },
      { type: 'Shots on Goal', value: 2 },
    ],
  },
  {
    team: { id: 42, name: 'Arsenal' },
    statistics: [
      { type: 'Ball Possession', value: '58%' },
      { type: 'Shots on Goal', value: 6 },
      { type: 'Total Shots', value: 14 },
      { type: 'Yellow Cards', value: null },
      { type: 'Passes %', value: '80%' },
    ],
  },
];

describe('match mapper', () => {
  it('parses numeric and percent values', () => {
    expect(parseStatValue('58%')).toBe(58);
    expect(parseStatValue(7)).toBe(7);
    expect(parseStatValue(null)).toBeUndefined();
    expect(parseStatValue('n/a')).toBeUndefined();
  });

  it('keeps only known statistic types', () => {
    expect(parseTeamStatistics(statistics[1]?.statistics)).toEqual({
      possession: 58,
      shotsOnTarget: 6,
      shots: 14,
    });
  });

  it('maps a fixture, matching statistics by team id', () => {
    const snapshot = mapFixture(fixture, statistics, 5_000);

    expect(snapshot).toMatchObject({
      fixtureId: '101',
      homeTeam: 'Arsenal',
      awayTeam: 'Chelsea',
      homeScore: 2,
      awayScore: 0,
      elapsed: 70,
      league: 'Premier League',
      status: '2H',
      capturedAt: 5_000,
      source: 'LIVE',
    });
    expect(snapshot.stats.home).toEqual({
      shots: 14,
      shotsOnTarget: 6,
      possession: 58,
      corners: 0,
      fouls: 0,
      yellowCards: 0,
      redCards: 0,
    });
    expect(snapshot.stats.away.possession).toBe(42);
  });

  it('resolves missing fields to safe defaults', () => {
    const snapshot = mapFixture({ fixture: { id: 7 } }, null, 0);
    expect(snapshot).toMatchObject({
      fixtureId: '7',
      homeTeam: '',
      awayTeam: '',
      homeScore: 0,
      awayScore: 0,
      elapsed: 0,
      status: '',
    });
    expect(snapshot.stats.home.possession).toBe(50);
  });
});

describe('snapshot builder', () => {
  it('clamps and floors raw values and freezes the result', () => {
    const snapshot = createSnapshot({
      fixtureId: 1,
      homeScore: -1,
      elapsed: 45.7,
      status: 'ht',
      stats: { home: { possession: 140, shots: Number.NaN } },
      capturedAt: 0,
    });
    expect(snapshot.homeScore).toBe(0);
    expect(snapshot.elapsed).toBe(45);
    expect(snapshot.status).toBe('HT');
    expect(snapshot.stats.home.possession).toBe(100);
    expect(snapshot.stats.home.shots).toBe(0);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('resolves sides by home-name substring', () => {
    const snapshot = createSnapshot({ fixtureId: 1, homeTeam: 'Manchester United', awayTeam: 'Manchester City', capturedAt: 0 });
    expect(resolveSide(snapshot, 'united')).toBe('home');
    expect(resolveSide(snapshot, 'City')).toBe('away');
    expect(resolveSide(snapshot, 'Liverpool')).toBe('away');
  });
});

describe('match fallback', () => {
  it('estimates shots and possession from score and time', () => {
    expect(estimateStats(2, 0, 70)).toEqual({
      home: { shots: 10, shotsOnTarget: 3, possession: 60 },
      away: { shots: 5, shotsOnTarget: 1, possession: 40 },
    });
  });

  it('uses an even split before kick-off', () => {
    expect(estimateStats(0, 0, 0)).toEqual({
      home: { shots: 4, shotsOnTarget: 1, possession: 50 },
      away: { shots: 4, shotsOnTarget: 1, possession: 50 },
    });
  });

  it('labels placeholder snapshots as FALLBACK', () => {
    const snapshot = fallbackSnapshot(fixture, 1_000);
    expect(snapshot.source).toBe('FALLBACK');
    expect(snapshot.stats.home.shotsOnTarget).toBe(3);
    expect(snapshot.stats.home.possession).toBe(60);
  });
});
