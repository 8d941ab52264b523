/**
 * API-Football payload -> MatchSnapshot
 */

import type {
  ApiFixtureItem,
  ApiStatisticEntry,
  ApiTeamStatistics,
  MatchSnapshot,
  SnapshotSource,
  TeamSide,
  TeamStats,
} from '../contracts/match.types.js';
import { createSnapshot } from './snapshot.builder.js';

const STAT_FIELDS: Readonly<Record<string, keyof TeamStats>> = {
  'Total Shots': 'shots',
  'Shots on Goal': 'shotsOnTarget',
  'Ball Possession': 'possession',
  'Corner Kicks': 'corners',
  'Fouls': 'fouls',
  'Yellow Cards': 'yellowCards',
  'Red Cards': 'redCards',
};

/**
 * "58%" -> 58, 7 -> 7, null/garbage -> undefined
 */
export function parseStatValue(value: ApiStatisticEntry['value']): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string') {
    const n = Number.parseFloat(value.replace('%', '').trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function parseTeamStatistics(entries: readonly ApiStatisticEntry[] | null | undefined): Partial<TeamStats> {
  const stats: Partial<TeamStats> = {};
  for (const entry of entries ?? []) {
    const field = STAT_FIELDS[entry.type];
    if (!field) continue;
    const value = parseStatValue(entry.value);
    if (value !== undefined) stats[field] = value;
  }
  return stats;
}

/**
 * Statistics come as one block per team; match by team id, else by order.
 */
export function splitStatistics(
  item: ApiFixtureItem,
  statistics: readonly ApiTeamStatistics[],
): Partial<Record<TeamSide, Partial<TeamStats>>> {
  const homeId = item.teams?.home?.id;
  const awayId = item.teams?.away?.id;

  const byId = (id: number | null | undefined) =>
    id == null ? undefined : statistics.find((s) => s.team?.id === id);

  const home = byId(homeId) ?? statistics[0];
  const away = byId(awayId) ?? statistics[1];

  return {
    home: home ? parseTeamStatistics(home.statistics) : undefined,
    away: away ? parseTeamStatistics(away.statistics) : undefined,
  };
}

export function fixtureIdOf(item: ApiFixtureItem): string | null {
  const id = item.fixture?.id;
  return typeof id === 'number' && Number.isFinite(id) ? String(id) : null;
}

export function statusOf(item: ApiFixtureItem): string {
  return (item.fixture?.status?.short ?? '').toUpperCase();
}

export function mapFixture(
  item: ApiFixtureItem,
  statistics: readonly ApiTeamStatistics[] | null,
  capturedAt: number,
  source: SnapshotSource = 'LIVE',
): MatchSnapshot {
  return createSnapshot({
    fixtureId: fixtureIdOf(item) ?? '',
    homeTeam: item.teams?.home?.name,
    awayTeam: item.teams?.away?.name,
    homeScore: item.goals?.home,
    awayScore: item.goals?.away,
    elapsed: item.fixture?.status?.elapsed,
    league: item.league?.name,
    status: item.fixture?.status?.short,
    stats: statistics && statistics.length > 0 ? splitStatistics(item, statistics) : undefined,
    capturedAt,
    source,
  });
}
