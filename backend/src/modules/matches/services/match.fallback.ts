/**
 * Placeholder statistics
 *
 * When statistics are unavailable and nothing is cached, shots and
 * possession are estimated from score and time so derived signals stay
 * meaningful. Snapshots built this way carry source FALLBACK.
 */

import type { ApiFixtureItem, MatchSnapshot, TeamSide, TeamStats } from '../contracts/match.types.js';
import { mapFixture } from './match.mapper.js';
import { createSnapshot } from './snapshot.builder.js';

export function estimateStats(
  homeScore: number,
  awayScore: number,
  elapsed: number,
): Record<TeamSide, Partial<TeamStats>> {
  const diff = homeScore - awayScore;
  const totalShots = Math.max(8, (homeScore + awayScore) * 4 + Math.floor(elapsed / 10));

  const homeRatio = Math.min(1, Math.max(0, 0.5 + diff * 0.1));
  const homeShots = Math.floor(totalShots * homeRatio);
  const awayShots = totalShots - homeShots;

  const homePossession = elapsed > 0 ? Math.min(100, Math.max(0, 50 + diff * 5)) : 50;

  return {
    home: {
      shots: homeShots,
      shotsOnTarget: Math.max(homeScore, Math.floor(homeShots / 3)),
      possession: homePossession,
    },
    away: {
      shots: awayShots,
      shotsOnTarget: Math.max(awayScore, Math.floor(awayShots / 3)),
      possession: 100 - homePossession,
    },
  };
}

export function fallbackSnapshot(item: ApiFixtureItem, capturedAt: number): MatchSnapshot {
  const base = mapFixture(item, null, capturedAt, 'FALLBACK');
  return createSnapshot({
    ...base,
    stats: estimateStats(base.homeScore, base.awayScore, base.elapsed),
  });
}
