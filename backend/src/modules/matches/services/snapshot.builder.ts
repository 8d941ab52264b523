/**
 * Snapshot construction.
 *
 * Missing or malformed upstream fields resolve to safe defaults
 * (0 counts, 50% possession, empty names) instead of raising.
 */

import type {
  MatchSnapshot,
  SnapshotInput,
  TeamSide,
  TeamStats,
} from '../contracts/match.types.js';

export const DEFAULT_TEAM_STATS: Readonly<TeamStats> = Object.freeze({
  shots: 0,
  shotsOnTarget: 0,
  possession: 50,
  corners: 0,
  fouls: 0,
  yellowCards: 0,
  redCards: 0,
});

function count(value: number | null | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

function percent(value: number | null | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 50;
  return Math.min(100, Math.max(0, value));
}

function text(value: string | null | undefined): string {
  return typeof value === 'string' ? value : '';
}

function buildStats(partial: Partial<TeamStats> | undefined): Readonly<TeamStats> {
  if (!partial) return DEFAULT_TEAM_STATS;
  return Object.freeze({
    shots: count(partial.shots),
    shotsOnTarget: count(partial.shotsOnTarget),
    possession: percent(partial.possession),
    corners: count(partial.corners),
    fouls: count(partial.fouls),
    yellowCards: count(partial.yellowCards),
    redCards: count(partial.redCards),
  });
}

export function createSnapshot(input: SnapshotInput): MatchSnapshot {
  const stats: Record<TeamSide, Readonly<TeamStats>> = {
    home: buildStats(input.stats?.home),
    away: buildStats(input.stats?.away),
  };

  return Object.freeze({
    fixtureId: String(input.fixtureId),
    homeTeam: text(input.homeTeam),
    awayTeam: text(input.awayTeam),
    homeScore: count(input.homeScore),
    awayScore: count(input.awayScore),
    elapsed: count(input.elapsed),
    league: text(input.league),
    status: text(input.status).toUpperCase(),
    stats: Object.freeze(stats),
    capturedAt: input.capturedAt,
    source: input.source ?? 'LIVE',
  });
}

/**
 * Same snapshot, re-labelled (e.g. served from cache).
 */
export function withSource(snapshot: MatchSnapshot, source: MatchSnapshot['source']): MatchSnapshot {
  if (snapshot.source === source) return snapshot;
  return Object.freeze({ ...snapshot, source });
}

export function scoreOf(snapshot: MatchSnapshot, side: TeamSide): number {
  return side === 'home' ? snapshot.homeScore : snapshot.awayScore;
}

export function teamNameOf(snapshot: MatchSnapshot, side: TeamSide): string {
  return side === 'home' ? snapshot.homeTeam : snapshot.awayTeam;
}

/**
 * Case-insensitive substring match against the home name; anything that
 * does not match home resolves to away.
 */
export function resolveSide(snapshot: Pick<MatchSnapshot, 'homeTeam'>, team: string): TeamSide {
  return snapshot.homeTeam.toLowerCase().includes(team.toLowerCase()) ? 'home' : 'away';
}
