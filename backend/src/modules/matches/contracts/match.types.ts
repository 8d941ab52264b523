/**
 * MATCHES MODULE — Types
 * ======================
 *
 * MatchSnapshot is the immutable per-cycle view of one fixture. A newer
 * cycle supersedes it; nothing mutates it.
 */

export type TeamSide = 'home' | 'away';

export type SnapshotSource =
  | 'LIVE'      // fresh upstream data
  | 'CACHE'     // served from the TTL cache or last known good
  | 'FALLBACK'; // placeholder with estimated stats

export interface TeamStats {
  shots: number;
  shotsOnTarget: number;
  possession: number; // percent, 0..100
  corners: number;
  fouls: number;
  yellowCards: number;
  redCards: number;
}

export interface MatchSnapshot {
  readonly fixtureId: string;
  readonly homeTeam: string;
  readonly awayTeam: string;
  readonly homeScore: number;
  readonly awayScore: number;
  readonly elapsed: number;
  readonly league: string;
  readonly status: string;
  readonly stats: Readonly<Record<TeamSide, Readonly<TeamStats>>>;
  readonly capturedAt: number;
  readonly source: SnapshotSource;
}

export interface SnapshotInput {
  fixtureId: string | number;
  homeTeam?: string | null;
  awayTeam?: string | null;
  homeScore?: number | null;
  awayScore?: number | null;
  elapsed?: number | null;
  league?: string | null;
  status?: string | null;
  stats?: Partial<Record<TeamSide, Partial<TeamStats>>>;
  capturedAt: number;
  source?: SnapshotSource;
}

/**
 * Snapshot provider consumed by the orchestrator. May serve cached or
 * placeholder snapshots; must not throw on transient upstream failure.
 */
export interface MatchSnapshotSource {
  fetchCurrentMatches(): Promise<MatchSnapshot[]>;
}

// ═══════════════════════════════════════════════════════════════
// FIXTURE STATUS CODES (API-Football short codes)
// ═══════════════════════════════════════════════════════════════

export const LIVE_STATUSES: ReadonlySet<string> = new Set(['1H', 'HT', '2H', 'ET', 'BT', 'P', 'LIVE', 'INT']);
export const FINISHED_STATUSES: ReadonlySet<string> = new Set(['FT', 'AET', 'PEN']);
export const SCHEDULED_STATUSES: ReadonlySet<string> = new Set(['NS', 'TBD', 'PST']);

// ═══════════════════════════════════════════════════════════════
// UPSTREAM PAYLOADS (subset of API-Football v3 actually read)
// ═══════════════════════════════════════════════════════════════

export interface ApiFixtureItem {
  fixture?: {
    id?: number | null;
    date?: string | null;
    status?: {
      short?: string | null;
      elapsed?: number | null;
    } | null;
  } | null;
  league?: {
    id?: number | null;
    name?: string | null;
  } | null;
  teams?: {
    home?: { id?: number | null; name?: string | null } | null;
    away?: { id?: number | null; name?: string | null } | null;
  } | null;
  goals?: {
    home?: number | null;
    away?: number | null;
  } | null;
}

export interface ApiStatisticEntry {
  type: string;
  value: number | string | null;
}

export interface ApiTeamStatistics {
  team?: { id?: number | null; name?: string | null } | null;
  statistics?: ApiStatisticEntry[] | null;
}

export interface ApiEnvelope<T> {
  response?: T[] | null;
  errors?: unknown;
  results?: number;
}
