/**
 * METRICS MODULE — Types
 */

import type { TeamSide } from '../../matches/contracts/match.types.js';

export interface SideSignals {
  xg: number;
  momentum: number;
  pressure: number;       // 0..1
  winProbability: number; // 0.01..0.95
}

/**
 * Derived per cycle from one MatchSnapshot; never persisted by the core.
 */
export interface DerivedSignals {
  readonly home: Readonly<SideSignals>;
  readonly away: Readonly<SideSignals>;
  readonly drawProbability: number;
}

export interface TeamMetricsView {
  team: string;
  side: TeamSide;
  score: number;
  opponentScore: number;
  xg: number;
  momentum: number;
  pressureIndex: number;
  winProbability: number;
  possession: number;
  shots: number;
  shotsOnTarget: number;
}
