/**
 * METRICS CALCULATOR
 * ==================
 *
 * Raw snapshot -> derived signals (xG, momentum, pressure index,
 * win/draw probabilities). Pure and deterministic: no clock, no state,
 * degenerate input still yields finite numbers.
 */

import type { MatchSnapshot, TeamSide } from '../matches/contracts/match.types.js';
import { resolveSide, scoreOf, teamNameOf } from '../matches/services/snapshot.builder.js';
import type { DerivedSignals, SideSignals, TeamMetricsView } from './contracts/metrics.types.js';
import { DEFAULT_LEAGUE_WEIGHT, LEAGUE_WEIGHTS, METRICS_POLICY } from './metrics.policy.js';

const { xg: XG, momentum: MOMENTUM, pressure: PRESSURE, probability: PROB } = METRICS_POLICY;

function finite(value: number, fallback = 0): number {
  return Number.isFinite(value) ? value : fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function leagueWeight(league: string): number {
  return LEAGUE_WEIGHTS[league] ?? DEFAULT_LEAGUE_WEIGHT;
}

// ═══════════════════════════════════════════════════════════════
// INDIVIDUAL SIGNALS
// ═══════════════════════════════════════════════════════════════

export function expectedGoals(snapshot: MatchSnapshot, side: TeamSide): number {
  const stats = snapshot.stats[side];
  const xg = stats.shotsOnTarget * XG.shotOnTarget + (stats.possession - 50) * XG.possessionAdvantage;
  return Math.max(0, finite(xg));
}

export function momentum(snapshot: MatchSnapshot, side: TeamSide): number {
  const score = scoreOf(snapshot, side);
  const opponent = scoreOf(snapshot, side === 'home' ? 'away' : 'home');
  const possession = snapshot.stats[side].possession;

  const timeMultiplier = Math.min(MOMENTUM.maxTimeMultiplier, snapshot.elapsed / MOMENTUM.timeDivisor);
  let value = (score * MOMENTUM.goalWeight + (possession - 50) * MOMENTUM.possessionWeight) * timeMultiplier;

  // Lead bonus only for the side currently ahead
  if (score > opponent) {
    value += (score - opponent) * MOMENTUM.leadBonusPerGoal;
  }

  return finite(value);
}

export function pressureIndex(snapshot: MatchSnapshot, side: TeamSide): number {
  const score = scoreOf(snapshot, side);
  const opponent = scoreOf(snapshot, side === 'home' ? 'away' : 'home');
  const timePressure = Math.min(1, snapshot.elapsed / PRESSURE.regulationMinutes);

  let value: number;
  if (score === opponent) {
    value = PRESSURE.tied;
  } else if (score < opponent) {
    value = PRESSURE.trailingBase + PRESSURE.trailingTimeWeight * timePressure;
  } else {
    value = PRESSURE.leadingBase + PRESSURE.leadingTimeWeight * timePressure;
  }

  return Math.min(1, finite(value * leagueWeight(snapshot.league)));
}

export function outcomeProbabilities(
  snapshot: MatchSnapshot,
  homeXg: number,
  awayXg: number,
): { home: number; away: number; draw: number } {
  const { homeScore, awayScore } = snapshot;

  const [homeBase, awayBase] =
    homeScore > awayScore ? PROB.homeLeading
      : awayScore > homeScore ? PROB.awayLeading
        : PROB.tied;

  const shift = (homeXg - awayXg) * PROB.xgShift;
  const remaining = Math.max(0, PRESSURE.regulationMinutes - snapshot.elapsed);
  const timeFactor = remaining <= PROB.lateGameMinutesRemaining ? PROB.lateTimeFactor : PROB.earlyTimeFactor;

  const homeLeads = homeScore > awayScore ? 1 : 0;
  const awayLeads = awayScore > homeScore ? 1 : 0;

  const home = clamp(finite((homeBase + shift) * (1 - timeFactor) + homeLeads * timeFactor), PROB.min, PROB.max);
  const away = clamp(finite((awayBase - shift) * (1 - timeFactor) + awayLeads * timeFactor), PROB.min, PROB.max);
  const draw = clamp(1 - home - away, PROB.min, PROB.max);

  const total = home + away + draw;
  return {
    home: home / total,
    away: away / total,
    draw: draw / total,
  };
}

// ═══════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════

export function deriveSignals(snapshot: MatchSnapshot): DerivedSignals {
  const homeXg = expectedGoals(snapshot, 'home');
  const awayXg = expectedGoals(snapshot, 'away');
  const probabilities = outcomeProbabilities(snapshot, homeXg, awayXg);

  const home: SideSignals = {
    xg: homeXg,
    momentum: momentum(snapshot, 'home'),
    pressure: pressureIndex(snapshot, 'home'),
    winProbability: probabilities.home,
  };

  const away: SideSignals = {
    xg: awayXg,
    momentum: momentum(snapshot, 'away'),
    pressure: pressureIndex(snapshot, 'away'),
    winProbability: probabilities.away,
  };

  return Object.freeze({
    home: Object.freeze(home),
    away: Object.freeze(away),
    drawProbability: probabilities.draw,
  });
}

/**
 * Per-team view, resolved with the same substring rule as conditions.
 */
export function teamMetrics(
  snapshot: MatchSnapshot,
  signals: DerivedSignals,
  team: string,
): TeamMetricsView {
  const side = resolveSide(snapshot, team);
  const other: TeamSide = side === 'home' ? 'away' : 'home';
  const stats = snapshot.stats[side];

  return {
    team: teamNameOf(snapshot, side) || team,
    side,
    score: scoreOf(snapshot, side),
    opponentScore: scoreOf(snapshot, other),
    xg: signals[side].xg,
    momentum: signals[side].momentum,
    pressureIndex: signals[side].pressure,
    winProbability: signals[side].winProbability,
    possession: stats.possession,
    shots: stats.shots,
    shotsOnTarget: stats.shotsOnTarget,
  };
}

export const metricsCalculator = {
  derive: deriveSignals,
  teamMetrics,
};
