/**
 * Metrics Policy — heuristic constants
 *
 * Changing any value here changes golden outputs of MetricsCalculator.
 */

export const METRICS_POLICY = {
  xg: {
    shotOnTarget: 0.25,
    possessionAdvantage: 0.02,
  },

  momentum: {
    goalWeight: 10,
    possessionWeight: 0.5,
    timeDivisor: 45,
    maxTimeMultiplier: 2.0,
    leadBonusPerGoal: 5,
  },

  pressure: {
    tied: 0.8,
    trailingBase: 0.9,
    trailingTimeWeight: 0.1,
    leadingBase: 0.3,
    leadingTimeWeight: 0.4,
    regulationMinutes: 90,
  },

  probability: {
    // [home, away, draw]
    homeLeading: [0.7, 0.1, 0.2] as const,
    awayLeading: [0.1, 0.7, 0.2] as const,
    tied: [0.3, 0.3, 0.4] as const,
    xgShift: 0.1,
    lateGameMinutesRemaining: 10,
    lateTimeFactor: 0.8,
    earlyTimeFactor: 0.3,
    min: 0.01,
    max: 0.95,
  },
} as const;

export const DEFAULT_LEAGUE_WEIGHT = 1.0;

export const LEAGUE_WEIGHTS: Readonly<Record<string, number>> = {
  'Premier League': 1.0,
  'La Liga': 0.95,
  'Bundesliga': 0.92,
  'Serie A': 0.9,
  'Ligue 1': 0.88,
  'Champions League': 1.1,
  'Europa League': 1.05,
};
