/**
 * Pattern scans
 *
 * Six independent, order-sensitive scans over one fixture's event buffer
 * (oldest first). Pure: same buffer, same patterns.
 *
 * Goal and card events carry running totals and repeat every cycle, so
 * their scans only look at the first sighting of each total and key
 * patterns on those totals. Sample scans key on sequence numbers.
 */

import type { TeamSide } from '../../matches/contracts/match.types.js';
import type {
  GamePattern,
  PatternEvent,
  PatternEventKind,
} from '../contracts/pattern.types.js';
import { PATTERN_POLICY } from '../pattern.policy.js';

const SIDES: readonly TeamSide[] = ['home', 'away'];

function isCard(e: PatternEvent): boolean {
  return e.kind === 'yellow_card' || e.kind === 'red_card';
}

function seqs(events: readonly PatternEvent[]): string {
  return events.map((e) => e.seq).join('-');
}

function countKey(e: PatternEvent): string {
  return `${e.side}.${e.kind}.${e.value}`;
}

function counts(events: readonly PatternEvent[]): string {
  return events.map(countKey).join('-');
}

function firstSightings(events: readonly PatternEvent[], keep: (e: PatternEvent) => boolean): PatternEvent[] {
  const seen = new Set<string>();
  return events.filter((e) => {
    if (!keep(e)) return false;
    const key = countKey(e);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function isGoal(e: PatternEvent): boolean {
  return e.kind === 'goal';
}

function span(events: readonly PatternEvent[]): { startTime: number; endTime: number } {
  const first = events[0];
  const last = events[events.length - 1];
  return {
    startTime: first ? first.timestamp : 0,
    endTime: last ? last.timestamp : 0,
  };
}

// ═══════════════════════════════════════════════════════════════
// EVENT SEQUENCES
// ═══════════════════════════════════════════════════════════════

export function scanGoalSequences(fixtureId: string, events: readonly PatternEvent[]): GamePattern[] {
  const { maxGapSeconds, highGapSeconds, confidence } = PATTERN_POLICY.goalSequence;
  const goals = firstSightings(events, isGoal);
  const patterns: GamePattern[] = [];

  for (let i = 0; i + 1 < goals.length; i++) {
    const first = goals[i];
    const second = goals[i + 1];
    if (!first || !second) continue;

    const gap = (second.timestamp - first.timestamp) / 1000;
    if (gap > maxGapSeconds) continue;

    const pair = [first, second];
    patterns.push({
      patternId: `goal_sequence:${fixtureId}:${counts(pair)}`,
      fixtureId,
      type: 'goal_sequence',
      name: 'Rapid Goal Sequence',
      description: `Two goals within ${(gap / 60).toFixed(1)} minutes`,
      severity: gap <= highGapSeconds ? 'high' : 'medium',
      confidence,
      events: pair,
      ...span(pair),
      metadata: { timeGapSeconds: gap },
    });
  }

  return patterns;
}

export function scanCardSequences(fixtureId: string, events: readonly PatternEvent[]): GamePattern[] {
  const { windowSize, maxSpanSeconds, confidence } = PATTERN_POLICY.cardSequence;
  const cards = firstSightings(events, isCard);
  const patterns: GamePattern[] = [];

  for (let i = 0; i + windowSize <= cards.length; i++) {
    const window = cards.slice(i, i + windowSize);
    const { startTime, endTime } = span(window);
    const spanSeconds = (endTime - startTime) / 1000;
    if (spanSeconds > maxSpanSeconds) continue;

    patterns.push({
      patternId: `card_sequence:${fixtureId}:${counts(window)}`,
      fixtureId,
      type: 'card_sequence',
      name: 'Aggressive Play Pattern',
      description: `Three cards within ${(spanSeconds / 60).toFixed(1)} minutes`,
      severity: 'medium',
      confidence,
      events: window,
      startTime,
      endTime,
      metadata: { timeGapSeconds: spanSeconds },
    });
  }

  return patterns;
}

// ═══════════════════════════════════════════════════════════════
// SAMPLE WINDOWS
// ═══════════════════════════════════════════════════════════════

interface SideWindow {
  side: TeamSide;
  samples: PatternEvent[];
  delta: number; // latest - earliest, 0 with fewer than 2 samples
}

function sideWindows(events: readonly PatternEvent[], kind: PatternEventKind, size: number): SideWindow[] {
  return SIDES.map((side) => {
    const samples = events.filter((e) => e.kind === kind && e.side === side).slice(-size);
    const first = samples[0];
    const last = samples[samples.length - 1];
    const delta = samples.length >= 2 && first && last ? last.value - first.value : 0;
    return { side, samples, delta };
  });
}

function bySeq(windows: readonly SideWindow[]): PatternEvent[] {
  return windows.flatMap((w) => w.samples).sort((a, b) => a.seq - b.seq);
}

function deltaOf(windows: readonly SideWindow[], side: TeamSide): number {
  return Math.abs(windows.find((w) => w.side === side)?.delta ?? 0);
}

export function scanPossessionSwings(fixtureId: string, events: readonly PatternEvent[]): GamePattern[] {
  const { sampleWindow, threshold, confidence } = PATTERN_POLICY.possessionSwing;
  const windows = sideWindows(events, 'possession', sampleWindow);
  const homeSwing = deltaOf(windows, 'home');
  const awaySwing = deltaOf(windows, 'away');

  if (homeSwing <= threshold && awaySwing <= threshold) return [];

  const samples = bySeq(windows);
  return [{
    patternId: `possession_swing:${fixtureId}:${seqs(samples)}`,
    fixtureId,
    type: 'possession_swing',
    name: 'Significant Possession Swing',
    description: `Possession changed by ${Math.max(homeSwing, awaySwing).toFixed(1)}%`,
    severity: 'medium',
    confidence,
    events: samples,
    ...span(samples),
    metadata: { homeSwing, awaySwing },
  }];
}

export function scanMomentumShifts(fixtureId: string, events: readonly PatternEvent[]): GamePattern[] {
  const { sampleWindow, threshold, confidence } = PATTERN_POLICY.momentumShift;
  const windows = sideWindows(events, 'momentum', sampleWindow);
  const homeShift = deltaOf(windows, 'home');
  const awayShift = deltaOf(windows, 'away');

  if (homeShift <= threshold && awayShift <= threshold) return [];

  const samples = bySeq(windows);
  return [{
    patternId: `momentum_shift:${fixtureId}:${seqs(samples)}`,
    fixtureId,
    type: 'momentum_shift',
    name: 'Momentum Shift',
    description: `Momentum changed by ${Math.max(homeShift, awayShift).toFixed(1)} points`,
    severity: 'high',
    confidence,
    events: samples,
    ...span(samples),
    metadata: { homeShift, awayShift },
  }];
}

export function scanPressureBuildups(fixtureId: string, events: readonly PatternEvent[]): GamePattern[] {
  const { sampleWindow, threshold, confidence } = PATTERN_POLICY.pressureBuildup;
  const windows = sideWindows(events, 'pressure', sampleWindow);

  const sustained = (side: TeamSide): boolean => {
    const samples = windows.find((w) => w.side === side)?.samples ?? [];
    return samples.length >= sampleWindow && samples.every((e) => e.value > threshold);
  };

  const homeHigh = sustained('home');
  const awayHigh = sustained('away');
  if (!homeHigh && !awayHigh) return [];

  const samples = bySeq(windows);
  return [{
    patternId: `pressure_buildup:${fixtureId}:${seqs(samples)}`,
    fixtureId,
    type: 'pressure_buildup',
    name: 'High Pressure Buildup',
    description: 'Sustained high pressure detected',
    severity: 'medium',
    confidence,
    events: samples,
    ...span(samples),
    metadata: { homeHigh, awayHigh },
  }];
}

// ═══════════════════════════════════════════════════════════════
// MATCH-MINUTE PATTERNS
// ═══════════════════════════════════════════════════════════════

export function scanTimeBasedPatterns(fixtureId: string, events: readonly PatternEvent[]): GamePattern[] {
  const { lateMinute, earlyMinute, minEvents, lateConfidence, earlyConfidence } = PATTERN_POLICY.timeBased;
  const patterns: GamePattern[] = [];

  const lateGoals = firstSightings(events, isGoal).filter((e) => e.matchMinute >= lateMinute);
  if (lateGoals.length >= minEvents) {
    patterns.push({
      patternId: `late_goals:${fixtureId}:${counts(lateGoals)}`,
      fixtureId,
      type: 'time_based_pattern',
      name: 'Late Goal Pattern',
      description: 'Multiple goals in final 10 minutes',
      severity: 'high',
      confidence: lateConfidence,
      events: lateGoals,
      ...span(lateGoals),
      metadata: { timePeriod: 'late' },
    });
  }

  const earlyCards = firstSightings(events, isCard).filter((e) => e.matchMinute <= earlyMinute);
  if (earlyCards.length >= minEvents) {
    patterns.push({
      patternId: `early_cards:${fixtureId}:${counts(earlyCards)}`,
      fixtureId,
      type: 'time_based_pattern',
      name: 'Early Aggression Pattern',
      description: `Multiple cards in first ${earlyMinute} minutes`,
      severity: 'medium',
      confidence: earlyConfidence,
      events: earlyCards,
      ...span(earlyCards),
      metadata: { timePeriod: 'early' },
    });
  }

  return patterns;
}

export const PATTERN_SCANS = [
  scanGoalSequences,
  scanCardSequences,
  scanPossessionSwings,
  scanMomentumShifts,
  scanPressureBuildups,
  scanTimeBasedPatterns,
] as const;
