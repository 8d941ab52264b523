/**
 * PATTERN DETECTOR
 * ================
 *
 * Per-fixture bounded event buffer + six scans per cycle.
 *
 * Patterns are a parallel output stream: they never gate rule firing.
 * The orchestrator owns one instance; all state is keyed by fixture id.
 */

import { systemClock, type Clock } from '../../../common/clock.js';
import { errorMessage } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type { MatchSnapshot, TeamSide } from '../../matches/contracts/match.types.js';
import { scoreOf, teamNameOf } from '../../matches/services/snapshot.builder.js';
import type { DerivedSignals } from '../../metrics/contracts/metrics.types.js';
import {
  PATTERN_SEVERITIES,
  PATTERN_TYPES,
  type GamePattern,
  type PatternAlertConfig,
  type PatternDetectorStats,
  type PatternEvent,
  type PatternEventKind,
  type PatternSeverity,
  type PatternType,
} from '../contracts/pattern.types.js';
import { PATTERN_POLICY } from '../pattern.policy.js';
import { RingBuffer } from './event.buffer.js';
import { PATTERN_SCANS } from './pattern.scans.js';

export interface PatternDetectorOptions {
  bufferSize?: number;
  retentionMs?: number;
  /** Broadcast threshold per pattern type; see configurePatternAlert */
  alerts?: Partial<Record<PatternType, PatternSeverity>>;
  clock?: Clock;
  logger?: Logger;
}

interface FixtureState {
  buffer: RingBuffer<PatternEvent>;
  lastCapturedAt: number;
  nextSeq: number;
  patterns: GamePattern[];
}

const SIDES: readonly TeamSide[] = ['home', 'away'];

function severityRank(severity: PatternSeverity): number {
  return PATTERN_SEVERITIES.indexOf(severity);
}

export class PatternDetector {
  private readonly fixtures = new Map<string, FixtureState>();
  private readonly alertConfig = new Map<PatternType, PatternAlertConfig>();
  private readonly bufferSize: number;
  private readonly retentionMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: PatternDetectorOptions = {}) {
    this.bufferSize = options.bufferSize ?? PATTERN_POLICY.bufferSize;
    this.retentionMs = options.retentionMs ?? PATTERN_POLICY.retentionMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;

    const alerts: Partial<Record<PatternType, PatternSeverity>> = options.alerts ?? PATTERN_POLICY.alertDefaults;
    for (const type of PATTERN_TYPES) {
      const threshold = alerts[type];
      if (threshold) this.configurePatternAlert(type, threshold);
    }
  }

  /**
   * Appends this cycle's events and returns patterns not reported before.
   * Never throws; a failing fixture yields no patterns.
   */
  detect(fixtureId: string, snapshot: MatchSnapshot, signals: DerivedSignals): GamePattern[] {
    try {
      const state = this.stateFor(fixtureId);
      this.append(state, snapshot, signals);

      const known = new Set(state.patterns.map((p) => p.patternId));
      const events = state.buffer.toArray();
      const fresh: GamePattern[] = [];

      for (const scan of PATTERN_SCANS) {
        for (const pattern of scan(fixtureId, events)) {
          if (known.has(pattern.patternId)) continue;
          known.add(pattern.patternId);
          fresh.push(pattern);
        }
      }

      state.patterns.push(...fresh);
      this.purge(state);

      return fresh;
    } catch (err) {
      this.logger.error({ fixtureId, error: errorMessage(err) }, '[PatternDetector] Detection failed');
      return [];
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // EVENT EXTRACTION
  // ═══════════════════════════════════════════════════════════════

  private append(state: FixtureState, snapshot: MatchSnapshot, signals: DerivedSignals): void {
    // Same or older capture: nothing new to record
    if (snapshot.capturedAt <= state.lastCapturedAt) return;
    state.lastCapturedAt = snapshot.capturedAt;

    const push = (kind: PatternEventKind, side: TeamSide, value: number): void => {
      state.buffer.push({
        seq: state.nextSeq++,
        kind,
        timestamp: snapshot.capturedAt,
        matchMinute: snapshot.elapsed,
        team: teamNameOf(snapshot, side),
        side,
        value,
      });
    };

    // Running totals, repeated every cycle while > 0; scans collapse repeats
    for (const side of SIDES) {
      const goals = scoreOf(snapshot, side);
      const { yellowCards, redCards } = snapshot.stats[side];
      if (goals > 0) push('goal', side, goals);
      if (yellowCards > 0) push('yellow_card', side, yellowCards);
      if (redCards > 0) push('red_card', side, redCards);
    }

    for (const side of SIDES) {
      push('possession', side, snapshot.stats[side].possession);
      push('momentum', side, signals[side].momentum);
      push('pressure', side, signals[side].pressure * PATTERN_POLICY.pressureBuildup.scale);
    }
  }

  private stateFor(fixtureId: string): FixtureState {
    let state = this.fixtures.get(fixtureId);
    if (!state) {
      state = {
        buffer: new RingBuffer<PatternEvent>(this.bufferSize),
        lastCapturedAt: Number.NEGATIVE_INFINITY,
        nextSeq: 1,
        patterns: [],
      };
      this.fixtures.set(fixtureId, state);
    }
    return state;
  }

  private purge(state: FixtureState): void {
    const cutoff = this.clock.now() - this.retentionMs;
    state.patterns = state.patterns.filter((p) => p.startTime > cutoff);
  }

  // ═══════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════

  getMatchPatterns(fixtureId: string): GamePattern[] {
    return [...(this.fixtures.get(fixtureId)?.patterns ?? [])];
  }

  getPatternsByType(type: PatternType): GamePattern[] {
    return this.allPatterns().filter((p) => p.type === type);
  }

  getHighSeverityPatterns(): GamePattern[] {
    const high = severityRank('high');
    return this.allPatterns().filter((p) => severityRank(p.severity) >= high);
  }

  getEvents(fixtureId: string): PatternEvent[] {
    return this.fixtures.get(fixtureId)?.buffer.toArray() ?? [];
  }

  private allPatterns(): GamePattern[] {
    return [...this.fixtures.values()].flatMap((s) => s.patterns);
  }

  // ═══════════════════════════════════════════════════════════════
  // ALERT POLICY
  // ═══════════════════════════════════════════════════════════════

  configurePatternAlert(type: PatternType, severityThreshold: PatternSeverity, enabled = true): void {
    this.alertConfig.set(type, { severityThreshold, enabled });
  }

  shouldAlertPattern(pattern: GamePattern): boolean {
    const config = this.alertConfig.get(pattern.type);
    if (!config || !config.enabled) return false;
    return severityRank(pattern.severity) >= severityRank(config.severityThreshold);
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  /**
   * Drops buffers of fixtures that left the live feed once their
   * patterns have aged out.
   */
  retainFixtures(activeFixtureIds: Iterable<string>): number {
    const active = new Set(activeFixtureIds);
    let removed = 0;
    for (const [fixtureId, state] of this.fixtures) {
      if (active.has(fixtureId)) continue;
      this.purge(state);
      if (state.patterns.length === 0) {
        this.fixtures.delete(fixtureId);
        removed++;
      }
    }
    return removed;
  }

  stats(): PatternDetectorStats {
    let bufferedEvents = 0;
    let retainedPatterns = 0;
    for (const state of this.fixtures.values()) {
      bufferedEvents += state.buffer.size;
      retainedPatterns += state.patterns.length;
    }
    return { fixtures: this.fixtures.size, bufferedEvents, retainedPatterns };
  }
}
