/**
 * ALERT ORCHESTRATOR
 * ==================
 *
 * The polling loop. Per cycle:
 *   1. fetch current snapshots (the source bounds upstream concurrency)
 *   2. drop snapshots older than the last one seen for that fixture
 *   3. derive signals, run pattern detection, broadcast qualifying patterns
 *   4. load active rules (read-only for the cycle)
 *   5. per (match, rule): skip if already fired, feed sequences,
 *      evaluate, collect fires
 *   6. per fire: claim the FireRecord (insert-if-absent), dispatch,
 *      write the outcome back
 *
 * A claimed record is never rolled back: a failed dispatch is recorded as
 * FAILED and the rule does not fire again for that match.
 *
 * The loop never exits on an error. A failed cycle waits the shorter
 * backoff interval instead of the poll interval. stop() lets the in-flight
 * cycle finish.
 */

import { v4 as uuidv4 } from 'uuid';
import { systemClock, type Clock } from '../../../common/clock.js';
import { errorMessage } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import { ConditionEvaluator, withinTimeWindows } from '../../conditions/services/condition.evaluator.js';
import { SequenceTracker, type SequenceStateView } from '../../conditions/services/sequence.tracker.js';
import type { MatchSnapshot, MatchSnapshotSource } from '../../matches/contracts/match.types.js';
import type { DerivedSignals } from '../../metrics/contracts/metrics.types.js';
import { metricsCalculator } from '../../metrics/metrics.calculator.js';
import type { GamePattern, PatternDetectorStats } from '../../patterns/contracts/pattern.types.js';
import { PatternDetector } from '../../patterns/services/pattern.detector.js';
import {
  BROADCAST,
  type AlertRule,
  type FireDispatch,
  type FireHistoryStore,
  type FireRecord,
  type FireStatus,
  type NotificationPayload,
  type PublishChannel,
  type RuleStore,
} from '../contracts/alert.types.js';
import type { DispatchResult } from './alert.dispatcher.js';

// ═══════════════════════════════════════════════════════════════
// CONTRACTS
// ═══════════════════════════════════════════════════════════════

export interface FireDispatcher {
  dispatch(fire: FireDispatch): Promise<DispatchResult>;
}

export interface AlertOrchestratorDeps {
  source: MatchSnapshotSource;
  rules: RuleStore;
  history: FireHistoryStore;
  dispatcher: FireDispatcher;
  /** Receives pattern broadcasts; patterns are not published without it */
  notifications?: PublishChannel;
  tracker?: SequenceTracker;
  detector?: PatternDetector;
  clock?: Clock;
  logger?: Logger;
}

export interface AlertOrchestratorOptions {
  intervalMs?: number;
  errorBackoffMs?: number;
}

export interface CycleReport {
  cycle: number;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  matches: number;
  staleSkipped: number;
  rulesLoaded: number;
  evaluated: number;
  alreadyFired: number;
  fired: number;
  lostClaims: number;
  dispatch: Record<Exclude<FireStatus, 'PENDING'>, number>;
  dispatchErrors: number;
  patterns: number;
  patternsBroadcast: number;
}

export interface OrchestratorStatus {
  running: boolean;
  cycleInFlight: boolean;
  cycles: number;
  consecutiveErrors: number;
  lastError: string | null;
  lastErrorAt: number | null;
  lastCycle: CycleReport | null;
  intervalMs: number;
  errorBackoffMs: number;
  trackedFixtures: number;
  sequences: SequenceStateView[];
  patterns: PatternDetectorStats;
}

interface PendingFire {
  rule: AlertRule;
  snapshot: MatchSnapshot;
  message: string;
}

export const DEFAULT_POLL_INTERVAL_MS = 60_000;
export const DEFAULT_ERROR_BACKOFF_MS = 30_000;

// ═══════════════════════════════════════════════════════════════
// RULE SCOPE
// ═══════════════════════════════════════════════════════════════

/**
 * Team filters match a side exactly (case-insensitive); league filters
 * match as a substring. Empty filter lists match everything.
 */
export function ruleAppliesToMatch(
  rule: Pick<AlertRule, 'leagueFilter' | 'teamFilter'>,
  snapshot: MatchSnapshot,
): boolean {
  if (rule.teamFilter.length > 0) {
    const teams = [snapshot.homeTeam.toLowerCase(), snapshot.awayTeam.toLowerCase()];
    if (!rule.teamFilter.some((t) => teams.includes(t.toLowerCase()))) return false;
  }

  if (rule.leagueFilter.length > 0) {
    const league = snapshot.league.toLowerCase();
    if (!rule.leagueFilter.some((l) => league.includes(l.toLowerCase()))) return false;
  }

  return true;
}

// ═══════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════

/**
 * PENDING record claimed before dispatch.
 */
export function buildFireRecord(
  rule: Pick<AlertRule, 'id' | 'name'>,
  snapshot: MatchSnapshot,
  message: string,
  firedAt: number,
): FireRecord {
  return {
    fireId: uuidv4(),
    ruleId: rule.id,
    ruleName: rule.name,
    matchId: snapshot.fixtureId,
    message,
    match: {
      homeTeam: snapshot.homeTeam,
      awayTeam: snapshot.awayTeam,
      homeScore: snapshot.homeScore,
      awayScore: snapshot.awayScore,
      elapsed: snapshot.elapsed,
      league: snapshot.league,
    },
    status: 'PENDING',
    channels: [],
    firedAt,
  };
}

export class AlertOrchestrator {
  private readonly source: MatchSnapshotSource;
  private readonly rules: RuleStore;
  private readonly history: FireHistoryStore;
  private readonly dispatcher: FireDispatcher;
  private readonly notifications?: PublishChannel;
  private readonly tracker: SequenceTracker;
  private readonly detector: PatternDetector;
  private readonly evaluator: ConditionEvaluator;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly errorBackoffMs: number;

  // fixtureId -> capturedAt of the newest snapshot evaluated
  private readonly lastSeen = new Map<string, number>();

  private running = false;
  private loopPromise: Promise<void> | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private wake: (() => void) | null = null;

  private cycles = 0;
  private consecutiveErrors = 0;
  private lastError: string | null = null;
  private lastErrorAt: number | null = null;
  private lastCycle: CycleReport | null = null;

  constructor(deps: AlertOrchestratorDeps, options: AlertOrchestratorOptions = {}) {
    this.source = deps.source;
    this.rules = deps.rules;
    this.history = deps.history;
    this.dispatcher = deps.dispatcher;
    this.notifications = deps.notifications;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? defaultLogger;
    this.tracker = deps.tracker ?? new SequenceTracker(this.clock);
    this.detector = deps.detector ?? new PatternDetector({ clock: this.clock, logger: this.logger });
    this.evaluator = new ConditionEvaluator({ logger: this.logger, sequences: this.tracker });
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.errorBackoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info(
      { intervalMs: this.intervalMs, errorBackoffMs: this.errorBackoffMs },
      '[AlertEngine] Started',
    );
    this.loopPromise = this.loop();
  }

  /**
   * Resolves once the in-flight cycle (if any) has finished.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.wake?.();
    await this.loopPromise;
    this.loopPromise = null;
    if (this.inFlight) await Promise.allSettled([this.inFlight]);
    this.logger.info({ cycles: this.cycles }, '[AlertEngine] Stopped');
  }

  /**
   * Runs one cycle now. Joins the in-flight cycle instead of starting a
   * second one. Errors propagate to the caller.
   */
  runOnce(): Promise<CycleReport> {
    if (this.inFlight) return this.inFlight;

    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  getStatus(): OrchestratorStatus {
    return {
      running: this.running,
      cycleInFlight: this.inFlight !== null,
      cycles: this.cycles,
      consecutiveErrors: this.consecutiveErrors,
      lastError: this.lastError,
      lastErrorAt: this.lastErrorAt,
      lastCycle: this.lastCycle,
      intervalMs: this.intervalMs,
      errorBackoffMs: this.errorBackoffMs,
      trackedFixtures: this.lastSeen.size,
      sequences: this.tracker.snapshot(),
      patterns: this.detector.stats(),
    };
  }

  private async loop(): Promise<void> {
    while (this.running) {
      let delay = this.intervalMs;

      try {
        await this.runOnce();
        this.consecutiveErrors = 0;
      } catch (err) {
        this.consecutiveErrors++;
        this.lastError = errorMessage(err);
        this.lastErrorAt = this.clock.now();
        delay = this.errorBackoffMs;
        this.logger.error(
          { error: this.lastError, consecutiveErrors: this.consecutiveErrors, retryInMs: delay },
          '[AlertEngine] Cycle failed',
        );
      }

      if (!this.running) break;
      await this.sleep(delay);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);

      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  // ═══════════════════════════════════════════════════════════════
  // CYCLE
  // ═══════════════════════════════════════════════════════════════

  private async runCycle(): Promise<CycleReport> {
    const startedAt = this.clock.now();
    const report: CycleReport = {
      cycle: this.cycles + 1,
      startedAt,
      finishedAt: startedAt,
      durationMs: 0,
      matches: 0,
      staleSkipped: 0,
      rulesLoaded: 0,
      evaluated: 0,
      alreadyFired: 0,
      fired: 0,
      lostClaims: 0,
      dispatch: { SENT: 0, FAILED: 0, SKIPPED: 0 },
      dispatchErrors: 0,
      patterns: 0,
      patternsBroadcast: 0,
    };

    const snapshots = await this.source.fetchCurrentMatches();
    const fresh = this.dropStale(snapshots, report);
    report.matches = fresh.length;

    const rules = await this.rules.loadActiveRules();
    report.rulesLoaded = rules.length;

    const pending: PendingFire[] = [];

    for (const snapshot of fresh) {
      const signals = metricsCalculator.derive(snapshot);
      this.detectPatterns(snapshot, signals, report);
      pending.push(...(await this.evaluateMatch(snapshot, signals, rules, report)));
    }

    const outcomes = await Promise.allSettled(pending.map((fire) => this.fire(fire, report)));
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        report.dispatchErrors++;
        this.logger.error({ error: errorMessage(outcome.reason) }, '[AlertEngine] Fire failed');
      }
    }

    const liveIds = snapshots.map((s) => s.fixtureId);
    this.tracker.retainFixtures(liveIds);
    this.detector.retainFixtures(liveIds);
    this.forgetFixtures(liveIds);

    report.finishedAt = this.clock.now();
    report.durationMs = report.finishedAt - startedAt;
    this.cycles++;
    this.lastCycle = report;

    this.logger.info(
      {
        cycle: report.cycle,
        matches: report.matches,
        rules: report.rulesLoaded,
        fired: report.fired,
        patterns: report.patterns,
        durationMs: report.durationMs,
      },
      '[AlertEngine] Cycle complete',
    );

    return report;
  }

  private dropStale(snapshots: readonly MatchSnapshot[], report: CycleReport): MatchSnapshot[] {
    const fresh: MatchSnapshot[] = [];
    for (const snapshot of snapshots) {
      const seen = this.lastSeen.get(snapshot.fixtureId);
      if (seen !== undefined && snapshot.capturedAt < seen) {
        report.staleSkipped++;
        this.logger.debug?.(
          { fixtureId: snapshot.fixtureId, capturedAt: snapshot.capturedAt, lastSeen: seen },
          '[AlertEngine] Stale snapshot skipped',
        );
        continue;
      }
      this.lastSeen.set(snapshot.fixtureId, snapshot.capturedAt);
      fresh.push(snapshot);
    }
    return fresh;
  }

  private forgetFixtures(liveIds: readonly string[]): void {
    const live = new Set(liveIds);
    for (const fixtureId of [...this.lastSeen.keys()]) {
      if (!live.has(fixtureId)) this.lastSeen.delete(fixtureId);
    }
  }

  private detectPatterns(snapshot: MatchSnapshot, signals: DerivedSignals, report: CycleReport): void {
    const patterns = this.detector.detect(snapshot.fixtureId, snapshot, signals);
    report.patterns += patterns.length;
    if (!this.notifications) return;

    for (const pattern of patterns) {
      if (!this.detector.shouldAlertPattern(pattern)) continue;
      this.notifications.publish(BROADCAST, this.patternPayload(pattern));
      report.patternsBroadcast++;
    }
  }

  private patternPayload(pattern: GamePattern): NotificationPayload {
    return {
      id: pattern.patternId,
      kind: 'pattern',
      title: pattern.name,
      message: pattern.description,
      fixtureId: pattern.fixtureId,
      data: {
        type: pattern.type,
        severity: pattern.severity,
        confidence: pattern.confidence,
        startTime: pattern.startTime,
        endTime: pattern.endTime,
      },
      timestamp: pattern.endTime,
    };
  }

  private async evaluateMatch(
    snapshot: MatchSnapshot,
    signals: DerivedSignals,
    rules: readonly AlertRule[],
    report: CycleReport,
  ): Promise<PendingFire[]> {
    const fires: PendingFire[] = [];

    for (const rule of rules) {
      if (!ruleAppliesToMatch(rule, snapshot)) continue;

      if (await this.history.exists(rule.id, snapshot.fixtureId)) {
        report.alreadyFired++;
        continue;
      }

      if (rule.sequences.length > 0 && withinTimeWindows(rule.timeWindows, snapshot.elapsed)) {
        const context = { ruleId: rule.id, fixtureId: snapshot.fixtureId };
        this.tracker.observeRule(snapshot.fixtureId, rule, (leaf) =>
          this.evaluator.matchesLeaf(leaf, snapshot, signals, context),
        );
      }

      report.evaluated++;
      const result = this.evaluator.evaluate(rule, snapshot, signals);
      if (result.fired) {
        fires.push({ rule, snapshot, message: result.message });
      }
    }

    return fires;
  }

  private async fire(pending: PendingFire, report: CycleReport): Promise<void> {
    const { rule, snapshot, message } = pending;
    const record = buildFireRecord(rule, snapshot, message, this.clock.now());

    const claimed = await this.history.record(record);
    if (!claimed) {
      report.lostClaims++;
      this.logger.info(
        { ruleId: rule.id, fixtureId: snapshot.fixtureId },
        '[AlertEngine] Already fired elsewhere, skipping dispatch',
      );
      return;
    }

    report.fired++;
    this.logger.info(
      { ruleId: rule.id, rule: rule.name, fixtureId: snapshot.fixtureId, message },
      '[AlertEngine] Rule fired',
    );

    let result: DispatchResult;
    try {
      result = await this.dispatcher.dispatch({ rule, snapshot, message, fireId: record.fireId });
    } catch (err) {
      result = { status: 'FAILED', channels: [], error: errorMessage(err) };
    }
    report.dispatch[result.status]++;

    if (result.status === 'FAILED') {
      this.logger.warn(
        { ruleId: rule.id, fixtureId: snapshot.fixtureId, error: result.error },
        '[AlertEngine] Dispatch failed, fire stands',
      );
    }

    await this.history.markDispatched(record.fireId, {
      status: result.status,
      channels: result.channels,
      error: result.error,
      dispatchedAt: this.clock.now(),
    });
  }
}
