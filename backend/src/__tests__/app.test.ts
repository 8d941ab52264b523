import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { ManualClock } from '../common/clock.js';
import type { Logger } from '../common/logger.js';
import { MatchDataService } from '../modules/matches/services/match.data.service.js';
import { createSnapshot } from '../modules/matches/services/snapshot.builder.js';
import { deriveSignals } from '../modules/metrics/metrics.calculator.js';
import {
  AlertOrchestrator,
  InMemoryFireHistoryStore,
  InMemoryRuleRepository,
  NotificationHub,
} from '../modules/alerts/index.js';
import { PatternDetector } from '../modules/patterns/index.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const VALID_RULE = {
  name: 'Arsenal two up',
  definition: {
    logic: 'AND',
    conditions: [
      { signal: 'score_difference', team: 'Arsenal', operator: '>=', value: 2 },
      { signal: 'xg', team: 'Arsenal', operator: '>', value: 1.5 },
    ],
  },
  target: { phone: '+15550001111' },
};

describe('HTTP API', () => {
  let app: FastifyInstance;
  let clock: ManualClock;
  let rules: InMemoryRuleRepository;
  let history: InMemoryFireHistoryStore;
  let detector: PatternDetector;

  beforeEach(async () => {
    vi.clearAllMocks();
    clock = new ManualClock(0);
    rules = new InMemoryRuleRepository(clock, mockLogger);
    history = new InMemoryFireHistoryStore();
    detector = new PatternDetector({ clock, logger: mockLogger });
    const hub = new NotificationHub(mockLogger);
    const engine = new AlertOrchestrator({
      source: { fetchCurrentMatches: async () => [] },
      rules,
      history,
      dispatcher: { dispatch: async () => ({ status: 'SKIPPED', channels: [] }) },
      detector,
      clock,
      logger: mockLogger,
    });

    const feed = new MatchDataService(
      {
        isConfigured: () => true,
        getLiveFixtures: async () => [],
        getFixtureStatistics: async () => [],
      },
      { clock, logger: mockLogger },
    );
    await feed.fetchCurrentMatches();

    app = buildApp(
      { rules, history, engine, patterns: detector, hub, feed },
      { logLevel: 'silent', wsEnabled: false },
    );
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: true,
      mongo: false,
      engine: { running: false, cycles: 0, consecutiveErrors: 0, lastCycleAt: null },
      feed: {
        cache: { size: 0, hits: 0, misses: 0, hitRate: 0 },
        lastKnownFixtures: 0,
        lastFetchAt: 0,
        lastFetchError: null,
        sources: { LIVE: 0, CACHE: 0, FALLBACK: 0 },
      },
    });
  });

  describe('rules', () => {
    it('creates and lists a rule', async () => {
      const created = await app.inject({ method: 'POST', url: '/api/alerts/rules', payload: VALID_RULE });
      expect(created.statusCode).toBe(201);
      const { rule } = created.json();
      expect(rule).toMatchObject({ name: 'Arsenal two up', isActive: true, target: { phone: '+15550001111' } });

      const listed = await app.inject({ method: 'GET', url: '/api/alerts/rules' });
      expect(listed.json()).toMatchObject({ ok: true, count: 1 });
      expect(listed.json().rules[0].ruleId).toBe(rule.ruleId);
    });

    it('rejects a body that fails validation', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/alerts/rules',
        payload: { ...VALID_RULE, name: '' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' });
      expect(res.json().message).toContain('name');
    });

    it('rejects NOT with more than one condition', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/alerts/rules',
        payload: { ...VALID_RULE, definition: { ...VALID_RULE.definition, logic: 'NOT' } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('INVALID_RULE');
      expect(res.json().message).toContain('NOT takes exactly one condition, got 2');
    });

    it('toggles and deletes a rule', async () => {
      const { rule } = (await app.inject({ method: 'POST', url: '/api/alerts/rules', payload: VALID_RULE })).json();

      const flipped = await app.inject({ method: 'PATCH', url: `/api/alerts/rules/${rule.ruleId}/toggle` });
      expect(flipped.json().rule.isActive).toBe(false);

      const explicit = await app.inject({
        method: 'PATCH',
        url: `/api/alerts/rules/${rule.ruleId}/toggle`,
        payload: { isActive: true },
      });
      expect(explicit.json().rule.isActive).toBe(true);

      const deleted = await app.inject({ method: 'DELETE', url: `/api/alerts/rules/${rule.ruleId}` });
      expect(deleted.json()).toEqual({ ok: true, deleted: rule.ruleId });

      const again = await app.inject({ method: 'DELETE', url: `/api/alerts/rules/${rule.ruleId}` });
      expect(again.statusCode).toBe(404);
      expect(again.json().error).toBe('NOT_FOUND');
    });

    it('returns 404 when toggling an unknown rule', async () => {
      const res = await app.inject({ method: 'PATCH', url: '/api/alerts/rules/missing/toggle' });
      expect(res.statusCode).toBe(404);
    });
  });

  describe('history and engine', () => {
    it('validates the history limit', async () => {
      const bad = await app.inject({ method: 'GET', url: '/api/alerts/history?limit=0' });
      expect(bad.statusCode).toBe(400);

      const ok = await app.inject({ method: 'GET', url: '/api/alerts/history' });
      expect(ok.json()).toEqual({ ok: true, count: 0, fires: [] });
    });

    it('returns fire statistics', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/alerts/stats' });
      expect(res.json().stats).toEqual({
        total: 0,
        byStatus: { PENDING: 0, SENT: 0, FAILED: 0, SKIPPED: 0 },
        topRules: [],
      });
    });

    it('runs a cycle on demand and exposes it in the status', async () => {
      const run = await app.inject({ method: 'POST', url: '/api/alerts/engine/run' });
      expect(run.statusCode).toBe(200);
      expect(run.json().report).toMatchObject({ cycle: 1, matches: 0, fired: 0 });

      const status = await app.inject({ method: 'GET', url: '/api/alerts/engine/status' });
      expect(status.json().status).toMatchObject({ running: false, cycles: 1, lastCycle: { cycle: 1 } });
    });
  });

  describe('patterns', () => {
    beforeEach(() => {
      const feed = (atSeconds: number, homeScore: number) => {
        clock.set(atSeconds * 1000);
        const snapshot = createSnapshot({
          fixtureId: 'fx-1',
          homeTeam: 'Arsenal',
          awayTeam: 'Chelsea',
          homeScore,
          awayScore: 0,
          elapsed: 70,
          league: 'Premier League',
          status: '2H',
          capturedAt: atSeconds * 1000,
        });
        detector.detect('fx-1', snapshot, deriveSignals(snapshot));
      };
      feed(0, 0);
      feed(60, 1);
      feed(150, 2);
    });

    it('lists high-severity patterns across fixtures', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/patterns/high-severity' });
      const body = res.json();

      expect(body.fixtureId).toBeUndefined();
      expect(body.patterns.map((p: { type: string }) => p.type)).toContain('goal_sequence');
    });

    it('returns one fixture\'s patterns and events', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/patterns/fx-1' });
      const body = res.json();

      expect(body.fixtureId).toBe('fx-1');
      expect(body.patterns.map((p: { type: string }) => p.type)).toContain('goal_sequence');
      expect(body.events.length).toBeGreaterThan(0);
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
