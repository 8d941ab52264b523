/**
 * ALERTS MODULE — In-memory stores
 *
 * Same contracts as the Mongo stores; used when running without a database
 * and in tests. Single-process only.
 */

import { buildStoredRule, compileRules } from '../services/rule.loader.js';
import { emptyStatusCounts } from './fire-history.store.js';
import { systemClock, type Clock } from '../../../common/clock.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type {
  AlertRule,
  DispatchUpdate,
  FireHistoryStore,
  FireRecord,
  FireStats,
  NewAlertRuleInput,
  RuleRepository,
  StoredAlertRule,
} from '../contracts/alert.types.js';

export class InMemoryRuleRepository implements RuleRepository {
  private readonly rules = new Map<string, StoredAlertRule>();

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Stores the document as given, without validation.
   */
  seed(rule: StoredAlertRule): void {
    this.rules.set(rule.ruleId, rule);
  }

  async loadActiveRules(): Promise<AlertRule[]> {
    const active = [...this.rules.values()].filter((r) => r.isActive);
    return compileRules(active, this.logger);
  }

  async list(): Promise<StoredAlertRule[]> {
    return [...this.rules.values()].sort((a, b) => b.createdAt - a.createdAt);
  }

  async get(ruleId: string): Promise<StoredAlertRule | null> {
    return this.rules.get(ruleId) ?? null;
  }

  async create(input: NewAlertRuleInput): Promise<StoredAlertRule> {
    const rule = buildStoredRule(input, this.clock.now());
    this.rules.set(rule.ruleId, rule);
    return rule;
  }

  async setActive(ruleId: string, isActive: boolean): Promise<StoredAlertRule | null> {
    const existing = this.rules.get(ruleId);
    if (!existing) return null;
    const updated = { ...existing, isActive, updatedAt: this.clock.now() };
    this.rules.set(ruleId, updated);
    return updated;
  }

  async delete(ruleId: string): Promise<boolean> {
    return this.rules.delete(ruleId);
  }
}

function pairKey(ruleId: string, matchId: string): string {
  return JSON.stringify([ruleId, matchId]);
}

export class InMemoryFireHistoryStore implements FireHistoryStore {
  private readonly byPair = new Map<string, FireRecord>();
  private readonly byId = new Map<string, FireRecord>();

  async exists(ruleId: string, matchId: string): Promise<boolean> {
    return this.byPair.has(pairKey(ruleId, matchId));
  }

  async record(record: FireRecord): Promise<boolean> {
    const key = pairKey(record.ruleId, record.matchId);
    if (this.byPair.has(key)) return false;
    const copy = { ...record, channels: [...record.channels] };
    this.byPair.set(key, copy);
    this.byId.set(copy.fireId, copy);
    return true;
  }

  async markDispatched(fireId: string, update: DispatchUpdate): Promise<void> {
    const record = this.byId.get(fireId);
    if (!record) return;
    record.status = update.status;
    record.channels = [...update.channels];
    record.dispatchedAt = update.dispatchedAt;
    if (update.error !== undefined) record.error = update.error;
  }

  async recent(limit: number): Promise<FireRecord[]> {
    return [...this.byId.values()]
      .sort((a, b) => b.firedAt - a.firedAt)
      .slice(0, limit)
      .map((r) => ({ ...r, channels: [...r.channels] }));
  }

  async stats(): Promise<FireStats> {
    const byStatus = emptyStatusCounts();
    const perRule = new Map<string, { ruleId: string; ruleName: string; count: number }>();

    for (const record of this.byId.values()) {
      byStatus[record.status]++;
      const entry = perRule.get(record.ruleId) ?? { ruleId: record.ruleId, ruleName: record.ruleName, count: 0 };
      entry.count++;
      entry.ruleName = record.ruleName;
      perRule.set(record.ruleId, entry);
    }

    return {
      total: this.byId.size,
      byStatus,
      topRules: [...perRule.values()].sort((a, b) => b.count - a.count).slice(0, 10),
    };
  }

  get size(): number {
    return this.byId.size;
  }
}
