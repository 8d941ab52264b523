/**
 * ALERTS MODULE — Rule Repository (MongoDB)
 */

import { AlertRuleModel } from './alert-rule.model.js';
import { buildStoredRule, compileRules } from '../services/rule.loader.js';
import { systemClock, type Clock } from '../../../common/clock.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type {
  AlertRule,
  NewAlertRuleInput,
  RuleRepository,
  StoredAlertRule,
} from '../contracts/alert.types.js';

function toStored(doc: StoredAlertRule): StoredAlertRule {
  return {
    ruleId: doc.ruleId,
    name: doc.name,
    description: doc.description,
    definition: doc.definition,
    target: { phone: doc.target?.phone, userId: doc.target?.userId },
    leagueFilter: doc.leagueFilter ?? [],
    teamFilter: doc.teamFilter ?? [],
    isActive: doc.isActive,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoRuleRepository implements RuleRepository {
  constructor(
    private readonly clock: Clock = systemClock,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async loadActiveRules(): Promise<AlertRule[]> {
    const docs = await AlertRuleModel.find({ isActive: true }).lean<StoredAlertRule[]>();
    return compileRules(docs.map(toStored), this.logger);
  }

  async list(): Promise<StoredAlertRule[]> {
    const docs = await AlertRuleModel.find({}).sort({ createdAt: -1 }).lean<StoredAlertRule[]>();
    return docs.map(toStored);
  }

  async get(ruleId: string): Promise<StoredAlertRule | null> {
    const doc = await AlertRuleModel.findOne({ ruleId }).lean<StoredAlertRule>();
    return doc ? toStored(doc) : null;
  }

  async create(input: NewAlertRuleInput): Promise<StoredAlertRule> {
    const rule = buildStoredRule(input, this.clock.now());
    await AlertRuleModel.create(rule);
    this.logger.info({ ruleId: rule.ruleId, name: rule.name }, '[Rules] Rule created');
    return rule;
  }

  async setActive(ruleId: string, isActive: boolean): Promise<StoredAlertRule | null> {
    const doc = await AlertRuleModel.findOneAndUpdate(
      { ruleId },
      { $set: { isActive, updatedAt: this.clock.now() } },
      { new: true },
    ).lean<StoredAlertRule>();
    return doc ? toStored(doc) : null;
  }

  async delete(ruleId: string): Promise<boolean> {
    const result = await AlertRuleModel.deleteOne({ ruleId });
    return result.deletedCount > 0;
  }
}
