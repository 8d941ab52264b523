/**
 * RULE LOADER
 * ===========
 *
 * Stored rule documents → evaluable AlertRule. A rule that fails to parse
 * is logged and skipped; it never takes the cycle down.
 */

import { v4 as uuidv4 } from 'uuid';
import { parseRuleDefinition } from '../../conditions/services/rule.parser.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import type { AlertRule, NewAlertRuleInput, StoredAlertRule } from '../contracts/alert.types.js';

function normalizeFilter(values: readonly string[] | undefined): string[] {
  return (values ?? []).map((v) => v.trim()).filter((v) => v.length > 0);
}

/**
 * @throws RuleDefinitionError when the definition does not parse
 */
export function toAlertRule(stored: StoredAlertRule): AlertRule {
  const definition = parseRuleDefinition(stored.definition, stored.ruleId);

  return Object.freeze({
    id: stored.ruleId,
    name: stored.name,
    description: stored.description,
    logic: definition.logic,
    condition: definition.condition,
    timeWindows: Object.freeze(definition.timeWindows),
    sequences: Object.freeze(definition.sequences),
    target: Object.freeze({ ...stored.target }),
    leagueFilter: Object.freeze([...stored.leagueFilter]),
    teamFilter: Object.freeze([...stored.teamFilter]),
  });
}

export function compileRules(stored: readonly StoredAlertRule[], logger: Logger = defaultLogger): AlertRule[] {
  const rules: AlertRule[] = [];
  for (const doc of stored) {
    try {
      rules.push(toAlertRule(doc));
    } catch (err) {
      logger.warn({ ruleId: doc.ruleId, error: errorMessage(err) }, '[Rules] Skipping invalid rule');
    }
  }
  return rules;
}

/**
 * Validates the definition up front so nothing unparseable is persisted.
 */
export function buildStoredRule(input: NewAlertRuleInput, now: number): StoredAlertRule {
  const ruleId = uuidv4();
  parseRuleDefinition(input.definition, ruleId);

  return {
    ruleId,
    name: input.name.trim(),
    description: input.description,
    definition: input.definition,
    target: { ...input.target },
    leagueFilter: normalizeFilter(input.leagueFilter),
    teamFilter: normalizeFilter(input.teamFilter),
    isActive: input.isActive ?? true,
    createdAt: now,
    updatedAt: now,
  };
}
