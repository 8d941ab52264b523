/**
 * Rule Parser
 *
 * Persisted rule definition ({ logic, conditions: [...] } nested to any
 * depth) -> validated ConditionNode tree. Runs once at rule-load time;
 * the resulting tree is read-only.
 */

import { z } from 'zod';
import { RuleDefinitionError } from '../../../common/errors.js';
import {
  LOGIC_OPERATORS,
  MAX_CONDITION_DEPTH,
  OPERATORS,
  SIGNAL_KINDS,
  type ConditionDoc,
  type ConditionNode,
  type LeafCondition,
  type LeafConditionDoc,
  type LogicOperator,
  type RuleDefinition,
  type RuleDefinitionDoc,
} from '../contracts/condition.types.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

export const LeafConditionDocSchema = z.object({
  signal: z.enum(SIGNAL_KINDS),
  team: z.string().max(120),
  operator: z.enum(OPERATORS),
  value: z.union([z.number().finite(), z.string().max(120)]),
});

export const ConditionDocSchema: z.ZodType<ConditionDoc> = z.lazy(() =>
  z.union([LeafConditionDocSchema, CompositeConditionDocSchema]),
);

const CompositeConditionDocSchema = z.object({
  logic: z.enum(LOGIC_OPERATORS),
  conditions: z.array(ConditionDocSchema),
});

export const TimeWindowDocSchema = z
  .object({
    startMinute: z.number().int().min(0).max(130),
    endMinute: z.number().int().min(0).max(130),
  })
  .refine((w) => w.startMinute <= w.endMinute, { message: 'startMinute must not be after endMinute' });

export const SequenceRuleDocSchema = z.object({
  conditions: z.array(LeafConditionDocSchema).min(1, 'sequence needs at least one condition'),
  timeLimitSeconds: z.number().positive(),
});

export const RuleDefinitionDocSchema = z.object({
  logic: z.enum(LOGIC_OPERATORS),
  conditions: z.array(ConditionDocSchema),
  timeWindows: z.array(TimeWindowDocSchema).optional(),
  sequences: z.array(SequenceRuleDocSchema).optional(),
});

// ═══════════════════════════════════════════════════════════════
// TREE CONSTRUCTION
// ═══════════════════════════════════════════════════════════════

function toLeaf(doc: LeafConditionDoc): LeafCondition {
  return Object.freeze({
    kind: 'leaf',
    signal: doc.signal,
    team: doc.team.trim(),
    operator: doc.operator,
    value: doc.value,
  });
}

function toComposite(logic: LogicOperator, docs: ConditionDoc[], depth: number): ConditionNode {
  if (depth > MAX_CONDITION_DEPTH) {
    throw new Error(`condition tree deeper than ${MAX_CONDITION_DEPTH} levels`);
  }

  const children = docs.map((d) => toNode(d, depth + 1));

  switch (logic) {
    case 'AND':
      return Object.freeze({ kind: 'all', children: Object.freeze(children) });
    case 'OR':
      return Object.freeze({ kind: 'any', children: Object.freeze(children) });
    case 'NOT': {
      const [child] = children;
      if (children.length !== 1 || !child) {
        throw new Error(`NOT takes exactly one condition, got ${children.length}`);
      }
      return Object.freeze({ kind: 'not', child });
    }
  }
}

function toNode(doc: ConditionDoc, depth: number): ConditionNode {
  if ('signal' in doc) {
    if (depth > MAX_CONDITION_DEPTH) {
      throw new Error(`condition tree deeper than ${MAX_CONDITION_DEPTH} levels`);
    }
    return toLeaf(doc);
  }
  return toComposite(doc.logic, doc.conditions, depth);
}

/**
 * @throws RuleDefinitionError on schema violations, NOT with more or fewer
 * than one child, or trees deeper than MAX_CONDITION_DEPTH.
 */
export function parseRuleDefinition(input: unknown, ruleId?: string): RuleDefinition {
  const parsed = RuleDefinitionDocSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new RuleDefinitionError(issues, ruleId);
  }

  const doc: RuleDefinitionDoc = parsed.data;

  try {
    return {
      logic: doc.logic,
      condition: toComposite(doc.logic, doc.conditions, 1),
      timeWindows: (doc.timeWindows ?? []).map((w) => Object.freeze({ ...w })),
      sequences: (doc.sequences ?? []).map((s) =>
        Object.freeze({
          conditions: Object.freeze(s.conditions.map(toLeaf)),
          timeLimitSeconds: s.timeLimitSeconds,
        }),
      ),
    };
  } catch (err) {
    throw new RuleDefinitionError(err instanceof Error ? err.message : String(err), ruleId);
  }
}
