/**
 * CONDITIONS MODULE — Types
 * =========================
 *
 * Rule trees are closed tagged unions: adding a signal or node kind breaks
 * every exhaustive switch until it is handled.
 */

export const SIGNAL_KINDS = [
  'goals',
  'score_difference',
  'time_elapsed',
  'xg',
  'momentum',
  'pressure',
  'win_probability',
  'possession',
] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

export const OPERATORS = ['==', '!=', '>', '>=', '<', '<=', 'contains', 'not_contains'] as const;

export type Operator = (typeof OPERATORS)[number];

export const LOGIC_OPERATORS = ['AND', 'OR', 'NOT'] as const;

export type LogicOperator = (typeof LOGIC_OPERATORS)[number];

export type ConditionValue = number | string;

export const MAX_CONDITION_DEPTH = 8;

// ═══════════════════════════════════════════════════════════════
// CONDITION TREE
// ═══════════════════════════════════════════════════════════════

export interface LeafCondition {
  readonly kind: 'leaf';
  readonly signal: SignalKind;
  readonly team: string;
  readonly operator: Operator;
  readonly value: ConditionValue;
}

export interface AllCondition {
  readonly kind: 'all';
  readonly children: readonly ConditionNode[];
}

export interface AnyCondition {
  readonly kind: 'any';
  readonly children: readonly ConditionNode[];
}

export interface NotCondition {
  readonly kind: 'not';
  readonly child: ConditionNode;
}

export type ConditionNode = LeafCondition | AllCondition | AnyCondition | NotCondition;

// ═══════════════════════════════════════════════════════════════
// GATES
// ═══════════════════════════════════════════════════════════════

/**
 * Inclusive minute range.
 */
export interface TimeWindow {
  readonly startMinute: number;
  readonly endMinute: number;
}

export interface SequenceRule {
  readonly conditions: readonly LeafCondition[];
  readonly timeLimitSeconds: number;
}

/**
 * The part of an alert rule the evaluator needs.
 */
export interface EvaluableRule {
  readonly id: string;
  readonly name: string;
  readonly logic: LogicOperator;
  readonly condition: ConditionNode;
  readonly timeWindows: readonly TimeWindow[];
  readonly sequences: readonly SequenceRule[];
}

export interface EvaluationResult {
  fired: boolean;
  message: string;
}

/**
 * Read side of the sequence tracker as seen by the evaluator.
 */
export interface SequenceGate {
  isComplete: (fixtureId: string, ruleId: string, sequenceIndex: number) => boolean;
}

// ═══════════════════════════════════════════════════════════════
// PERSISTED FORM
// ═══════════════════════════════════════════════════════════════

export interface LeafConditionDoc {
  signal: SignalKind;
  team: string;
  operator: Operator;
  value: ConditionValue;
}

export interface CompositeConditionDoc {
  logic: LogicOperator;
  conditions: ConditionDoc[];
}

export type ConditionDoc = LeafConditionDoc | CompositeConditionDoc;

export interface TimeWindowDoc {
  startMinute: number;
  endMinute: number;
}

export interface SequenceRuleDoc {
  conditions: LeafConditionDoc[];
  timeLimitSeconds: number;
}

export interface RuleDefinitionDoc {
  logic: LogicOperator;
  conditions: ConditionDoc[];
  timeWindows?: TimeWindowDoc[];
  sequences?: SequenceRuleDoc[];
}

export interface RuleDefinition {
  logic: LogicOperator;
  condition: ConditionNode;
  timeWindows: TimeWindow[];
  sequences: SequenceRule[];
}
