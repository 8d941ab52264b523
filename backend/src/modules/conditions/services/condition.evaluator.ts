/**
 * CONDITION EVALUATOR
 * ===================
 *
 * (rule, snapshot, signals) -> { fired, message }
 *
 * Order of gates:
 *   1. time windows (elapsed must fall in at least one, when any are set)
 *   2. recursive condition tree
 *   3. sequences (at least one complete, when any are set)
 *
 * Leaves fail closed: a resolution or type error makes that leaf false,
 * is logged, and siblings keep evaluating.
 */

import { ConditionEvaluationError, errorMessage } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type { MatchSnapshot } from '../../matches/contracts/match.types.js';
import { resolveSide } from '../../matches/services/snapshot.builder.js';
import type { DerivedSignals } from '../../metrics/contracts/metrics.types.js';
import {
  MAX_CONDITION_DEPTH,
  type ConditionNode,
  type ConditionValue,
  type EvaluableRule,
  type EvaluationResult,
  type LeafCondition,
  type Operator,
  type SequenceGate,
  type TimeWindow,
} from '../contracts/condition.types.js';

export interface ConditionEvaluatorOptions {
  logger?: Logger;
  sequences?: SequenceGate;
}

export interface NodeResult {
  result: boolean;
  message: string;
}

interface EvaluationContext {
  ruleId?: string;
  fixtureId?: string;
}

const FALSE: NodeResult = Object.freeze({ result: false, message: '' });

// ═══════════════════════════════════════════════════════════════
// PURE HELPERS
// ═══════════════════════════════════════════════════════════════

function expectNumber(value: ConditionValue, operator: Operator): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConditionEvaluationError(`operator ${operator} needs a numeric value, got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Applies an operator to a resolved numeric signal.
 * Ordering and equality need a numeric comparison value; substring
 * operators compare case-insensitively on the string forms.
 */
export function compareValues(actual: number, operator: Operator, expected: ConditionValue): boolean {
  switch (operator) {
    case '==':
      return actual === expectNumber(expected, operator);
    case '!=':
      return actual !== expectNumber(expected, operator);
    case '>':
      return actual > expectNumber(expected, operator);
    case '>=':
      return actual >= expectNumber(expected, operator);
    case '<':
      return actual < expectNumber(expected, operator);
    case '<=':
      return actual <= expectNumber(expected, operator);
    case 'contains':
      return String(actual).toLowerCase().includes(String(expected).toLowerCase());
    case 'not_contains':
      return !String(actual).toLowerCase().includes(String(expected).toLowerCase());
    default: {
      const unknown: never = operator;
      throw new ConditionEvaluationError(`unknown operator ${String(unknown)}`);
    }
  }
}

export function withinTimeWindows(windows: readonly TimeWindow[], elapsed: number): boolean {
  if (windows.length === 0) return true;
  return windows.some((w) => w.startMinute <= elapsed && elapsed <= w.endMinute);
}

function percent(value: ConditionValue): string {
  const n = typeof value === 'number' ? value : Number.NaN;
  if (!Number.isFinite(n)) {
    throw new ConditionEvaluationError(`win_probability needs a numeric value, got ${JSON.stringify(value)}`);
  }
  return `${(n * 100).toFixed(1)}%`;
}

function describeLeaf(leaf: LeafCondition): string {
  if (leaf.signal === 'time_elapsed') {
    return `time_elapsed ${leaf.operator} ${leaf.value}`;
  }
  return `${leaf.team} ${leaf.signal} ${leaf.operator} ${leaf.value}`;
}

function describeOperand(node: ConditionNode): string {
  return node.kind === 'leaf' || node.kind === 'not'
    ? describeCondition(node)
    : `(${describeCondition(node)})`;
}

/**
 * Human-readable rendering of a tree, e.g.
 * `Arsenal goals >= 2 AND (Arsenal xg > 1.5 OR NOT Chelsea pressure > 0.9)`.
 */
export function describeCondition(node: ConditionNode): string {
  switch (node.kind) {
    case 'leaf':
      return describeLeaf(node);
    case 'all':
      return node.children.map(describeOperand).join(' AND ');
    case 'any':
      return node.children.map(describeOperand).join(' OR ');
    case 'not':
      return `NOT ${describeOperand(node.child)}`;
  }
}

/**
 * Identity of a leaf inside a sequence. Two leaves with the same key count
 * as one trigger.
 */
export function leafKey(leaf: LeafCondition): string {
  return `${leaf.signal}:${leaf.team.toLowerCase()}:${leaf.operator}:${leaf.value}`;
}

// ═══════════════════════════════════════════════════════════════
// EVALUATOR
// ═══════════════════════════════════════════════════════════════

export class ConditionEvaluator {
  private readonly logger: Logger;
  private readonly sequences?: SequenceGate;

  constructor(options: ConditionEvaluatorOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.sequences = options.sequences;
  }

  evaluate(rule: EvaluableRule, snapshot: MatchSnapshot, signals: DerivedSignals): EvaluationResult {
    const context: EvaluationContext = { ruleId: rule.id, fixtureId: snapshot.fixtureId };

    if (!withinTimeWindows(rule.timeWindows, snapshot.elapsed)) {
      return { fired: false, message: '' };
    }

    const { result, message } = this.evaluateCondition(rule.condition, snapshot, signals, context);
    if (!result) {
      return { fired: false, message: '' };
    }

    if (rule.sequences.length > 0 && !this.anySequenceComplete(rule, snapshot.fixtureId)) {
      return { fired: false, message: '' };
    }

    return { fired: true, message };
  }

  evaluateCondition(
    node: ConditionNode,
    snapshot: MatchSnapshot,
    signals: DerivedSignals,
    context: EvaluationContext = {},
    depth = 1,
  ): NodeResult {
    if (depth > MAX_CONDITION_DEPTH) {
      this.logger.warn({ ...context, depth }, '[ConditionEvaluator] Tree too deep, treating as false');
      return FALSE;
    }

    switch (node.kind) {
      case 'leaf':
        return this.evaluateLeaf(node, snapshot, signals, context);

      case 'all': {
        if (node.children.length === 0) return FALSE;
        const results = node.children.map((c) => this.evaluateCondition(c, snapshot, signals, context, depth + 1));
        const allTrue = results.every((r) => r.result);
        if (!allTrue) return FALSE;
        return {
          result: true,
          message: results.map((r) => r.message).filter(Boolean).join(' AND '),
        };
      }

      case 'any': {
        if (node.children.length === 0) return FALSE;
        const results = node.children.map((c) => this.evaluateCondition(c, snapshot, signals, context, depth + 1));
        const matched = results.filter((r) => r.result);
        if (matched.length === 0) return FALSE;
        return {
          result: true,
          message: matched.map((r) => r.message).filter(Boolean).join(' OR '),
        };
      }

      case 'not': {
        const inner = this.evaluateCondition(node.child, snapshot, signals, context, depth + 1);
        if (inner.result) return FALSE;
        return { result: true, message: `NOT ${describeOperand(node.child)}` };
      }
    }
  }

  /**
   * Leaf truth only; used by the sequence tracker each cycle.
   */
  matchesLeaf(leaf: LeafCondition, snapshot: MatchSnapshot, signals: DerivedSignals, context: EvaluationContext = {}): boolean {
    return this.evaluateLeaf(leaf, snapshot, signals, context).result;
  }

  private evaluateLeaf(
    leaf: LeafCondition,
    snapshot: MatchSnapshot,
    signals: DerivedSignals,
    context: EvaluationContext,
  ): NodeResult {
    try {
      const result = this.resolveLeaf(leaf, snapshot, signals);
      return result ?? FALSE;
    } catch (err) {
      this.logger.warn(
        { ...context, signal: leaf.signal, team: leaf.team, operator: leaf.operator, error: errorMessage(err) },
        '[ConditionEvaluator] Leaf evaluation failed, treating as false',
      );
      return FALSE;
    }
  }

  /**
   * Returns null when the comparison is false.
   */
  private resolveLeaf(leaf: LeafCondition, snapshot: MatchSnapshot, signals: DerivedSignals): NodeResult | null {
    const side = resolveSide(snapshot, leaf.team);
    const { team, operator: op, value } = leaf;
    const check = (actual: number): boolean => compareValues(actual, op, value);

    switch (leaf.signal) {
      case 'goals': {
        const goals = side === 'home' ? snapshot.homeScore : snapshot.awayScore;
        return check(goals) ? { result: true, message: `${team} goals: ${goals} ${op} ${value}` } : null;
      }
      case 'score_difference': {
        const lead = side === 'home'
          ? snapshot.homeScore - snapshot.awayScore
          : snapshot.awayScore - snapshot.homeScore;
        return check(lead) ? { result: true, message: `${team} lead: ${lead} ${op} ${value}` } : null;
      }
      case 'time_elapsed': {
        const minute = snapshot.elapsed;
        return check(minute) ? { result: true, message: `Match time: ${minute} ${op} ${value} minutes` } : null;
      }
      case 'xg': {
        const xg = signals[side].xg;
        return check(xg) ? { result: true, message: `${team} xG: ${xg.toFixed(2)} ${op} ${value}` } : null;
      }
      case 'momentum': {
        const momentum = signals[side].momentum;
        return check(momentum) ? { result: true, message: `${team} momentum: ${momentum.toFixed(1)} ${op} ${value}` } : null;
      }
      case 'pressure': {
        const pressure = signals[side].pressure;
        return check(pressure) ? { result: true, message: `${team} pressure: ${pressure.toFixed(2)} ${op} ${value}` } : null;
      }
      case 'win_probability': {
        const probability = signals[side].winProbability;
        const expected = percent(value);
        return check(probability)
          ? { result: true, message: `${team} win probability: ${percent(probability)} ${op} ${expected}` }
          : null;
      }
      case 'possession': {
        const possession = snapshot.stats[side].possession;
        return check(possession) ? { result: true, message: `${team} possession: ${possession.toFixed(1)}% ${op} ${value}` } : null;
      }
      default: {
        const unknown: never = leaf.signal;
        throw new ConditionEvaluationError(`unknown signal ${String(unknown)}`);
      }
    }
  }

  private anySequenceComplete(rule: EvaluableRule, fixtureId: string): boolean {
    const gate = this.sequences;
    if (!gate) {
      this.logger.warn({ ruleId: rule.id, fixtureId }, '[ConditionEvaluator] Rule has sequences but no tracker is wired');
      return false;
    }
    return rule.sequences.some((_, index) => gate.isComplete(fixtureId, rule.id, index));
  }
}
