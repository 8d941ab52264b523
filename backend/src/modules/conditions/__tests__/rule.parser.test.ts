import { describe, it, expect } from 'vitest';
import { RuleDefinitionError } from '../../../common/errors.js';
import { parseRuleDefinition } from '../services/rule.parser.js';

const goals = { signal: 'goals', team: 'Arsenal', operator: '>=', value: 2 };
const xg = { signal: 'xg', team: 'Arsenal', operator: '>', value: 1.5 };

describe('parseRuleDefinition', () => {
  it('builds a tagged tree from the persisted form', () => {
    const def = parseRuleDefinition({ logic: 'AND', conditions: [goals, { logic: 'OR', conditions: [xg] }] });

    expect(def.condition).toEqual({
      kind: 'all',
      children: [
        { kind: 'leaf', signal: 'goals', team: 'Arsenal', operator: '>=', value: 2 },
        { kind: 'any', children: [{ kind: 'leaf', signal: 'xg', team: 'Arsenal', operator: '>', value: 1.5 }] },
      ],
    });
    expect(def.timeWindows).toEqual([]);
    expect(def.sequences).toEqual([]);
  });

  it('builds NOT around its single child', () => {
    const def = parseRuleDefinition({ logic: 'NOT', conditions: [goals] });
    expect(def.condition.kind).toBe('not');
  });

  it('rejects NOT with more than one child', () => {
    expect(() => parseRuleDefinition({ logic: 'NOT', conditions: [goals, xg] }, 'r-9'))
      .toThrow('Rule r-9: NOT takes exactly one condition, got 2');
  });

  it('rejects trees deeper than eight levels', () => {
    let doc: Record<string, unknown> = { logic: 'AND', conditions: [goals] };
    for (let i = 0; i < 8; i++) {
      doc = { logic: 'AND', conditions: [doc] };
    }
    expect(() => parseRuleDefinition(doc)).toThrow(RuleDefinitionError);
  });

  it('rejects unknown signals and operators', () => {
    expect(() => parseRuleDefinition({ logic: 'AND', conditions: [{ ...goals, signal: 'corners' }] }))
      .toThrow(RuleDefinitionError);
    expect(() => parseRuleDefinition({ logic: 'AND', conditions: [{ ...goals, operator: '=~' }] }))
      .toThrow(RuleDefinitionError);
  });

  it('rejects inverted windows and empty sequences', () => {
    expect(() => parseRuleDefinition({
      logic: 'AND',
      conditions: [goals],
      timeWindows: [{ startMinute: 80, endMinute: 70 }],
    })).toThrow('startMinute must not be after endMinute');

    expect(() => parseRuleDefinition({
      logic: 'AND',
      conditions: [goals],
      sequences: [{ conditions: [], timeLimitSeconds: 600 }],
    })).toThrow('sequence needs at least one condition');
  });

  it('keeps windows and sequence leaves', () => {
    const def = parseRuleDefinition({
      logic: 'OR',
      conditions: [goals],
      timeWindows: [{ startMinute: 75, endMinute: 90 }],
      sequences: [{ conditions: [goals, xg], timeLimitSeconds: 600 }],
    });
    expect(def.timeWindows).toEqual([{ startMinute: 75, endMinute: 90 }]);
    expect(def.sequences[0]?.conditions.map((c) => c.signal)).toEqual(['goals', 'xg']);
    expect(def.sequences[0]?.timeLimitSeconds).toBe(600);
  });
});
