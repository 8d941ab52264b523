/**
 * SEQUENCE TRACKER
 * ================
 *
 * Per (fixture, rule, sequence) state machine:
 *
 *   IDLE ──trigger seen──▶ ACCUMULATING ──all distinct triggers seen──▶ COMPLETE
 *     ▲                          │                                         │
 *     └──────── time limit exceeded since window start (reset) ◀───────────┘
 *
 * Sequences expire, they do not pause. COMPLETE stays until the next
 * expiry reset.
 */

import { systemClock, type Clock } from '../../../common/clock.js';
import type { EvaluableRule, LeafCondition, SequenceGate, SequenceRule } from '../contracts/condition.types.js';
import { leafKey } from './condition.evaluator.js';

export type SequenceStatus = 'IDLE' | 'ACCUMULATING' | 'COMPLETE';

interface SequenceState {
  fixtureId: string;
  ruleId: string;
  sequenceIndex: number;
  observed: Set<string>;
  required: number;
  windowStart: number;
}

export interface SequenceStateView {
  fixtureId: string;
  ruleId: string;
  sequenceIndex: number;
  status: SequenceStatus;
  observed: string[];
  required: number;
  windowStart: number;
}

function stateKey(fixtureId: string, ruleId: string, index: number): string {
  return JSON.stringify([fixtureId, ruleId, index]);
}

function statusOf(state: SequenceState | undefined): SequenceStatus {
  if (!state || state.observed.size === 0) return 'IDLE';
  return state.observed.size >= state.required ? 'COMPLETE' : 'ACCUMULATING';
}

export class SequenceTracker implements SequenceGate {
  private readonly states = new Map<string, SequenceState>();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Feed one cycle for one sequence. `matches` decides whether a trigger
   * holds against the current snapshot.
   */
  observe(
    fixtureId: string,
    ruleId: string,
    sequenceIndex: number,
    sequence: SequenceRule,
    matches: (leaf: LeafCondition) => boolean,
  ): SequenceStatus {
    const now = this.clock.now();
    const key = stateKey(fixtureId, ruleId, sequenceIndex);
    const required = new Set(sequence.conditions.map(leafKey)).size;

    let state = this.states.get(key);
    if (!state) {
      state = { fixtureId, ruleId, sequenceIndex, observed: new Set(), required, windowStart: now };
      this.states.set(key, state);
    }
    state.required = required;

    if (now - state.windowStart > sequence.timeLimitSeconds * 1000) {
      state.observed.clear();
      state.windowStart = now;
    }

    for (const leaf of sequence.conditions) {
      const id = leafKey(leaf);
      if (state.observed.has(id)) continue;
      if (matches(leaf)) state.observed.add(id);
    }

    return statusOf(state);
  }

  /**
   * Feed every sequence of a rule.
   */
  observeRule(fixtureId: string, rule: EvaluableRule, matches: (leaf: LeafCondition) => boolean): SequenceStatus[] {
    return rule.sequences.map((sequence, index) => this.observe(fixtureId, rule.id, index, sequence, matches));
  }

  isComplete(fixtureId: string, ruleId: string, sequenceIndex: number): boolean {
    return this.status(fixtureId, ruleId, sequenceIndex) === 'COMPLETE';
  }

  status(fixtureId: string, ruleId: string, sequenceIndex: number): SequenceStatus {
    return statusOf(this.states.get(stateKey(fixtureId, ruleId, sequenceIndex)));
  }

  /**
   * Drops state of fixtures no longer in the live feed.
   */
  retainFixtures(activeFixtureIds: Iterable<string>): number {
    const active = new Set(activeFixtureIds);
    let removed = 0;
    for (const [key, state] of [...this.states.entries()]) {
      if (!active.has(state.fixtureId)) {
        this.states.delete(key);
        removed++;
      }
    }
    return removed;
  }

  snapshot(): SequenceStateView[] {
    return [...this.states.values()].map((state) => ({
      fixtureId: state.fixtureId,
      ruleId: state.ruleId,
      sequenceIndex: state.sequenceIndex,
      status: statusOf(state),
      observed: [...state.observed],
      required: state.required,
      windowStart: state.windowStart,
    }));
  }

  get size(): number {
    return this.states.size;
  }
}
