import { describe, it, expect } from 'vitest';
import { createSnapshot } from '../../matches/services/snapshot.builder.js';
import { buildFireRecord } from '../services/alert.orchestrator.js';
import { FireHistoryModel } from '../storage/fire-history.model.js';

describe('FireHistoryModel', () => {
  const rule = { id: 'r-goals', name: 'Arsenal two up' };

  it('accepts a record for a match the feed sent without a league', () => {
    const snapshot = createSnapshot({ fixtureId: 7, homeTeam: 'Arsenal', awayTeam: 'Chelsea', homeScore: 2, capturedAt: 1 });
    const record = buildFireRecord(rule, snapshot, 'Arsenal goals: 2 >= 2', 1);

    expect(record.match.league).toBe('');
    expect(new FireHistoryModel(record).validateSync() ?? null).toBeNull();
  });

  it('accepts a record without team names', () => {
    const snapshot = createSnapshot({ fixtureId: 8, league: 'Premier League', capturedAt: 1 });
    const record = buildFireRecord(rule, snapshot, 'goals: 0 >= 0', 1);

    expect(record.match).toMatchObject({ homeTeam: '', awayTeam: '' });
    expect(new FireHistoryModel(record).validateSync() ?? null).toBeNull();
  });

  it('still rejects a record without a rule id', () => {
    const snapshot = createSnapshot({ fixtureId: 9, homeTeam: 'Arsenal', awayTeam: 'Chelsea', capturedAt: 1 });
    const record = buildFireRecord({ id: '', name: 'Nameless' }, snapshot, 'x', 1);

    const error = new FireHistoryModel(record).validateSync();
    expect(Object.keys(error?.errors ?? {})).toEqual(['ruleId']);
  });
});
