/**
 * ALERTS MODULE — Fire History (MongoDB)
 */

import { FireHistoryModel } from './fire-history.model.js';
import { isDuplicateKeyError } from '../../../db/mongoose.js';
import type {
  DispatchUpdate,
  FireHistoryStore,
  FireRecord,
  FireStats,
  FireStatus,
} from '../contracts/alert.types.js';

export function emptyStatusCounts(): Record<FireStatus, number> {
  return { PENDING: 0, SENT: 0, FAILED: 0, SKIPPED: 0 };
}

function toRecord(doc: FireRecord): FireRecord {
  return {
    fireId: doc.fireId,
    ruleId: doc.ruleId,
    ruleName: doc.ruleName,
    matchId: doc.matchId,
    message: doc.message,
    match: { ...doc.match },
    status: doc.status,
    channels: (doc.channels ?? []).map((c) => ({ ...c })),
    error: doc.error,
    firedAt: doc.firedAt,
    dispatchedAt: doc.dispatchedAt,
  };
}

export class MongoFireHistoryStore implements FireHistoryStore {
  async exists(ruleId: string, matchId: string): Promise<boolean> {
    const found = await FireHistoryModel.exists({ ruleId, matchId });
    return found !== null;
  }

  async record(record: FireRecord): Promise<boolean> {
    try {
      await FireHistoryModel.create(record);
      return true;
    } catch (err) {
      if (isDuplicateKeyError(err)) return false;
      throw err;
    }
  }

  async markDispatched(fireId: string, update: DispatchUpdate): Promise<void> {
    const $set: Partial<FireRecord> = {
      status: update.status,
      channels: update.channels,
      dispatchedAt: update.dispatchedAt,
    };
    if (update.error !== undefined) $set.error = update.error;

    await FireHistoryModel.updateOne({ fireId }, { $set });
  }

  async recent(limit: number): Promise<FireRecord[]> {
    const docs = await FireHistoryModel.find({}).sort({ firedAt: -1 }).limit(limit).lean<FireRecord[]>();
    return docs.map(toRecord);
  }

  async stats(): Promise<FireStats> {
    const [total, statusRows, ruleRows] = await Promise.all([
      FireHistoryModel.countDocuments({}),
      FireHistoryModel.aggregate<{ _id: FireStatus; count: number }>([
        { $group: { _id: '$status', count: { $sum: 1 } } },
      ]),
      FireHistoryModel.aggregate<{ _id: string; ruleName: string; count: number }>([
        { $group: { _id: '$ruleId', ruleName: { $last: '$ruleName' }, count: { $sum: 1 } } },
        { $sort: { count: -1 } },
        { $limit: 10 },
      ]),
    ]);

    const byStatus = emptyStatusCounts();
    for (const row of statusRows) byStatus[row._id] = row.count;

    return {
      total,
      byStatus,
      topRules: ruleRows.map((r) => ({ ruleId: r._id, ruleName: r.ruleName, count: r.count })),
    };
  }
}
