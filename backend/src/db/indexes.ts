/**
 * Database Indexes
 * Run on startup. A failure here is a startup failure: the fire-history
 * unique index is what makes at-most-once firing hold across workers.
 */

import { AlertRuleModel } from '../modules/alerts/storage/alert-rule.model.js';
import { FireHistoryModel } from '../modules/alerts/storage/fire-history.model.js';

export async function ensureIndexes(): Promise<void> {
  await AlertRuleModel.syncIndexes();
  console.log('[DB] alert_rules indexes ensured');

  await FireHistoryModel.syncIndexes();
  console.log('[DB] alert_fire_history indexes ensured');
}
