/**
 * ALERTS MODULE — Fire History Model
 *
 * The unique (ruleId, matchId) index is the at-most-once guarantee.
 */

import mongoose, { Schema } from 'mongoose';
import type { FireRecord } from '../contracts/alert.types.js';

const ChannelOutcomeSchema = new Schema({
  channel: { type: String, required: true, enum: ['SMS', 'PUSH'] },
  success: { type: Boolean, required: true },
  id: { type: String },
  error: { type: String },
}, { _id: false });

const FireHistorySchema = new Schema({
  fireId: { type: String, required: true, unique: true },
  ruleId: { type: String, required: true },
  ruleName: { type: String, required: true },
  matchId: { type: String, required: true },
  message: { type: String, required: true },

  // Names and league may be '' when the feed omits them
  match: {
    homeTeam: { type: String, default: '' },
    awayTeam: { type: String, default: '' },
    homeScore: { type: Number, required: true },
    awayScore: { type: Number, required: true },
    elapsed: { type: Number, required: true },
    league: { type: String, default: '' },
  },

  status: { type: String, required: true, enum: ['PENDING', 'SENT', 'FAILED', 'SKIPPED'] },
  channels: { type: [ChannelOutcomeSchema], default: [] },
  error: { type: String },

  firedAt: { type: Number, required: true },
  dispatchedAt: { type: Number },
}, {
  collection: 'alert_fire_history',
});

FireHistorySchema.index({ ruleId: 1, matchId: 1 }, { unique: true });
FireHistorySchema.index({ firedAt: -1 });
FireHistorySchema.index({ status: 1 });

export const FireHistoryModel = mongoose.model<FireRecord>('AlertFireHistory', FireHistorySchema);
