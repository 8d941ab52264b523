/**
 * ALERTS MODULE — Rule Model
 */

import mongoose, { Schema } from 'mongoose';
import type { StoredAlertRule } from '../contracts/alert.types.js';

const AlertRuleSchema = new Schema({
  ruleId: { type: String, required: true, unique: true },
  name: { type: String, required: true },
  description: { type: String },

  // { logic, conditions, timeWindows?, sequences? }; validated on read
  definition: { type: Schema.Types.Mixed, required: true },

  target: {
    phone: { type: String },
    userId: { type: String },
  },

  leagueFilter: [{ type: String }],
  teamFilter: [{ type: String }],

  isActive: { type: Boolean, required: true, default: true },
  createdAt: { type: Number, required: true },
  updatedAt: { type: Number, required: true },
}, {
  collection: 'alert_rules',
  minimize: false,
});

AlertRuleSchema.index({ isActive: 1 });
AlertRuleSchema.index({ 'target.userId': 1 });

export const AlertRuleModel = mongoose.model<StoredAlertRule>('AlertRule', AlertRuleSchema);
