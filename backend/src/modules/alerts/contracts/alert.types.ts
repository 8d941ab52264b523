/**
 * ALERTS MODULE — Types
 * =====================
 *
 * Rules, fire history and dispatch contracts. Storage and channels are
 * interfaces so the orchestrator runs the same against Mongo or in-memory.
 */

import type {
  EvaluableRule,
  RuleDefinitionDoc,
} from '../../conditions/contracts/condition.types.js';
import type { MatchSnapshot } from '../../matches/contracts/match.types.js';

// ═══════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════

export interface AlertTarget {
  phone?: string;
  userId?: string;
}

/**
 * Rule as persisted: the condition tree stays in its document form.
 */
export interface StoredAlertRule {
  ruleId: string;
  name: string;
  description?: string;
  definition: RuleDefinitionDoc;
  target: AlertTarget;
  leagueFilter: string[];  // empty = every league
  teamFilter: string[];    // empty = every team
  isActive: boolean;
  createdAt: number;
  updatedAt: number;
}

/**
 * Rule ready for evaluation; read-only for the duration of a cycle.
 */
export interface AlertRule extends EvaluableRule {
  readonly description?: string;
  readonly target: Readonly<AlertTarget>;
  readonly leagueFilter: readonly string[];
  readonly teamFilter: readonly string[];
}

export type NewAlertRuleInput = Pick<StoredAlertRule, 'name' | 'definition' | 'target'> &
  Partial<Pick<StoredAlertRule, 'description' | 'leagueFilter' | 'teamFilter' | 'isActive'>>;

export interface RuleStore {
  loadActiveRules(): Promise<AlertRule[]>;
}

export interface RuleRepository extends RuleStore {
  list(): Promise<StoredAlertRule[]>;
  get(ruleId: string): Promise<StoredAlertRule | null>;
  create(input: NewAlertRuleInput): Promise<StoredAlertRule>;
  setActive(ruleId: string, isActive: boolean): Promise<StoredAlertRule | null>;
  delete(ruleId: string): Promise<boolean>;
}

// ═══════════════════════════════════════════════════════════════
// FIRE HISTORY
// ═══════════════════════════════════════════════════════════════

export type AlertChannel = 'SMS' | 'PUSH';

export type FireStatus =
  | 'PENDING'   // claimed, dispatch in flight
  | 'SENT'      // at least one channel delivered
  | 'FAILED'    // every attempted channel failed
  | 'SKIPPED';  // no channel configured for the target

export interface ChannelOutcome {
  channel: AlertChannel;
  success: boolean;
  id?: string;
  error?: string;
}

export interface FireMatchContext {
  homeTeam: string;
  awayTeam: string;
  homeScore: number;
  awayScore: number;
  elapsed: number;
  league: string;
}

/**
 * One per (ruleId, matchId). The decision to fire stands whatever the
 * dispatch outcome.
 */
export interface FireRecord {
  fireId: string;
  ruleId: string;
  ruleName: string;
  matchId: string;
  message: string;
  match: FireMatchContext;
  status: FireStatus;
  channels: ChannelOutcome[];
  error?: string;
  firedAt: number;
  dispatchedAt?: number;
}

export interface DispatchUpdate {
  status: FireStatus;
  channels: ChannelOutcome[];
  error?: string;
  dispatchedAt: number;
}

export interface FireStats {
  total: number;
  byStatus: Record<FireStatus, number>;
  topRules: Array<{ ruleId: string; ruleName: string; count: number }>;
}

export interface FireHistoryStore {
  exists(ruleId: string, matchId: string): Promise<boolean>;
  /**
   * Insert-if-absent. False when (ruleId, matchId) already fired.
   */
  record(record: FireRecord): Promise<boolean>;
  markDispatched(fireId: string, update: DispatchUpdate): Promise<void>;
  recent(limit: number): Promise<FireRecord[]>;
  stats(): Promise<FireStats>;
}

// ═══════════════════════════════════════════════════════════════
// DISPATCH
// ═══════════════════════════════════════════════════════════════

export interface SmsResult {
  success: boolean;
  id?: string;
  error?: string;
}

export interface SmsChannel {
  isConfigured(): boolean;
  sendSms(phone: string, message: string): Promise<SmsResult>;
}

export const BROADCAST = 'broadcast';

export type NotificationKind = 'alert' | 'pattern' | 'system';

export interface NotificationPayload {
  id: string;
  kind: NotificationKind;
  title: string;
  message: string;
  fixtureId?: string;
  ruleId?: string;
  data?: Record<string, unknown>;
  timestamp: number;
}

export interface PublishChannel {
  /**
   * Returns the number of subscribers reached.
   */
  publish(topic: string, payload: NotificationPayload): number;
}

export interface FireDispatch {
  rule: AlertRule;
  snapshot: MatchSnapshot;
  message: string;
  fireId: string;
}
