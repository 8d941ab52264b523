/**
 * ALERT DISPATCHER
 * ================
 *
 * Delivers a fired rule to the channels its target names:
 *   - SMS   when the target has a phone and the SMS channel is configured
 *   - PUSH  when the target has a userId (NotificationHub topic)
 *
 * Returns one outcome per attempted channel. Never throws; the caller
 * records whatever comes back.
 */

import { defaultLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import type { MatchSnapshot } from '../../matches/contracts/match.types.js';
import type {
  AlertRule,
  ChannelOutcome,
  FireDispatch,
  FireStatus,
  NotificationPayload,
  PublishChannel,
  SmsChannel,
} from '../contracts/alert.types.js';

export interface DispatchResult {
  status: Exclude<FireStatus, 'PENDING'>;
  channels: ChannelOutcome[];
  error?: string;
}

export function formatSmsMessage(rule: Pick<AlertRule, 'name'>, snapshot: MatchSnapshot, message: string): string {
  return [
    `⚽ Alert: ${rule.name}`,
    `🏆 ${snapshot.league}`,
    `📊 ${snapshot.homeTeam} ${snapshot.homeScore} - ${snapshot.awayScore} ${snapshot.awayTeam}`,
    `🎯 ${message}`,
    `⏰ ${snapshot.elapsed} min`,
  ].join('\n');
}

export function summarizeOutcomes(channels: readonly ChannelOutcome[]): DispatchResult {
  if (channels.length === 0) {
    return { status: 'SKIPPED', channels: [] };
  }
  if (channels.some((c) => c.success)) {
    return { status: 'SENT', channels: [...channels] };
  }
  const error = channels
    .map((c) => `${c.channel}: ${c.error ?? 'failed'}`)
    .join('; ');
  return { status: 'FAILED', channels: [...channels], error };
}

export class AlertDispatcher {
  constructor(
    private readonly sms: SmsChannel,
    private readonly push: PublishChannel,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async dispatch(fire: FireDispatch): Promise<DispatchResult> {
    const { rule, snapshot, message } = fire;
    const outcomes: ChannelOutcome[] = [];

    if (rule.target.phone) {
      if (this.sms.isConfigured()) {
        outcomes.push(await this.sendSms(rule.target.phone, formatSmsMessage(rule, snapshot, message)));
      } else {
        this.logger.debug?.({ ruleId: rule.id }, '[AlertDispatcher] SMS not configured, skipping channel');
      }
    }

    if (rule.target.userId) {
      outcomes.push(this.sendPush(rule.target.userId, fire));
    }

    const result = summarizeOutcomes(outcomes);
    this.logger.info(
      { ruleId: rule.id, fixtureId: snapshot.fixtureId, status: result.status, channels: outcomes.length },
      '[AlertDispatcher] Dispatched',
    );
    return result;
  }

  private async sendSms(phone: string, text: string): Promise<ChannelOutcome> {
    try {
      const result = await this.sms.sendSms(phone, text);
      return { channel: 'SMS', success: result.success, id: result.id, error: result.error };
    } catch (err) {
      return { channel: 'SMS', success: false, error: errorMessage(err) };
    }
  }

  private sendPush(userId: string, fire: FireDispatch): ChannelOutcome {
    const { rule, snapshot, message, fireId } = fire;
    const payload: NotificationPayload = {
      id: fireId,
      kind: 'alert',
      title: rule.name,
      message: formatSmsMessage(rule, snapshot, message),
      fixtureId: snapshot.fixtureId,
      ruleId: rule.id,
      data: {
        homeTeam: snapshot.homeTeam,
        awayTeam: snapshot.awayTeam,
        homeScore: snapshot.homeScore,
        awayScore: snapshot.awayScore,
        elapsed: snapshot.elapsed,
        league: snapshot.league,
        trigger: message,
      },
      timestamp: snapshot.capturedAt,
    };

    try {
      const delivered = this.push.publish(userId, payload);
      return delivered > 0
        ? { channel: 'PUSH', success: true, id: fireId }
        : { channel: 'PUSH', success: false, error: 'no active subscribers' };
    } catch (err) {
      return { channel: 'PUSH', success: false, error: errorMessage(err) };
    }
  }
}
