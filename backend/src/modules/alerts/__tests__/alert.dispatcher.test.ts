import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from '../../../common/logger.js';
import { createSnapshot } from '../../matches/services/snapshot.builder.js';
import { parseRuleDefinition } from '../../conditions/services/rule.parser.js';
import type { AlertRule, AlertTarget, SmsChannel, SmsResult } from '../contracts/alert.types.js';
import { AlertDispatcher, formatSmsMessage, summarizeOutcomes } from '../services/alert.dispatcher.js';
import { NotificationHub } from '../services/notification.hub.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const snapshot = createSnapshot({
  fixtureId: 77,
  homeTeam: 'Arsenal',
  awayTeam: 'Chelsea',
  homeScore: 2,
  awayScore: 1,
  elapsed: 83,
  league: 'Premier League',
  status: '2H',
  capturedAt: 1_000,
});

function rule(target: AlertTarget): AlertRule {
  const definition = parseRuleDefinition({
    logic: 'AND',
    conditions: [{ signal: 'goals', team: 'Arsenal', operator: '>=', value: 2 }],
  });
  return {
    id: 'r-1',
    name: 'Arsenal late lead',
    ...definition,
    target,
    leagueFilter: [],
    teamFilter: [],
  };
}

class FakeSms implements SmsChannel {
  configured = true;
  result: SmsResult = { success: true, id: 'SM-1' };
  sent: Array<{ phone: string; message: string }> = [];

  isConfigured(): boolean {
    return this.configured;
  }

  async sendSms(phone: string, message: string): Promise<SmsResult> {
    this.sent.push({ phone, message });
    return this.result;
  }
}

describe('formatSmsMessage', () => {
  it('renders the alert card', () => {
    expect(formatSmsMessage({ name: 'Arsenal late lead' }, snapshot, 'Arsenal goals: 2 >= 2')).toBe(
      [
        '⚽ Alert: Arsenal late lead',
        '🏆 Premier League',
        '📊 Arsenal 2 - 1 Chelsea',
        '🎯 Arsenal goals: 2 >= 2',
        '⏰ 83 min',
      ].join('\n'),
    );
  });
});

describe('summarizeOutcomes', () => {
  it('is SKIPPED with no channels, SENT with any success, FAILED otherwise', () => {
    expect(summarizeOutcomes([]).status).toBe('SKIPPED');
    expect(
      summarizeOutcomes([
        { channel: 'SMS', success: false, error: 'x' },
        { channel: 'PUSH', success: true },
      ]).status,
    ).toBe('SENT');
    expect(
      summarizeOutcomes([
        { channel: 'SMS', success: false, error: 'invalid number' },
        { channel: 'PUSH', success: false },
      ]),
    ).toEqual({
      status: 'FAILED',
      channels: [
        { channel: 'SMS', success: false, error: 'invalid number' },
        { channel: 'PUSH', success: false },
      ],
      error: 'SMS: invalid number; PUSH: failed',
    });
  });
});

describe('AlertDispatcher', () => {
  let sms: FakeSms;
  let hub: NotificationHub;
  let dispatcher: AlertDispatcher;

  beforeEach(() => {
    vi.clearAllMocks();
    sms = new FakeSms();
    hub = new NotificationHub(mockLogger);
    dispatcher = new AlertDispatcher(sms, hub, mockLogger);
  });

  it('sends SMS and push to a target with both', async () => {
    const received: string[] = [];
    hub.subscribe('user-1', (payload) => received.push(payload.title));

    const result = await dispatcher.dispatch({
      rule: rule({ phone: '+15550001111', userId: 'user-1' }),
      snapshot,
      message: 'Arsenal goals: 2 >= 2',
      fireId: 'fire-1',
    });

    expect(result).toEqual({
      status: 'SENT',
      channels: [
        { channel: 'SMS', success: true, id: 'SM-1', error: undefined },
        { channel: 'PUSH', success: true, id: 'fire-1' },
      ],
    });
    expect(sms.sent).toHaveLength(1);
    expect(sms.sent[0]?.phone).toBe('+15550001111');
    expect(sms.sent[0]?.message).toContain('🎯 Arsenal goals: 2 >= 2');
    expect(received).toEqual(['Arsenal late lead']);
  });

  it('skips SMS when the channel is not configured', async () => {
    sms.configured = false;

    const result = await dispatcher.dispatch({
      rule: rule({ phone: '+15550001111' }),
      snapshot,
      message: 'm',
      fireId: 'fire-2',
    });

    expect(result).toEqual({ status: 'SKIPPED', channels: [] });
    expect(sms.sent).toEqual([]);
  });

  it('reports a failed SMS without throwing', async () => {
    sms.result = { success: false, error: 'invalid number' };

    const result = await dispatcher.dispatch({
      rule: rule({ phone: '+15550001111' }),
      snapshot,
      message: 'm',
      fireId: 'fire-3',
    });

    expect(result.status).toBe('FAILED');
    expect(result.error).toBe('SMS: invalid number');
  });

  it('turns a throwing SMS channel into a failed outcome', async () => {
    vi.spyOn(sms, 'sendSms').mockRejectedValue(new Error('socket hang up'));

    const result = await dispatcher.dispatch({
      rule: rule({ phone: '+15550001111' }),
      snapshot,
      message: 'm',
      fireId: 'fire-4',
    });

    expect(result.channels).toEqual([{ channel: 'SMS', success: false, error: 'socket hang up' }]);
  });

  it('fails push when the user has no open connection', async () => {
    const result = await dispatcher.dispatch({
      rule: rule({ userId: 'offline-user' }),
      snapshot,
      message: 'm',
      fireId: 'fire-5',
    });

    expect(result.channels).toEqual([{ channel: 'PUSH', success: false, error: 'no active subscribers' }]);
    expect(result.status).toBe('FAILED');
  });
});
