import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from '../../../common/logger.js';
import { BROADCAST, type NotificationPayload } from '../contracts/alert.types.js';
import { NotificationHub } from '../services/notification.hub.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const payload: NotificationPayload = {
  id: 'n-1',
  kind: 'system',
  title: 'hello',
  message: 'world',
  timestamp: 0,
};

describe('NotificationHub', () => {
  let hub: NotificationHub;

  beforeEach(() => {
    vi.clearAllMocks();
    hub = new NotificationHub(mockLogger);
  });

  it('delivers only to subscribers of the topic', () => {
    const user = vi.fn();
    const everyone = vi.fn();
    hub.subscribe('user-1', user);
    hub.subscribe(BROADCAST, everyone);

    expect(hub.publish('user-1', payload)).toBe(1);
    expect(user).toHaveBeenCalledWith(payload);
    expect(everyone).not.toHaveBeenCalled();

    expect(hub.publish('user-2', payload)).toBe(0);
  });

  it('stops delivering after unsubscribe', () => {
    const listener = vi.fn();
    const off = hub.subscribe(BROADCAST, listener);
    off();

    expect(hub.publish(BROADCAST, payload)).toBe(0);
    expect(hub.subscriberCount()).toBe(0);
  });

  it('isolates a throwing listener', () => {
    hub.subscribe(BROADCAST, () => {
      throw new Error('closed socket');
    });
    const healthy = vi.fn();
    hub.subscribe(BROADCAST, healthy);

    expect(hub.publish(BROADCAST, payload)).toBe(1);
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { topic: BROADCAST, error: 'closed socket' },
      '[NotificationHub] Listener failed',
    );
  });
});
