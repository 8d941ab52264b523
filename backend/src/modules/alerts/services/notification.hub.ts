/**
 * NOTIFICATION HUB
 *
 * In-process pub/sub between the engine and connected clients. Topics are
 * user ids plus BROADCAST. A throwing subscriber is dropped from the count
 * and logged; it never affects the publisher.
 */

import { defaultLogger, type Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import type { NotificationPayload, PublishChannel } from '../contracts/alert.types.js';

export type NotificationListener = (payload: NotificationPayload) => void;

export class NotificationHub implements PublishChannel {
  private readonly topics = new Map<string, Set<NotificationListener>>();

  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * Returns the unsubscribe function.
   */
  subscribe(topic: string, listener: NotificationListener): () => void {
    let listeners = this.topics.get(topic);
    if (!listeners) {
      listeners = new Set();
      this.topics.set(topic, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.topics.get(topic);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.topics.delete(topic);
    };
  }

  publish(topic: string, payload: NotificationPayload): number {
    const listeners = this.topics.get(topic);
    if (!listeners) return 0;

    let delivered = 0;
    for (const listener of [...listeners]) {
      try {
        listener(payload);
        delivered++;
      } catch (err) {
        this.logger.warn({ topic, error: errorMessage(err) }, '[NotificationHub] Listener failed');
      }
    }
    return delivered;
  }

  subscriberCount(topic?: string): number {
    if (topic !== undefined) return this.topics.get(topic)?.size ?? 0;
    let total = 0;
    for (const listeners of this.topics.values()) total += listeners.size;
    return total;
  }
}
