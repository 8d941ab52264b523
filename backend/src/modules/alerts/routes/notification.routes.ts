/**
 * NOTIFICATION GATEWAY
 *
 * GET /ws?userId=: every socket receives broadcasts; with a userId it
 * also receives that user's alerts. Requires @fastify/websocket.
 */

import type { FastifyInstance } from 'fastify';
import { BROADCAST, type NotificationPayload } from '../contracts/alert.types.js';
import type { NotificationHub } from '../services/notification.hub.js';
import { systemClock, type Clock } from '../../../common/clock.js';

export interface NotificationRoutesDeps {
  hub: NotificationHub;
  clock?: Clock;
}

export async function registerNotificationRoutes(app: FastifyInstance, deps: NotificationRoutesDeps): Promise<void> {
  const { hub } = deps;
  const clock = deps.clock ?? systemClock;

  app.get<{ Querystring: { userId?: string } }>('/ws', { websocket: true }, (socket, req) => {
    const userId = req.query.userId?.trim() || undefined;

    const send = (payload: NotificationPayload): void => {
      if (socket.readyState === socket.OPEN) socket.send(JSON.stringify(payload));
    };

    const unsubscribe = [hub.subscribe(BROADCAST, send)];
    if (userId) unsubscribe.push(hub.subscribe(userId, send));

    app.log.info({ userId: userId ?? null, subscribers: hub.subscriberCount() }, '[WS] Client connected');

    send({
      id: `welcome-${clock.now()}`,
      kind: 'system',
      title: 'connected',
      message: userId ? `Subscribed as ${userId}` : 'Subscribed to broadcasts',
      timestamp: clock.now(),
    });

    socket.on('message', (raw) => {
      if (raw.toString() === 'ping') socket.send('pong');
    });

    socket.on('close', () => {
      for (const off of unsubscribe) off();
      app.log.info({ userId: userId ?? null }, '[WS] Client disconnected');
    });
  });
}
