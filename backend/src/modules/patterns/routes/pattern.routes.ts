/**
 * PATTERN ROUTES
 */

import type { FastifyInstance } from 'fastify';
import type { PatternDetector } from '../services/pattern.detector.js';

export type PatternQueries = Pick<PatternDetector, 'getMatchPatterns' | 'getHighSeverityPatterns' | 'getEvents'>;

export async function registerPatternRoutes(app: FastifyInstance, patterns: PatternQueries): Promise<void> {
  // static segment wins over :fixtureId in the router
  app.get('/api/patterns/high-severity', async (_req, reply) => {
    const list = patterns.getHighSeverityPatterns().sort((a, b) => b.endTime - a.endTime);
    return reply.send({ ok: true, count: list.length, patterns: list });
  });

  app.get<{ Params: { fixtureId: string } }>('/api/patterns/:fixtureId', async (req, reply) => {
    const { fixtureId } = req.params;
    const list = patterns.getMatchPatterns(fixtureId);
    return reply.send({
      ok: true,
      fixtureId,
      count: list.length,
      patterns: list,
      events: patterns.getEvents(fixtureId),
    });
  });
}
