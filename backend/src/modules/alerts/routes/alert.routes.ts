/**
 * ALERT ROUTES
 * ============
 *
 * Rule management, fire history and engine control.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../../common/errors.js';
import { RuleDefinitionDocSchema } from '../../conditions/services/rule.parser.js';
import type { FireHistoryStore, RuleRepository } from '../contracts/alert.types.js';
import type { AlertOrchestrator } from '../services/alert.orchestrator.js';

export type AlertEngineControl = Pick<AlertOrchestrator, 'getStatus' | 'runOnce'>;

export interface AlertRoutesDeps {
  rules: RuleRepository;
  history: FireHistoryStore;
  engine: AlertEngineControl;
}

const CreateRuleBodySchema = z.object({
  name: z.string().trim().min(1).max(120),
  description: z.string().max(500).optional(),
  definition: RuleDefinitionDocSchema,
  target: z
    .object({
      phone: z.string().regex(/^\+?[0-9]{6,15}$/, 'phone must be digits, optionally prefixed with +').optional(),
      userId: z.string().min(1).optional(),
    })
    .default({}),
  leagueFilter: z.array(z.string()).optional(),
  teamFilter: z.array(z.string()).optional(),
  isActive: z.boolean().optional(),
});

const ToggleBodySchema = z
  .object({ isActive: z.boolean().optional() })
  .nullish();

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ValidationError(issues);
  }
  return result.data;
}

export async function registerAlertRoutes(app: FastifyInstance, deps: AlertRoutesDeps): Promise<void> {
  const { rules, history, engine } = deps;

  // ═══════════════════════════════════════════════════════════════
  // RULES
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/alerts/rules', async (_req, reply) => {
    const list = await rules.list();
    return reply.send({ ok: true, count: list.length, rules: list });
  });

  app.post('/api/alerts/rules', async (req, reply) => {
    const body = parseOrThrow(CreateRuleBodySchema, req.body);
    const rule = await rules.create(body);
    return reply.status(201).send({ ok: true, rule });
  });

  app.patch<{ Params: { ruleId: string } }>('/api/alerts/rules/:ruleId/toggle', async (req, reply) => {
    const { ruleId } = req.params;
    const body = parseOrThrow(ToggleBodySchema, req.body);

    const existing = await rules.get(ruleId);
    if (!existing) throw new NotFoundError(`Rule ${ruleId} not found`);

    const rule = await rules.setActive(ruleId, body?.isActive ?? !existing.isActive);
    if (!rule) throw new NotFoundError(`Rule ${ruleId} not found`);

    return reply.send({ ok: true, rule });
  });

  app.delete<{ Params: { ruleId: string } }>('/api/alerts/rules/:ruleId', async (req, reply) => {
    const deleted = await rules.delete(req.params.ruleId);
    if (!deleted) throw new NotFoundError(`Rule ${req.params.ruleId} not found`);
    return reply.send({ ok: true, deleted: req.params.ruleId });
  });

  // ═══════════════════════════════════════════════════════════════
  // HISTORY
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/alerts/history', async (req, reply) => {
    const { limit } = parseOrThrow(HistoryQuerySchema, req.query);
    const fires = await history.recent(limit);
    return reply.send({ ok: true, count: fires.length, fires });
  });

  app.get('/api/alerts/stats', async (_req, reply) => {
    const stats = await history.stats();
    return reply.send({ ok: true, stats });
  });

  // ═══════════════════════════════════════════════════════════════
  // ENGINE
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/alerts/engine/status', async (_req, reply) => {
    return reply.send({ ok: true, status: engine.getStatus() });
  });

  app.post('/api/alerts/engine/run', async (_req, reply) => {
    const report = await engine.runOnce();
    return reply.send({ ok: true, report });
  });
}
