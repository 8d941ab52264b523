import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import fastifyWebsocket from '@fastify/websocket';
import { AppError } from './common/errors.js';
import { isMongoConnected } from './db/mongoose.js';
import {
  registerAlertRoutes,
  registerNotificationRoutes,
  type AlertEngineControl,
  type FireHistoryStore,
  type NotificationHub,
  type RuleRepository,
} from './modules/alerts/index.js';
import type { MatchDataStats } from './modules/matches/services/match.data.service.js';
import { registerPatternRoutes, type PatternQueries } from './modules/patterns/index.js';

export interface MatchFeedStatus {
  stats(): MatchDataStats;
}

export interface AppDeps {
  rules: RuleRepository;
  history: FireHistoryStore;
  engine: AlertEngineControl;
  patterns: PatternQueries;
  hub: NotificationHub;
  feed?: MatchFeedStatus;
}

export interface AppOptions {
  logLevel: string;
  corsOrigins: string;
  wsEnabled: boolean;
  /** Hide internal error messages from clients */
  production: boolean;
}

const DEFAULT_OPTIONS: AppOptions = {
  logLevel: 'info',
  corsOrigins: '*',
  wsEnabled: true,
  production: false,
};

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps, overrides: Partial<AppOptions> = {}): FastifyInstance {
  const options = { ...DEFAULT_OPTIONS, ...overrides };

  const app = Fastify({
    logger: {
      level: options.logLevel,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: options.corsOrigins === '*' ? true : options.corsOrigins.split(','),
    credentials: true,
  });

  if (options.wsEnabled) {
    app.register(fastifyWebsocket, {
      options: { maxPayload: 1048576 },
    });
  }

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        ok: false,
        error: err.code ?? 'BAD_REQUEST',
        message: err.message,
      });
    }

    app.log.error(err);
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: options.production ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => {
    const engine = deps.engine.getStatus();
    return {
      ok: true,
      timestamp: new Date().toISOString(),
      mongo: isMongoConnected(),
      engine: {
        running: engine.running,
        cycles: engine.cycles,
        consecutiveErrors: engine.consecutiveErrors,
        lastCycleAt: engine.lastCycle?.finishedAt ?? null,
      },
      feed: deps.feed?.stats() ?? null,
    };
  });

  app.register(async (instance) => {
    await registerAlertRoutes(instance, { rules: deps.rules, history: deps.history, engine: deps.engine });
    await registerPatternRoutes(instance, deps.patterns);
  });

  if (options.wsEnabled) {
    app.register(async (instance) => {
      await registerNotificationRoutes(instance, { hub: deps.hub });
    });
  }

  return app;
}
