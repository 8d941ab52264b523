/**
 * Live match alert server
 *
 * Wires config → storage → upstream client → engine → HTTP, then runs
 * until SIGINT/SIGTERM. Storage being unreachable at boot is fatal; every
 * later failure is handled per cycle by the engine.
 */

import { buildApp } from './app.js';
import { env } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import {
  AlertDispatcher,
  AlertOrchestrator,
  MongoFireHistoryStore,
  MongoRuleRepository,
  NotificationHub,
  SmsSender,
} from './modules/alerts/index.js';
import { FootballApiClient } from './modules/matches/clients/football-api.client.js';
import { MatchDataService } from './modules/matches/services/match.data.service.js';
import { PatternDetector } from './modules/patterns/index.js';
import { SequenceTracker } from './modules/conditions/services/sequence.tracker.js';

async function main(): Promise<void> {
  console.log('[Server] Connecting to MongoDB...');
  await connectMongo(env.MONGO_URL, env.DB_NAME);
  await ensureIndexes();

  const hub = new NotificationHub();
  const rules = new MongoRuleRepository();
  const history = new MongoFireHistoryStore();
  const detector = new PatternDetector({
    bufferSize: env.PATTERN_BUFFER_SIZE,
    retentionMs: env.PATTERN_RETENTION_MS,
  });

  // app is built before the engine so the engine can log through pino
  let engine: AlertOrchestrator | null = null;
  const engineControl = {
    getStatus: () => requireEngine().getStatus(),
    runOnce: () => requireEngine().runOnce(),
  };
  function requireEngine(): AlertOrchestrator {
    if (!engine) throw new Error('Alert engine not initialized');
    return engine;
  }
  let source: MatchDataService | null = null;
  const feedStatus = {
    stats: () => requireSource().stats(),
  };
  function requireSource(): MatchDataService {
    if (!source) throw new Error('Match data service not initialized');
    return source;
  }

  const app = buildApp(
    { rules, history, engine: engineControl, patterns: detector, hub, feed: feedStatus },
    {
      logLevel: env.LOG_LEVEL,
      corsOrigins: env.CORS_ORIGINS,
      wsEnabled: env.WS_ENABLED,
      production: env.NODE_ENV === 'production',
    },
  );
  const logger = app.log;

  const footballApi = new FootballApiClient(
    {
      baseUrl: env.FOOTBALL_API_URL,
      apiKey: env.FOOTBALL_API_KEY,
      maxConcurrent: env.FOOTBALL_API_MAX_CONCURRENT,
      minTimeMs: env.FOOTBALL_API_MIN_TIME_MS,
      maxRetries: env.FOOTBALL_API_MAX_RETRIES,
    },
    logger,
  );
  const matchData = new MatchDataService(footballApi, {
    batchSize: env.FOOTBALL_API_MAX_CONCURRENT,
    logger,
  });
  source = matchData;

  const sms = new SmsSender(
    {
      enabled: env.SMS_ENABLED,
      accountSid: env.TWILIO_ACCOUNT_SID,
      authToken: env.TWILIO_AUTH_TOKEN,
      fromNumber: env.TWILIO_FROM_NUMBER,
      timeoutMs: 10_000,
    },
    logger,
  );

  engine = new AlertOrchestrator(
    {
      source: matchData,
      rules,
      history,
      dispatcher: new AlertDispatcher(sms, hub, logger),
      notifications: hub,
      tracker: new SequenceTracker(),
      detector,
      logger,
    },
    {
      intervalMs: env.ALERT_POLL_INTERVAL_MS,
      errorBackoffMs: env.ALERT_ERROR_BACKOFF_MS,
    },
  );

  const cacheSweep = setInterval(() => matchData.cleanupExpired(), 5 * 60 * 1000);
  cacheSweep.unref();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, '[Server] Shutting down...');
    clearInterval(cacheSweep);
    await engine?.stop();
    await app.close();
    await disconnectMongo();
    logger.info({}, '[Server] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[Server] Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });

  if (env.ALERT_ENGINE_ENABLED) {
    engine.start();
  } else {
    logger.warn({}, '[Server] Alert engine disabled (ALERT_ENGINE_ENABLED=false)');
  }

  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  Live match alerts listening on ${env.HOST}:${env.PORT}`);
  console.log('═══════════════════════════════════════════════════════════════');
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
