/**
 * ALERTS MODULE — Index
 */

// Types
export * from './contracts/alert.types.js';

// Services
export { AlertOrchestrator, buildFireRecord, ruleAppliesToMatch } from './services/alert.orchestrator.js';
export type { CycleReport, OrchestratorStatus, FireDispatcher } from './services/alert.orchestrator.js';
export { AlertDispatcher, formatSmsMessage } from './services/alert.dispatcher.js';
export { SmsSender } from './services/sms.sender.js';
export { NotificationHub } from './services/notification.hub.js';
export { compileRules, toAlertRule } from './services/rule.loader.js';

// Storage
export { MongoRuleRepository } from './storage/alert-rule.repository.js';
export { MongoFireHistoryStore } from './storage/fire-history.store.js';
export { InMemoryRuleRepository, InMemoryFireHistoryStore } from './storage/memory.stores.js';

// Routes
export { registerAlertRoutes } from './routes/alert.routes.js';
export type { AlertRoutesDeps, AlertEngineControl } from './routes/alert.routes.js';
export { registerNotificationRoutes } from './routes/notification.routes.js';
