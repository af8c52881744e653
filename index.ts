import { createApp, registerErrorHandlers } from './src/server/create-app.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  DEBUG_ENGINE,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  MAX_SESSIONS,
  NOTIFICATION_WEBHOOK_URL,
  NOTIFICATION_HISTORY_FILE,
  SNAPSHOT_DIR,
  ENGINE_DEFAULTS,
} from './src/server/runtime.js';
import { createFetchWithTimeout } from './src/utils/http-client.js';
import {
  NotificationHistory,
  createLogDispatcher,
  createWebhookDispatcher,
} from './src/utils/notification-dispatch.js';
import { createFileSnapshotStore, createMemorySnapshotStore } from './src/utils/snapshot.js';
import { SessionRegistry } from './src/utils/session-registry.js';
import { registerHealthRoutes } from './src/routes/health.js';
import { registerRiskRoutes } from './src/routes/risk.js';
import { registerSessionRoutes } from './src/routes/sessions.js';

const app = createApp({
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
});

const dispatcher = NOTIFICATION_WEBHOOK_URL
  ? createWebhookDispatcher({ url: NOTIFICATION_WEBHOOK_URL, fetchWithTimeout: createFetchWithTimeout(REQUEST_TIMEOUT_MS) })
  : createLogDispatcher();

const registry = new SessionRegistry({
  defaults: ENGINE_DEFAULTS,
  dispatcher,
  history: new NotificationHistory({ filePath: NOTIFICATION_HISTORY_FILE }),
  snapshotStore: SNAPSHOT_DIR ? createFileSnapshotStore(SNAPSHOT_DIR) : createMemorySnapshotStore(),
  maxSessions: MAX_SESSIONS,
  debug: DEBUG_ENGINE,
});

if (DEBUG_ENGINE) {
  console.log('[engine] defaults:', JSON.stringify(ENGINE_DEFAULTS));
  console.log('[engine] dispatcher:', NOTIFICATION_WEBHOOK_URL ? 'webhook' : 'log');
}

registerHealthRoutes({ app, activeSessions: () => registry.size });
registerRiskRoutes(app);
registerSessionRoutes({ app, registry });
registerErrorHandlers(app);

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT, onShutdown: () => registry.stopAll() });
}

export { app, registry };
