import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { QueueStats } from '../jobs/queue/interface.js';
import type { DigestLog } from '../services/digests/log.js';
import type { NotificationIntake } from '../services/intake/notification-intake.js';
import type { SubscriptionManager } from '../services/subscriptions/manager.js';
import type { Poller } from '../workflows/poller.js';
import { basicAuth, type BasicAuthCredentials } from './middleware/auth.js';
import { digestRoutes } from './routes/digests.js';
import { healthRoutes } from './routes/health.js';
import { subscriptionRoutes } from './routes/subscriptions.js';
import { webhookRoutes } from './routes/webhook.js';

export interface AppDeps {
  intake: NotificationIntake;
  manager: SubscriptionManager;
  poller: Pick<Poller, 'poll'>;
  digestLog: DigestLog;
  /** Resource used by POST /api/subscriptions when the body names none */
  defaultResource: string;
  queueStats?: () => QueueStats;
  basicAuth?: BasicAuthCredentials;
  /** Hono access log; off in tests */
  accessLog?: boolean;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  // Middleware
  if (deps.accessLog ?? true) {
    app.use('*', logger());
  }

  // Public routes (no auth required)
  app.route('/api/health', healthRoutes({ queueStats: deps.queueStats }));
  app.route('/webhook', webhookRoutes(deps.intake));

  // Protected routes (auth required)
  app.use('/api/*', basicAuth(deps.basicAuth));

  app.route('/api/subscriptions', subscriptionRoutes(deps.manager, deps.defaultResource));
  app.route('/api', digestRoutes(deps.digestLog, deps.poller)); // /api/digests and /api/poll

  return app;
}
