// Inbox Digest - Main Entry Point
import { serve } from '@hono/node-server';
import { createApp } from './api/app.js';
import { graphPrincipal, loadConfig, pushEnabled, watchedResource } from './config/index.js';
import { openDatabase } from './db/index.js';
import { DigestHandler, MemoryJobQueue, WorkerPool } from './jobs/index.js';
import { createSecretCodec } from './lib/encryption.js';
import { errorKindOf, errorMessage } from './lib/errors.js';
import { Scheduler } from './scheduler/index.js';
import { SqliteDigestLog } from './services/digests/index.js';
import { GraphClient, GraphTokenProvider } from './services/graph/index.js';
import { DedupCache, NotificationIntake } from './services/intake/index.js';
import { createNotificationSink } from './services/notifiers/index.js';
import { SqliteSubscriptionStore, SubscriptionManager, SubscriptionTable } from './services/subscriptions/index.js';
import { createSummarizer } from './services/summarizer/index.js';
import { DigestPipeline, Poller } from './workflows/index.js';

async function main() {
  console.log('Inbox Digest starting...');

  const config = loadConfig();
  const { server: serverConfig, graph: graphConfig, subscriptions: subConfig, digest: digestConfig } = config;

  if (!graphConfig.clientId) {
    throw new Error('MICROSOFT_CLIENT_ID is required');
  }

  console.log('Opening database...');
  const database = openDatabase(config.database.url);

  // Blocks on first use (consent in delegated mode); an AuthError here is fatal
  const tokens = new GraphTokenProvider({
    credentials: {
      tenantId: graphConfig.tenantId,
      clientId: graphConfig.clientId,
      clientSecret: graphConfig.clientSecret,
    },
    mode: graphConfig.authMode,
    tokenPath: graphConfig.tokenPath,
    timeoutMs: graphConfig.requestTimeoutMs,
  });
  await tokens.getToken();
  console.log(`✓ Authenticated with Microsoft Graph (${graphConfig.authMode} mode)`);

  const graph = new GraphClient({
    tokens,
    principal: graphPrincipal(config),
    timeoutMs: graphConfig.requestTimeoutMs,
    maxBodyChars: digestConfig.maxInputChars,
  });

  const digestLog = new SqliteDigestLog(database.db);
  const pipeline = new DigestPipeline({
    gateway: graph,
    summarizer: createSummarizer({ ...config.summarizer, maxInputChars: digestConfig.maxInputChars }),
    sink: createNotificationSink(config.notifier),
    log: digestLog,
    maxInputChars: digestConfig.maxInputChars,
  });
  const poller = new Poller({
    gateway: graph,
    pipeline,
    log: digestLog,
    folder: digestConfig.folder,
    maxMessages: digestConfig.maxMessagesPerPoll,
  });

  const policy = {
    maxLifetimeMinutes: subConfig.maxLifetimeMinutes,
    renewalFraction: subConfig.renewalFraction,
    minRenewalWindowMinutes: subConfig.minRenewalWindowMinutes,
  };
  const table = new SubscriptionTable(
    new SqliteSubscriptionStore(database.db, createSecretCodec(subConfig.storageKey)),
    policy
  );

  const push = pushEnabled(config);
  const resource = watchedResource(config);
  if (subConfig.mode === 'push' && !push) {
    console.warn('PUBLIC_BASE_URL is not set, falling back to polling');
  }

  const baseUrl = (serverConfig.publicBaseUrl ?? `http://localhost:${serverConfig.port}`).replace(/\/+$/, '');
  const manager = new SubscriptionManager({
    provider: graph,
    table,
    policy,
    notificationUrl: `${baseUrl}/webhook/notifications`,
    lifecycleNotificationUrl: `${baseUrl}/webhook/lifecycle`,
    changeType: subConfig.changeType,
    lifetimeMinutes: subConfig.lifetimeMinutes,
  });

  const scheduler = new Scheduler({
    manager,
    poller,
    digestLog,
    pushResource: push ? resource : undefined,
    pollingEnabled: !push,
    sweepIntervalMs: subConfig.sweepIntervalMs,
    pollIntervalMs: digestConfig.fallbackPollIntervalMs,
    retentionDays: digestConfig.retentionDays,
  });

  const queue = new MemoryJobQueue({ capacity: config.queue.capacity, maxAttempts: config.queue.maxAttempts });
  const intake = new NotificationIntake({
    table,
    dedup: new DedupCache({
      windowMs: subConfig.dedupWindowMinutes * 60 * 1000,
      maxEntries: subConfig.dedupMaxEntries,
    }),
    queue,
    triggers: scheduler,
    maxAttempts: config.queue.maxAttempts,
  });

  const workerPool = new WorkerPool({
    queue,
    handler: new DigestHandler(pipeline),
    workers: config.queue.workers,
    shutdownGraceMs: config.queue.shutdownGraceMs,
  });

  const app = createApp({
    intake,
    manager,
    poller,
    digestLog,
    defaultResource: resource,
    queueStats: () => queue.stats(),
    basicAuth:
      serverConfig.basicUser && serverConfig.basicPassword
        ? { username: serverConfig.basicUser, password: serverConfig.basicPassword }
        : undefined,
  });

  manager.restore();

  console.log('Starting worker pool...');
  workerPool.start();

  // The provider validates the callback URL while creating a subscription, so serve first
  console.log(`Starting HTTP server on http://${serverConfig.host}:${serverConfig.port}`);
  const server = serve({ fetch: app.fetch, port: serverConfig.port, hostname: serverConfig.host });

  if (push) {
    try {
      await manager.ensure(resource);
    } catch (error) {
      console.error(`Subscription setup failed (${errorKindOf(error)}): ${errorMessage(error)}`);
      if (errorKindOf(error) === 'auth') throw error;
      scheduler.triggerPoll('subscription setup failed');
    }
  }

  console.log('Starting scheduler...');
  scheduler.start();
  if (!push) {
    await scheduler.pollNow('startup');
  }

  console.log(`Inbox Digest ready! (${push ? 'push' : 'poll'} mode)`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log(`${signal} received, shutting down gracefully...`);
    scheduler.stop();
    await workerPool.stop();
    tokens.stop();
    server.close();
    database.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
