// Configuration management: config/app.yml merged with environment variable overrides
import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import 'dotenv/config';

const ConfigSchema = z.object({
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().default(3000),
    /** Public HTTPS base URL the provider calls back on; push mode needs it */
    publicBaseUrl: z.string().url().optional(),
    basicUser: z.string().optional(),
    basicPassword: z.string().optional(),
  }).default({}),
  database: z.object({
    url: z.string().default('./data/inbox-digest.db'),
  }).default({}),
  graph: z.object({
    tenantId: z.string().default('common'),
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    authMode: z.enum(['delegated', 'app']).default('delegated'),
    /** Mailbox owner for app mode (users/{targetUser}) */
    targetUser: z.string().optional(),
    tokenPath: z.string().default('config/token.json'),
    requestTimeoutMs: z.number().int().positive().default(10_000),
  }).default({}),
  subscriptions: z.object({
    mode: z.enum(['push', 'poll']).default('push'),
    /** Defaults to the watched folder's messages under the mailbox principal */
    resource: z.string().optional(),
    changeType: z.string().default('created'),
    lifetimeMinutes: z.number().int().positive().default(4230),
    maxLifetimeMinutes: z.number().int().positive().default(4230),
    renewalFraction: z.number().min(0).max(1).default(0.2),
    minRenewalWindowMinutes: z.number().nonnegative().default(10),
    sweepIntervalMs: z.number().int().positive().default(5 * 60 * 1000),
    dedupWindowMinutes: z.number().positive().default(15),
    dedupMaxEntries: z.number().int().positive().default(10_000),
    /** 32 byte hex key; client-state secrets are encrypted at rest when set */
    storageKey: z.string().optional(),
  }).default({}),
  queue: z.object({
    capacity: z.number().int().positive().default(500),
    workers: z.number().int().positive().default(3),
    maxAttempts: z.number().int().positive().default(3),
    shutdownGraceMs: z.number().int().nonnegative().default(10_000),
  }).default({}),
  digest: z.object({
    folder: z.string().default('inbox'),
    maxInputChars: z.number().int().positive().default(4000),
    maxMessagesPerPoll: z.number().int().positive().default(10),
    fallbackPollIntervalMs: z.number().int().positive().default(15 * 60 * 1000),
    retentionDays: z.number().int().positive().default(7),
  }).default({}),
  summarizer: z.object({
    mode: z.enum(['llm', 'local']).default('llm'),
    model: z.string().default('google/gemini-1.5-flash'),
  }).default({}),
  notifier: z.object({
    type: z.enum(['console', 'telegram']).default('console'),
    maxLength: z.number().int().positive().optional(),
    telegramBotToken: z.string().optional(),
    telegramChatId: z.string().optional(),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function int(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function float(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

function envOverrides(env: Env) {
  return {
    server: {
      host: env.HOST,
      port: int(env.PORT),
      publicBaseUrl: env.PUBLIC_BASE_URL,
      basicUser: env.HTTP_BASIC_USER,
      basicPassword: env.HTTP_BASIC_PASSWORD,
    },
    database: {
      url: env.DATABASE_URL,
    },
    graph: {
      tenantId: env.MICROSOFT_TENANT_ID,
      clientId: env.MICROSOFT_CLIENT_ID,
      clientSecret: env.MICROSOFT_CLIENT_SECRET,
      authMode: env.AUTH_MODE,
      targetUser: env.TARGET_EMAIL_ADDRESS,
      tokenPath: env.GRAPH_TOKEN_PATH,
      requestTimeoutMs: int(env.GRAPH_TIMEOUT_MS),
    },
    subscriptions: {
      mode: env.SUBSCRIPTION_MODE,
      resource: env.SUBSCRIPTION_RESOURCE,
      lifetimeMinutes: int(env.SUBSCRIPTION_LIFETIME_MINUTES),
      renewalFraction: float(env.RENEWAL_FRACTION),
      minRenewalWindowMinutes: float(env.MIN_RENEWAL_WINDOW_MINUTES),
      dedupWindowMinutes: float(env.DEDUP_WINDOW_MINUTES),
      storageKey: env.SUBSCRIPTION_STORAGE_KEY,
    },
    queue: {
      capacity: int(env.QUEUE_CAPACITY),
      workers: int(env.WORKERS),
    },
    digest: {
      maxMessagesPerPoll: int(env.MAX_EMAILS),
      fallbackPollIntervalMs: int(env.POLL_INTERVAL_MS),
    },
    summarizer: {
      mode: env.SUMMARIZER_MODE,
      model: env.SUMMARIZER_MODEL,
    },
    notifier: {
      type: env.NOTIFIER_TYPE,
      maxLength: int(env.NOTIFIER_MAX_LENGTH),
      telegramBotToken: env.TELEGRAM_BOT_TOKEN,
      telegramChatId: env.TELEGRAM_CHAT_ID,
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const value = source[key];
    const existing = output[key];
    if (isPlainObject(value)) {
      output[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
    } else {
      output[key] = value;
    }
  }
  return output;
}

export function removeUndefined(value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }

  const clean: Record<string, unknown> = {};
  for (const key of Object.keys(value)) {
    const inner = removeUndefined(value[key]);
    if (inner !== undefined) {
      clean[key] = inner;
    }
  }
  return Object.keys(clean).length > 0 ? clean : undefined;
}

function readYaml(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    console.warn(`No ${path} found, using defaults and environment variables`);
    return {};
  }

  const parsed: unknown = parse(readFileSync(path, 'utf-8'));
  return isPlainObject(parsed) ? parsed : {};
}

export interface LoadConfigOptions {
  path?: string;
  env?: Env;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const path = options.path ?? env.CONFIG_PATH ?? 'config/app.yml';

  const overrides = removeUndefined(envOverrides(env));
  const merged = deepMerge(readYaml(path), isPlainObject(overrides) ? overrides : {});

  return ConfigSchema.parse(merged);
}

/**
 * Mailbox path segment: "me" for delegated auth, "users/{address}" for app auth
 */
export function graphPrincipal(config: Config): string {
  if (config.graph.authMode === 'app') {
    if (!config.graph.targetUser) {
      throw new Error('TARGET_EMAIL_ADDRESS is required when AUTH_MODE=app');
    }
    return `users/${config.graph.targetUser}`;
  }
  return 'me';
}

export function watchedResource(config: Config): string {
  return (
    config.subscriptions.resource ??
    `${graphPrincipal(config)}/mailFolders/${config.digest.folder}/messages`
  );
}

/** Push needs a public callback URL; without one the service polls */
export function pushEnabled(config: Config): boolean {
  return config.subscriptions.mode === 'push' && config.server.publicBaseUrl !== undefined;
}
