import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const baseSchema = z.object({
  // Telegram
  telegramBotToken: z.string().min(1),
  telegramWebhookUrl: z.string().url().optional(), // Optional: if not set, uses long polling
  telegramWebhookSecret: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,256}$/, 'must be 1-256 characters of A-Z, a-z, 0-9, _ or -')
    .optional(),

  // Database
  databaseUrl: z.string().min(1).default('file:data/chatwarden.db'),
  dbPoolSize: z.coerce.number().int().min(1).max(64).default(4),
  dbIdleTimeoutMs: z.coerce.number().int().positive().default(30_000),
  autoMigrate: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((value) => value === 'true' || value === '1'),

  // Processing
  rateLimitPerSecond: z.coerce.number().positive().default(30),
  pollTimeoutSeconds: z.coerce.number().int().min(0).max(50).default(30),
  pollLimit: z.coerce.number().int().min(1).max(100).default(100),
  maxSendAttempts: z.coerce.number().int().min(1).default(5),
  maxCommitRetries: z.coerce.number().int().min(0).default(3),
  authFailureLimit: z.coerce.number().int().min(1).default(3),
  workerConcurrency: z.coerce.number().int().min(1).default(8),
  shutdownGraceMs: z.coerce.number().int().min(0).default(10_000),
  webhookAckTimeoutMs: z.coerce.number().int().positive().default(25_000),
  conversationScope: z.enum(['chat', 'chat_user']).default('chat'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8000),
});

const configSchema = baseSchema.refine((value) => !value.telegramWebhookUrl || value.telegramWebhookSecret, {
  message: 'is required when TELEGRAM_WEBHOOK_URL is set',
  path: ['telegramWebhookSecret'],
});

const databaseSchema = baseSchema.pick({ databaseUrl: true, dbPoolSize: true, dbIdleTimeoutMs: true, logLevel: true });

export type Config = z.infer<typeof configSchema>;
export type DatabaseConfig = z.infer<typeof databaseSchema>;

type Env = Record<string, string | undefined>;

/**
 * Reads `NAME`, falling back to the trimmed contents of the file named by `NAME_FILE`
 * (container secrets are mounted that way).
 */
function secret(env: Env, key: string): string | undefined {
  const direct = env[key];
  if (direct !== undefined && direct !== '') {
    return direct;
  }

  const file = env[`${key}_FILE`];
  if (file === undefined || file === '') {
    return undefined;
  }

  try {
    const value = readFileSync(file, 'utf8').trim();
    return value === '' ? undefined : value;
  } catch (error) {
    throw new ConfigError(`Cannot read ${key}_FILE at ${file}`, { cause: error });
  }
}

export function loadConfig(env: Env = process.env): Config {
  // Helper to convert empty strings to undefined
  const value = (key: string): string | undefined => {
    const raw = env[key];
    return raw === '' ? undefined : raw;
  };

  const raw = {
    telegramBotToken: secret(env, 'TELEGRAM_BOT_TOKEN'),
    telegramWebhookUrl: value('TELEGRAM_WEBHOOK_URL'),
    telegramWebhookSecret: secret(env, 'TELEGRAM_WEBHOOK_SECRET'),
    databaseUrl: secret(env, 'DATABASE_URL'),
    dbPoolSize: value('DB_POOL_SIZE'),
    dbIdleTimeoutMs: value('DB_IDLE_TIMEOUT_MS'),
    autoMigrate: value('AUTO_MIGRATE'),
    rateLimitPerSecond: value('RATE_LIMIT_PER_SECOND'),
    pollTimeoutSeconds: value('POLL_TIMEOUT_SECONDS'),
    pollLimit: value('POLL_LIMIT'),
    maxSendAttempts: value('MAX_SEND_ATTEMPTS'),
    maxCommitRetries: value('MAX_COMMIT_RETRIES'),
    authFailureLimit: value('AUTH_FAILURE_LIMIT'),
    workerConcurrency: value('WORKER_CONCURRENCY'),
    shutdownGraceMs: value('SHUTDOWN_GRACE_MS'),
    webhookAckTimeoutMs: value('WEBHOOK_ACK_TIMEOUT_MS'),
    conversationScope: value('CONVERSATION_SCOPE'),
    logLevel: value('LOG_LEVEL'),
    host: value('HOST'),
    port: value('PORT'),
  };

  return validate(configSchema, raw);
}

/** Just the storage settings, for tools such as the migration script that never reach the platform. */
export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  const raw = {
    databaseUrl: secret(env, 'DATABASE_URL'),
    dbPoolSize: env.DB_POOL_SIZE || undefined,
    dbIdleTimeoutMs: env.DB_IDLE_TIMEOUT_MS || undefined,
    logLevel: env.LOG_LEVEL || undefined,
  };
  return validate(databaseSchema, raw);
}

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}
