// Load environment variables first
import 'dotenv/config';

import { loadConfig, type Config } from './config/index.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { ConfigError, EXIT_CODES, TransientSourceError, exitCodeFor } from './utils/errors.js';
import { DEFAULT_BACKOFF, withRetry } from './utils/retry.js';
import { ConnectionPool, resolveDatabasePath } from './persistence/database.js';
import { ConversationRepository } from './persistence/repositories/ConversationRepository.js';
import { OutboundRepository } from './persistence/repositories/OutboundRepository.js';
import { ArchiveRepository } from './persistence/repositories/ArchiveRepository.js';
import { CursorRepository } from './persistence/repositories/CursorRepository.js';
import { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import { PollingUpdateSource } from './sources/PollingUpdateSource.js';
import { WebhookUpdateSource } from './sources/WebhookUpdateSource.js';
import type { UpdateSource } from './ports/UpdateSource.js';
import { Dispatcher } from './core/dispatch/Dispatcher.js';
import { createDefaultFlow } from './core/flows/defaultFlow.js';
import { UpdateProcessor } from './core/engine/UpdateProcessor.js';
import { TokenBucket } from './core/outbound/TokenBucket.js';
import { OutboundSender } from './core/outbound/OutboundSender.js';
import { Supervisor } from './supervisor/Supervisor.js';
import { closeServer, createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

function webhookSettings(config: Config): { url: string; secret: string } | null {
  if (!config.telegramWebhookUrl) {
    return null;
  }
  if (!config.telegramWebhookSecret) {
    throw new ConfigError('TELEGRAM_WEBHOOK_SECRET is required when TELEGRAM_WEBHOOK_URL is set');
  }
  return { url: config.telegramWebhookUrl, secret: config.telegramWebhookSecret };
}

/** Retries platform calls that failed for transient reasons; anything else is thrown at once. */
function retryTransient<T>(what: string, fn: () => Promise<T>): Promise<T> {
  return withRetry(fn, {
    maxAttempts: 5,
    policy: DEFAULT_BACKOFF,
    shouldRetry: (error) => error instanceof TransientSourceError,
    onRetry: (error, attempt, delayMs) => logger.warn({ error, attempt, delayMs }, `${what} failed; retrying`),
  });
}

async function main(): Promise<number> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info('Starting update engine');

  // Flow problems surface before anything touches the network
  const dispatcher = new Dispatcher(createDefaultFlow());
  const webhook = webhookSettings(config);

  const pool = new ConnectionPool({
    path: resolveDatabasePath(config.databaseUrl),
    maxSize: config.dbPoolSize,
    idleTimeoutMs: config.dbIdleTimeoutMs,
  });

  try {
    const telegram = new TelegramAdapter(config.telegramBotToken);
    await retryTransient('getMe', () => telegram.getMe());

    let source: UpdateSource;
    let webhookSource: WebhookUpdateSource | null = null;
    if (webhook) {
      webhookSource = new WebhookUpdateSource((raw) => telegram.parse(raw), {
        secret: webhook.secret,
        ackTimeoutMs: config.webhookAckTimeoutMs,
      });
      source = webhookSource;
    } else {
      source = new PollingUpdateSource(telegram, {
        timeoutSeconds: config.pollTimeoutSeconds,
        limit: config.pollLimit,
        authFailureLimit: config.authFailureLimit,
      });
    }

    const outboundRepository = new OutboundRepository(pool);
    const sender = new OutboundSender(telegram, outboundRepository, new TokenBucket(config.rateLimitPerSecond), {
      maxAttempts: config.maxSendAttempts,
      backoff: DEFAULT_BACKOFF,
    });
    sender.onFailure(({ message }) => {
      logger.warn({ messageId: message.id, chatId: message.chatId, attempts: message.attempts }, 'Message given up on');
    });

    const processor = new UpdateProcessor(
      {
        store: new ConversationRepository(pool),
        dispatcher,
        lookup: new ArchiveRepository(pool),
        queue: sender,
        members: telegram,
      },
      { maxCommitRetries: config.maxCommitRetries, conversationScope: config.conversationScope }
    );

    const supervisor = new Supervisor(
      { pool, source, processor, sender, cursor: new CursorRepository(pool) },
      {
        autoMigrate: config.autoMigrate,
        workerConcurrency: config.workerConcurrency,
        shutdownGraceMs: config.shutdownGraceMs,
      }
    );

    // Migrate before the platform starts pushing updates at us
    supervisor.prepare();

    const appOptions = webhookSource
      ? { health: () => supervisor.health(), webhook: webhookSource.router() }
      : { health: () => supervisor.health() };
    const server = await startServer(createApp(appOptions), config.port, config.host);

    if (webhook) {
      await retryTransient('setWebhook', () => telegram.setWebhook(webhook.url, webhook.secret));
    } else {
      await retryTransient('deleteWebhook', () => telegram.deleteWebhook());
    }

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'Shutdown requested');
      supervisor.stop().catch((error: unknown) => {
        logger.error({ error }, 'Error while stopping');
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
      await supervisor.run();
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      await closeServer(server);
    }
  } finally {
    pool.close();
  }

  logger.info('Update engine stopped');
  return EXIT_CODES.ok;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    logger.fatal({ error }, 'Update engine failed');
    process.exit(exitCodeFor(error));
  }
);
