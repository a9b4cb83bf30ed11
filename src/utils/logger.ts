import pino from 'pino';

export type Logger = pino.Logger;

let baseLogger: pino.Logger | null = null;

function getBaseLogger(): pino.Logger {
  if (baseLogger) {
    return baseLogger;
  }

  const level = process.env.LOG_LEVEL || 'info';
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  baseLogger = pino(loggerOptions);
  return baseLogger;
}

/** Applies the configured level once config is loaded; loggers created earlier follow it. */
export function setLogLevel(level: string): void {
  getBaseLogger().level = level;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getBaseLogger().child({ ...context });
}

/**
 * Child logger for one inbound update. Every log line written while the update is
 * processed carries the same correlation id, so a single update can be followed
 * across dispatch, commit and delivery.
 */
export function createUpdateLogger(
  parent: pino.Logger,
  update: { id: number; chatId: string }
): pino.Logger {
  return parent.child({
    correlationId: generateCorrelationId(),
    updateId: update.id,
    chatId: update.chatId,
  });
}
