export class EngineError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Network failures and 5xx/429 answers from the platform. Retried with backoff, never fatal. */
export class TransientSourceError extends EngineError {
  public readonly retryAfterMs: number | undefined;

  constructor(message: string, options?: ErrorOptions & { retryAfterMs?: number }) {
    super(message, 'TRANSIENT_SOURCE', options);
    this.name = 'TransientSourceError';
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class AuthError extends EngineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'AUTH', options);
    this.name = 'AuthError';
  }
}

export class VersionConflict extends EngineError {
  public readonly key: string;
  public readonly expectedVersion: number;
  public readonly actualVersion: number | null;

  constructor(key: string, expectedVersion: number, actualVersion: number | null) {
    super(
      `Conversation ${key} moved from version ${expectedVersion} to ${actualVersion ?? 'absent'}`,
      'VERSION_CONFLICT'
    );
    this.name = 'VersionConflict';
    this.key = key;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class SchemaError extends EngineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'SCHEMA', options);
    this.name = 'SchemaError';
  }
}

/**
 * Terminal or retryable failure to deliver one outbound message. Recorded on the
 * message row by the sender rather than thrown past it.
 */
export class DeliveryFailure extends EngineError {
  public readonly retryable: boolean;
  public readonly retryAfterMs: number | undefined;

  constructor(message: string, options: ErrorOptions & { retryable: boolean; retryAfterMs?: number }) {
    super(message, 'DELIVERY_FAILURE', options);
    this.name = 'DeliveryFailure';
    this.retryable = options.retryable;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class RoutingConfigError extends EngineError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid conversation flow:\n${problems.join('\n')}`, 'ROUTING_CONFIG');
    this.name = 'RoutingConfigError';
    this.problems = problems;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export const EXIT_CODES = {
  ok: 0,
  unexpected: 1,
  auth: 2,
  schema: 3,
  config: 4,
} as const;

export function exitCodeFor(error: unknown): number {
  if (error instanceof AuthError) return EXIT_CODES.auth;
  if (error instanceof SchemaError) return EXIT_CODES.schema;
  if (error instanceof ConfigError || error instanceof RoutingConfigError) return EXIT_CODES.config;
  return EXIT_CODES.unexpected;
}
