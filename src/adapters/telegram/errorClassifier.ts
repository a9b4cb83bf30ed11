import {
  AuthError,
  DeliveryFailure,
  EngineError,
  TransientSourceError,
} from '../../utils/errors.js';
import { isRecord, numberField, stringField } from '../../utils/guards.js';

export type TelegramOperation = 'poll' | 'send' | 'call';

interface TelegramErrorDetails {
  /** `ETELEGRAM` for API answers, `EFATAL` for transport failures, `EPARSE` for unreadable bodies. */
  code: string | undefined;
  status: number | undefined;
  description: string;
  retryAfterMs: number | undefined;
}

/** Reads what node-telegram-bot-api attaches to its errors. */
export function inspectTelegramError(error: unknown): TelegramErrorDetails {
  const details: TelegramErrorDetails = {
    code: undefined,
    status: undefined,
    description: error instanceof Error ? error.message : String(error),
    retryAfterMs: undefined,
  };
  if (!isRecord(error)) {
    return details;
  }

  details.code = stringField(error, 'code');
  const response = error.response;
  const body = isRecord(response) && isRecord(response.body) ? response.body : undefined;
  if (body) {
    details.status = numberField(body, 'error_code');
    details.description = stringField(body, 'description') ?? details.description;
    const parameters = isRecord(body.parameters) ? body.parameters : undefined;
    const retryAfter = parameters ? numberField(parameters, 'retry_after') : undefined;
    if (retryAfter !== undefined) {
      details.retryAfterMs = retryAfter * 1000;
    }
  }
  if (details.status === undefined && isRecord(response)) {
    details.status = numberField(response, 'statusCode');
  }
  return details;
}

function isTransient(details: TelegramErrorDetails): boolean {
  if (details.status === undefined) {
    // Transport failure or unreadable answer
    return details.code !== 'ETELEGRAM';
  }
  return details.status === 429 || details.status === 409 || details.status >= 500;
}

/**
 * Maps a Bot API failure onto the engine's error types. Rejected credentials are
 * an `AuthError` everywhere except on sends, where every failure becomes a
 * `DeliveryFailure` so the sender can record it on the message.
 */
export function classifyTelegramError(error: unknown, operation: TelegramOperation): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  const details = inspectTelegramError(error);
  const message = details.status !== undefined ? `${details.status} ${details.description}` : details.description;
  const retryAfter = details.retryAfterMs !== undefined ? { retryAfterMs: details.retryAfterMs } : {};

  if (operation === 'send') {
    return new DeliveryFailure(message, { cause: error, retryable: isTransient(details), ...retryAfter });
  }
  if (details.status === 401 || details.status === 404) {
    return new AuthError(`Bot token rejected: ${message}`, { cause: error });
  }
  if (isTransient(details)) {
    return new TransientSourceError(message, { cause: error, ...retryAfter });
  }
  return new EngineError(message, 'PLATFORM_REJECTED', { cause: error });
}
