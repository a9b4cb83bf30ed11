import type { BotApiPort } from '../ports/BotApiPort.js';
import type { Update } from '../ports/Update.js';
import type { UpdateSource } from '../ports/UpdateSource.js';
import { AuthError, TransientSourceError } from '../utils/errors.js';
import { computeBackoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from '../utils/retry.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

export interface PollingOptions {
  timeoutSeconds: number;
  limit: number;
  /** Consecutive rejected-credential answers tolerated before giving up. */
  authFailureLimit: number;
  backoff?: BackoffPolicy;
}

type Polled = { aborted: true } | { aborted: false; updates: Update[] };

/** Sorts by id and drops repeats and ids at or below `floor`. */
export function orderBatch(updates: readonly Update[], floor: number): Update[] {
  const seen = new Set<number>();
  return [...updates]
    .sort((a, b) => a.id - b.id)
    .filter((update) => {
      if (update.id <= floor || seen.has(update.id)) {
        return false;
      }
      seen.add(update.id);
      return true;
    });
}

/**
 * Long-polls getUpdates. The platform treats every id below the requested offset
 * as confirmed, so the offset only moves past a batch once the consumer asks for
 * the next one, after it has finished with the current batch.
 */
export class PollingUpdateSource implements UpdateSource {
  readonly mode = 'polling' as const;
  private readonly logger = createLogger({ component: 'PollingUpdateSource' });
  private readonly backoff: BackoffPolicy;

  constructor(
    private readonly api: Pick<BotApiPort, 'getUpdates'>,
    private readonly options: PollingOptions,
    private readonly clock: Clock = systemClock
  ) {
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
  }

  async *batches(startAfter: number, signal: AbortSignal): AsyncGenerator<Update[]> {
    let offset = startAfter + 1;
    let transientFailures = 0;
    let authFailures = 0;

    while (!signal.aborted) {
      let polled: Polled;
      try {
        polled = await this.poll(offset, signal);
      } catch (error) {
        if (error instanceof AuthError) {
          authFailures++;
          if (authFailures >= this.options.authFailureLimit) {
            this.logger.error({ error, authFailures }, 'Bot token rejected repeatedly; giving up');
            throw error;
          }
          const delay = computeBackoffDelay(authFailures, this.backoff);
          this.logger.warn({ error, authFailures, delay }, 'Bot token rejected; retrying');
          await this.clock.sleep(delay, signal);
          continue;
        }
        if (error instanceof TransientSourceError) {
          transientFailures++;
          const delay = computeBackoffDelay(transientFailures, this.backoff, error.retryAfterMs);
          this.logger.warn({ error, transientFailures, delay }, 'Polling failed; backing off');
          await this.clock.sleep(delay, signal);
          continue;
        }
        throw error;
      }

      if (polled.aborted) {
        return;
      }
      transientFailures = 0;
      authFailures = 0;

      const batch = orderBatch(polled.updates, offset - 1);
      if (batch.length === 0) {
        continue;
      }
      this.logger.debug({ count: batch.length, first: batch[0]?.id, offset }, 'Polled updates');
      yield batch;

      const last = batch[batch.length - 1];
      if (last) {
        offset = last.id + 1;
      }
    }
  }

  acknowledge(updateIds: readonly number[]): void {
    // Confirmed to the platform by the next getUpdates offset
    this.logger.debug({ count: updateIds.length }, 'Updates acknowledged');
  }

  /** One getUpdates call that gives way to `signal`; a late answer is dropped and fetched again next run. */
  private poll(offset: number, signal: AbortSignal): Promise<Polled> {
    const request = this.api.getUpdates({
      offset,
      timeoutSeconds: this.options.timeoutSeconds,
      limit: this.options.limit,
    });

    return new Promise<Polled>((resolve, reject) => {
      const onAbort = (): void => {
        void request.then(
          (updates) => this.logger.debug({ count: updates.length }, 'Discarding updates polled during shutdown'),
          (error: unknown) => this.logger.debug({ error }, 'Poll failed during shutdown')
        );
        resolve({ aborted: true });
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      void request.then(
        (updates) => {
          signal.removeEventListener('abort', onAbort);
          resolve({ aborted: false, updates });
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}
