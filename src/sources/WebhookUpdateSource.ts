import { createHash, timingSafeEqual } from 'node:crypto';
import express from 'express';
import type { Router } from 'express';
import type { Update } from '../ports/Update.js';
import type { UpdateSource } from '../ports/UpdateSource.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger, generateCorrelationId } from '../utils/logger.js';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export interface WebhookOptions {
  secret: string;
  /** How long a request waits for its update to be committed before answering 503. */
  ackTimeoutMs: number;
  /** Admitted but unacknowledged updates allowed before new requests are turned away. */
  maxBuffered?: number;
}

interface Admission {
  update: Update;
  waiters: Array<(acked: boolean) => void>;
}

export function secretMatches(received: string | undefined, expected: string): boolean {
  if (received === undefined) {
    return false;
  }
  const a = createHash('sha256').update(received).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * Receives updates pushed to an HTTP endpoint. A request is answered 200 only
 * after its update has been acknowledged, so the platform redelivers anything
 * that was not committed. Requests carrying the wrong secret get 401 and
 * unreadable bodies get 400.
 */
export class WebhookUpdateSource implements UpdateSource {
  readonly mode = 'webhook' as const;
  private readonly logger = createLogger({ component: 'WebhookUpdateSource' });
  private readonly buffered = new Map<number, Admission>();
  private readonly inFlight = new Map<number, Admission>();
  private readonly maxBuffered: number;
  private floor: number | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(
    private readonly parse: (raw: unknown) => Update | null,
    private readonly options: WebhookOptions,
    private readonly clock: Clock = systemClock
  ) {
    this.maxBuffered = options.maxBuffered ?? 1000;
  }

  get pending(): number {
    return this.buffered.size + this.inFlight.size;
  }

  router(): Router {
    const router = express.Router();

    router.post('/', express.json(), async (req, res) => {
      const requestLogger = this.logger.child({ correlationId: generateCorrelationId() });

      if (!secretMatches(req.get(SECRET_HEADER), this.options.secret)) {
        requestLogger.warn({ ip: req.ip }, 'Webhook request with a missing or wrong secret');
        res.status(401).json({ ok: false, error: 'Unauthorized' });
        return;
      }

      const update = this.parse(req.body);
      if (!update) {
        requestLogger.warn('Webhook request without a readable update');
        res.status(400).json({ ok: false, error: 'Malformed update' });
        return;
      }

      const acked = await this.admit(update);
      if (acked) {
        res.status(200).json({ ok: true });
      } else {
        requestLogger.warn({ updateId: update.id }, 'Update not committed in time; asking for redelivery');
        res.status(503).json({ ok: false, error: 'Update not processed in time' });
      }
    });

    return router;
  }

  /** Resolves true once the update is acknowledged, false on timeout or shutdown. */
  admit(update: Update): Promise<boolean> {
    if (this.floor !== null && update.id <= this.floor) {
      this.logger.debug({ updateId: update.id }, 'Update already behind the cursor');
      return Promise.resolve(true);
    }

    let admission = this.buffered.get(update.id) ?? this.inFlight.get(update.id);
    if (!admission) {
      if (this.pending >= this.maxBuffered) {
        this.logger.warn({ updateId: update.id, pending: this.pending }, 'Webhook buffer full');
        return Promise.resolve(false);
      }
      admission = { update, waiters: [] };
      this.buffered.set(update.id, admission);
      this.wake();
    }
    return this.waitFor(admission);
  }

  async *batches(startAfter: number, signal: AbortSignal): AsyncGenerator<Update[]> {
    this.floor = startAfter;
    for (const [id, admission] of this.buffered) {
      if (id <= startAfter) {
        this.buffered.delete(id);
        settle(admission, true);
      }
    }

    try {
      while (!signal.aborted) {
        if (this.buffered.size === 0) {
          await this.waitForWork(signal);
          continue;
        }
        const batch = [...this.buffered.values()].sort((a, b) => a.update.id - b.update.id);
        this.buffered.clear();
        for (const admission of batch) {
          this.inFlight.set(admission.update.id, admission);
        }
        yield batch.map((admission) => admission.update);
      }
    } finally {
      // Anything not acknowledged by now will be redelivered by the platform
      for (const admission of [...this.buffered.values(), ...this.inFlight.values()]) {
        settle(admission, false);
      }
      this.buffered.clear();
      this.inFlight.clear();
    }
  }

  acknowledge(updateIds: readonly number[]): void {
    for (const id of updateIds) {
      const admission = this.inFlight.get(id);
      if (admission) {
        this.inFlight.delete(id);
        settle(admission, true);
      }
    }
  }

  private waitFor(admission: Admission): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = new AbortController();
      let settled = false;
      const finish = (acked: boolean): void => {
        if (settled) return;
        settled = true;
        timer.abort();
        resolve(acked);
      };
      admission.waiters.push(finish);
      void this.clock.sleep(this.options.ackTimeoutMs, timer.signal).then(() => finish(false));
    });
  }

  private wake(): void {
    const wakeUp = this.wakeUp;
    this.wakeUp = null;
    wakeUp?.();
  }

  private async waitForWork(signal: AbortSignal): Promise<void> {
    const woken = new Promise<void>((resolve) => {
      this.wakeUp = resolve;
    });
    const onAbort = (): void => this.wake();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      await woken;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

function settle(admission: Admission, acked: boolean): void {
  const waiters = admission.waiters;
  admission.waiters = [];
  for (const waiter of waiters) {
    waiter(acked);
  }
}
