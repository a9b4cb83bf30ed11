import type { BotApiPort } from '../../ports/BotApiPort.js';
import type { OutboundMessage, OutboundQueue, OutboundStore } from '../../ports/OutboundStore.js';
import type { TokenBucket } from './TokenBucket.js';
import { DeliveryFailure, describeError } from '../../utils/errors.js';
import { computeBackoffDelay, type BackoffPolicy } from '../../utils/retry.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { createLogger } from '../../utils/logger.js';

export interface OutboundSenderOptions {
  maxAttempts: number;
  backoff: BackoffPolicy;
}

export interface DeliveryFailureEvent {
  message: OutboundMessage;
  error: unknown;
}

interface QueuedMessage {
  message: OutboundMessage;
  notBefore: number;
}

/**
 * Delivers committed outbound messages. One FIFO queue per chat keeps per-chat
 * order; chats are served round-robin under one shared token bucket. A failed
 * head message blocks only its own chat until its backoff elapses. After
 * `maxAttempts`, or on a rejection the platform will never accept, the message is
 * marked `failed` and reported to the failure handlers.
 */
export class OutboundSender implements OutboundQueue {
  private readonly logger = createLogger({ component: 'OutboundSender' });
  private readonly queues = new Map<string, QueuedMessage[]>();
  private readonly rotation: string[] = [];
  private readonly known = new Set<number>();
  private readonly failureHandlers: Array<(event: DeliveryFailureEvent) => void> = [];
  private readonly clock: Clock;
  private idleWaiters: Array<() => void> = [];
  private wakeUp: (() => void) | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private inFlight = false;
  private nextIndex = 0;

  constructor(
    private readonly api: Pick<BotApiPort, 'sendMessage'>,
    private readonly store: OutboundStore,
    private readonly limiter: TokenBucket,
    private readonly options: OutboundSenderOptions,
    clock?: Clock
  ) {
    this.clock = clock ?? systemClock;
  }

  get depth(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.length;
    }
    return total;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  onFailure(handler: (event: DeliveryFailureEvent) => void): void {
    this.failureHandlers.push(handler);
  }

  /** Queues a pending message and returns at once. Messages already queued are ignored. */
  enqueue(message: OutboundMessage): void {
    if (message.status !== 'pending' || this.known.has(message.id)) {
      return;
    }
    this.known.add(message.id);

    const queue = this.queues.get(message.chatId);
    const entry: QueuedMessage = { message: { ...message }, notBefore: 0 };
    if (queue) {
      queue.push(entry);
    } else {
      this.queues.set(message.chatId, [entry]);
      this.rotation.push(message.chatId);
    }
    this.wake();
  }

  /** Re-queues messages left `pending` by an earlier run. Returns how many were queued. */
  recover(): number {
    const before = this.depth;
    for (const message of this.store.listPending()) {
      this.enqueue(message);
    }
    const recovered = this.depth - before;
    if (recovered > 0) {
      this.logger.info({ recovered }, 'Recovered pending outbound messages');
    }
    return recovered;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.controller = new AbortController();
    const signal = this.controller.signal;
    this.loop = this.run(signal).catch((error: unknown) => {
      this.logger.error({ error }, 'Outbound delivery loop crashed');
    });
    this.logger.info('Outbound sender started');
  }

  /**
   * Stops delivering after the queues drain or `graceMs` elapses, whichever comes
   * first. Undelivered messages stay `pending` in the store for the next start.
   */
  async stop(graceMs: number): Promise<void> {
    if (!this.loop || !this.controller) {
      return;
    }

    const timer = new AbortController();
    await Promise.race([this.whenIdle(), this.clock.sleep(graceMs, timer.signal)]);
    timer.abort();

    this.controller.abort();
    this.wake();
    await this.loop;
    this.loop = null;
    this.controller = null;

    const left = this.depth;
    if (left > 0) {
      this.logger.warn({ left }, 'Outbound sender stopped with messages still pending');
    } else {
      this.logger.info('Outbound sender stopped');
    }
  }

  /** Resolves once every queue is empty and nothing is in flight. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.depth === 0 && !this.inFlight;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const next = this.pickReady(this.clock.now());
      if (!next) {
        if (this.depth === 0) {
          this.notifyIdle();
          await this.waitForWork(signal);
        } else {
          await this.waitForWork(signal, this.earliestReadyAt() - this.clock.now());
        }
        continue;
      }

      this.inFlight = true;
      try {
        if (!(await this.limiter.acquire(signal))) {
          break;
        }
        await this.deliver(next);
      } catch (error) {
        // Store failures land here; the message stays queued and is tried again
        this.logger.error({ error, messageId: next.message.id }, 'Delivery bookkeeping failed');
        next.notBefore = this.clock.now() + computeBackoffDelay(next.message.attempts + 1, this.options.backoff);
      } finally {
        this.inFlight = false;
      }
    }
    this.notifyIdle();
  }

  private async deliver(entry: QueuedMessage): Promise<void> {
    const { message } = entry;
    const attempt = message.attempts + 1;
    const logger = this.logger.child({ messageId: message.id, chatId: message.chatId, attempt });

    let sentId: number;
    try {
      const options = message.replyTo !== undefined ? { replyToMessageId: message.replyTo } : undefined;
      const sent = await this.api.sendMessage(message.chatId, message.body, options);
      sentId = sent.messageId;
    } catch (error) {
      this.handleSendError(entry, attempt, error);
      return;
    }

    this.store.markSent(message.id, attempt, sentId);
    this.remove(entry);
    logger.info({ platformMessageId: sentId }, 'Message delivered');
  }

  private handleSendError(entry: QueuedMessage, attempt: number, error: unknown): void {
    const { message } = entry;
    const logger = this.logger.child({ messageId: message.id, chatId: message.chatId, attempt });
    const permanent = error instanceof DeliveryFailure && !error.retryable;
    const reason = describeError(error);

    if (permanent || attempt >= this.options.maxAttempts) {
      this.store.markFailed(message.id, attempt, reason);
      message.attempts = attempt;
      message.status = 'failed';
      message.lastError = reason;
      this.remove(entry);
      logger.error({ error, permanent }, 'Message delivery failed');
      for (const handler of this.failureHandlers) {
        handler({ message: { ...message }, error });
      }
      return;
    }

    this.store.recordAttempt(message.id, attempt, reason);
    message.attempts = attempt;
    message.lastError = reason;
    const retryAfterMs = error instanceof DeliveryFailure ? error.retryAfterMs : undefined;
    const delay = computeBackoffDelay(attempt, this.options.backoff, retryAfterMs);
    entry.notBefore = this.clock.now() + delay;
    logger.warn({ error, delay }, 'Message delivery failed; will retry');
  }

  /** Next chat in rotation whose head message is due. */
  private pickReady(now: number): QueuedMessage | null {
    const count = this.rotation.length;
    for (let offset = 0; offset < count; offset++) {
      const index = (this.nextIndex + offset) % count;
      const chatId = this.rotation[index];
      const head = chatId === undefined ? undefined : this.queues.get(chatId)?.[0];
      if (head && head.notBefore <= now) {
        this.nextIndex = index + 1;
        return head;
      }
    }
    return null;
  }

  private earliestReadyAt(): number {
    let earliest = Number.POSITIVE_INFINITY;
    for (const queue of this.queues.values()) {
      const head = queue[0];
      if (head) {
        earliest = Math.min(earliest, head.notBefore);
      }
    }
    return earliest;
  }

  private remove(entry: QueuedMessage): void {
    const { chatId, id } = entry.message;
    const queue = this.queues.get(chatId);
    if (queue?.[0] === entry) {
      queue.shift();
    }
    this.known.delete(id);

    if (queue && queue.length === 0) {
      this.queues.delete(chatId);
      const index = this.rotation.indexOf(chatId);
      if (index !== -1) {
        this.rotation.splice(index, 1);
        if (index < this.nextIndex) {
          this.nextIndex--;
        }
      }
    }
  }

  private wake(): void {
    const wakeUp = this.wakeUp;
    this.wakeUp = null;
    wakeUp?.();
  }

  /** Waits for `enqueue`, abort, or `timeoutMs` when given. */
  private async waitForWork(signal: AbortSignal, timeoutMs?: number): Promise<void> {
    const timer = new AbortController();
    const woken = new Promise<void>((resolve) => {
      this.wakeUp = resolve;
    });
    const onAbort = (): void => this.wake();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      if (timeoutMs === undefined) {
        await woken;
      } else {
        await Promise.race([woken, this.clock.sleep(Math.max(0, timeoutMs), timer.signal)]);
      }
    } finally {
      timer.abort();
      signal.removeEventListener('abort', onAbort);
      this.wakeUp = null;
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle() && this.running && !this.controller?.signal.aborted) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
