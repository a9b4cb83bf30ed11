import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ConnectionPool } from '../../persistence/database.js';
import { OutboundRepository, insertOutbound } from '../../persistence/repositories/OutboundRepository.js';
import { OutboundSender, type DeliveryFailureEvent } from '../../core/outbound/OutboundSender.js';
import { TokenBucket } from '../../core/outbound/TokenBucket.js';
import type { OutboundDraft, OutboundMessage } from '../../ports/OutboundStore.js';
import { DeliveryFailure } from '../../utils/errors.js';
import { FakeClock } from '../helpers/FakeClock.js';
import { FakeBotApi } from '../helpers/fakes.js';
import { createTestPool } from '../helpers/database.js';

describe('OutboundSender', () => {
  const backoff = { initialDelayMs: 100, maxDelayMs: 1000 };
  let clock: FakeClock;
  let pool: ConnectionPool;
  let store: OutboundRepository;
  let api: FakeBotApi;
  let sender: OutboundSender;
  let nextUpdateId: number;

  const createSender = (ratePerSecond: number, maxAttempts = 5): OutboundSender =>
    new OutboundSender(api, store, new TokenBucket(ratePerSecond, clock), { maxAttempts, backoff }, clock);

  const persist = (...drafts: OutboundDraft[]): OutboundMessage[] =>
    pool.use((db) => insertOutbound(db, nextUpdateId++, drafts, clock.now()));

  const deliverAll = async (messages: OutboundMessage[]): Promise<void> => {
    for (const message of messages) {
      sender.enqueue(message);
    }
    sender.start();
    await sender.whenIdle();
  };

  beforeEach(() => {
    clock = new FakeClock();
    pool = createTestPool(clock);
    store = new OutboundRepository(pool, clock);
    api = new FakeBotApi(clock);
    nextUpdateId = 1;
  });

  afterEach(async () => {
    await sender.stop(0);
    pool.close();
  });

  it('keeps to the rate limit and per-chat order', async () => {
    sender = createSender(1);
    const messages = persist(
      { chatId: '42', body: 'one' },
      { chatId: '42', body: 'two' },
      { chatId: '42', body: 'three' }
    );

    await deliverAll(messages);

    expect(api.sent.map((s) => s.text)).toEqual(['one', 'two', 'three']);
    const first = api.sent[0]?.at ?? 0;
    expect(api.sent.map((s) => s.at - first)).toEqual([0, 1000, 2000]);
    expect(store.countByStatus()).toEqual({ pending: 0, sent: 3, failed: 0 });
  });

  it('serves chats round-robin', async () => {
    sender = createSender(100);
    const messages = persist(
      { chatId: 'A', body: 'A1' },
      { chatId: 'A', body: 'A2' },
      { chatId: 'B', body: 'B1' }
    );

    await deliverAll(messages);

    expect(api.sent.map((s) => s.text)).toEqual(['A1', 'B1', 'A2']);
  });

  it('passes the reply target through', async () => {
    sender = createSender(100);
    await deliverAll(persist({ chatId: '42', body: 'done', replyTo: 77 }));

    expect(api.sent[0]?.options).toEqual({ replyToMessageId: 77 });
  });

  it('retries a retryable failure after backoff', async () => {
    sender = createSender(100);
    api.sendFailures = [new DeliveryFailure('502 Bad Gateway', { retryable: true })];
    const [message] = persist({ chatId: '42', body: 'hello' });

    await deliverAll(message ? [message] : []);

    expect(api.sent.map((s) => s.text)).toEqual(['hello']);
    expect(store.get(message?.id ?? 0)).toMatchObject({ status: 'sent', attempts: 2 });
  });

  it('honours the retry-after the platform asks for', async () => {
    sender = createSender(100);
    api.sendFailures = [new DeliveryFailure('429 Too Many Requests', { retryable: true, retryAfterMs: 3000 })];
    const start = clock.now();

    await deliverAll(persist({ chatId: '42', body: 'hello' }));

    expect((api.sent[0]?.at ?? 0) - start).toBeGreaterThanOrEqual(3000);
  });

  it('does not let one chat’s retries hold up another chat', async () => {
    sender = createSender(100);
    api.sendFailures = [new DeliveryFailure('502 Bad Gateway', { retryable: true })];

    await deliverAll(persist({ chatId: 'A', body: 'A1' }, { chatId: 'B', body: 'B1' }));

    expect(api.sent.map((s) => s.text)).toEqual(['B1', 'A1']);
  });

  it('marks a permanent rejection failed at once and moves on', async () => {
    sender = createSender(100);
    const failures: DeliveryFailureEvent[] = [];
    sender.onFailure((event) => failures.push(event));
    api.sendFailures = [new DeliveryFailure('403 Forbidden: bot was blocked by the user', { retryable: false })];
    const [blocked, next] = persist({ chatId: '42', body: 'first' }, { chatId: '42', body: 'second' });

    await deliverAll([blocked, next].filter((m): m is OutboundMessage => m !== undefined));

    expect(store.get(blocked?.id ?? 0)).toMatchObject({
      status: 'failed',
      attempts: 1,
      lastError: 'DeliveryFailure: 403 Forbidden: bot was blocked by the user',
    });
    expect(failures.map((f) => f.message.body)).toEqual(['first']);
    expect(api.sent.map((s) => s.text)).toEqual(['second']);
  });

  it('marks a message failed after maxAttempts', async () => {
    sender = createSender(100, 2);
    const handler = vi.fn();
    sender.onFailure(handler);
    api.sendFailures = [new Error('socket hang up'), new Error('socket hang up')];
    const [message] = persist({ chatId: '42', body: 'hello' });

    await deliverAll(message ? [message] : []);

    expect(store.get(message?.id ?? 0)).toMatchObject({ status: 'failed', attempts: 2, lastError: 'Error: socket hang up' });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(api.sent).toEqual([]);
  });

  it('recovers pending messages from the store and skips finished ones', async () => {
    sender = createSender(100);
    const [done, waiting] = persist({ chatId: '42', body: 'old' }, { chatId: '42', body: 'waiting' });
    store.markSent(done?.id ?? 0, 1, 900);

    expect(sender.recover()).toBe(1);
    expect(sender.recover()).toBe(0);
    sender.start();
    await sender.whenIdle();

    expect(api.sent.map((s) => s.text)).toEqual([waiting?.body]);
  });

  it('ignores a message it already holds', () => {
    sender = createSender(100);
    const [message] = persist({ chatId: '42', body: 'once' });
    if (!message) throw new Error('nothing persisted');

    sender.enqueue(message);
    sender.enqueue(message);
    expect(sender.depth).toBe(1);
  });

  it('stops cleanly once idle', async () => {
    sender = createSender(100);
    await deliverAll(persist({ chatId: '42', body: 'bye' }));

    await sender.stop(1000);
    expect(sender.running).toBe(false);
  });
});
