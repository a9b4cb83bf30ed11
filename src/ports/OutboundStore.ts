export type DeliveryStatus = 'pending' | 'sent' | 'failed';

/** A reply produced by a handler, before it is persisted. */
export interface OutboundDraft {
  chatId: string;
  body: string;
  replyTo?: number;
}

export interface OutboundMessage {
  id: number;
  dedupeKey: string;
  updateId: number | null;
  chatId: string;
  body: string;
  replyTo?: number;
  status: DeliveryStatus;
  attempts: number;
  lastError?: string;
  createdAt: number;
}

export interface OutboundStore {
  listPending(): OutboundMessage[];
  markSent(id: number, attempts: number, platformMessageId: number): void;
  recordAttempt(id: number, attempts: number, error: string): void;
  markFailed(id: number, attempts: number, error: string): void;
}

/** Where committed outbound messages are handed for delivery. */
export interface OutboundQueue {
  enqueue(message: OutboundMessage): void;
}
