import type { ArchiveOp } from './ArchivePort.js';
import type { OutboundDraft, OutboundMessage } from './OutboundStore.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ConversationContext = Record<string, JsonValue>;

/** Shallow patch over the context: a `null` value removes the key. */
export type ContextPatch = Record<string, JsonValue>;

export interface ConversationSnapshot {
  key: string;
  chatId: string;
  state: string;
  context: ConversationContext;
  /** 0 for a conversation that does not exist yet. */
  version: number;
  updatedAt: number | null;
}

export interface CommitRequest {
  key: string;
  chatId: string;
  expectedVersion: number;
  nextState: string;
  contextPatch: ContextPatch;
  updateId: number;
  /** Cursor value to store with this commit; the stored cursor never goes below its current value. */
  cursorAdvance: number;
  outbound: OutboundDraft[];
  archive: ArchiveOp[];
}

export type CommitResult =
  | { status: 'committed'; version: number; outbound: OutboundMessage[] }
  | { status: 'duplicate' };

export interface ConversationStore {
  load(key: string): ConversationSnapshot | null;
  /** Throws `VersionConflict` when the stored version moved since `load`. */
  commit(request: CommitRequest): CommitResult;
  /** True when the update was already committed or lies at or below the cursor. */
  isProcessed(updateId: number): boolean;
}
