export type ArchiveOp =
  | {
      kind: 'record';
      chatId: string;
      messageId: number;
      userId: string;
      username?: string;
      text: string;
      sentAt: number;
    }
  | { kind: 'edit'; chatId: string; messageId: number; text: string; editedAt: number }
  | { kind: 'markDeleted'; chatId: string; messageId: number };

export interface ArchiveHit {
  messageId: number;
  text: string;
  author: string;
  edited: boolean;
}

/** Read-only view of the message archive handed to conversation handlers. */
export interface ArchiveLookup {
  searchHashtag(chatId: string, hashtag: string, limit: number): ArchiveHit[];
  latestMessageBy(chatId: string, userId: string): number | null;
  /** `null` when the message was never archived. */
  isDeleted(chatId: string, messageId: number): boolean | null;
}
