export type ChatType = 'private' | 'group' | 'supergroup' | 'channel' | 'unknown';

export const MEMBER_STATUSES = ['creator', 'administrator', 'member', 'restricted', 'left', 'kicked'] as const;
export type MemberStatus = (typeof MEMBER_STATUSES)[number];

export type UpdatePayload =
  | { kind: 'command'; token: string; args: string[]; text: string }
  | { kind: 'text'; text: string }
  | { kind: 'callback'; data: string; callbackId: string }
  | { kind: 'edit'; messageId: number; text: string; editedAt: number }
  | {
      kind: 'member';
      memberId: string;
      memberName: string;
      isBotMember: boolean;
      chatTitle?: string;
      from: MemberStatus;
      to: MemberStatus;
    }
  | { kind: 'ignored'; reason: string };

/**
 * One inbound platform event, normalized. Ignored updates keep their id so the
 * cursor can move past them; their chat and user fields may be empty.
 */
export interface Update {
  id: number;
  chatId: string;
  chatType: ChatType;
  userId: string;
  username?: string;
  isBot: boolean;
  messageId?: number;
  replyTo?: {
    messageId: number;
    userId?: string;
  };
  payload: UpdatePayload;
  /** The sender's status in the chat, looked up before dispatch when a route needs it. */
  senderStatus?: MemberStatus;
  /** Human administrators of the chat, looked up before dispatch when a route needs them. */
  chatAdminIds?: string[];
  /** Epoch ms; the platform's message date when present, else receipt time. */
  receivedAt: number;
}
