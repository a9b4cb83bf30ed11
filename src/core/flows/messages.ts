export const TELEGRAM_MAX_TEXT_CHARS = 4096;

export const ASK_NAME = 'What is your name?';
export const CANCELLED = 'Cancelled.';
export const NOTHING_TO_CANCEL = 'There is nothing to cancel.';
export const DELETE_DONE = 'Message marked as deleted.';
export const DELETE_NOT_FOUND = 'I could not find a message of yours to delete.';
export const SEARCH_USAGE = 'Give a hashtag to search for, e.g. /search_hashtag #example';
export const SEARCH_EMPTY = 'No messages with that hashtag were found.';
export const SEARCH_HEADER = 'Hashtag search results:';
export const UNRECOGNIZED = "Sorry, I didn't understand that.";
export const ADMIN_ONLY = 'This command is only available to chat administrators.';
export const UNTITLED_CHAT = 'Private Chat';

export function greeting(name: string): string {
  return `Nice to meet you, ${name}!`;
}

export function helpText(commands: ReadonlyArray<{ token: string; description: string }>): string {
  const lines = commands.map(({ token, description }) => `/${token} - ${description}`);
  return ['Here is what I can do:', ...lines].join('\n');
}

export function memberJoined(name: string, chatTitle: string): string {
  return `User ${name} joined the chat '${chatTitle}'.`;
}

export function memberLeft(name: string, chatTitle: string): string {
  return `User ${name} left the chat '${chatTitle}'.`;
}

export function formatSearchHit(hit: { text: string; author: string; edited: boolean }): string {
  const label = hit.edited ? 'Text (edited)' : 'Text';
  return `${label}: ${hit.text}\nAuthor: ${hit.author}`;
}

/** Cuts `block` into pieces of at most `limit` UTF-16 units without splitting a code point. */
function splitBlock(block: string, limit: number): string[] {
  const parts: string[] = [];
  let part = '';
  for (const char of block) {
    if (part !== '' && part.length + char.length > limit) {
      parts.push(part);
      part = '';
    }
    part += char;
  }
  if (part !== '') {
    parts.push(part);
  }
  return parts;
}

/**
 * Packs blocks into messages no longer than `limit`, separated by blank lines.
 * A single block longer than the limit is cut into pieces.
 */
export function packMessages(blocks: readonly string[], limit = TELEGRAM_MAX_TEXT_CHARS): string[] {
  const messages: string[] = [];
  let current = '';

  const pieces = blocks.flatMap((block) => (block.length <= limit ? [block] : splitBlock(block, limit)));

  for (const piece of pieces) {
    const candidate = current === '' ? piece : `${current}\n\n${piece}`;
    if (candidate.length <= limit) {
      current = candidate;
    } else {
      messages.push(current);
      current = piece;
    }
  }
  if (current !== '') {
    messages.push(current);
  }
  return messages;
}
