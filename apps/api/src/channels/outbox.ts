import type { OutboundMessage } from '../types.js';

export interface UserChannel {
  deliver(message: OutboundMessage): void;
  forget(sessionId: string): void;
}

export const DEFAULT_OUTBOX_LIMIT = 200;

interface Mailbox {
  /** Absolute offset of `messages[0]`; grows as old messages are dropped. */
  dropped: number;
  messages: OutboundMessage[];
}

/**
 * Keeps the most recent `limit` messages per session until the session is
 * evicted. Offsets passed to `list` count every message ever delivered, so a
 * reader paging with `after` stays in place when older ones are dropped.
 */
export class InMemoryOutbox implements UserChannel {
  private readonly mailboxes = new Map<string, Mailbox>();

  constructor(private readonly limit = DEFAULT_OUTBOX_LIMIT) {}

  deliver(message: OutboundMessage): void {
    const mailbox = this.mailboxes.get(message.sessionId) ?? { dropped: 0, messages: [] };
    mailbox.messages.push(message);
    const excess = mailbox.messages.length - this.limit;
    if (excess > 0) {
      mailbox.messages.splice(0, excess);
      mailbox.dropped += excess;
    }
    this.mailboxes.set(message.sessionId, mailbox);
  }

  forget(sessionId: string): void {
    this.mailboxes.delete(sessionId);
  }

  list(sessionId: string, after = 0): OutboundMessage[] {
    const mailbox = this.mailboxes.get(sessionId);
    if (!mailbox) return [];
    return mailbox.messages.slice(Math.max(0, after - mailbox.dropped));
  }

  responses(sessionId: string): OutboundMessage[] {
    return this.list(sessionId).filter((m) => m.type === 'response');
  }
}
