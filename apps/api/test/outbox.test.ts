import { describe, expect, it } from 'vitest';
import { InMemoryOutbox } from '../src/channels/outbox.js';
import type { OutboundMessage } from '../src/types.js';

function status(sessionId: string, n: number): OutboundMessage {
  return { type: 'status', sessionId, text: `step ${n}`, at: '2026-03-01T12:00:00.000Z' };
}

function texts(messages: OutboundMessage[]): string[] {
  return messages.flatMap((m) => (m.type === 'response' ? [] : [m.text]));
}

describe('InMemoryOutbox', () => {
  it('pages by offset per session', () => {
    const outbox = new InMemoryOutbox();
    outbox.deliver(status('s1', 1));
    outbox.deliver(status('s2', 1));
    outbox.deliver(status('s1', 2));

    expect(texts(outbox.list('s1'))).toEqual(['step 1', 'step 2']);
    expect(texts(outbox.list('s1', 1))).toEqual(['step 2']);
    expect(texts(outbox.list('s2'))).toEqual(['step 1']);
    expect(outbox.list('unknown')).toEqual([]);
  });

  it('keeps only the most recent messages without shifting offsets', () => {
    const outbox = new InMemoryOutbox(3);
    for (let n = 1; n <= 5; n += 1) outbox.deliver(status('s1', n));

    expect(texts(outbox.list('s1'))).toEqual(['step 3', 'step 4', 'step 5']);
    expect(texts(outbox.list('s1', 4))).toEqual(['step 5']);
    expect(outbox.list('s1', 5)).toEqual([]);
  });

  it('forgets a session', () => {
    const outbox = new InMemoryOutbox();
    outbox.deliver(status('s1', 1));
    outbox.forget('s1');

    expect(outbox.list('s1')).toEqual([]);
  });
});
