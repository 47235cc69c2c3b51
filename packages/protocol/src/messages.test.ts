import { describe, expect, it } from 'vitest';

import { MessagesResponseSchema, RawMessageSchema, priorityFromRelay } from './messages';

describe('priorityFromRelay', () => {
  it('maps -2..2 onto the named priorities', () => {
    expect([-2, -1, 0, 1, 2].map(priorityFromRelay)).toEqual(['lowest', 'low', 'normal', 'high', 'emergency']);
  });

  it('clamps out-of-range values', () => {
    expect(priorityFromRelay(-7)).toBe('lowest');
    expect(priorityFromRelay(9)).toBe('emergency');
  });
});

describe('RawMessageSchema', () => {
  it('fills defaults for optional relay fields', () => {
    const parsed = RawMessageSchema.parse({ id: 4, message: 'disk almost full', date: 1_700_000_000 });

    expect(parsed).toMatchObject({
      id: 4,
      app: '',
      priority: 0,
      acked: 0,
    });
  });

  it('rejects messages without an id', () => {
    expect(RawMessageSchema.safeParse({ message: 'x', date: 1 }).success).toBe(false);
  });

  it('accepts 0 for retry and expire', () => {
    const parsed = RawMessageSchema.parse({ id: 5, message: 'x', date: 1, priority: 2, retry: 0, expire: 0 });
    expect(parsed).toMatchObject({ retry: 0, expire: 0 });
  });
});

describe('MessagesResponseSchema', () => {
  it('treats a missing messages array as empty', () => {
    expect(MessagesResponseSchema.parse({ status: 1 }).messages).toEqual([]);
  });

  it('keeps a malformed item for the caller to check on its own', () => {
    const parsed = MessagesResponseSchema.parse({ status: 1, messages: [{ message: 'x', date: 1 }, { id: 2, message: 'y', date: 1 }] });
    expect(parsed.messages).toHaveLength(2);
  });
});
