import { describe, expect, it } from 'vitest';
import { ChatSession, converse, type QueryProcessor } from './session';
import { RedisChatStore } from '../memory/chat-store';
import { MemoryKv } from '../test/memory-kv';
import { fixedClock } from '../test/fake-http';

const echo: QueryProcessor = {
  async processUserQuery(text, history) {
    return { text: `${text} (${history.length} before)`, agent: 'controller_agent' };
  },
};

describe('converse', () => {
  it('stores both sides of each exchange', async () => {
    const store = new RedisChatStore(new MemoryKv(), { ttlSeconds: 60 });
    const now = fixedClock('2030-05-01T08:00:00Z');

    await converse(store, echo, 'c1', 'Hello', now);
    const reply = await converse(store, echo, 'c1', 'Hotels in Rome?', now);

    expect(reply).toEqual({ text: 'Hotels in Rome? (2 before)', agent: 'controller_agent' });
    expect((await store.load('c1'))?.messages).toHaveLength(4);
  });
});

describe('ChatSession', () => {
  it('handles commands and blank lines', async () => {
    const store = new RedisChatStore(new MemoryKv(), { ttlSeconds: 60 });
    const session = new ChatSession('cli', echo, store);

    expect(await session.handle('   ')).toEqual({ kind: 'skip' });
    expect(await session.handle('Hi')).toEqual({
      kind: 'reply',
      reply: { text: 'Hi (0 before)', agent: 'controller_agent' },
    });
    expect(await session.handle('/reset')).toEqual({ kind: 'reset' });
    expect(await store.load('cli')).toBeNull();
    expect(await session.handle('EXIT')).toEqual({ kind: 'exit' });
  });
});
