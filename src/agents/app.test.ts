import type { Server } from 'node:http';
import { afterEach, describe, expect, it } from 'vitest';
import { createChatApp } from './app';
import type { QueryProcessor } from './session';
import { RedisChatStore, type ChatStore } from '../memory/chat-store';
import { MemoryKv } from '../test/memory-kv';
import { fixedClock } from '../test/fake-http';
import { closeServer, listen } from '../utils/http-server';
import { createLogger } from '../utils/logger';
import type { AssistantReply, ChatMessage } from '../types/types';

const AT = '2030-05-01T08:00:00.000Z';

function stubAssistant(reply: (text: string) => AssistantReply = (text) => ({ text: `Reply to ${text}`, agent: 'weather_agent' })) {
  const calls: Array<{ text: string; history: ChatMessage[] }> = [];
  const assistant: QueryProcessor = {
    async processUserQuery(text, history) {
      calls.push({ text, history });
      return reply(text);
    },
  };
  return { assistant, calls };
}

describe('chat application', () => {
  let server: Server | undefined;

  afterEach(async () => {
    if (server) await closeServer(server);
    server = undefined;
  });

  async function start(assistant: QueryProcessor, store: ChatStore = new RedisChatStore(new MemoryKv(), { ttlSeconds: 60 })) {
    const app = createChatApp({ assistant, store, now: fixedClock(AT), logger: createLogger('test:chat') });
    server = await listen(app, 0, '127.0.0.1');
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('not listening');
    const base = `http://127.0.0.1:${address.port}`;

    return async (method: string, path: string, body?: unknown) => {
      const res = await fetch(`${base}${path}`, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
      const text = await res.text();
      return { status: res.status, json: text ? JSON.parse(text) : null };
    };
  }

  it('answers messages and keeps the history', async () => {
    const { assistant, calls } = stubAssistant();
    const request = await start(assistant);

    expect(await request('POST', '/api/chat/trip-1/message', { text: '  Weather in Oslo?  ' })).toEqual({
      status: 200,
      json: { chatId: 'trip-1', text: 'Reply to Weather in Oslo?', agent: 'weather_agent' },
    });
    await request('POST', '/api/chat/trip-1/message', { text: 'And tomorrow?' });

    expect(calls[0]?.history).toEqual([]);
    expect(calls[1]?.history).toEqual([
      { role: 'user', text: 'Weather in Oslo?', at: AT },
      { role: 'assistant', text: 'Reply to Weather in Oslo?', at: AT, agent: 'weather_agent' },
    ]);

    const chat = await request('GET', '/api/chat/trip-1');
    expect(chat.status).toBe(200);
    expect(chat.json.createdAt).toBe(AT);
    expect(chat.json.messages.map((m: ChatMessage) => m.text)).toEqual([
      'Weather in Oslo?',
      'Reply to Weather in Oslo?',
      'And tomorrow?',
      'Reply to And tomorrow?',
    ]);
  });

  it('rejects messages without text', async () => {
    const { assistant, calls } = stubAssistant();
    const request = await start(assistant);

    expect(await request('POST', '/api/chat/trip-1/message', {})).toEqual({ status: 400, json: { error: 'Missing text' } });
    expect(await request('POST', '/api/chat/trip-1/message', { text: '   ' })).toEqual({
      status: 400,
      json: { error: 'Missing text' },
    });
    expect(await request('POST', '/api/chat/trip-1/message', { text: 42 })).toEqual({
      status: 400,
      json: { error: 'Missing text' },
    });
    expect(calls).toHaveLength(0);
  });

  it('returns null for the agent of a blocked reply', async () => {
    const { assistant } = stubAssistant(() => ({ text: 'Travel only, please.', blocked: true }));
    const request = await start(assistant);

    expect(await request('POST', '/api/chat/x/message', { text: 'Write me a poem' })).toEqual({
      status: 200,
      json: { chatId: 'x', text: 'Travel only, please.', agent: null },
    });
  });

  it('reports unknown chats and deletes history', async () => {
    const { assistant } = stubAssistant();
    const request = await start(assistant);

    expect(await request('GET', '/api/chat/nobody')).toEqual({ status: 404, json: { error: 'Chat not found' } });

    await request('POST', '/api/chat/trip-2/message', { text: 'Hi' });
    expect(await request('DELETE', '/api/chat/trip-2')).toEqual({ status: 204, json: null });
    expect((await request('GET', '/api/chat/trip-2')).status).toBe(404);
  });

  it('validates chat ids', async () => {
    const { assistant } = stubAssistant();
    const request = await start(assistant);

    expect(await request('GET', '/api/chat/bad.id')).toEqual({ status: 400, json: { error: 'Invalid chat id' } });
  });

  it('hides store failures behind a 500', async () => {
    const { assistant } = stubAssistant();
    const broken: ChatStore = {
      load: async () => null,
      save: async () => {
        throw new Error('disk full');
      },
      reset: async () => undefined,
    };
    const request = await start(assistant, broken);

    expect(await request('POST', '/api/chat/trip-3/message', { text: 'Hi' })).toEqual({
      status: 500,
      json: { error: 'Internal server error' },
    });
  });

  it('has a health check', async () => {
    const request = await start(stubAssistant().assistant);

    expect(await request('GET', '/health')).toEqual({ status: 200, json: { ok: true } });
  });
});
