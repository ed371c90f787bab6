import express, { type Express } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { converse, type QueryProcessor } from './session';
import { isValidChatId, type ChatStore } from '../memory/chat-store';
import { createLogger, type Logger } from '../utils/logger';
import { errorMiddleware } from '../utils/http-server';

export interface ChatAppDeps {
  assistant: QueryProcessor;
  store: ChatStore;
  logger?: Logger;
  now?: () => Date;
}

const MessageBody = z.object({ text: z.unknown() }).partial();

export function createChatApp({ assistant, store, logger = createLogger('chat'), now = () => new Date() }: ChatAppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.param('chatId', (_req, res, next, chatId: string) => {
    if (!isValidChatId(chatId)) {
      res.status(400).json({ error: 'Invalid chat id' });
      return;
    }
    next();
  });

  // GET: full chat history by chatId
  app.get('/api/chat/:chatId', async (req, res, next) => {
    try {
      const chat = await store.load(req.params.chatId);
      if (!chat) {
        res.status(404).json({ error: 'Chat not found' });
        return;
      }
      res.json(chat);
    } catch (err) {
      next(err);
    }
  });

  // POST: send a message, run the agents, persist both sides
  // Body: { text: string }
  app.post('/api/chat/:chatId/message', async (req, res, next) => {
    const { chatId } = req.params;
    const body = MessageBody.safeParse(req.body);
    const raw = body.success ? body.data.text : undefined;
    const text = typeof raw === 'string' ? raw.trim() : '';
    if (!text) {
      res.status(400).json({ error: 'Missing text' });
      return;
    }

    try {
      const reply = await converse(store, assistant, chatId, text, now);

      logger.info(`[${chatId}] ${reply.blocked ? 'blocked' : `answered by ${reply.agent ?? 'unknown agent'}`}`);
      res.json({ chatId, text: reply.text, agent: reply.agent ?? null });
    } catch (err) {
      next(err);
    }
  });

  // DELETE: forget the conversation
  app.delete('/api/chat/:chatId', async (req, res, next) => {
    try {
      await store.reset(req.params.chatId);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use(errorMiddleware(logger));
  return app;
}
