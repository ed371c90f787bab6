/**
 * Conversation memory for the chat application and the CLI.
 * A record per chat: JSON files by default, Redis when CHAT_STORE=redis.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { createClient } from 'redis';
import type { AppConfig } from '../config/config';
import { createLogger, type Logger } from '../utils/logger';
import { ChatRecordSchema, ErrorCodes, TravelAgentError, errorMessage, type ChatRecord } from '../types/types';

export interface ChatStore {
  load(chatId: string): Promise<ChatRecord | null>;
  save(record: ChatRecord): Promise<void>;
  reset(chatId: string): Promise<void>;
}

const CHAT_ID = /^[A-Za-z0-9_-]{1,128}$/;

// ids end up in file names and keys
export function isValidChatId(chatId: string): boolean {
  return CHAT_ID.test(chatId);
}

function assertChatId(chatId: string): void {
  if (!isValidChatId(chatId)) {
    throw new TravelAgentError(`Invalid chat id: ${chatId}`, ErrorCodes.INVALID_INPUT, { chatId });
  }
}

export function newChatRecord(chatId: string, now: Date = new Date()): ChatRecord {
  return { chatId, createdAt: now.toISOString(), messages: [] };
}

function parseRecord(raw: string, chatId: string, logger: Logger): ChatRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn(`chat ${chatId} is not valid JSON, starting over: ${errorMessage(err)}`);
    return null;
  }
  const parsed = ChatRecordSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(`chat ${chatId} has an unexpected shape, starting over`);
    return null;
  }
  return parsed.data;
}

// ---------- file-per-chat JSON ----------

export class FileChatStore implements ChatStore {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger = createLogger('chat-store')
  ) {}

  private file(chatId: string): string {
    assertChatId(chatId);
    return path.join(this.dir, `${chatId}.json`);
  }

  async load(chatId: string): Promise<ChatRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file(chatId), 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return parseRecord(raw, chatId, this.logger);
  }

  async save(record: ChatRecord): Promise<void> {
    const file = this.file(record.chatId);
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(file, JSON.stringify(record, null, 2), 'utf8');
  }

  async reset(chatId: string): Promise<void> {
    await fs.rm(this.file(chatId), { force: true });
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

// ---------- redis ----------

/** The slice of a Redis client the store needs. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options: { EX: number }): Promise<unknown>;
  del(key: string): Promise<number>;
}

export interface RedisChatStoreOptions {
  prefix?: string;
  ttlSeconds: number;
}

export class RedisChatStore implements ChatStore {
  private readonly prefix: string;
  private readonly ttlSeconds: number;

  constructor(
    private readonly client: KeyValueClient,
    options: RedisChatStoreOptions,
    private readonly logger: Logger = createLogger('chat-store')
  ) {
    this.prefix = options.prefix ?? 'travel:chat:';
    this.ttlSeconds = options.ttlSeconds;
  }

  private key(chatId: string): string {
    assertChatId(chatId);
    return `${this.prefix}${chatId}`;
  }

  async load(chatId: string): Promise<ChatRecord | null> {
    const raw = await this.client.get(this.key(chatId));
    return raw === null ? null : parseRecord(raw, chatId, this.logger);
  }

  // every save pushes the expiry out again
  async save(record: ChatRecord): Promise<void> {
    await this.client.set(this.key(record.chatId), JSON.stringify(record), { EX: this.ttlSeconds });
  }

  async reset(chatId: string): Promise<void> {
    await this.client.del(this.key(chatId));
  }
}

export interface OpenChatStore {
  store: ChatStore;
  close: () => Promise<void>;
}

export async function openChatStore(config: AppConfig, logger: Logger = createLogger('chat-store')): Promise<OpenChatStore> {
  if (config.CHAT_STORE === 'file') {
    logger.info(`chats stored under ${config.CHAT_DATA_DIR}`);
    return { store: new FileChatStore(path.resolve(config.CHAT_DATA_DIR), logger), close: async () => {} };
  }

  const client = createClient({ url: config.REDIS_URL });
  client.on('error', (err: unknown) => logger.error('Redis error:', err));
  await client.connect();
  logger.info(`chats stored in Redis at ${config.REDIS_URL}`);

  const kv: KeyValueClient = {
    get: (key) => client.get(key),
    set: (key, value, options) => client.set(key, value, options),
    del: (key) => client.del(key),
  };
  return {
    store: new RedisChatStore(kv, { ttlSeconds: config.CHAT_TTL_SECONDS }, logger),
    close: async () => {
      await client.quit();
    },
  };
}
