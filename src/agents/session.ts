import { newChatRecord, type ChatStore } from '../memory/chat-store';
import type { AssistantReply, ChatMessage } from '../types/types';

export interface QueryProcessor {
  processUserQuery(text: string, history: ChatMessage[]): Promise<AssistantReply>;
}

export type SessionStep =
  | { kind: 'exit' }
  | { kind: 'skip' }
  | { kind: 'reset' }
  | { kind: 'reply'; reply: AssistantReply };

/** Loads the chat, asks the assistant, and stores both sides of the exchange. */
export async function converse(
  store: ChatStore,
  assistant: QueryProcessor,
  chatId: string,
  text: string,
  now: () => Date = () => new Date()
): Promise<AssistantReply> {
  const chat = (await store.load(chatId)) ?? newChatRecord(chatId, now());
  const reply = await assistant.processUserQuery(text, [...chat.messages]);
  chat.messages.push({ role: 'user', text, at: now().toISOString() });
  chat.messages.push({ role: 'assistant', text: reply.text, at: now().toISOString(), agent: reply.agent });
  await store.save(chat);
  return reply;
}

/** One chat as the terminal sees it: commands plus persisted history. */
export class ChatSession {
  constructor(
    private readonly chatId: string,
    private readonly assistant: QueryProcessor,
    private readonly store: ChatStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async handle(line: string): Promise<SessionStep> {
    const q = line.trim();
    if (!q) return { kind: 'skip' };
    if (q.toLowerCase() === 'exit') return { kind: 'exit' };
    if (q === '/reset') {
      await this.store.reset(this.chatId);
      return { kind: 'reset' };
    }

    const reply = await converse(this.store, this.assistant, this.chatId, q, this.now);
    return { kind: 'reply', reply };
  }
}
