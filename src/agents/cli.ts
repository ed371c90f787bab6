// Interactive travel assistant. Type "exit" to quit, "/reset" to forget the conversation.
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { TravelAssistant } from './assistant';
import { ChatSession } from './session';
import { openChatStore } from '../memory/chat-store';
import { getConfig } from '../config/config';
import { createLogger } from '../utils/logger';

const log = createLogger('cli');

async function main() {
  const config = getConfig();
  const chatId = process.argv[2] ?? 'cli';
  const { store, close } = await openChatStore(config);
  const session = new ChatSession(chatId, new TravelAssistant({ config }), store);

  const rl = readline.createInterface({ input, output });
  console.log(`Travel assistant (chat "${chatId}"). Type "exit" to quit. Commands: /reset`);

  try {
    while (true) {
      const step = await session.handle(await rl.question('you> '));
      if (step.kind === 'exit') break;
      if (step.kind === 'reset') console.log('(history reset)');
      if (step.kind === 'reply') {
        console.log(`\n[${step.reply.agent ?? (step.reply.blocked ? 'guardrail' : 'assistant')}]: ${step.reply.text}\n`);
      }
    }
  } finally {
    rl.close();
    await close();
  }
  console.log('Session ended. Bye!');
}

main().catch((err: unknown) => {
  log.error(err);
  process.exit(1);
});
