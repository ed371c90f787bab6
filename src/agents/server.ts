import { createChatApp } from './app';
import { TravelAssistant } from './assistant';
import { openChatStore } from '../memory/chat-store';
import { getConfig } from '../config/config';
import { closeServer, listen } from '../utils/http-server';
import { createLogger } from '../utils/logger';

const log = createLogger('server');

async function main() {
  const config = getConfig();
  const { store, close } = await openChatStore(config);
  const app = createChatApp({ assistant: new TravelAssistant({ config }), store });

  const server = await listen(app, config.PORT, config.HOST);
  log.info(`Travel assistant listening on http://${config.HOST}:${config.PORT}`);

  const shutdown = () => {
    closeServer(server)
      .then(close)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error('shutdown failed:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  log.error('failed to start:', err);
  process.exit(1);
});
