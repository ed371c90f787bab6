/**
 * Runs the MCP tool servers.
 *
 *   servers weather --port 5004
 *   servers all
 *
 * `all` starts the four servers in one process, each on its configured port.
 */

import { parseServeArgs, startServers, type ServeCommand } from './serve';
import { closeServer } from '../utils/http-server';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../types/types';

const log = createLogger('servers');

async function main() {
  let command: ServeCommand;
  try {
    command = parseServeArgs(process.argv.slice(2));
  } catch (err) {
    log.error(errorMessage(err));
    process.exit(2);
  }

  const servers = await startServers(command);

  const shutdown = () => {
    log.info('shutting down');
    Promise.all(servers.map((s) => closeServer(s)))
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
