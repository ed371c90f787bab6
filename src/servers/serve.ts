/** Argument parsing and startup for the MCP server command line. */

import { parseArgs } from 'node:util';
import type { Server } from 'node:http';
import { createMcpApp } from './mcp';
import { SERVER_FACTORIES, SERVER_NAMES, defaultPort, isServerName, type ServerName } from './registry';
import { getConfig, type AppConfig } from '../config/config';
import { closeServer, listen } from '../utils/http-server';
import { createLogger } from '../utils/logger';

const log = createLogger('servers');

export const USAGE = `Usage: servers <${[...SERVER_NAMES, 'all'].join('|')}> [--port <port>] [--host <host>]`;

export interface ServeCommand {
  targets: ServerName[];
  port?: number;
  host?: string;
}

export function parseServeArgs(argv: string[]): ServeCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      port: { type: 'string', short: 'p' },
      host: { type: 'string', short: 'h' },
    },
  });

  const [target] = positionals;
  if (!target || positionals.length > 1) throw new Error(USAGE);

  let port: number | undefined;
  if (values.port !== undefined) {
    port = Number(values.port);
    if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid port: ${values.port}`);
  }

  if (target === 'all') {
    // one port cannot serve four servers
    if (port !== undefined) throw new Error('--port cannot be combined with "all"');
    return { targets: [...SERVER_NAMES], host: values.host };
  }
  if (!isServerName(target)) throw new Error(`Unknown server "${target}". ${USAGE}`);
  return { targets: [target], port, host: values.host };
}

export async function startServers(command: ServeCommand, config: AppConfig = getConfig()): Promise<Server[]> {
  const host = command.host ?? config.MCP_HOST;
  const servers: Server[] = [];
  try {
    for (const name of command.targets) {
      const def = SERVER_FACTORIES[name](config);
      const port = command.port ?? defaultPort(name, config);
      servers.push(await listen(createMcpApp(def), port, host));
      log.info(`${def.title} listening on http://${host}:${port}/mcp (${def.tools.join(', ')})`);
    }
  } catch (err) {
    await Promise.all(servers.map((s) => closeServer(s)));
    throw err;
  }
  return servers;
}
