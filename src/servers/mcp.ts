/**
 * Stateless MCP-over-HTTP hosting.
 * Each POST /mcp builds a fresh McpServer + Streamable HTTP transport, so the
 * four tool servers keep no session state between calls.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { formatErrorResponse } from './base-service';
import { createLogger, type Logger } from '../utils/logger';
import { errorMiddleware } from '../utils/http-server';
import { TravelAgentError, errorMessage } from '../types/types';

export interface McpToolServer {
  /** Short id used on the command line and in logs, e.g. "weather". */
  name: string;
  title: string;
  tools: readonly string[];
  register: (server: McpServer) => void;
}

export function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: 'text', text }], isError: true } : { content: [{ type: 'text', text }] };
}

/**
 * Runs a tool body and turns its outcome into a tool result.
 * Domain errors carry a message meant for the model; anything else is logged.
 */
export async function runTool(tool: string, logger: Logger, body: () => Promise<string>): Promise<CallToolResult> {
  try {
    logger.debug(`call ${tool}`);
    return textResult(await body());
  } catch (err) {
    if (err instanceof TravelAgentError) {
      logger.warn(`${tool}: ${err.message}`);
      return textResult(err.message, true);
    }
    logger.error(`${tool} failed:`, err);
    return textResult(formatErrorResponse(errorMessage(err), tool), true);
  }
}

export function buildMcpServer(def: McpToolServer): McpServer {
  const server = new McpServer({ name: def.title, version: '1.0.0' });
  def.register(server);
  return server;
}

const rpcError = (code: number, message: string) => ({ jsonrpc: '2.0', error: { code, message }, id: null });

export function createMcpApp(def: McpToolServer, logger: Logger = createLogger(`mcp:${def.name}`)): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.post('/mcp', async (req, res) => {
    const server = buildMcpServer(def);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        logger.warn(`cleanup failed: ${errorMessage(err)}`);
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error('MCP request failed:', err);
      if (!res.headersSent) res.status(500).json(rpcError(-32603, 'Internal server error'));
    }
  });

  // stateless: no SSE stream to resume, no session to delete
  app.get('/mcp', (_req, res) => {
    res.status(405).json(rpcError(-32000, 'Method not allowed.'));
  });
  app.delete('/mcp', (_req, res) => {
    res.status(405).json(rpcError(-32000, 'Method not allowed.'));
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true, server: def.title, tools: def.tools });
  });

  app.use(errorMiddleware(logger));
  return app;
}
