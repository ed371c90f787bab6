import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'node:http';
import type { Logger } from './logger';
import { errorMessage } from '../types/types';

/** Last-resort express middleware: logs the failure and answers with a JSON error. */
export function errorMiddleware(logger: Logger) {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusOf(error);
    if (status >= 500) {
      logger.error(`${req.method} ${req.originalUrl} failed:`, error);
    } else {
      logger.warn(`${req.method} ${req.originalUrl} rejected: ${errorMessage(error)}`);
    }
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : errorMessage(error) });
  };
}

// body-parser tags its errors (bad JSON, oversized body) with an HTTP status
function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
