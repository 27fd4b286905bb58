/**
 * HTTP, WebSocket and local socket surface of the executor
 *
 * SECURITY: every route except /health and every WebSocket upgrade must
 * carry the internal API key when one is configured.
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { createServer } from 'http';
import type { IncomingHttpHeaders, Server } from 'http';
import { createServer as createNetServer } from 'net';
import type { Server as NetServer } from 'net';
import { rm } from 'fs/promises';
import { WebSocketServer } from 'ws';
import { StreamTransport, WebSocketTransport } from '@devloop/sdk';
import type { Config } from './config';
import type { ExecutorOrchestrator } from './orchestrator/executorOrchestrator';
import { loggers } from './utils/logger';

const log = loggers.server;

export const EXECUTOR_WS_PATH = '/ws/executor';

/**
 * Internal key from `x-internal-api-key`, `Authorization: Bearer|Internal`,
 * or the `internalKey` query parameter (browsers cannot set upgrade headers)
 */
export function extractInternalKey(headers: IncomingHttpHeaders, url?: URL): string | undefined {
  const internalKeyHeader = headers['x-internal-api-key'];
  if (internalKeyHeader) {
    return Array.isArray(internalKeyHeader) ? internalKeyHeader[0] : internalKeyHeader;
  }

  const authHeader = headers['authorization'];
  if (authHeader?.startsWith('Bearer ')) return authHeader.slice(7);
  if (authHeader?.startsWith('Internal ')) return authHeader.slice(9);

  return url?.searchParams.get('internalKey') ?? undefined;
}

export function isAuthorized(expectedKey: string, providedKey: string | undefined): boolean {
  // No key configured: development mode
  if (!expectedKey) return true;
  return providedKey === expectedKey;
}

export interface ExecutorServer {
  app: express.Express;
  server: Server;
  listen(): Promise<void>;
  close(): Promise<void>;
}

export function createExecutorServer(config: Config, orchestrator: ExecutorOrchestrator): ExecutorServer {
  const app = express();
  const server = createServer(app);
  const wss = new WebSocketServer({ noServer: true });
  let socketServer: NetServer | null = null;

  if (!config.internalApiKey) {
    log.warn('No INTERNAL_API_KEY configured - running in INSECURE mode');
  }

  app.use(express.json());

  const validateInternalAuth = (req: Request, res: Response, next: NextFunction): void => {
    if (req.path === '/health') {
      next();
      return;
    }
    if (!isAuthorized(config.internalApiKey, extractInternalKey(req.headers))) {
      log.warn({ path: req.path, ip: req.ip }, 'Unauthorized request');
      res.status(401).json({ error: 'Unauthorized - internal API key required' });
      return;
    }
    next();
  };

  app.use(validateInternalAuth);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      sessions: orchestrator.sessionCount,
      uptime: process.uptime(),
    });
  });

  app.get('/sessions', (_req, res) => {
    res.json({ sessions: orchestrator.list() });
  });

  app.get('/sessions/:id', (req, res) => {
    const session = orchestrator.list().find((entry) => entry.sessionId === req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json(session);
  });

  app.get('/sessions/:id/events', (req, res) => {
    const session = orchestrator.getSession(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json({ sessionId: session.sessionId, phase: session.phase, events: session.eventLog });
  });

  // Handle HTTP upgrade manually so only the executor path upgrades
  server.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);

    if (url.pathname !== EXECUTOR_WS_PATH) {
      socket.destroy();
      return;
    }
    if (!isAuthorized(config.internalApiKey, extractInternalKey(request.headers, url))) {
      log.warn({ path: url.pathname }, 'Unauthorized WebSocket upgrade');
      socket.write('HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      orchestrator.attach(new WebSocketTransport(ws));
    });
  });

  const listen = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.port, config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    log.info({ port: config.port, host: config.host, wsPath: EXECUTOR_WS_PATH }, 'HTTP server listening');

    const socketPath = config.socketPath;
    if (socketPath) {
      // Stale socket file from a previous run
      await rm(socketPath, { force: true });
      const netServer = createNetServer((socket) => {
        orchestrator.attach(StreamTransport.fromDuplex(socket));
      });
      socketServer = netServer;
      await new Promise<void>((resolve, reject) => {
        netServer.once('error', reject);
        netServer.listen(socketPath, () => {
          netServer.off('error', reject);
          resolve();
        });
      });
      log.info({ socketPath }, 'Local socket listening');
    }
  };

  const close = async (): Promise<void> => {
    for (const client of wss.clients) {
      client.terminate();
    }
    const closing: Array<Promise<void>> = [
      new Promise((resolve) => {
        server.close(() => resolve());
      }),
    ];
    const netServer = socketServer;
    if (netServer) {
      closing.push(new Promise((resolve) => {
        netServer.close(() => resolve());
      }));
    }
    await Promise.all(closing);
  };

  return { app, server, listen, close };
}
