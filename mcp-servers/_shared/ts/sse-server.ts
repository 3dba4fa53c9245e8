/**
 * HTTP + server-sent-events transport.
 *
 *   GET  /sse                      open a session; first event is `endpoint`
 *   POST /message?sessionId=<id>   one request frame; the response arrives
 *                                  on the session's stream as `message`
 *   GET  /health                   liveness and session count
 *
 * Each session runs its own `MCPServer.serve()` loop over a QueueTransport,
 * so responses keep request order per session.
 */

import { randomUUID } from 'crypto';
import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import express, { type Request, type Response } from 'express';

import { errorMessage } from './errors';
import type { Logger } from './logger';
import type { MCPServer } from './mcp-base';
import { QueueTransport } from './transport';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface SseServerOptions {
  server: MCPServer;
  host: string;
  port: number;
  logger: Logger;
}

export interface SseServerHandle {
  host: string;
  port: number;
  /** Number of open sessions */
  sessionCount(): number;
  close(): Promise<void>;
}

interface Session {
  transport: QueueTransport;
  res: Response;
}

export const MESSAGE_PATH = '/message';

// ─── Helpers ────────────────────────────────────────────────────────────────

function writeEvent(res: Response, event: string, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (res.writableEnded || res.destroyed) {
      reject(new Error('event stream is closed'));
      return;
    }
    res.write(`event: ${event}\ndata: ${data}\n\n`, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

function listen(app: express.Express, host: string, port: number): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    const onError = (err: Error): void => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve(server);
    };
    server.once('error', onError);
    server.once('listening', onListening);
  });
}

function boundAddress(server: HttpServer, fallbackHost: string, fallbackPort: number): { host: string; port: number } {
  const address: AddressInfo | string | null = server.address();
  if (address !== null && typeof address === 'object') {
    return { host: address.address, port: address.port };
  }
  return { host: fallbackHost, port: fallbackPort };
}

// ─── Server ─────────────────────────────────────────────────────────────────

/** Bind the HTTP server. Rejects when the address cannot be bound. */
export async function startSseServer(options: SseServerOptions): Promise<SseServerHandle> {
  const { server, logger } = options;
  const sessions = new Map<string, Session>();
  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', sessions: sessions.size });
  });

  app.get('/sse', (_req: Request, res: Response) => {
    const sessionId = randomUUID();
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    const transport = new QueueTransport((frame) => writeEvent(res, 'message', frame));
    sessions.set(sessionId, { transport, res });
    logger.info(`SSE session ${sessionId} opened`);

    res.on('close', () => {
      transport.close();
      sessions.delete(sessionId);
      logger.info(`SSE session ${sessionId} closed`);
    });

    void writeEvent(res, 'endpoint', `${MESSAGE_PATH}?sessionId=${sessionId}`)
      .then(() => server.serve(transport))
      .catch((err: unknown) => {
        logger.warn(`SSE session ${sessionId} ended with error: ${errorMessage(err)}`);
      })
      .finally(() => {
        transport.close();
        sessions.delete(sessionId);
        if (!res.writableEnded) res.end();
      });
  });

  app.post(MESSAGE_PATH, express.text({ type: () => true, limit: '16mb' }), (req: Request, res: Response) => {
    const sessionId = req.query.sessionId;
    if (typeof sessionId !== 'string' || sessionId.length === 0) {
      res.status(400).json({ error: 'missing sessionId' });
      return;
    }

    const body = typeof req.body === 'string' ? req.body : '';
    if (body.trim().length === 0) {
      res.status(400).json({ error: 'empty request body' });
      return;
    }

    const session = sessions.get(sessionId);
    if (!session || !session.transport.push(body)) {
      res.status(404).json({ error: `unknown session: ${sessionId}` });
      return;
    }

    res.status(202).send('Accepted');
  });

  const httpServer = await listen(app, options.host, options.port);
  const bound = boundAddress(httpServer, options.host, options.port);
  logger.info(`SSE server listening on ${bound.host}:${bound.port}`);

  return {
    host: bound.host,
    port: bound.port,
    sessionCount: () => sessions.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const session of sessions.values()) {
          session.transport.close();
          if (!session.res.writableEnded) session.res.end();
        }
        sessions.clear();
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        httpServer.closeAllConnections();
      }),
  };
}
