/**
 * HTTP transports for the MCP server (Streamable HTTP and legacy SSE), served
 * with express. Each client session gets its own McpServer instance from the
 * factory; all of them share the process-wide tool context.
 */

import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import express, { type Express, type Request, type Response } from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage } from '../../lib/errors';
import type { Logger } from '../../lib/logger';

export type McpServerFactory = () => McpServer;

export interface HttpServerOptions {
  host: string;
  port: number;
  logger: Logger;
}

export interface RunningServer {
  readonly url: string;
  close(): Promise<void>;
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/**
 * Adapt an async route for express 4, which ignores returned promises
 */
export function asyncRoute(route: AsyncRoute, logger: Logger) {
  return (req: Request, res: Response): void => {
    route(req, res).catch((error: unknown) => {
      logger.error({ method: req.method, path: req.path, error: errorMessage(error) }, 'Request failed');
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    });
  };
}

export function listen(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

/**
 * Base URL of a listening server, with the port the OS actually bound
 */
export function serverUrl(server: Server, host: string, fallbackPort: number): string {
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : fallbackPort;
  return `http://${host}:${port}`;
}

function badSession(res: Response): void {
  res.status(400).json({
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
    id: null,
  });
}

/**
 * Streamable HTTP transport on a single path; sessions are tracked by the
 * `mcp-session-id` header
 */
export async function startStreamableHttpServer(
  factory: McpServerFactory,
  path: string,
  options: HttpServerOptions,
): Promise<RunningServer> {
  const logger = options.logger.child({ transport: 'streamable-http' });
  const transports = new Map<string, StreamableHTTPServerTransport>();
  const app = express();
  app.use(express.json({ limit: '4mb' }));

  app.post(
    path,
    asyncRoute(async (req, res) => {
      const sessionId = req.header('mcp-session-id');
      const existing = sessionId !== undefined ? transports.get(sessionId) : undefined;
      if (existing) {
        await existing.handleRequest(req, res, req.body);
        return;
      }
      if (sessionId !== undefined || !isInitializeRequest(req.body)) {
        badSession(res);
        return;
      }

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id) => {
          transports.set(id, transport);
          logger.info({ sessionId: id }, 'Session initialized');
        },
      });
      transport.onclose = () => {
        if (transport.sessionId !== undefined) {
          transports.delete(transport.sessionId);
          logger.info({ sessionId: transport.sessionId }, 'Session closed');
        }
      };
      await factory().connect(transport);
      await transport.handleRequest(req, res, req.body);
    }, logger),
  );

  const sessionRequest = asyncRoute(async (req, res) => {
    const sessionId = req.header('mcp-session-id');
    const transport = sessionId !== undefined ? transports.get(sessionId) : undefined;
    if (!transport) {
      badSession(res);
      return;
    }
    await transport.handleRequest(req, res);
  }, logger);
  app.get(path, sessionRequest);
  app.delete(path, sessionRequest);

  const server = await listen(app, options.host, options.port);
  const url = `${serverUrl(server, options.host, options.port)}${path}`;
  logger.info({ url }, 'Streamable HTTP server listening');

  return {
    url,
    async close() {
      for (const transport of [...transports.values()]) {
        await transport.close();
      }
      transports.clear();
      await closeServer(server);
    },
  };
}

/**
 * Legacy SSE transport: `GET /sse` opens the stream, `POST /messages?sessionId=`
 * carries client messages
 */
export async function startSseServer(
  factory: McpServerFactory,
  options: HttpServerOptions,
): Promise<RunningServer> {
  const logger = options.logger.child({ transport: 'sse' });
  const transports = new Map<string, SSEServerTransport>();
  const app = express();

  app.get(
    '/sse',
    asyncRoute(async (_req, res) => {
      const transport = new SSEServerTransport('/messages', res);
      transports.set(transport.sessionId, transport);
      res.on('close', () => {
        transports.delete(transport.sessionId);
        logger.info({ sessionId: transport.sessionId }, 'SSE stream closed');
      });
      logger.info({ sessionId: transport.sessionId }, 'SSE stream opened');
      await factory().connect(transport);
    }, logger),
  );

  app.post(
    '/messages',
    express.json({ limit: '4mb' }),
    asyncRoute(async (req, res) => {
      const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined;
      const transport = sessionId !== undefined ? transports.get(sessionId) : undefined;
      if (!transport) {
        res.status(400).send('No transport found for sessionId');
        return;
      }
      await transport.handlePostMessage(req, res, req.body);
    }, logger),
  );

  const server = await listen(app, options.host, options.port);
  const url = `${serverUrl(server, options.host, options.port)}/sse`;
  logger.info({ url }, 'SSE server listening');

  return {
    url,
    async close() {
      for (const transport of [...transports.values()]) {
        await transport.close();
      }
      transports.clear();
      await closeServer(server);
    },
  };
}
