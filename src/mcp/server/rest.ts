/**
 * REST surface: every tool is exposed as `POST /<tool name>` with its arguments
 * as the JSON body, behind a bearer API key. `GET /openapi.json` describes the
 * endpoints.
 */

import { timingSafeEqual } from 'node:crypto';
import express, { type NextFunction, type Request, type Response } from 'express';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ValidationError, errorMessage } from '../../lib/errors';
import type { Logger } from '../../lib/logger';
import type { ToolContext } from '../context/types';
import type { Tool } from '../tools/tool-definition';
import { responseText } from '../tools/response-formatter';
import { asyncRoute, closeServer, listen, serverUrl, type RunningServer } from './http';

export interface RestResult {
  status: number;
  body: unknown;
}

export interface RestServerOptions {
  host: string;
  port: number;
  apiKey: string;
  title: string;
  version: string;
  logger: Logger;
}

/**
 * Compare a bearer Authorization header against the configured key
 */
export function isAuthorized(header: string | undefined, apiKey: string): boolean {
  const match = header !== undefined ? /^Bearer\s+(.+)$/i.exec(header.trim()) : null;
  const presented = match?.[1];
  if (presented === undefined) {
    return false;
  }
  const expected = Buffer.from(apiKey);
  const actual = Buffer.from(presented);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

function toBody(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Run one tool and map the outcome onto an HTTP status and JSON body
 */
export async function handleRestToolCall(
  tools: ReadonlyMap<string, Tool>,
  name: string,
  args: unknown,
  context: ToolContext,
): Promise<RestResult> {
  const tool = tools.get(name);
  if (!tool) {
    return { status: 404, body: { detail: `Tool not found: ${name}` } };
  }
  try {
    const response = await tool.invoke(args, context);
    const text = responseText(response);
    if (response.isError) {
      return { status: 500, body: { detail: text } };
    }
    return { status: 200, body: toBody(text) };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { status: 422, body: { detail: error.message } };
    }
    context.logger.error({ tool: name, error: errorMessage(error) }, 'REST tool call failed');
    return { status: 500, body: { detail: errorMessage(error) } };
  }
}

export function buildOpenApiDocument(
  tools: readonly Tool[],
  info: { title: string; version: string },
): Record<string, unknown> {
  const paths: Record<string, unknown> = {};
  for (const tool of tools) {
    paths[`/${tool.name}`] = {
      post: {
        operationId: tool.name,
        summary: tool.name,
        description: tool.description,
        requestBody: {
          required: false,
          content: {
            'application/json': {
              schema: zodToJsonSchema(tool.inputSchema, { target: 'openApi3', $refStrategy: 'none' }),
            },
          },
        },
        responses: {
          '200': { description: 'Successful Response' },
          '401': { description: 'Invalid API key' },
          '422': { description: 'Validation Error' },
          '500': { description: 'Tool Error' },
        },
        security: [{ HTTPBearer: [] }],
      },
    };
  }
  return {
    openapi: '3.1.0',
    info: { title: info.title, version: info.version },
    paths,
    components: {
      securitySchemes: { HTTPBearer: { type: 'http', scheme: 'bearer' } },
    },
  };
}

export async function startRestServer(
  tools: readonly Tool[],
  context: ToolContext,
  options: RestServerOptions,
): Promise<RunningServer> {
  const logger = options.logger.child({ transport: 'rest' });
  const registry = new Map(tools.map((tool) => [tool.name, tool]));
  const openApi = buildOpenApiDocument(tools, options);
  const app = express();
  app.use(express.json({ limit: '4mb' }));

  app.get('/openapi.json', (_req, res) => {
    res.json(openApi);
  });

  const requireKey = (req: Request, res: Response, next: NextFunction): void => {
    if (!isAuthorized(req.header('authorization'), options.apiKey)) {
      res.status(401).json({ detail: 'Invalid API key' });
      return;
    }
    next();
  };

  app.post(
    '/:tool',
    requireKey,
    asyncRoute(async (req, res) => {
      const name = req.params.tool ?? '';
      logger.info({ tool: name }, 'REST tool call');
      const result = await handleRestToolCall(registry, name, req.body, context);
      res.status(result.status).json(result.body);
    }, logger),
  );

  const server = await listen(app, options.host, options.port);
  const url = serverUrl(server, options.host, options.port);
  logger.info({ url, tools: tools.length }, 'REST server listening');

  return {
    url,
    close: () => closeServer(server),
  };
}
