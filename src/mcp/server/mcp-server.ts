/**
 * MCP Server implementation using the Model Context Protocol SDK.
 * Serves the Teradata tools and prompts over stdio, Streamable HTTP, SSE or
 * the REST compatibility surface.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { ServerConfig } from '../../config';
import { SERVER_NAME, SERVER_VERSION } from '../../config';
import { parseDatabaseUri } from '../../lib/database-uri';
import { ConfigurationError, errorMessage } from '../../lib/errors';
import type { Logger } from '../../lib/logger';
import { findResourceDir } from '../../lib/resources';
import { TeradataClient, createTeradataSqlConnector, type Connector } from '../../lib/teradata';
import { createVectorStoreClient, type FetchFn, type VectorStore } from '../../lib/vector-store';
import { createSessionState } from '../../domain/types';
import { getBuiltinTools } from '../../tools';
import type { ToolContext } from '../context/types';
import { loadCustomDefinitions } from '../custom/loader';
import { loadPromptsFromDirectory, type PromptDefinition } from '../prompts/loader';
import { registerPrompts } from '../prompts/registry';
import type { Tool } from '../tools/tool-definition';
import { startSseServer, startStreamableHttpServer, type RunningServer } from './http';
import { startRestServer } from './rest';
import { removeAliveFile, writeAliveFile } from './shutdown';

export interface ServerDependencies {
  config: ServerConfig;
  logger: Logger;
  database: TeradataClient;
  vectorStore?: VectorStore | undefined;
  tools: readonly Tool[];
  prompts: readonly PromptDefinition[];
}

export interface CreateServerOptions {
  connector?: Connector;
  fetch?: FetchFn;
  promptsDir?: string;
}

/**
 * Keep the first item of each name
 */
function uniqueByName<T extends { name: string }>(
  items: readonly T[],
  kind: string,
  logger: Logger,
): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    if (seen.has(item.name)) {
      logger.warn({ [kind]: item.name }, `Duplicate ${kind} name, skipping`);
      return false;
    }
    seen.add(item.name);
    return true;
  });
}

async function connectVectorStore(
  config: ServerConfig,
  logger: Logger,
  fetchFn?: FetchFn,
): Promise<VectorStore | undefined> {
  if (!config.vectorStore) {
    return undefined;
  }
  const client = createVectorStoreClient(config.vectorStore, logger, fetchFn);
  if (!client) {
    return undefined;
  }
  try {
    await client.verify();
    logger.info({ vectorStore: client.name }, 'Enterprise Vector Store connected');
    return client;
  } catch (error) {
    logger.error(
      { vectorStore: client.name, error: errorMessage(error) },
      'Unable to connect to Enterprise Vector Store, vector store tools disabled',
    );
    return undefined;
  }
}

async function loadBuiltinPrompts(directory: string, logger: Logger): Promise<PromptDefinition[]> {
  const result = await loadPromptsFromDirectory(directory, logger);
  if (!result.ok) {
    logger.error({ directory, error: result.error }, 'Built-in prompts unavailable');
    return [];
  }
  return result.value;
}

/**
 * MCP Server class that wires the Teradata tools and prompts into the SDK.
 * Each transport session gets a fresh McpServer from createMcpServer(); the
 * database client, vector store and session state are shared.
 */
export class TeradataMCPServer {
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly database: TeradataClient;
  private readonly toolList: Tool[];
  private readonly promptList: PromptDefinition[];
  private readonly toolContext: ToolContext;
  private running: RunningServer | undefined;
  private isRunning = false;

  constructor(deps: ServerDependencies) {
    this.config = deps.config;
    this.logger = deps.logger.child({ component: 'TeradataMCPServer' });
    this.database = deps.database;
    this.toolList = uniqueByName(deps.tools, 'tool', this.logger);
    this.promptList = uniqueByName(deps.prompts, 'prompt', this.logger);
    this.toolContext = {
      logger: deps.logger,
      database: deps.database,
      vectorStore: deps.vectorStore,
      session: createSessionState(),
      settings: { faqTable: deps.config.tools.faqTable },
    };
  }

  /**
   * Build a server from configuration: database client, vector store,
   * built-in prompts and the custom tool files
   */
  static async create(
    config: ServerConfig,
    logger: Logger,
    options: CreateServerOptions = {},
  ): Promise<TeradataMCPServer> {
    const settings =
      config.databaseUri !== undefined ? parseDatabaseUri(config.databaseUri) : undefined;
    if (!settings) {
      logger.warn('DATABASE_URI is not set; database tools will fail until it is configured');
    }
    const database = new TeradataClient(
      settings,
      options.connector ?? createTeradataSqlConnector(),
      logger,
    );
    const vectorStore = await connectVectorStore(config, logger, options.fetch);
    const promptsDir = options.promptsDir ?? findResourceDir('prompts');
    const prompts = await loadBuiltinPrompts(promptsDir, logger);
    const custom = await loadCustomDefinitions(config.tools.customToolsDir, logger);

    return new TeradataMCPServer({
      config,
      logger,
      database,
      vectorStore,
      tools: [...getBuiltinTools(), ...custom.tools],
      prompts: [...prompts, ...custom.prompts],
    });
  }

  get tools(): readonly Tool[] {
    return this.toolList;
  }

  get prompts(): readonly PromptDefinition[] {
    return this.promptList;
  }

  get context(): ToolContext {
    return this.toolContext;
  }

  /**
   * A new SDK server with every tool and prompt registered
   */
  createMcpServer(): McpServer {
    const server = new McpServer(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {}, prompts: {}, logging: {} } },
    );

    for (const tool of this.toolList) {
      if (Object.keys(tool.inputShape).length === 0) {
        // No schema for argument-less tools so calls without arguments validate
        server.registerTool(tool.name, { description: tool.description }, () =>
          tool.invoke({}, this.toolContext),
        );
      } else {
        server.registerTool(
          tool.name,
          { description: tool.description, inputSchema: tool.inputShape },
          (args) => tool.invoke(args, this.toolContext),
        );
      }
    }
    registerPrompts(server, this.promptList, this.logger);

    this.logger.debug(
      { tools: this.toolList.length, prompts: this.promptList.length },
      'MCP server created',
    );
    return server;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Server is already running');
      return;
    }
    const { transport, host, port, path, apiKey, aliveFile } = this.config.server;
    this.logger.info(
      { transport, tools: this.toolList.length, prompts: this.promptList.length },
      'Starting server',
    );

    switch (transport) {
      case 'stdio': {
        const server = this.createMcpServer();
        await server.connect(new StdioServerTransport());
        this.running = { url: 'stdio', close: () => server.close() };
        break;
      }
      case 'streamable-http':
        this.running = await startStreamableHttpServer(() => this.createMcpServer(), path, {
          host,
          port,
          logger: this.logger,
        });
        break;
      case 'sse': {
        const sse = await startSseServer(() => this.createMcpServer(), {
          host,
          port,
          logger: this.logger,
        });
        writeAliveFile(aliveFile, this.logger);
        this.running = {
          url: sse.url,
          close: async () => {
            removeAliveFile(aliveFile, this.logger);
            await sse.close();
          },
        };
        break;
      }
      case 'rest':
        if (apiKey === undefined) {
          throw new ConfigurationError('MCPO_API_KEY is required for the rest transport');
        }
        this.running = await startRestServer(this.toolList, this.toolContext, {
          host,
          port,
          apiKey,
          title: SERVER_NAME,
          version: SERVER_VERSION,
          logger: this.logger,
        });
        break;
    }

    this.isRunning = true;
    this.logger.info({ transport, url: this.running?.url }, 'Server started');
  }

  async stop(): Promise<void> {
    const running = this.running;
    this.running = undefined;
    this.isRunning = false;
    if (running) {
      await running.close();
    }
    await this.database.close();
    this.logger.info('Server stopped');
  }
}
