/**
 * Main export file for embedding the server or reusing its tools
 */

export { TeradataMCPServer, type ServerDependencies, type CreateServerOptions } from './mcp/server';
export { startRestServer, handleRestToolCall, buildOpenApiDocument } from './mcp/server';

export { loadConfig, loadEnvFile, describeConfig, type ServerConfig, type Transport } from './config';

export { getBuiltinTools, toolsByCategory } from './tools';
export { defineTool, type Tool, type ToolCategory } from './mcp/tools/tool-definition';
export type { ToolContext } from './mcp/context/types';
export { loadCustomDefinitions, parseCustomDefinitions } from './mcp/custom/loader';
export { loadPromptsFromDirectory, type PromptDefinition } from './mcp/prompts/loader';

export {
  TeradataClient,
  createTeradataSqlConnector,
  type SqlConnection,
  type Connector,
} from './lib/teradata';
export { parseDatabaseUri, type ConnectionSettings } from './lib/database-uri';
export { VectorStoreClient, createVectorStoreClient, type VectorStore } from './lib/vector-store';
export { createLogger, type Logger } from './lib/logger';
export { formatImageVersion, formatImageReference } from './lib/image-tag';

export type { Result, ToolResponse } from './domain/types';
export { Success, Failure } from './domain/types';
