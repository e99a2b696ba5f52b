/**
 * Centralized Configuration Defaults
 */

export const SERVER_NAME = 'teradata-mcp-server';
export const SERVER_VERSION = '1.0.0';

export const TRANSPORTS = ['stdio', 'sse', 'streamable-http', 'rest'] as const;

export const DEFAULT_SERVER = {
  transport: 'stdio',
  host: 'localhost',
  port: 8001,
  path: '/mcp/',
} as const;

export const DEFAULT_LOG_FILE = 'logs/teradata_mcp_server.log';

export const DEFAULT_ALIVE_FILE = '/tmp/.alive';

export const DEFAULT_FAQ_TABLE = 'FAQ_DEMO';

export const CUSTOM_TOOLS_SUFFIX = '_tools.yaml';

export const DEFAULT_TIMEOUTS = {
  vectorStore: 30000, // 30 seconds
} as const;
