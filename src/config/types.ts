/**
 * Configuration Types
 */

import type { TRANSPORTS } from './defaults';

export type Transport = (typeof TRANSPORTS)[number];
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface VectorStoreSettings {
  name: string;
  baseUrl: string | undefined;
  user: string | undefined;
  password: string | undefined;
  token: string | undefined;
  timeout: number;
}

export interface ServerConfig {
  nodeEnv: NodeEnv;
  databaseUri: string | undefined;
  server: {
    transport: Transport;
    host: string;
    port: number;
    path: string;
    apiKey: string | undefined;
    aliveFile: string;
  };
  logging: {
    level: LogLevel;
    file: string | undefined;
  };
  vectorStore: VectorStoreSettings | undefined;
  tools: {
    customToolsDir: string;
    faqTable: string;
  };
}
