/**
 * Server configuration
 *
 * Environment variables (optionally loaded from a .env file) are mapped onto a
 * typed ServerConfig and validated in one pass so every problem is reported.
 */

import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../lib/errors';
import {
  DEFAULT_ALIVE_FILE,
  DEFAULT_FAQ_TABLE,
  DEFAULT_SERVER,
  DEFAULT_TIMEOUTS,
  TRANSPORTS,
} from './defaults';
import type { ServerConfig } from './types';

export type { ServerConfig, Transport, LogLevel, VectorStoreSettings } from './types';
export * from './defaults';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value.trim().length > 0 ? value : undefined));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
    DATABASE_URI: optionalString,
    MCP_TRANSPORT: z
      .string()
      .default(DEFAULT_SERVER.transport)
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(TRANSPORTS)),
    MCP_HOST: z.string().min(1).default(DEFAULT_SERVER.host),
    MCP_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SERVER.port),
    MCP_PATH: z.string().startsWith('/').default(DEFAULT_SERVER.path),
    MCPO_API_KEY: optionalString,
    ALIVE_FILE: z.string().min(1).default(DEFAULT_ALIVE_FILE),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    LOG_FILE: optionalString,
    VS_NAME: optionalString,
    VS_BASE_URL: optionalString.pipe(z.string().url().optional()),
    VS_USER: optionalString,
    VS_PASSWORD: optionalString,
    VS_TOKEN: optionalString,
    VS_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.vectorStore),
    CUSTOM_TOOLS_DIR: optionalString,
    FAQ_TABLE: z.string().min(1).default(DEFAULT_FAQ_TABLE),
  })
  .superRefine((env, ctx) => {
    if (env.MCP_TRANSPORT === 'rest' && env.MCPO_API_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MCPO_API_KEY'],
        message: 'Required when MCP_TRANSPORT is rest',
      });
    }
  });

/**
 * Build the server configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    databaseUri: values.DATABASE_URI,
    server: {
      transport: values.MCP_TRANSPORT,
      host: values.MCP_HOST,
      port: values.MCP_PORT,
      path: values.MCP_PATH,
      apiKey: values.MCPO_API_KEY,
      aliveFile: values.ALIVE_FILE,
    },
    logging: {
      level: values.LOG_LEVEL ?? (values.NODE_ENV === 'development' ? 'debug' : 'info'),
      file: values.LOG_FILE,
    },
    vectorStore:
      values.VS_NAME !== undefined
        ? {
            name: values.VS_NAME,
            baseUrl: values.VS_BASE_URL,
            user: values.VS_USER,
            password: values.VS_PASSWORD,
            token: values.VS_TOKEN,
            timeout: values.VS_TIMEOUT,
          }
        : undefined,
    tools: {
      customToolsDir: values.CUSTOM_TOOLS_DIR ?? process.cwd(),
      faqTable: values.FAQ_TABLE,
    },
  };
}

/**
 * Load a .env file into process.env without overriding variables already set
 */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path !== undefined ? { path } : {});
  if (result.error && path !== undefined) {
    throw new ConfigurationError(`Cannot read configuration file ${path}`, {}, result.error);
  }
}

/**
 * Summary safe to print: secrets are masked
 */
export function describeConfig(config: ServerConfig): Record<string, unknown> {
  return {
    transport: config.server.transport,
    host: config.server.host,
    port: config.server.port,
    path: config.server.path,
    database: config.databaseUri !== undefined ? maskUri(config.databaseUri) : 'not set',
    apiKey: config.server.apiKey !== undefined ? '***' : 'not set',
    logLevel: config.logging.level,
    logFile: config.logging.file ?? 'stderr only',
    vectorStore: config.vectorStore?.name ?? 'disabled',
    customToolsDir: config.tools.customToolsDir,
  };
}

function maskUri(uri: string): string {
  return uri.replace(/\/\/([^:/@]+):[^@]*@/, '//$1:***@');
}
