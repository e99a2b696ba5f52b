/**
 * Tool execution wrappers
 *
 * Database tools get a live connection (reopened when the previous one was
 * dropped); vector store tools get the store and one retry after a session
 * refresh. Both convert Result values and thrown errors into tool responses.
 */

import { errorMessage } from '../../lib/errors';
import type { SqlConnection } from '../../lib/teradata';
import type { VectorStore } from '../../lib/vector-store';
import type { Result, ToolResponse } from '../../domain/types';
import type { ToolContext } from '../context/types';
import { formatErrorResponse, formatTextResponse } from './response-formatter';

export type DbHandler = (connection: SqlConnection) => Promise<Result<string>>;
export type VectorStoreHandler = (store: VectorStore) => Promise<Result<string>>;

export const VECTOR_STORE_UNAVAILABLE = 'Enterprise Vector Store is not available on this server.';

function toResponse(result: Result<string>): ToolResponse {
  return result.ok ? formatTextResponse(result.value) : formatErrorResponse(result.error);
}

export async function executeDbTool(
  context: ToolContext,
  toolName: string,
  handler: DbHandler,
): Promise<ToolResponse> {
  try {
    if (!context.database.isConnected) {
      context.logger.info({ tool: toolName }, 'Reinitializing database connection');
    }
    const connection = await context.database.connection();
    const result = await handler(connection);
    if (!result.ok) {
      context.logger.error({ tool: toolName, error: result.error }, 'Tool failed');
    }
    return toResponse(result);
  } catch (error) {
    context.logger.error({ tool: toolName, error: errorMessage(error) }, 'Error executing tool');
    return formatErrorResponse(errorMessage(error));
  }
}

function isSessionExpired(message: string): boolean {
  return message.includes('401') || message.includes('Session expired');
}

async function runVectorStoreHandler(
  store: VectorStore,
  handler: VectorStoreHandler,
): Promise<Result<string>> {
  const result = await handler(store);
  if (!result.ok && isSessionExpired(result.error)) {
    throw new Error(result.error);
  }
  return result;
}

export async function executeVectorStoreTool(
  context: ToolContext,
  toolName: string,
  handler: VectorStoreHandler,
): Promise<ToolResponse> {
  const store = context.vectorStore;
  if (!store) {
    return formatErrorResponse(VECTOR_STORE_UNAVAILABLE);
  }

  try {
    return toResponse(await runVectorStoreHandler(store, handler));
  } catch (error) {
    const message = errorMessage(error);
    if (!isSessionExpired(message)) {
      context.logger.error({ tool: toolName, error: message }, 'Vector store tool error');
      return formatErrorResponse(message);
    }

    context.logger.warn({ tool: toolName }, 'Vector store session expired, refreshing');
    try {
      await store.refresh();
      const retried = await handler(store);
      if (!retried.ok) {
        throw new Error(retried.error);
      }
      return formatTextResponse(retried.value);
    } catch (retryError) {
      const retryMessage = errorMessage(retryError);
      context.logger.error({ tool: toolName, error: retryMessage }, 'Vector store retry failed');
      return formatErrorResponse(`After refresh, still failed: ${retryMessage}`);
    }
  }
}
