/**
 * ToolContext - what every tool implementation receives
 */

import type { Logger } from '../../lib/logger';
import type { TeradataClient } from '../../lib/teradata';
import type { VectorStore } from '../../lib/vector-store';
import type { SessionState } from '../../domain/types';

export interface ToolContext {
  logger: Logger;
  /** Shared database client; tools obtain connections through the executor */
  database: TeradataClient;
  /** Undefined when no Enterprise Vector Store is configured or reachable */
  vectorStore: VectorStore | undefined;
  /** RAG and feature store selections for this server process */
  session: SessionState;
  settings: {
    faqTable: string;
  };
}
