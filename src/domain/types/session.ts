/**
 * Per-process session state shared by every MCP session of one server.
 */

/**
 * Locations used by the RAG workflow. The table names and model id are fixed;
 * only the databases and the chunk table are supplied by the caller.
 */
export interface RagConfig {
  queryDb: string;
  modelDb: string;
  vectorDb: string;
  vectorTable: string;
  queryTable: string;
  queryEmbeddingStore: string;
  modelId: string;
}

export const RAG_DEFAULTS = {
  queryTable: 'user_query',
  queryEmbeddingStore: 'user_query_embeddings',
  modelId: 'bge-small-en-v1.5',
} as const;

/**
 * Feature store selection. Keys stay undefined until validated against the catalog.
 */
export interface FeatureStoreConfig {
  data_domain?: string | undefined;
  entity?: string | undefined;
  db_name?: string | undefined;
  feature_catalog?: string | undefined;
  process_catalog?: string | undefined;
  dataset_catalog?: string | undefined;
}

export interface SessionState {
  rag: RagConfig | undefined;
  featureStore: FeatureStoreConfig;
}

export function createSessionState(): SessionState {
  return { rag: undefined, featureStore: {} };
}
