/**
 * RAG Tools
 *
 * In-database retrieval workflow: store the question, tokenize it and embed it
 * with the ONNX model held in the model database, materialise the embedding as
 * columns, then rank chunk embeddings by cosine distance.
 *
 * Every step after rag_setConfig reads the locations from session state.
 */

import type { Logger } from '../../lib/logger';
import type { SqlConnection } from '../../lib/teradata';
import { createResponse, serializeValue } from '../../lib/serialize';
import { quoteIdentifier, quoteLiteral, quoteQualifiedName } from '../../lib/sql';
import {
  RAG_DEFAULTS,
  Failure,
  type RagConfig,
  type Result,
  type ToolResponse,
} from '../../domain/types';
import type { ToolContext } from '../../mcp/context/types';
import { executeDbTool } from '../../mcp/tools/executor';
import { formatErrorResponse, formatTextResponse } from '../../mcp/tools/response-formatter';
import { defineTool } from '../../mcp/tools/tool-definition';
import { queryResponse, runTimed, tableExists } from '../query';
import {
  noParamsSchema,
  semanticSearchSchema,
  setConfigSchema,
  storeUserQuerySchema,
  type SemanticSearchParams,
  type SetConfigParams,
  type StoreUserQueryParams,
} from './schema';

export const RAG_CONFIG_MISSING = 'RAG config not set. Call rag_setConfig first.';
export const EMBEDDING_DIMENSIONS = 384;
export const TOKENIZED_VIEW = 'v_topics_tokenized';
export const EMBEDDINGS_VIEW = 'v_topics_embeddings';

const RAG_PREFIX = '/rag ';

export function createRagConfig(params: SetConfigParams): RagConfig {
  return {
    queryDb: params.query_db.trim(),
    modelDb: params.model_db.trim(),
    vectorDb: params.vector_db.trim(),
    vectorTable: params.vector_table.trim(),
    ...RAG_DEFAULTS,
  };
}

export function describeRagConfig(config: RagConfig): Record<string, string> {
  return {
    query_db: config.queryDb,
    model_db: config.modelDb,
    vector_db: config.vectorDb,
    vector_table: config.vectorTable,
    query_table: config.queryTable,
    query_embedding_store: config.queryEmbeddingStore,
    model_id: config.modelId,
  };
}

/** Drop a leading `/rag ` command prefix */
export function cleanQuestion(question: string): string {
  const trimmed = question.trim();
  return trimmed.startsWith(RAG_PREFIX) ? trimmed.slice(RAG_PREFIX.length).trim() : trimmed;
}

/** `YYYY-MM-DD HH:MI:SS.ffffff` in UTC, as bound to a TIMESTAMP(6) column */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 23).replace('T', ' ')}000`;
}

export async function storeUserQuery(
  connection: SqlConnection,
  params: StoreUserQueryParams,
  logger: Logger,
  now: () => Date = () => new Date(),
): Promise<Result<string>> {
  const question = cleanQuestion(params.question);
  if (question.length === 0) {
    return Failure('question is required');
  }
  return runTimed(logger, 'rag_storeUserQuery', async () => {
    const table = quoteQualifiedName(params.table_name, params.db_name);
    const exists = await tableExists(connection, params.db_name, params.table_name);
    if (!exists) {
      logger.info({ table }, 'Creating user query table');
      await connection.execute(`CREATE TABLE ${table} (
  id INTEGER GENERATED ALWAYS AS IDENTITY (START WITH 1 INCREMENT BY 1),
  txt VARCHAR(5000) CHARACTER SET UNICODE,
  created_ts TIMESTAMP(6) DEFAULT CURRENT_TIMESTAMP(6)
) PRIMARY INDEX (id)`);
    }
    // Identity values are not ordered; the row is found by its text and timestamp
    const createdTs = formatTimestamp(now());
    await connection.execute(`INSERT INTO ${table} (txt, created_ts) VALUES (?, ?)`, [
      question,
      createdTs,
    ]);
    const { rows } = await connection.query(
      `SELECT TOP 1 id FROM ${table} WHERE txt = ? AND created_ts = ? ORDER BY id DESC`,
      [question, createdTs],
    );
    return createResponse([{ id: serializeValue(rows[0]?.[0]), txt: question }], {
      tool_name: 'rag_storeUserQuery',
      db_name: params.db_name,
      table_name: params.table_name,
      table_created: !exists,
    });
  });
}

export function tokenizeQuerySql(config: RagConfig): string {
  const queryDb = quoteIdentifier(config.queryDb);
  return `REPLACE VIEW ${queryDb}.${TOKENIZED_VIEW} AS (
  SELECT id, txt, IDS AS input_ids, attention_mask
  FROM ivsm.tokenizer_encode(
    ON (
      SELECT TOP 1 id, txt
      FROM ${queryDb}.${quoteIdentifier(config.queryTable)}
      ORDER BY created_ts DESC
    )
    ON (
      SELECT model AS tokenizer
      FROM ${quoteIdentifier(config.modelDb)}.embeddings_tokenizers
      WHERE model_id = ${quoteLiteral(config.modelId)}
    ) DIMENSION
    USING
      ColumnsToPreserve('id', 'txt')
      OutputFields('IDS', 'ATTENTION_MASK')
      MaxLength(1024)
      PadToMaxLength('False')
      TokenDataType('INT64')
  ) AS t
)`;
}

export function embeddingViewSql(config: RagConfig): string {
  const queryDb = quoteIdentifier(config.queryDb);
  return `REPLACE VIEW ${queryDb}.${EMBEDDINGS_VIEW} AS (
  SELECT *
  FROM ivsm.IVSM_score(
    ON ${queryDb}.${TOKENIZED_VIEW}
    ON (
      SELECT *
      FROM ${quoteIdentifier(config.modelDb)}.embeddings_models
      WHERE model_id = ${quoteLiteral(config.modelId)}
    ) DIMENSION
    USING
      ColumnsToPreserve('id', 'txt')
      ModelType('ONNX')
      BinaryInputFields('input_ids', 'attention_mask')
      BinaryOutputFields('sentence_embedding')
      Caching('inquery')
  ) AS s
)`;
}

export function queryEmbeddingTableSql(config: RagConfig): string {
  const queryDb = quoteIdentifier(config.queryDb);
  return `CREATE TABLE ${queryDb}.${quoteIdentifier(config.queryEmbeddingStore)} AS (
  SELECT *
  FROM ivsm.vector_to_columns(
    ON ${queryDb}.${EMBEDDINGS_VIEW}
    USING
      ColumnsToPreserve('id', 'txt')
      VectorDataType('FLOAT32')
      VectorLength(${EMBEDDING_DIMENSIONS})
      OutputColumnPrefix('emb_')
      InputColumnName('sentence_embedding')
  ) AS a
) WITH DATA`;
}

export function semanticSearchSql(config: RagConfig, topK: number): string {
  const chunks = `${quoteIdentifier(config.vectorDb)}.${quoteIdentifier(config.vectorTable)}`;
  const features = `'[emb_0:emb_${EMBEDDING_DIMENSIONS - 1}]'`;
  return `SELECT e_ref.txt AS reference_txt,
       e_ref.chunk_num,
       e_ref.page_num,
       e_ref.doc_name,
       CAST(1.0 - dt.distance AS DECIMAL(6,4)) AS similarity
FROM TD_VECTORDISTANCE(
  ON ${quoteIdentifier(config.queryDb)}.${quoteIdentifier(config.queryEmbeddingStore)} AS TargetTable
  ON ${chunks} AS ReferenceTable DIMENSION
  USING
    TargetIDColumn('id')
    TargetFeatureColumns(${features})
    RefIDColumn('id')
    RefFeatureColumns(${features})
    DistanceMeasure('cosine')
    TopK(${topK})
) AS dt
JOIN ${chunks} e_ref
  ON e_ref.id = dt.reference_id
ORDER BY similarity DESC`;
}

export async function tokenizeQuery(
  connection: SqlConnection,
  config: RagConfig,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'rag_tokenizeQuery', async () => {
    await connection.execute(tokenizeQuerySql(config));
    return createResponse(
      [{ view: `${config.queryDb}.${TOKENIZED_VIEW}` }],
      { tool_name: 'rag_tokenizeQuery', model_id: config.modelId },
    );
  });
}

export async function createEmbeddingView(
  connection: SqlConnection,
  config: RagConfig,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'rag_createEmbeddingView', async () => {
    await connection.execute(embeddingViewSql(config));
    return createResponse(
      [{ view: `${config.queryDb}.${EMBEDDINGS_VIEW}` }],
      { tool_name: 'rag_createEmbeddingView', model_id: config.modelId },
    );
  });
}

export async function createQueryEmbeddingTable(
  connection: SqlConnection,
  config: RagConfig,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'rag_createQueryEmbeddingTable', async () => {
    const table = `${quoteIdentifier(config.queryDb)}.${quoteIdentifier(config.queryEmbeddingStore)}`;
    if (await tableExists(connection, config.queryDb, config.queryEmbeddingStore)) {
      await connection.execute(`DROP TABLE ${table}`);
    }
    await connection.execute(queryEmbeddingTableSql(config));
    return createResponse(
      [{ table: `${config.queryDb}.${config.queryEmbeddingStore}` }],
      { tool_name: 'rag_createQueryEmbeddingTable', vector_length: EMBEDDING_DIMENSIONS },
    );
  });
}

export async function semanticSearchChunks(
  connection: SqlConnection,
  config: RagConfig,
  params: SemanticSearchParams,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'rag_semanticSearchChunks', () =>
    queryResponse(connection, semanticSearchSql(config, params.k), [], {
      tool_name: 'rag_semanticSearchChunks',
      top_k: params.k,
      vector_table: `${config.vectorDb}.${config.vectorTable}`,
    }),
  );
}

type RagStep = (connection: SqlConnection, config: RagConfig, logger: Logger) => Promise<Result<string>>;

function runRagStep(context: ToolContext, name: string, step: RagStep): Promise<ToolResponse> {
  const config = context.session.rag;
  if (!config) {
    return Promise.resolve(formatErrorResponse(RAG_CONFIG_MISSING));
  }
  return executeDbTool(context, name, (connection) =>
    step(connection, config, context.logger.child({ tool: name })),
  );
}

export const ragTools = [
  defineTool({
    name: 'rag_setConfig',
    description: `Set the configuration for the current Retrieval-Augmented Generation (RAG) session.
This MUST be called before any other RAG-related tools.

The following values are fixed:
- query_table = '${RAG_DEFAULTS.queryTable}'
- query_embedding_store = '${RAG_DEFAULTS.queryEmbeddingStore}'
- model_id = '${RAG_DEFAULTS.modelId}'

Only the database locations are needed:
- query_db: where user queries and query embeddings will be stored
- model_db: where the embedding model metadata is stored
- vector_db + vector_table: where PDF chunk embeddings are stored

Once this configuration is set, all other RAG tools reuse it automatically.`,
    category: 'rag',
    shape: setConfigSchema.shape,
    run: async (params, context) => {
      const config = createRagConfig(params);
      context.session.rag = config;
      context.logger.info({ rag: describeRagConfig(config) }, 'RAG config set');
      return formatTextResponse(
        createResponse(describeRagConfig(config), { tool_name: 'rag_setConfig' }),
      );
    },
  }),
  defineTool({
    name: 'rag_storeUserQuery',
    description:
      "Store a user's natural language question as the first step in a Retrieval-Augmented Generation (RAG) workflow. " +
      'Run this before any embedding or similarity search steps. ' +
      'The question is inserted into the table given by `db_name` and `table_name`; a leading `/rag ` prefix is stripped. ' +
      'Each question is appended as a new row with a generated ID and timestamp. ' +
      'A missing table is created with columns `id`, `txt` and `created_ts`. ' +
      'Returns the inserted row ID and the cleaned question text.',
    category: 'rag',
    shape: storeUserQuerySchema.shape,
    run: (params, context) =>
      executeDbTool(context, 'rag_storeUserQuery', (connection) =>
        storeUserQuery(connection, params, context.logger.child({ tool: 'rag_storeUserQuery' })),
      ),
  }),
  defineTool({
    name: 'rag_tokenizeQuery',
    description:
      'Tokenize the latest stored user question with the tokenizer from the RAG configuration. ' +
      'Requires rag_setConfig and rag_storeUserQuery first. ' +
      "Creates the view '<query_db>.v_topics_tokenized' with 'id', 'txt', 'input_ids' and 'attention_mask', " +
      'which is used downstream to generate vector embeddings.',
    category: 'rag',
    shape: noParamsSchema.shape,
    run: (_params, context) => runRagStep(context, 'rag_tokenizeQuery', tokenizeQuery),
  }),
  defineTool({
    name: 'rag_createEmbeddingView',
    description:
      'Generate sentence embeddings for the most recent tokenized user query with the ONNX model from `<model_db>.embeddings_models`. ' +
      'Reads `<query_db>.v_topics_tokenized` and creates or replaces the view `<query_db>.v_topics_embeddings` with a `sentence_embedding` column. ' +
      'Run after rag_tokenizeQuery and before rag_createQueryEmbeddingTable.',
    category: 'rag',
    shape: noParamsSchema.shape,
    run: (_params, context) => runRagStep(context, 'rag_createEmbeddingView', createEmbeddingView),
  }),
  defineTool({
    name: 'rag_createQueryEmbeddingTable',
    description:
      'Convert the sentence embedding from `v_topics_embeddings` into 384 vector columns using `ivsm.vector_to_columns`, ' +
      'replacing the table that stores the latest query embedding. ' +
      'Run after rag_createEmbeddingView and before rag_semanticSearchChunks.',
    category: 'rag',
    shape: noParamsSchema.shape,
    run: (_params, context) =>
      runRagStep(context, 'rag_createQueryEmbeddingTable', createQueryEmbeddingTable),
  }),
  defineTool({
    name: 'rag_semanticSearchChunks',
    description:
      "Retrieve the top-k most relevant PDF chunks for the user's latest embedded query using cosine similarity via `TD_VECTORDISTANCE`. " +
      'Requires rag_setConfig. Each result includes the similarity score, chunk text, page number, chunk number and document name.',
    category: 'rag',
    shape: semanticSearchSchema.shape,
    run: (params, context) =>
      runRagStep(context, 'rag_semanticSearchChunks', (connection, config, logger) =>
        semanticSearchChunks(connection, config, params, logger),
      ),
  }),
];
