/**
 * RAG Tools Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  RAG_CONFIG_MISSING,
  cleanQuestion,
  createQueryEmbeddingTable,
  createRagConfig,
  formatTimestamp,
  ragTools,
  semanticSearchSql,
  storeUserQuery,
  tokenizeQuerySql,
} from '../../../src/tools/rag';
import type { RagConfig } from '../../../src/domain/types';
import { FakeConnection, result } from '../../__support__/fake-connection';
import { createTestContext, envelopeOf, textOf } from '../../__support__/context';
import { createSilentLogger } from '../../__support__/logger';

const config: RagConfig = createRagConfig({
  query_db: 'rag_queries',
  model_db: 'rag_models',
  vector_db: 'rag_vectors',
  vector_table: 'pdf_chunks',
});

function ragTool(name: string) {
  const tool = ragTools.find((candidate) => candidate.name === name);
  if (!tool) {
    throw new Error(`Missing tool ${name}`);
  }
  return tool;
}

describe('RAG Tools', () => {
  const logger = createSilentLogger();
  let connection: FakeConnection;

  beforeEach(() => {
    connection = new FakeConnection();
  });

  it('should fill the fixed names into the configuration', () => {
    expect(config).toEqual({
      queryDb: 'rag_queries',
      modelDb: 'rag_models',
      vectorDb: 'rag_vectors',
      vectorTable: 'pdf_chunks',
      queryTable: 'user_query',
      queryEmbeddingStore: 'user_query_embeddings',
      modelId: 'bge-small-en-v1.5',
    });
  });

  it('should strip the /rag prefix from questions', () => {
    expect(cleanQuestion('/rag What is the refund policy?')).toBe('What is the refund policy?');
    expect(cleanQuestion('  plain question ')).toBe('plain question');
  });

  describe('rag_storeUserQuery', () => {
    it('should create a missing table and insert the question', async () => {
      connection
        .queueResult(result(['1']))
        .queueExecute(0)
        .queueExecute(1)
        .queueResult(result(['id'], [42]));

      const outcome = await storeUserQuery(
        connection,
        { db_name: 'rag_queries', table_name: 'pdf_user_queries', question: '/rag What is X?' },
        logger,
        () => new Date('2026-03-04T05:06:07.891Z'),
      );

      expect(outcome.ok && JSON.parse(outcome.value)).toEqual({
        status: 'success',
        metadata: {
          tool_name: 'rag_storeUserQuery',
          db_name: 'rag_queries',
          table_name: 'pdf_user_queries',
          table_created: true,
        },
        results: [{ id: 42, txt: 'What is X?' }],
      });
      expect(connection.calls.map((call) => call.kind)).toEqual(['query', 'execute', 'execute', 'query']);
      expect(connection.calls[1]?.sql).toContain('CREATE TABLE "rag_queries"."pdf_user_queries"');
      expect(connection.calls[2]).toEqual({
        kind: 'execute',
        sql: 'INSERT INTO "rag_queries"."pdf_user_queries" (txt, created_ts) VALUES (?, ?)',
        params: ['What is X?', '2026-03-04 05:06:07.891000'],
      });
    });

    it('should read the id back by the inserted text and timestamp', async () => {
      connection.queueResult(result(['1'], [1])).queueExecute(1).queueResult(result(['id'], [7]));

      const outcome = await storeUserQuery(
        connection,
        { db_name: 'rag_queries', table_name: 'pdf_user_queries', question: 'Hello' },
        logger,
        () => new Date('2026-03-04T05:06:07.000Z'),
      );

      expect(connection.calls[2]).toEqual({
        kind: 'query',
        sql: 'SELECT TOP 1 id FROM "rag_queries"."pdf_user_queries" WHERE txt = ? AND created_ts = ? ORDER BY id DESC',
        params: ['Hello', '2026-03-04 05:06:07.000000'],
      });
      expect(outcome.ok && JSON.parse(outcome.value).results).toEqual([{ id: 7, txt: 'Hello' }]);
    });

    it('should format timestamps for TIMESTAMP(6) columns', () => {
      expect(formatTimestamp(new Date('2026-12-31T23:59:58.123Z'))).toBe('2026-12-31 23:59:58.123000');
    });

    it('should reuse an existing table', async () => {
      connection.queueResult(result(['1'], [1])).queueExecute(1).queueResult(result(['id'], [7]));

      await storeUserQuery(
        connection,
        { db_name: 'rag_queries', table_name: 'pdf_user_queries', question: 'Hello' },
        logger,
      );

      expect(connection.sql.some((sql) => sql.startsWith('CREATE TABLE'))).toBe(false);
    });

    it('should reject an empty question', async () => {
      expect(
        await storeUserQuery(connection, { db_name: 'a', table_name: 'b', question: '/rag ' }, logger),
      ).toEqual({ ok: false, error: 'question is required' });
    });
  });

  it('should tokenize the newest question with the configured model', () => {
    const sql = tokenizeQuerySql(config);

    expect(sql).toContain('REPLACE VIEW "rag_queries".v_topics_tokenized AS (');
    expect(sql).toContain('FROM "rag_queries"."user_query"');
    expect(sql).toContain("WHERE model_id = 'bge-small-en-v1.5'");
  });

  it('should replace the previous query embedding table', async () => {
    connection.queueResult(result(['1'], [1]));

    await createQueryEmbeddingTable(connection, config, logger);

    expect(connection.sql[1]).toBe('DROP TABLE "rag_queries"."user_query_embeddings"');
    expect(connection.sql[2]).toContain('VectorLength(384)');
  });

  it('should rank chunks by cosine distance', () => {
    const sql = semanticSearchSql(config, 5);

    expect(sql).toContain('TopK(5)');
    expect(sql).toContain("TargetFeatureColumns('[emb_0:emb_383]')");
    expect(sql).toContain('JOIN "rag_vectors"."pdf_chunks" e_ref');
  });

  describe('session configuration', () => {
    it('should refuse workflow steps before rag_setConfig', async () => {
      const response = await ragTool('rag_tokenizeQuery').invoke({}, createTestContext(connection));

      expect(textOf(response)).toBe(`Error: ${RAG_CONFIG_MISSING}`);
      expect(connection.calls).toHaveLength(0);
    });

    it('should store the configuration for later steps', async () => {
      const context = createTestContext(connection);

      await ragTool('rag_setConfig').invoke(
        {
          query_db: 'rag_queries',
          model_db: 'rag_models',
          vector_db: 'rag_vectors',
          vector_table: 'pdf_chunks',
        },
        context,
      );
      const response = await ragTool('rag_semanticSearchChunks').invoke({ k: '3' }, context);

      expect(context.session.rag).toEqual(config);
      expect(envelopeOf(response).metadata).toMatchObject({
        tool_name: 'rag_semanticSearchChunks',
        top_k: 3,
        vector_table: 'rag_vectors.pdf_chunks',
      });
    });
  });
});
