/**
 * Enterprise Vector Store Tools
 *
 * Similarity search against the configured vector store, and a FAQ lookup
 * that answers with the stored answer of the best-scoring match.
 */

import type { Logger } from '../../lib/logger';
import type { SqlConnection } from '../../lib/teradata';
import { createResponse, serializeValue } from '../../lib/serialize';
import { quoteIdentifier } from '../../lib/sql';
import { materializeRecords, type VectorStore } from '../../lib/vector-store';
import type { Result } from '../../domain/types';
import { executeVectorStoreTool } from '../../mcp/tools/executor';
import { defineTool } from '../../mcp/tools/tool-definition';
import { runTimed } from '../query';
import {
  bestAnswerSchema,
  similaritySearchSchema,
  type BestAnswerParams,
  type SimilaritySearchParams,
} from './schema';

export const NO_SIMILAR_QUESTION = '(No similar question found)';
export const NO_ANSWER = '(No answer for this kb_id)';

export async function similaritySearch(
  store: VectorStore,
  params: SimilaritySearchParams,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'vector_store_similarity_search', async () => {
    const results = await store.similaritySearch({ question: params.question, topK: params.top_k });
    return createResponse(results, {
      tool_name: 'evs_similarity_search',
      question: params.question,
      top_k: params.top_k,
    });
  });
}

function score(record: Record<string, unknown>): number {
  const value = Number(record.score);
  return Number.isFinite(value) ? value : Number.NEGATIVE_INFINITY;
}

/**
 * Record with the highest `score`; the first one wins a tie
 */
export function pickBestMatch(
  records: readonly Record<string, unknown>[],
): Record<string, unknown> | undefined {
  let best: Record<string, unknown> | undefined;
  for (const record of records) {
    if (best === undefined || score(record) > score(best)) {
      best = record;
    }
  }
  return best;
}

export async function bestAnswer(
  store: VectorStore,
  connection: () => Promise<SqlConnection>,
  params: BestAnswerParams,
  faqTable: string,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'vector_store_best_answer', async () => {
    const raw = await store.similaritySearch({
      question: params.question,
      topK: params.top_k,
      outputColumns: ['kb_id', 'score'],
    });
    const best = pickBestMatch(materializeRecords(raw));
    if (!best) {
      return NO_SIMILAR_QUESTION;
    }

    const kbId = serializeValue(best.kb_id);
    logger.debug({ kbId, score: best.score }, 'Best vector store match');
    const db = await connection();
    const { rows } = await db.query(
      `SELECT answer FROM ${quoteIdentifier(faqTable)} WHERE kb_id = ?`,
      [kbId],
    );
    const answer = rows[0]?.[0];
    return answer === undefined || answer === null ? NO_ANSWER : String(answer);
  });
}

export const vectorStoreTools = [
  defineTool({
    name: 'vector_store_similarity_search',
    description: 'Enterprise Vector Store similarity search',
    category: 'evs',
    shape: similaritySearchSchema.shape,
    run: (params, context) =>
      executeVectorStoreTool(context, 'vector_store_similarity_search', (store) =>
        similaritySearch(store, params, context.logger.child({ tool: 'vector_store_similarity_search' })),
      ),
  }),
  defineTool({
    name: 'vector_store_best_answer',
    description: 'Enterprise Vector Store - best answer only',
    category: 'evs',
    shape: bestAnswerSchema.shape,
    run: (params, context) =>
      executeVectorStoreTool(context, 'vector_store_best_answer', (store) =>
        bestAnswer(
          store,
          () => context.database.connection(),
          params,
          context.settings.faqTable,
          context.logger.child({ tool: 'vector_store_best_answer' }),
        ),
      ),
  }),
];
