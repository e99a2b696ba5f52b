/**
 * Enterprise Vector Store tool parameter schemas
 */

import { z } from 'zod';

const questionSchema = z.string().min(1).describe('Natural language question');

export const similaritySearchSchema = z.object({
  question: questionSchema,
  top_k: z.coerce.number().int().positive().default(1).describe('top matches to return'),
});

export const bestAnswerSchema = z.object({
  question: questionSchema,
  top_k: z.coerce
    .number()
    .int()
    .positive()
    .default(2)
    .describe('rows to inspect before picking best'),
});

export type SimilaritySearchParams = z.infer<typeof similaritySearchSchema>;
export type BestAnswerParams = z.infer<typeof bestAnswerSchema>;
