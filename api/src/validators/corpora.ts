/**
 * Corpus Validation Schemas
 */

import { z } from 'zod';
import { CORPUS_FORMAT_NAMES } from '@/services/corpusFormats';
import { idList, optionalId, optionalText, requiredName } from './common';

/**
 * POST /corpora, PUT /corpora/:id
 * Forms are not submitted; they are read from `content`.
 */
export const corpusBodySchema = z.object({
  name: requiredName,
  description: optionalText,
  content: optionalText,
  form_search: optionalId,
  tags: idList,
});

/**
 * PUT /corpora/:id/writetofile
 */
export const writeToFileSchema = z.object({
  format: z.enum(CORPUS_FORMAT_NAMES, {
    errorMap: () => ({
      message: `Value must be one of: ${CORPUS_FORMAT_NAMES.join('; ')}`,
    }),
  }),
});

export type CorpusBody = z.infer<typeof corpusBodySchema>;
export type WriteToFileBody = z.infer<typeof writeToFileSchema>;
