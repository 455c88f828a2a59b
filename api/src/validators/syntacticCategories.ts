/**
 * Syntactic Category Validation Schemas
 */

import { z } from 'zod';
import { SYNTACTIC_CATEGORY_TYPES } from '@/services/syntacticCategory.service';
import { optionalText, requiredName } from './common';

const TYPE_MESSAGE = `Value must be one of: ${SYNTACTIC_CATEGORY_TYPES.join('; ')}`;

/**
 * POST /syntacticcategories, PUT /syntacticcategories/:id
 */
export const syntacticCategoryBodySchema = z.object({
  name: requiredName,
  type: z
    .enum(['lexical', 'phrasal', 'sentential', ''], {
      errorMap: () => ({ message: TYPE_MESSAGE }),
    })
    .nullish()
    .transform((value) => value ?? ''),
  description: optionalText,
});

export type SyntacticCategoryBody = z.infer<typeof syntacticCategoryBodySchema>;
