/**
 * Form Validation Schemas
 */

import { z } from 'zod';
import { idList, optionalBoundedText, optionalId, optionalText, requiredText } from './common';

const translationSchema = z.object({
  transcription: z.string().min(1, 'Please enter a value'),
  grammaticality: optionalText,
});

/**
 * POST /forms, PUT /forms/:id
 */
export const formBodySchema = z.object({
  transcription: requiredText(510),
  morpheme_break: optionalBoundedText(510),
  morpheme_gloss: optionalBoundedText(510),
  grammaticality: optionalBoundedText(255),
  translations: z
    .array(translationSchema)
    .nullish()
    .transform((value) => value ?? []),
  syntax: optionalText,
  syntactic_category: optionalId,
  tags: idList,
});

export type FormBody = z.infer<typeof formBodySchema>;
