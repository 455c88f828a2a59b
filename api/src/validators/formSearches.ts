/**
 * Form Search Validation Schemas
 */

import { z } from 'zod';
import { optionalText, requiredName } from './common';

/**
 * POST /formsearches
 * `search` is compiled by the query builder before it is stored.
 */
export const formSearchBodySchema = z.object({
  name: requiredName,
  search: z.record(z.string(), z.unknown(), {
    required_error: 'Please enter a value',
    invalid_type_error: 'The search must be a query object',
  }),
  description: optionalText,
});

export type FormSearchBody = z.infer<typeof formSearchBodySchema>;
