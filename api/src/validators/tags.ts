/**
 * Tag Validation Schemas
 */

import { z } from 'zod';
import { optionalText, requiredName } from './common';

/**
 * POST /tags, PUT /tags/:id
 */
export const tagBodySchema = z.object({
  name: requiredName,
  description: optionalText,
});

export type TagBody = z.infer<typeof tagBodySchema>;
