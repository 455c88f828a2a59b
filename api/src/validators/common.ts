/**
 * Shared Validation Schemas
 *
 * Ordering and pagination parameters, search bodies, and the zValidator
 * hook that hands failures to the error handler.
 */

import { z, type ZodError } from 'zod';
import { MAX_INTEGER_ID } from '@/db/schema';
import { NotFoundError } from '@/errors/http';
import { normalize } from '@/utils/text';
import type { IndexParams } from '@/services/listing';

const POSITIVE_INTEGER_MESSAGE = 'Please enter an integer greater than or equal to 1';

/**
 * zValidator hook: rethrow so the error handler renders `{errors}`
 */
export function throwOnInvalid(result: { success: true } | { success: false; error: ZodError }): void {
  if (!result.success) {
    throw result.error;
  }
}

/**
 * Numeric path id; anything else cannot name a resource
 */
export function resourceId(raw: string, notFoundMessage: (id: string) => string): number {
  const id = Number(raw);
  if (!/^\d+$/.test(raw) || id > MAX_INTEGER_ID) {
    throw new NotFoundError(notFoundMessage(raw));
  }
  return id;
}

const positiveInteger = z.coerce
  .number({ invalid_type_error: POSITIVE_INTEGER_MESSAGE })
  .int(POSITIVE_INTEGER_MESSAGE)
  .min(1, POSITIVE_INTEGER_MESSAGE)
  .max(MAX_INTEGER_ID, `Please enter an integer less than or equal to ${MAX_INTEGER_ID}`);

/**
 * GET index query string
 * order_by_* take effect only together; page/items_per_page likewise
 */
export const indexQuerySchema = z
  .object({
    page: positiveInteger.optional(),
    items_per_page: positiveInteger.optional(),
    order_by_model: z.string().optional(),
    order_by_attribute: z.string().optional(),
    order_by_direction: z.string().optional(),
  })
  .superRefine((params, ctx) => {
    const { order_by_model, order_by_attribute, order_by_direction } = params;
    if (
      order_by_model &&
      order_by_attribute &&
      order_by_direction !== undefined &&
      order_by_direction !== 'asc' &&
      order_by_direction !== 'desc'
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['order_by_direction'],
        message: `Value must be one of: asc; desc (not '${order_by_direction}')`,
      });
    }
  })
  .transform(({ order_by_direction, ...rest }): IndexParams => ({
    ...rest,
    order_by_direction:
      order_by_direction === 'asc' || order_by_direction === 'desc' ? order_by_direction : undefined,
  }));

export const paginatorSchema = z.object({
  page: positiveInteger,
  items_per_page: positiveInteger,
});

/**
 * POST <resource>/search body
 * The query itself is checked by the query builder.
 */
export const searchBodySchema = z.object({
  query: z.unknown(),
  paginator: paginatorSchema.optional(),
});

/** Optional string fields arrive as null from some clients */
export const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

/**
 * Required text, measured after NFD normalization
 */
export function requiredText(max: number) {
  return z
    .string({ required_error: 'Please enter a value', invalid_type_error: 'Please enter a value' })
    .trim()
    .transform(normalize)
    .pipe(
      z
        .string()
        .min(1, 'Please enter a value')
        .max(max, `Enter a value not more than ${max} characters long`)
    );
}

/** Optional text stored in a VARCHAR column */
export function optionalBoundedText(max: number) {
  return optionalText
    .transform(normalize)
    .pipe(z.string().max(max, `Enter a value not more than ${max} characters long`));
}

export const requiredName = requiredText(255);

const storableId = z
  .number({ invalid_type_error: 'Please enter an integer id' })
  .int()
  .positive()
  .max(MAX_INTEGER_ID, `Please enter an integer id less than or equal to ${MAX_INTEGER_ID}`);

export const idList = z
  .array(storableId, { invalid_type_error: 'Please enter a list of ids' })
  .nullish()
  .transform((value) => value ?? []);

export const optionalId = storableId.nullish().transform((value) => value ?? null);

export type IndexQuery = z.infer<typeof indexQuerySchema>;
export type SearchBody = z.infer<typeof searchBodySchema>;
