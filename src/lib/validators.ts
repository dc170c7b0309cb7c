/**
 * Request validation schemas
 */

import { z } from 'zod';

/**
 * POST /extract body. The url is only a base for resolving relative
 * references; it is never fetched.
 */
export const extractRequestSchema = (maxHtmlLength: number) =>
  z.object({
    html: z
      .string({ required_error: 'html is required', invalid_type_error: 'html must be a string' })
      .refine((value) => value.trim().length > 0, { message: 'html must not be empty' })
      .refine((value) => value.length <= maxHtmlLength, {
        message: `html must be at most ${maxHtmlLength} characters`,
      }),
    url: z
      .string()
      .trim()
      .url({ message: 'url must be an absolute URL' })
      .refine((value) => /^https?:\/\//i.test(value), { message: 'url must use http or https' })
      .optional(),
  });
