/**
 * Environment configuration, validated with zod
 */

import { z } from 'zod';
import { DEFAULT_TECHNIQUES } from './extractor';

const techniqueList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  )
  .refine((ids) => ids.length > 0, { message: 'TECHNIQUES must name at least one technique' });

export const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  ALLOWED_ORIGINS: z.string().min(1).default('*'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  TECHNIQUES: techniqueList.default(DEFAULT_TECHNIQUES.join(',')),
  MAX_HTML_LENGTH: z.coerce.number().int().positive().default(5_000_000),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const firstError = result.error.issues[0];
    const path = firstError ? firstError.path.join('.') : '';
    const message = firstError ? firstError.message : 'Invalid configuration';
    throw new Error(path ? `Invalid configuration for ${path}: ${message}` : message);
  }
  return result.data;
}
