import { z } from 'zod';

import { ValidationError } from './errors.js';

/**
 * Zod schema for all supported environment variables.
 * Uses .coerce for numbers, provides defaults, and enforces enums.
 */
export const EnvSchema = z.object({
  CORS_ORIGIN: z.string().default('*'),

  HOST: z.string().default('localhost'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  NAME: z.string().default('promptlab-api'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  PORT: z.coerce.number().int().min(0).max(65535).default(8000),

  STORAGE_TYPE: z.enum(['memory']).default('memory'),

  VERSION: z.string().default('0.1.0'),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Parses the given environment. Throws a ValidationError listing every
 * offending variable.
 */
export function parseConfig(env: Record<string, string | undefined>): EnvVars {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.errors.map(e => `- ${e.path.join('.')}: ${e.message}`);
    throw new ValidationError(
      'Invalid or missing environment variables:\n' + errors.join('\n'),
      result.error.errors,
    );
  }
  return result.data;
}

/**
 * Loads and validates the server configuration from environment variables.
 * Prints the problems and exits if validation fails.
 */
export function loadConfig(): EnvVars {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(`\n${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}
