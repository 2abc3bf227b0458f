/**
 * Environment Configuration
 *
 * Loads and validates configuration from environment variables.
 */

import { z } from 'zod';

export const errorFormats = ['json', 'text'] as const;
export type ErrorFormat = (typeof errorFormats)[number];

const configSchema = z.object({
  // Left empty here; YnabClient rejects it with setup instructions
  accessToken: z.string(),
  defaultBudgetId: z
    .union([z.string().uuid(), z.literal('last-used'), z.literal('default')])
    .default('last-used'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  errorFormat: z.enum(errorFormats).default('json'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Read an optional environment variable, treating an empty string as unset.
 */
function readOptional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    accessToken: env['YNAB_ACCESS_TOKEN'] ?? '',
    defaultBudgetId: readOptional(env, 'YNAB_BUDGET_ID'),
    logLevel: readOptional(env, 'LOG_LEVEL')?.toLowerCase(),
    errorFormat: readOptional(env, 'ERROR_FORMAT')?.toLowerCase(),
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}
