/**
 * Environment variable validation using Zod
 *
 * Only OPENAI_API_KEY is required. Any other setting that is present but
 * invalid falls back to its default and is reported by name.
 */

import { z } from 'zod';
import 'dotenv/config';

export const MISSING_CREDENTIAL_MESSAGE =
  'Error: OPENAI_API_KEY not found in environment or .env file';

/**
 * Build the schemas. `invalid` collects the names of settings that were
 * set but rejected; unset settings take their default silently.
 */
function buildSchemas(invalid: string[]) {
  const withDefault = <T extends z.ZodTypeAny>(name: string, schema: T, fallback: z.output<T>) =>
    schema.catch(({ input }: { input: unknown }) => {
      if (input !== undefined) invalid.push(name);
      return fallback;
    });

  const logging = z.object({
    // Logging
    LOG_LEVEL: withDefault(
      'LOG_LEVEL',
      z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
      'info'
    ),
    LOG_FILE: withDefault('LOG_FILE', z.string().min(1), './logs/app.log'),

    // Environment
    NODE_ENV: withDefault('NODE_ENV', z.enum(['development', 'production', 'test']), 'development'),
  });

  const env = logging.extend({
    // OpenAI
    OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
    OPENAI_MODEL: withDefault('OPENAI_MODEL', z.string().min(1), 'gpt-4o-mini'),
    OPENAI_MAX_TOKENS: withDefault('OPENAI_MAX_TOKENS', z.coerce.number().int().positive(), 4000),
    OPENAI_TEMPERATURE: withDefault('OPENAI_TEMPERATURE', z.coerce.number().min(0).max(2), 0.7),

    // Files
    FEEDS_FILE: withDefault('FEEDS_FILE', z.string().min(1), './rss_feeds.json'),
    OUTPUT_DIR: withDefault('OUTPUT_DIR', z.string().min(1), './output'),
  });

  return { logging, env };
}

type Schemas = ReturnType<typeof buildSchemas>;

export type Env = z.infer<Schemas['env']>;
export type LoggingEnv = z.infer<Schemas['logging']>;

export type EnvResult =
  | { ok: true; env: Env; invalidSettings: string[] }
  | { ok: false; message: string };

type EnvSource = Record<string, string | undefined>;

/**
 * Validate the full environment. Never throws; the only failure is a
 * missing API key, so the caller can abort before any network call.
 */
export function loadEnv(source: EnvSource = process.env): EnvResult {
  const invalidSettings: string[] = [];
  const result = buildSchemas(invalidSettings).env.safeParse(source);

  if (!result.success) {
    return { ok: false, message: MISSING_CREDENTIAL_MESSAGE };
  }

  return { ok: true, env: result.data, invalidSettings };
}

/**
 * Logging settings are read eagerly: the logger exists before the
 * credential check runs.
 */
export const loggingEnv: LoggingEnv = buildSchemas([]).logging.parse(process.env);
