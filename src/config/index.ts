/**
 * Application configuration
 */

import type { Env } from './env.js';
import { DEFAULT_FEEDS } from './feeds.js';

export function createConfig(env: Env) {
  return {
    app: {
      name: 'podcast-notes-generator',
      version: '1.0.0',
      env: env.NODE_ENV,
    },

    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      maxTokens: env.OPENAI_MAX_TOKENS,
      temperature: env.OPENAI_TEMPERATURE,
    },

    feeds: {
      file: env.FEEDS_FILE,
      defaults: DEFAULT_FEEDS,
    },

    output: {
      dir: env.OUTPUT_DIR,
    },
  } as const;
}

export type Config = ReturnType<typeof createConfig>;
export { loadEnv, loggingEnv, MISSING_CREDENTIAL_MESSAGE, type Env, type EnvResult } from './env.js';
export { DEFAULT_FEEDS } from './feeds.js';
