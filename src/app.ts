/**
 * Application bootstrap
 *
 * Validates the environment, wires the real collaborators and runs a
 * session. Resolves the process exit code.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { createConfig, loadEnv } from './config/index.js';
import { createFeedParser, resolveFeeds, type FeedParser } from './scraper/index.js';
import { createClient, type ChatCompletionClient } from './summarizer/index.js';
import { createLineReader, Prompter, type LineReader, type Output } from './cli/prompter.js';
import { runSession } from './pipeline.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  env?: Record<string, string | undefined>;
  createClient?: (apiKey: string) => ChatCompletionClient;
  createParser?: () => FeedParser;
  /** Defaults to a readline interface over stdin/stdout */
  reader?: LineReader;
  output?: Output;
  errorOutput?: Output;
}

export async function runApp(options: AppOptions = {}): Promise<number> {
  const output = options.output ?? console.log;
  const errorOutput = options.errorOutput ?? console.error;

  const envResult = loadEnv(options.env ?? process.env);
  if (!envResult.ok) {
    errorOutput(envResult.message);
    logger.fatal('OPENAI_API_KEY is not set');
    return 1;
  }

  if (envResult.invalidSettings.length > 0) {
    logger.warn({ settings: envResult.invalidSettings }, 'Invalid settings replaced with defaults');
  }

  const config = createConfig(envResult.env);
  logger.info(
    { env: config.app.env, model: config.openai.model, feedsFile: config.feeds.file },
    'Starting application'
  );

  output('=== RSS Podcast Note Generator ===');

  const feeds = await resolveFeeds(config.feeds.file, config.feeds.defaults);
  const client = (options.createClient ?? createClient)(config.openai.apiKey);
  const parser = (options.createParser ?? createFeedParser)();

  let rl: Interface | undefined;
  let reader = options.reader;
  if (!reader) {
    rl = createInterface({ input: process.stdin, output: process.stdout });
    reader = createLineReader(rl);
  }

  try {
    const outcome = await runSession({
      feeds,
      prompter: new Prompter(reader, output),
      parser,
      client,
      notes: {
        model: config.openai.model,
        maxTokens: config.openai.maxTokens,
        temperature: config.openai.temperature,
      },
      outputDir: config.output.dir,
    });

    logger.info({ status: outcome.status }, 'Session finished');
    return 0;
  } finally {
    rl?.close();
  }
}
