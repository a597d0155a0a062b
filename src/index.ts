/**
 * RSS Podcast Note Generator
 *
 * Interactive pipeline that:
 * 1. Loads the feed list (rss_feeds.json, or built-in defaults)
 * 2. Fetches the selected RSS/Atom feeds
 * 3. Keeps entries from the past 1-4 weeks
 * 4. Generates podcast program notes with OpenAI
 * 5. Writes the notes to the output directory
 *
 * Usage:
 *   node dist/index.js
 *   npx tsx src/index.ts
 */

import { runApp } from './app.js';
import { logger } from './utils/logger.js';

runApp()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Application failed');
    process.exitCode = 1;
  });
