/**
 * Session Pipeline
 *
 * Orchestrates one interactive run:
 * 1. Choose feed order and feeds
 * 2. Choose the time window
 * 3. Fetch and date-filter each feed, in selection order
 * 4. Merge entries newest first
 * 5. Generate program notes with OpenAI
 * 6. Print and save the notes
 */

import { fetchFeed, sortFeeds, type FeedParser } from './scraper/index.js';
import { filterEntriesByDate, sortEntriesByDate } from './filter/index.js';
import { generateProgramNotes, type ChatCompletionClient, type NotesOptions } from './summarizer/index.js';
import { buildNotesFilename, saveProgramNotes } from './output/notes-writer.js';
import { INVALID_SELECTION_MESSAGE, type Prompter } from './cli/prompter.js';
import { logger } from './utils/logger.js';
import type { Entry, Feed, FeedSortMode, SessionOutcome } from './types/index.js';

/**
 * Everything a session needs, passed in by the caller
 */
export interface SessionDeps {
  feeds: readonly Feed[];
  prompter: Prompter;
  parser: FeedParser;
  client: ChatCompletionClient;
  notes: NotesOptions;
  outputDir: string;
  now?: () => Date;
}

const SORT_MODES: readonly { mode: FeedSortMode; label: string }[] = [
  { mode: 'asc', label: 'Alphabetical (A-Z)' },
  { mode: 'desc', label: 'Reverse alphabetical (Z-A)' },
  { mode: 'original', label: 'As listed in the feeds file' },
];

const MAX_WEEKS = 4;

async function selectFeeds(prompter: Prompter, feeds: readonly Feed[]): Promise<Feed[] | null> {
  prompter.print('\n=== Sort Feeds ===');
  SORT_MODES.forEach(({ label }, i) => prompter.print(`${i + 1}. ${label}`));

  const sortChoice = await prompter.promptInteger('\nSelect sort order (number): ', {
    min: 1,
    max: SORT_MODES.length,
    rangeMessage: INVALID_SELECTION_MESSAGE,
  });
  if (sortChoice === null) return null;

  const sorted = sortFeeds(feeds, SORT_MODES[sortChoice - 1].mode);

  prompter.print('\n=== Available RSS Feeds ===');
  sorted.forEach((feed, i) => prompter.print(`${i + 1}. ${feed.name}`));

  const indices = await prompter.promptSelection(
    '\nSelect feeds (comma-separated numbers, e.g. 1,3): ',
    sorted.length
  );
  if (indices === null) return null;

  return indices.map((i) => sorted[i]);
}

async function selectWeeks(prompter: Prompter): Promise<number | null> {
  prompter.print('\n=== Select Time Period ===');
  prompter.print('1. Past week');
  for (let weeks = 2; weeks <= MAX_WEEKS; weeks++) {
    prompter.print(`${weeks}. Past ${weeks} weeks`);
  }

  return prompter.promptInteger('\nSelect time period (number): ', {
    min: 1,
    max: MAX_WEEKS,
    rangeMessage: INVALID_SELECTION_MESSAGE,
  });
}

/**
 * Fetch and filter the selected feeds one at a time. Entries are tagged with
 * their feed name when more than one feed is selected.
 */
async function collectEntries(
  deps: SessionDeps,
  feeds: readonly Feed[],
  weeksAgo: number
): Promise<Entry[]> {
  const { prompter, parser } = deps;
  const multiFeed = feeds.length > 1;
  const now = deps.now?.() ?? new Date();
  const collected: Entry[] = [];

  for (const feed of feeds) {
    prompter.print(`\nFetching ${feed.name} feed...`);
    const result = await fetchFeed(feed.url, parser);

    if (!result.ok) {
      prompter.print(`Could not fetch ${feed.name}. Skipping.`);
      continue;
    }

    prompter.print(`Found ${result.entries.length} entries in ${feed.name}.`);

    const recent = filterEntriesByDate(result.entries, weeksAgo, now);
    prompter.print(`${recent.length} entries from the past ${weeksAgo} week(s).`);

    logger.info(
      { feed: feed.name, found: result.entries.length, recent: recent.length, weeksAgo },
      'Feed processed'
    );

    collected.push(...(multiFeed ? recent.map((entry) => ({ ...entry, sourceName: feed.name })) : recent));
  }

  return sortEntriesByDate(collected);
}

/**
 * Run one interactive session
 */
export async function runSession(deps: SessionDeps): Promise<SessionOutcome> {
  const { prompter } = deps;
  const startTime = Date.now();

  if (deps.feeds.length === 0) {
    prompter.print('No RSS feeds configured. Exiting.');
    return { status: 'no-feeds' };
  }

  const feeds = await selectFeeds(prompter, deps.feeds);
  if (feeds === null) return { status: 'cancelled' };

  const weeksAgo = await selectWeeks(prompter);
  if (weeksAgo === null) return { status: 'cancelled' };

  logger.info({ feeds: feeds.map((feed) => feed.name), weeksAgo }, 'Starting session');

  const entries = await collectEntries(deps, feeds, weeksAgo);
  if (entries.length === 0) {
    prompter.print('\nNo entries found for the selected time period. Exiting.');
    return { status: 'no-entries' };
  }
  prompter.print(`\nUsing ${entries.length} entries in total.`);

  const topicCount = await prompter.promptInteger('\nHow many topics for the program notes? (1-5): ', {
    min: 1,
    max: 5,
    rangeMessage: 'Please enter a number between 1 and 5.',
  });
  if (topicCount === null) return { status: 'cancelled' };

  const techLevel = await prompter.promptInteger(
    '\nTechnical depth level (0-5, where 0 is non-technical and 5 is highly technical): ',
    { min: 0, max: 5, rangeMessage: 'Please enter a number between 0 and 5.' }
  );
  if (techLevel === null) return { status: 'cancelled' };

  prompter.print('\nGenerating podcast program notes...');
  const notes = await generateProgramNotes(
    { entries, topicCount, techLevel, multiFeed: feeds.length > 1 },
    deps.client,
    deps.notes
  );

  prompter.print('\n=== Podcast Program Notes ===\n');
  prompter.print(notes.text);

  const filename = buildNotesFilename(
    feeds.map((feed) => feed.name),
    deps.now?.() ?? new Date()
  );

  let filePath: string | null = null;
  try {
    filePath = await saveProgramNotes(deps.outputDir, filename, notes.text);
    prompter.print(`\nProgram notes saved to ${filePath}`);
  } catch (error) {
    logger.error({ error, outputDir: deps.outputDir, filename }, 'Failed to save program notes');
    prompter.print(`\nCould not save program notes to ${deps.outputDir}.`);
  }

  logger.info(
    { status: notes.status, filePath, durationMs: Date.now() - startTime },
    'Session complete'
  );

  return { status: 'completed', filePath, notes };
}
