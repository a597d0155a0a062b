/**
 * Core types for the podcast notes generator
 */

export interface Feed {
  name: string;
  url: string;
}

export type FeedSortMode = 'asc' | 'desc' | 'original';

export interface ContentBlock {
  value: string;
}

/**
 * A feed entry. `published` and `updated` hold the raw date text from the
 * feed; the `*Parsed` fields hold the dates the feed parser resolved.
 */
export interface Entry {
  readonly title?: string;
  readonly link?: string;
  readonly summary?: string;
  readonly content?: readonly ContentBlock[];
  readonly published?: string;
  readonly publishedParsed?: Date;
  readonly updated?: string;
  readonly updatedParsed?: Date;
  readonly sourceName?: string;
}

export type FetchResult =
  | { ok: true; entries: Entry[] }
  | { ok: false; entries: Entry[]; error: string };

export interface GenerationRequest {
  entries: readonly Entry[];
  topicCount: number;
  techLevel: number;
  multiFeed: boolean;
}

export type NotesStatus = 'empty' | 'failed' | 'generated';

export interface NotesResult {
  status: NotesStatus;
  text: string;
}

export type SessionOutcome =
  | { status: 'cancelled' }
  | { status: 'no-feeds' }
  | { status: 'no-entries' }
  | { status: 'completed'; filePath: string | null; notes: NotesResult };
