/**
 * Program Notes Generator
 *
 * Turns recent feed entries into podcast program notes with OpenAI
 */

import OpenAI from 'openai';
import { logger } from '../utils/logger.js';
import { stripTags, truncate } from '../utils/text.js';
import type { Entry, GenerationRequest, NotesResult } from '../types/index.js';

export const NO_ENTRIES_MESSAGE = 'No entries found for the selected time period.';
export const GENERATION_FAILED_MESSAGE = 'Failed to generate program notes. Please try again.';

/** Entries beyond this are left out of the prompt */
export const MAX_PROMPT_ENTRIES = 20;
export const SUMMARY_MAX_LENGTH = 500;

export const SYSTEM_PROMPT =
  'You are an expert podcast producer who creates concise, informative program notes.';

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

/**
 * The slice of the OpenAI client used here
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: ChatMessage[];
        max_tokens: number;
        temperature: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface NotesOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Create OpenAI client
 */
export function createClient(apiKey: string): ChatCompletionClient {
  return new OpenAI({ apiKey });
}

/**
 * Summary text of an entry: the `summary` field, else the first content
 * block with a value. Tags are stripped and long text is cut.
 */
export function extractSummary(entry: Entry): string {
  const summary = entry.summary ?? entry.content?.find((block) => block.value)?.value ?? '';
  return truncate(stripTags(summary), SUMMARY_MAX_LENGTH);
}

/**
 * Format one entry as a numbered article block (index is zero-based)
 */
export function formatArticle(entry: Entry, index: number, multiFeed: boolean): string {
  const lines = [
    `Article ${index + 1}:`,
    `Title: ${entry.title || 'No title'}`,
    `Link: ${entry.link || 'No link'}`,
  ];

  if (multiFeed) {
    lines.push(`Source: ${entry.sourceName || 'Unknown source'}`);
  }

  lines.push(`Published: ${entry.published ?? entry.updated ?? ''}`);
  lines.push(`Summary: ${extractSummary(entry)}`);

  return lines.join('\n');
}

/**
 * Build the user prompt for a generation request
 */
export function buildPrompt(request: GenerationRequest): string {
  const { topicCount, techLevel, multiFeed } = request;
  const entries = request.entries.slice(0, MAX_PROMPT_ENTRIES);

  const intro = multiFeed
    ? 'Here are recent articles from several RSS feeds:'
    : 'Here are recent articles from an RSS feed:';
  const articles = entries.map((entry, i) => formatArticle(entry, i, multiFeed)).join('\n\n');
  const mentionSources = multiFeed ? ', including their source names' : '';
  const relatedFormat = multiFeed ? '[Article url] ([Source name])' : '[Article url]';

  return `Based on the articles provided, create program notes for a weekly podcast episode.
The notes should cover ${topicCount} main topics from these articles.

Technical depth level: ${techLevel}/5 (where 0 is non-technical and 5 is highly technical)

For each topic:
1. Create a catchy title
2. Write a brief summary (2-3 sentences)
3. Include key points for discussion (3-5 bullet points)
4. Mention relevant articles from the list${mentionSources}

${intro}

${articles}

Format the response as:
# Weekly Podcast Program Notes

## Topic 1: [Catchy Title]
[Brief summary]

Key points:
- [Point 1]
- [Point 2]
- [Point 3]

Related articles: ${relatedFormat}

## Topic 2: [Catchy Title]
...and so on
`;
}

/**
 * Generate program notes. Never rejects: the result text is the generated
 * notes, NO_ENTRIES_MESSAGE or GENERATION_FAILED_MESSAGE.
 */
export async function generateProgramNotes(
  request: GenerationRequest,
  client: ChatCompletionClient,
  options: NotesOptions
): Promise<NotesResult> {
  if (request.entries.length === 0) {
    logger.info('No entries to summarize, skipping generation');
    return { status: 'empty', text: NO_ENTRIES_MESSAGE };
  }

  const prompt = buildPrompt(request);

  logger.info(
    {
      entries: Math.min(request.entries.length, MAX_PROMPT_ENTRIES),
      topicCount: request.topicCount,
      techLevel: request.techLevel,
      model: options.model,
    },
    'Generating program notes'
  );

  try {
    const response = await client.chat.completions.create({
      model: options.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      max_tokens: options.maxTokens,
      temperature: options.temperature,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      logger.error({ model: options.model }, 'Empty response from OpenAI');
      return { status: 'failed', text: GENERATION_FAILED_MESSAGE };
    }

    logger.info({ length: content.length }, 'Program notes generated');
    return { status: 'generated', text: content };
  } catch (error) {
    logger.error({ error }, 'Failed to generate program notes');
    return { status: 'failed', text: GENERATION_FAILED_MESSAGE };
  }
}
