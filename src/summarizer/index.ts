/**
 * Summarizer Module
 *
 * OpenAI-powered program notes generation
 */

export {
  createClient,
  buildPrompt,
  extractSummary,
  formatArticle,
  generateProgramNotes,
  NO_ENTRIES_MESSAGE,
  GENERATION_FAILED_MESSAGE,
  MAX_PROMPT_ENTRIES,
  SUMMARY_MAX_LENGTH,
  SYSTEM_PROMPT,
  type ChatCompletionClient,
  type ChatMessage,
  type NotesOptions,
} from './program-notes.js';
