/**
 * Notes Writer
 *
 * Names and writes the program notes file for a session
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../utils/logger.js';

/**
 * Make a feed name safe for use in a file name
 */
export function sanitizeFeedName(name: string): string {
  return name.replace(/[ /\\]/g, '_');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * File name for a run over one or more feeds. Only the first two feed names
 * are spelled out; the rest are counted.
 */
export function buildNotesFilename(feedNames: readonly string[], date: Date): string {
  const named = feedNames.slice(0, 2).map(sanitizeFeedName);
  const remaining = feedNames.length - named.length;
  const fragment = remaining > 0 ? `${named.join('_')}_and_${remaining}_more` : named.join('_');
  return `${fragment}_${formatTimestamp(date)}.md`;
}

/**
 * Write notes into `dir` (created if needed). Fails rather than overwrite.
 */
export async function saveProgramNotes(dir: string, filename: string, notes: string): Promise<string> {
  await mkdir(dir, { recursive: true });

  const filePath = join(dir, filename);
  await writeFile(filePath, notes, { encoding: 'utf-8', flag: 'wx' });

  logger.info({ filePath, length: notes.length }, 'Program notes saved');
  return filePath;
}
