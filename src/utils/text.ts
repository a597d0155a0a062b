/**
 * Text helpers for prompt building
 */

/**
 * Remove every markup tag, keeping the text between them
 */
export function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, '').trim();
}

/**
 * Cut text to maxLength characters, marking the cut with "..."
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}
