/**
 * Keyword Extraction
 *
 * Shared by the context router (keyword index) and the SQLite adapter
 * (free text to FTS5 query).
 */

import { readFileSync } from 'fs';

export const DEFAULT_MAX_KEYWORDS = 20;

const FTS_RESERVED = new Set(['and', 'or', 'not', 'near']);

function loadStopWords(): Set<string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./stop-words.json', import.meta.url), 'utf8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('stop-words.json must contain an array of strings');
  }
  return new Set(raw.filter((w): w is string => typeof w === 'string'));
}

export const STOP_WORDS: ReadonlySet<string> = loadStopWords();

/**
 * Lower-case, split on [a-z0-9_-]+, drop stop words and tokens of two
 * characters or fewer, de-duplicate in order and cap at `maxKeywords`.
 */
export function extractKeywords(text: string, maxKeywords = DEFAULT_MAX_KEYWORDS): string[] {
  const words = text.toLowerCase().match(/[a-z0-9_-]+/g) ?? [];
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const word of words) {
    if (word.length <= 2 || STOP_WORDS.has(word) || seen.has(word)) continue;
    seen.add(word);
    keywords.push(word);
    if (keywords.length >= maxKeywords) break;
  }

  return keywords;
}

/**
 * Build an FTS5 OR query of quoted keywords, or null when nothing is left
 */
export function toFtsQuery(text: string, maxKeywords = DEFAULT_MAX_KEYWORDS): string | null {
  const keywords = extractKeywords(text, maxKeywords).filter((w) => !FTS_RESERVED.has(w));
  if (keywords.length === 0) return null;
  return keywords.map((w) => `"${w}"`).join(' OR ');
}
