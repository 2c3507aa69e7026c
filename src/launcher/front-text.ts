import type { CurrentCardInfo } from '../types.js';

export const MAX_FRONT_LENGTH = 800;
export const MAX_WORDS = 3;
export const FALLBACK_LENGTH = 100;

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
};

/**
 * Reduces rendered card HTML to plain text: style and script blocks, sound
 * tags and markup are removed, a few common entities are unescaped and
 * whitespace is collapsed.
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<(style|script)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/\[sound:[^\]]*\]/g, ' ')
    .replace(/<[^>]*>/g, ' ')
    .replace(/&(nbsp|amp|lt|gt);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Word tokens of at least two characters, deduplicated case-insensitively
 * (first spelling wins).
 */
export function tokensFromText(text: string): string[] {
  const seen = new Set<string>();
  const tokens: string[] = [];
  for (const match of text.matchAll(/[\p{L}\p{M}\p{N}_]+/gu)) {
    const token = match[0];
    const key = token.toLowerCase();
    if (token.length < 2 || seen.has(key)) continue;
    seen.add(key);
    tokens.push(token);
  }
  return tokens;
}

/**
 * Builds the --word-list value for a card front: the longest tokens, in the
 * order they appear, joined by commas. Text without usable tokens is passed
 * on as a single entry.
 */
export function deriveWordList(frontText: string): string {
  const tokens = tokensFromText(frontText);
  if (tokens.length === 0) {
    return frontText.slice(0, FALLBACK_LENGTH).trim();
  }

  const longest = tokens
    .map((token, index) => ({ token, index }))
    .sort((a, b) => b.token.length - a.token.length)
    .slice(0, MAX_WORDS)
    .sort((a, b) => a.index - b.index);
  return longest.map(({ token }) => token).join(',');
}

/**
 * Front text of the card shown in the reviewer. Uses the rendered question
 * and falls back to the note's first field.
 */
export function extractFrontText(card: CurrentCardInfo): string {
  let text = stripHtml(card.question);
  if (!text) {
    const [firstField] = Object.values(card.fields);
    text = stripHtml(firstField ?? '');
  }
  return text.slice(0, MAX_FRONT_LENGTH);
}
