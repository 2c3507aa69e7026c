import sanitizeHtml from 'sanitize-html';

/**
 * Tags a reformatted vocabulary card may contain.
 */
const CARD_TAGS = [
  // Text formatting
  'b',
  'i',
  'u',
  'strong',
  'em',
  'small',
  'sub',
  'sup',
  // Structure
  'br',
  'div',
  'span',
  // Pronunciation aids
  'ruby',
  'rt',
];

/**
 * Sanitizes model output before it is written to a card.
 *
 * Strips dangerous tags and event handlers. Inline styles pass through
 * untouched, since the gray example spans depend on them.
 */
export function sanitize(dirtyContent: string): string {
  const clean = sanitizeHtml(dirtyContent, {
    allowedTags: CARD_TAGS,
    allowedAttributes: {
      span: ['style'],
      div: ['style'],
    },
    parseStyleAttributes: false,
  });
  // Anki stores line breaks as <br>
  return clean.replace(/<br \/>/g, '<br>');
}

/**
 * Converts plain newlines to <br> and sanitizes the result.
 */
export function toCardHtml(value: string): string {
  return sanitize(value.replace(/\n/g, '<br>'));
}
