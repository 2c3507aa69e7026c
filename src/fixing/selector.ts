import type { CardStore } from '../types.js';
import type { SkippedItem } from './types.js';
import { logDebug } from './logger.js';

export interface SelectionOptions {
  deckName: string;
  wordList?: string;
  flaggedOnly: boolean;
  // 1-based; 0 and 1 both mean "from the first card"
  startFrom: number;
}

export interface Selection {
  cardIds: number[];
  skipped: SkippedItem[];
  mode: 'words' | 'flagged' | 'new';
}

/**
 * Splits a comma-separated word list, trimming items and dropping empties.
 */
export function parseWordList(wordList: string): string[] {
  return wordList
    .split(',')
    .map((word) => word.trim())
    .filter((word) => word.length > 0);
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function deckQuery(deckName: string): string {
  return `deck:"${deckName.replace(/"/g, '\\"')}"`;
}

/**
 * Cards in the deck whose Front contains `word` as a whole word.
 */
export function wordSearchQuery(deckName: string, word: string): string {
  const pattern = escapeRegex(word).replace(/"/g, '\\"');
  return `${deckQuery(deckName)} "front:re:^.*\\b${pattern}\\b.*$"`;
}

/**
 * Query for the default and flagged modes. By default only new cards that
 * have not been reviewed by the fixer yet are picked up.
 */
export function defaultSearchQuery(
  deckName: string,
  flaggedOnly: boolean,
): string {
  const filter = flaggedOnly ? 'flag:1' : '-tag:reviewed is:new';
  return `${deckQuery(deckName)} ${filter}`;
}

/**
 * Throws when the deck does not exist, listing the decks that do.
 */
export async function assertDeckExists(
  store: CardStore,
  deckName: string,
): Promise<void> {
  const deckNames = await store.deckNames();
  if (!deckNames.includes(deckName)) {
    throw new Error(
      `Deck '${deckName}' not found. Available decks: ${deckNames.join(', ')}`,
    );
  }
}

async function selectByWords(
  store: CardStore,
  deckName: string,
  words: string[],
): Promise<{ cardIds: number[]; skipped: SkippedItem[] }> {
  const cardIds: number[] = [];
  const skipped: SkippedItem[] = [];
  const seen = new Set<number>();

  for (const word of words) {
    const query = wordSearchQuery(deckName, word);
    await logDebug(`Searching: ${query}`);
    const results = await store.findCards(query);

    if (results.length === 0) {
      skipped.push({
        target: word,
        reason: 'no_match',
        details: `No card in '${deckName}' matches '${word}'.`,
      });
      continue;
    }

    if (results.length > 1) {
      skipped.push({
        target: word,
        reason: 'multiple_matches',
        details: `Found ${results.length} cards matching '${word}'. Please be more specific.`,
      });
      continue;
    }

    const [cardId] = results;
    if (cardId !== undefined && !seen.has(cardId)) {
      seen.add(cardId);
      cardIds.push(cardId);
    }
  }

  return { cardIds, skipped };
}

/**
 * Orders cards by their position in the new-card queue.
 */
export async function sortByDue(
  store: CardStore,
  cardIds: number[],
): Promise<number[]> {
  if (cardIds.length === 0) return cardIds;
  const cards = await store.cardsInfo(cardIds);
  return [...cards].sort((a, b) => a.due - b.due).map((card) => card.cardId);
}

/**
 * Picks the cards a fix run will send to the model.
 */
export async function selectCards(
  store: CardStore,
  options: SelectionOptions,
): Promise<Selection> {
  const { deckName, flaggedOnly, startFrom } = options;
  await assertDeckExists(store, deckName);

  let selection: Selection;

  if (options.wordList !== undefined) {
    const words = parseWordList(options.wordList);
    if (words.length === 0) {
      // An empty list selects nothing; it never widens to the whole deck.
      return {
        cardIds: [],
        skipped: [
          {
            target: options.wordList,
            reason: 'no_words',
            details: 'The word list contains no words.',
          },
        ],
        mode: 'words',
      };
    }
    await logDebug(`Filtering cards to words: ${words.join(', ')}`);
    const { cardIds, skipped } = await selectByWords(store, deckName, words);
    selection = { cardIds, skipped, mode: 'words' };
  } else {
    const query = defaultSearchQuery(deckName, flaggedOnly);
    await logDebug(`Searching: ${query}`);
    const found = await store.findCards(query);
    const sorted = await sortByDue(store, found);
    selection = {
      cardIds: sorted,
      skipped: [],
      mode: flaggedOnly ? 'flagged' : 'new',
    };
  }

  if (startFrom > 1) {
    selection.cardIds = selection.cardIds.slice(startFrom - 1);
    await logDebug(
      `Starting from card ${startFrom}, ${selection.cardIds.length} cards left`,
    );
  }

  return selection;
}
