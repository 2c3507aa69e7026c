import type { CardStore } from '../types.js';
import { deckQuery } from './selector.js';
import { EDITABLE_FIELDS } from './types.js';
import { logDebug } from './logger.js';

const TTS_SOUND = /\[sound:hypertts-[^\]]*?\.mp3\]/g;

/**
 * Drops generated TTS tags, then collapses the spaces they leave behind.
 * Values without such a tag come back untouched.
 */
export function stripTtsSounds(value: string): string {
  const stripped = value.replace(TTS_SOUND, '');
  if (stripped === value) return value;
  return stripped.replace(/ {2,}/g, ' ').trim();
}

export interface StripTtsResult {
  scanned: number;
  changedNoteIds: number[];
}

/**
 * Removes generated TTS sound tags from the Front and Back of every note in
 * the deck. Audio is left alone. With `dryRun` nothing is written.
 */
export async function stripTtsFromDeck(
  store: CardStore,
  deckName: string,
  options: { dryRun: boolean },
): Promise<StripTtsResult> {
  const noteIds = await store.findNotes(deckQuery(deckName));
  const notes = await store.notesInfo(noteIds);
  const changedNoteIds: number[] = [];

  for (const note of notes) {
    const fields: Record<string, string> = {};
    for (const name of EDITABLE_FIELDS) {
      const value = note.fields[name];
      if (value === undefined) continue;
      const stripped = stripTtsSounds(value);
      if (stripped !== value) {
        fields[name] = stripped;
      }
    }
    if (Object.keys(fields).length === 0) continue;

    changedNoteIds.push(note.noteId);
    await logDebug(
      `Note ${note.noteId}: removing TTS sounds from ${Object.keys(fields).join(', ')}`,
    );
    if (!options.dryRun) {
      await store.updateNoteFields(note.noteId, fields);
    }
  }

  return { scanned: notes.length, changedNoteIds };
}
