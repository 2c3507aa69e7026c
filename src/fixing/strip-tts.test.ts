import { describe, it, expect } from 'vitest';
import { InMemoryCardStore } from '../testing/in-memory-card-store.js';
import { stripTtsFromDeck, stripTtsSounds } from './strip-tts.js';

function createStore(): InMemoryCardStore {
  return new InMemoryCardStore()
    .addNote(
      {
        noteId: 1,
        modelName: 'Basic',
        fields: {
          Front: 'en hund[sound:hypertts-ab12.mp3]',
          Back: 'dog',
          Audio: '[sound:hypertts-cd34.mp3]',
        },
        tags: [],
      },
      { cardId: 10, deckName: 'Svenska', due: 1 },
    )
    .addNote(
      {
        noteId: 2,
        modelName: 'Basic',
        fields: { Front: 'en katt', Back: 'cat[sound:katt.mp3]', Audio: '' },
        tags: [],
      },
      { cardId: 20, deckName: 'Svenska', due: 2 },
    );
}

describe('stripTtsSounds', () => {
  it('removes generated TTS tags only', () => {
    expect(
      stripTtsSounds('a[sound:hypertts-1.mp3] b [sound:recorded.mp3]'),
    ).toBe('a b [sound:recorded.mp3]');
  });

  it('collapses the spaces a removed tag leaves', () => {
    expect(stripTtsSounds('Hund [sound:hypertts-x.mp3]')).toBe('Hund');
    expect(
      stripTtsSounds('en [sound:hypertts-1.mp3] stor [sound:hypertts-2.mp3] hund'),
    ).toBe('en stor hund');
  });

  it('leaves values without a TTS tag as they are', () => {
    expect(stripTtsSounds(' hund  ')).toBe(' hund  ');
  });
});

describe('stripTtsFromDeck', () => {
  it('updates Front and Back of affected notes and leaves Audio alone', async () => {
    const store = createStore();
    const result = await stripTtsFromDeck(store, 'Svenska', { dryRun: false });

    expect(result).toEqual({ scanned: 2, changedNoteIds: [1] });
    expect(store.fieldUpdates).toEqual([
      { noteId: 1, fields: { Front: 'en hund' } },
    ]);
    expect(store.notes.get(1)?.fields.Audio).toBe('[sound:hypertts-cd34.mp3]');
  });

  it('writes nothing in a dry run', async () => {
    const store = createStore();
    const result = await stripTtsFromDeck(store, 'Svenska', { dryRun: true });

    expect(result.changedNoteIds).toEqual([1]);
    expect(store.fieldUpdates).toEqual([]);
  });
});
